import { Book } from '../modules/books/domain/entities/book.entity';
import type {
  BookFilter,
  BookPageOptions,
  IBooksRepository,
  NewBook,
} from '../modules/books/domain/ports/books.port';

/**
 * Implementación en memoria de IBooksRepository para tests.
 */
export class InMemoryBooksRepository implements IBooksRepository {
  private readonly books = new Map<string, Book>();

  seed(partial: Partial<Book>): Book {
    const book = new Book(partial);
    this.books.set(book.id, book);
    return book;
  }

  async findById(id: string): Promise<Book | null> {
    return this.books.get(id) ?? null;
  }

  async findAll(
    filter: BookFilter,
    options: BookPageOptions,
  ): Promise<{ data: Book[]; total: number }> {
    const contains = (value: string, needle: string): boolean =>
      value.toLowerCase().includes(needle.toLowerCase());

    const matching = [...this.books.values()].filter((book) => {
      if (filter.availableOnly && !book.isAvailable) return false;
      if (filter.genre && book.genre !== filter.genre) return false;
      if (filter.author && !contains(book.author, filter.author)) return false;
      if (filter.minPrice !== undefined && book.price < filter.minPrice) return false;
      if (filter.maxPrice !== undefined && book.price > filter.maxPrice) return false;
      if (filter.minRating !== undefined && book.rating < filter.minRating) return false;
      if (filter.search) {
        const needle = filter.search;
        return [book.title, book.author, book.description].some((field) =>
          contains(field, needle),
        );
      }
      return true;
    });

    const direction = options.sortOrder === 'asc' ? 1 : -1;
    const sortKey = (book: Book): string | number => {
      const value = book[options.sortBy];
      if (value instanceof Date) return value.getTime();
      return value ?? '';
    };
    matching.sort((a, b) => {
      const left = sortKey(a);
      const right = sortKey(b);
      const order =
        typeof left === 'number' && typeof right === 'number'
          ? left - right
          : String(left).localeCompare(String(right));
      return order * direction;
    });

    return {
      data: matching.slice(options.skip, options.skip + options.limit),
      total: matching.length,
    };
  }

  async distinctGenres(): Promise<string[]> {
    const genres = new Set<string>();
    this.books.forEach((book) => {
      if (book.isAvailable && book.genre) genres.add(book.genre);
    });
    return [...genres].sort((a, b) => a.localeCompare(b));
  }

  async count(): Promise<number> {
    return this.books.size;
  }

  async insertMany(books: NewBook[]): Promise<number> {
    books.forEach((book) => this.seed(book));
    return books.length;
  }
}
