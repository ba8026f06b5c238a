import type { SortOrder } from '../../../../common/types/common.types';
import type { Book } from '../entities/book.entity';

export const BOOK_SORT_FIELDS = [
  'title',
  'author',
  'price',
  'rating',
  'publishedDate',
] as const;

export type BookSortField = (typeof BOOK_SORT_FIELDS)[number];

/**
 * Criterios de búsqueda del catálogo. Todos opcionales y combinables (AND).
 */
export interface BookFilter {
  availableOnly?: boolean;
  search?: string; // título, autor o descripción
  author?: string;
  genre?: string;
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
}

export interface BookPageOptions {
  skip: number;
  limit: number;
  sortBy: BookSortField;
  sortOrder: SortOrder;
}

export type NewBook = Omit<Book, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Puerto: persistencia del catálogo.
 */
export interface IBooksRepository {
  findById(id: string): Promise<Book | null>;

  findAll(
    filter: BookFilter,
    options: BookPageOptions,
  ): Promise<{ data: Book[]; total: number }>;

  /**
   * Géneros de libros disponibles, ordenados alfabéticamente.
   */
  distinctGenres(): Promise<string[]>;

  count(): Promise<number>;

  insertMany(books: NewBook[]): Promise<number>;
}
