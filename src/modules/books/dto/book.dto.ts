import type { Book } from '../domain/entities/book.entity';

/**
 * Representación pública del libro. `filePath` nunca sale del backend.
 */
export interface BookDTO {
  id: string;
  title: string;
  author: string;
  description: string;
  price: number;
  coverImage: string | null;
  genre: string | null;
  rating: number;
  ratingCount: number;
  publishedDate: string | null; // YYYY-MM-DD
  fileSize: number | null;
  isAvailable: boolean;
}

export function toBookDTO(book: Book): BookDTO {
  return {
    id: book.id,
    title: book.title,
    author: book.author,
    description: book.description,
    price: book.price,
    coverImage: book.coverImage,
    genre: book.genre,
    rating: book.rating,
    ratingCount: book.ratingCount,
    publishedDate: book.publishedDate
      ? book.publishedDate.toISOString().slice(0, 10)
      : null,
    fileSize: book.fileSize,
    isAvailable: book.isAvailable,
  };
}
