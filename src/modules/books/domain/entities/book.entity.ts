import { v4 as uuidv4 } from 'uuid';

/**
 * Entidad: Book
 * Entrada del catálogo. Solo lectura desde el flujo de compra y descarga.
 */
export class Book {
  id: string;
  title: string;
  author: string;
  description: string;
  price: number; // en la moneda del catálogo, dos decimales
  coverImage: string | null;
  genre: string | null;
  rating: number; // 0..5
  ratingCount: number;
  publishedDate: Date | null;
  filePath: string | null;
  fileSize: number | null; // bytes
  isAvailable: boolean;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<Book> = {}) {
    this.id = partial.id ?? uuidv4();
    this.title = partial.title ?? '';
    this.author = partial.author ?? '';
    this.description = partial.description ?? '';
    this.price = partial.price ?? 0;
    this.coverImage = partial.coverImage ?? null;
    this.genre = partial.genre ?? null;
    this.rating = partial.rating ?? 0;
    this.ratingCount = partial.ratingCount ?? 0;
    this.publishedDate = partial.publishedDate ?? null;
    this.filePath = partial.filePath ?? null;
    this.fileSize = partial.fileSize ?? null;
    this.isAvailable = partial.isAvailable ?? true;
    this.createdAt = partial.createdAt ?? new Date();
    this.updatedAt = partial.updatedAt ?? new Date();
  }
}
