import { Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import type { IBooksRepository, NewBook } from '../domain/ports/books.port';
import catalog from './catalog.json';

export interface CatalogEntry {
  title: string;
  author: string;
  genre: string;
  description: string;
  price: number;
  rating: number;
  ratingCount: number;
  publishedDate: string;
  coverImage: string;
  filePath: string;
  fileSize: number;
}

export function toNewBook(entry: CatalogEntry): NewBook {
  return {
    title: entry.title,
    author: entry.author,
    genre: entry.genre,
    description: entry.description,
    price: entry.price,
    rating: entry.rating,
    ratingCount: entry.ratingCount,
    publishedDate: new Date(`${entry.publishedDate}T00:00:00.000Z`),
    coverImage: entry.coverImage,
    filePath: entry.filePath,
    fileSize: entry.fileSize,
    isAvailable: true,
  };
}

/**
 * CatalogSeedService - carga inicial del catálogo
 *
 * Idempotente: solo inserta cuando la colección de libros está vacía.
 */
@Injectable()
export class CatalogSeedService {
  private readonly logger = new Logger(CatalogSeedService.name);

  constructor(
    @Inject(INJECTION_TOKENS.BOOKS_REPOSITORY)
    private readonly booksRepository: IBooksRepository,
  ) {}

  async seedIfEmpty(entries: CatalogEntry[] = catalog): Promise<number> {
    const existing = await this.booksRepository.count();
    if (existing > 0) {
      this.logger.debug(
        `Books collection already has ${existing} documents - skipping seed`,
      );
      return 0;
    }

    this.logger.log('🌱 Books collection is empty - seeding catalog...');
    const inserted = await this.booksRepository.insertMany(entries.map(toNewBook));
    this.logger.log(`✅ Catalog seeded with ${inserted} books`);
    return inserted;
  }
}
