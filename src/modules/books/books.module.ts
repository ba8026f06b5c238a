import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { BooksService } from './application/books.service';
import { MongoDbBooksRepository } from './infrastructure/adapters/mongodb-books.repository';
import { BooksController } from './infrastructure/controllers/books.controller';
import {
  BookSchema,
  BookSchemaFactory,
} from './infrastructure/schemas/book.schema';
import { CatalogSeedService } from './seeds/catalog-seed.service';

/**
 * Módulo de catálogo.
 *
 * - GET /books, /books/search, /books/genres, /books/:bookId
 * - CatalogSeedService: carga `seeds/catalog.json` si la colección está vacía
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: BookSchema.name, schema: BookSchemaFactory },
    ]),
  ],
  controllers: [BooksController],
  providers: [
    BooksService,
    CatalogSeedService,
    {
      provide: INJECTION_TOKENS.BOOKS_REPOSITORY,
      useClass: MongoDbBooksRepository,
    },
  ],
  exports: [INJECTION_TOKENS.BOOKS_REPOSITORY, CatalogSeedService],
})
export class BooksModule {}
