import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import {
  buildMongoQuery,
  escapeRegex,
} from '../../../../common/helpers/build-mongo-query';
import { Book } from '../../domain/entities/book.entity';
import type {
  BookFilter,
  BookPageOptions,
  IBooksRepository,
  NewBook,
} from '../../domain/ports/books.port';
import { BookSchema } from '../schemas/book.schema';

const SEARCH_FIELDS = ['title', 'author', 'description'];

/**
 * Adapter: repositorio del catálogo sobre MongoDB
 */
@Injectable()
export class MongoDbBooksRepository implements IBooksRepository {
  private readonly logger = new Logger(MongoDbBooksRepository.name);

  constructor(
    @InjectModel(BookSchema.name)
    private readonly bookModel: Model<BookSchema>,
  ) {}

  async findById(id: string): Promise<Book | null> {
    const document = await this.bookModel.findOne({ id }).exec();
    return document ? this.mapToDomain(document) : null;
  }

  async findAll(
    filter: BookFilter,
    options: BookPageOptions,
  ): Promise<{ data: Book[]; total: number }> {
    const { mongoFilter, options: query } = buildMongoQuery<
      BookSchema,
      Record<string, unknown>
    >(
      {
        limit: options.limit,
        sortBy: options.sortBy,
        sortOrder: options.sortOrder,
        search: filter.search,
        filters: {
          genre: filter.genre,
          isAvailable: filter.availableOnly ? true : undefined,
        },
      },
      SEARCH_FIELDS,
      'title',
    );

    if (filter.author) {
      Object.assign(mongoFilter, {
        author: { $regex: escapeRegex(filter.author), $options: 'i' },
      });
    }

    // Rangos
    const price: Record<string, number> = {};
    if (filter.minPrice !== undefined) price.$gte = filter.minPrice;
    if (filter.maxPrice !== undefined) price.$lte = filter.maxPrice;
    if (Object.keys(price).length > 0) {
      Object.assign(mongoFilter, { price });
    }
    if (filter.minRating !== undefined) {
      Object.assign(mongoFilter, { rating: { $gte: filter.minRating } });
    }

    const [documents, total] = await Promise.all([
      this.bookModel
        .find(mongoFilter)
        .sort(query.sort)
        .skip(options.skip)
        .limit(options.limit)
        .exec(),
      this.bookModel.countDocuments(mongoFilter).exec(),
    ]);

    return {
      data: documents.map((doc) => this.mapToDomain(doc)),
      total,
    };
  }

  async distinctGenres(): Promise<string[]> {
    const genres = await this.bookModel
      .distinct('genre', { isAvailable: true, genre: { $ne: null } })
      .exec();
    return genres
      .filter((genre): genre is string => typeof genre === 'string')
      .sort((a, b) => a.localeCompare(b));
  }

  async count(): Promise<number> {
    return this.bookModel.countDocuments().exec();
  }

  async insertMany(books: NewBook[]): Promise<number> {
    const inserted = await this.bookModel.insertMany(books);
    this.logger.debug(`Inserted ${inserted.length} books`);
    return inserted.length;
  }

  /**
   * Mapea documento de MongoDB a entidad de dominio
   */
  private mapToDomain(document: BookSchema): Book {
    return new Book({
      id: document.id,
      title: document.title,
      author: document.author,
      description: document.description,
      price: document.price,
      coverImage: document.coverImage,
      genre: document.genre,
      rating: document.rating,
      ratingCount: document.ratingCount,
      publishedDate: document.publishedDate,
      filePath: document.filePath,
      fileSize: document.fileSize,
      isAvailable: document.isAvailable,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }
}
