import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { NotFoundError } from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { createPaginationMeta } from '../../../common/helpers/build-pagination-meta';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { SortOrder } from '../../../common/types/common.types';
import {
  BOOK_SORT_FIELDS,
  BookFilter,
  BookSortField,
  IBooksRepository,
} from '../domain/ports/books.port';
import {
  BookDTO,
  ListBooksQueryDto,
  SearchBooksQueryDto,
  toBookDTO,
} from '../dto';

export const MAX_PAGE_SIZE = 100;

function isSortField(value: string | undefined): value is BookSortField {
  return BOOK_SORT_FIELDS.some((field) => field === value);
}

/**
 * Servicio de catálogo: listado, búsqueda, detalle y géneros.
 * Solo expone libros disponibles.
 */
@Injectable()
export class BooksService {
  private readonly logger = new Logger(BooksService.name);
  private readonly defaultPageSize: number;

  constructor(
    @Inject(INJECTION_TOKENS.BOOKS_REPOSITORY)
    private readonly booksRepository: IBooksRepository,
    private readonly asyncContextService: AsyncContextService,
    configService: ConfigService,
  ) {
    this.defaultPageSize = configService.get<number>('BOOKS_PER_PAGE') ?? 20;
  }

  /**
   * Lista libros disponibles con paginación, búsqueda y filtro por género.
   * `sortBy` desconocido cae a `title`.
   */
  async listBooks(query: ListBooksQueryDto): Promise<ApiResponse<BookDTO[]>> {
    const sortBy: BookSortField = isSortField(query.sortBy) ? query.sortBy : 'title';
    const sortOrder: SortOrder = query.sortOrder ?? 'asc';

    return this.page(
      {
        availableOnly: true,
        search: query.search?.trim() || undefined,
        genre: query.genre?.trim() || undefined,
      },
      query.page,
      query.limit,
      sortBy,
      sortOrder,
      'Error al obtener libros',
    );
  }

  async searchBooks(
    query: SearchBooksQueryDto,
  ): Promise<ApiResponse<BookDTO[]>> {
    return this.page(
      {
        availableOnly: true,
        search: query.q?.trim() || undefined,
        author: query.author?.trim() || undefined,
        genre: query.genre?.trim() || undefined,
        minPrice: query.minPrice,
        maxPrice: query.maxPrice,
        minRating: query.minRating,
      },
      query.page,
      query.limit,
      'rating',
      'desc',
      'Error en la búsqueda',
    );
  }

  async getBook(bookId: string): Promise<ApiResponse<BookDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const book = await this.booksRepository.findById(bookId);
      if (!book || !book.isAvailable) {
        throw new NotFoundError('book', 'Libro no encontrado');
      }
      return ApiResponse.ok<BookDTO>(HttpStatus.OK, toBookDTO(book), undefined, {
        requestId,
      });
    } catch (error) {
      this.logFailure(requestId, `getBook(${bookId})`, error);
      return toFailureResponse<BookDTO>(error, requestId, 'Error al obtener libro');
    }
  }

  async listGenres(): Promise<ApiResponse<string[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const genres = await this.booksRepository.distinctGenres();
      return ApiResponse.ok<string[]>(HttpStatus.OK, genres, undefined, {
        requestId,
      });
    } catch (error) {
      this.logFailure(requestId, 'listGenres', error);
      return toFailureResponse<string[]>(error, requestId, 'Error al obtener géneros');
    }
  }

  private async page(
    filter: BookFilter,
    requestedPage: number | undefined,
    requestedLimit: number | undefined,
    sortBy: BookSortField,
    sortOrder: SortOrder,
    fallbackMessage: string,
  ): Promise<ApiResponse<BookDTO[]>> {
    const requestId = this.asyncContextService.getRequestId();
    const page = Math.max(requestedPage ?? 1, 1);
    const limit = Math.min(requestedLimit ?? this.defaultPageSize, MAX_PAGE_SIZE);

    try {
      this.logger.debug(
        `[${requestId}] Fetching books: page=${page}, limit=${limit}, filter=${JSON.stringify(filter)}`,
      );

      const { data, total } = await this.booksRepository.findAll(filter, {
        skip: (page - 1) * limit,
        limit,
        sortBy,
        sortOrder,
      });

      return ApiResponse.ok<BookDTO[]>(
        HttpStatus.OK,
        data.map(toBookDTO),
        `${data.length} de ${total} libros encontrados`,
        {
          requestId,
          pagination: createPaginationMeta(total, page, limit),
        },
      );
    } catch (error) {
      this.logFailure(requestId, 'findAll', error);
      return toFailureResponse<BookDTO[]>(error, requestId, fallbackMessage);
    }
  }

  private logFailure(requestId: string, operation: string, error: unknown): void {
    const errorMsg = error instanceof Error ? error.message : String(error);
    if (error instanceof NotFoundError) {
      this.logger.log(`[${requestId}] ${operation}: ${errorMsg}`);
      return;
    }
    this.logger.error(
      `[${requestId}] ${operation} failed: ${errorMsg}`,
      error instanceof Error ? error.stack : undefined,
    );
  }
}
