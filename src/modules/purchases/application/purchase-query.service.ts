import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { NotFoundError } from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { IBooksRepository } from '../../books/domain/ports/books.port';
import { toBookDTO } from '../../books/dto/book.dto';
import type { IUsersRepository } from '../../users/domain/ports/users.port';
import { PurchaseStatus } from '../domain/entities/purchase.entity';
import type { IPurchasesRepository } from '../domain/ports/purchases.port';
import { BookOwnershipDTO, PurchaseDTO, PurchasedBookDTO, toPurchaseDTO } from '../dto';

/**
 * Servicio de consulta de compras del usuario autenticado
 */
@Injectable()
export class PurchaseQueryService {
  private readonly logger = new Logger(PurchaseQueryService.name);

  constructor(
    @Inject(INJECTION_TOKENS.PURCHASES_REPOSITORY)
    private readonly purchasesRepository: IPurchasesRepository,
    @Inject(INJECTION_TOKENS.BOOKS_REPOSITORY)
    private readonly booksRepository: IBooksRepository,
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  /**
   * Historial de compras, más reciente primero.
   */
  async listPurchases(
    userId: string,
    status?: PurchaseStatus,
  ): Promise<ApiResponse<PurchaseDTO[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const purchases = await this.purchasesRepository.findByUserId(userId, status);
      this.logger.debug(
        `[${requestId}] Retrieved ${purchases.length} purchases for user ${userId}`,
      );
      return ApiResponse.ok<PurchaseDTO[]>(
        HttpStatus.OK,
        purchases.map(toPurchaseDTO),
        `${purchases.length} compras encontradas`,
        { requestId },
      );
    } catch (error) {
      this.logError(requestId, 'listPurchases', error);
      return toFailureResponse<PurchaseDTO[]>(
        error,
        requestId,
        'Error al obtener compras',
      );
    }
  }

  /**
   * Biblioteca del usuario: compras completadas con su libro.
   */
  async listPurchasedBooks(
    userId: string,
  ): Promise<ApiResponse<PurchasedBookDTO[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const purchases = await this.purchasesRepository.findByUserId(
        userId,
        PurchaseStatus.COMPLETED,
      );

      const library: PurchasedBookDTO[] = [];
      for (const purchase of purchases) {
        const book = await this.booksRepository.findById(purchase.bookId);
        if (!book) {
          this.logger.warn(
            `[${requestId}] Book ${purchase.bookId} of purchase ${purchase.id} no longer exists`,
          );
          continue;
        }
        library.push({
          purchaseId: purchase.id,
          purchasedAt: purchase.createdAt,
          purchasePrice: purchase.purchasePrice,
          downloadCount: purchase.downloadCount,
          downloadsRemaining: purchase.downloadsRemaining(),
          book: toBookDTO(book),
        });
      }

      return ApiResponse.ok<PurchasedBookDTO[]>(HttpStatus.OK, library, undefined, {
        requestId,
      });
    } catch (error) {
      this.logError(requestId, 'listPurchasedBooks', error);
      return toFailureResponse<PurchasedBookDTO[]>(
        error,
        requestId,
        'Error al obtener la biblioteca',
      );
    }
  }

  /**
   * Indica si el usuario posee el libro, según su set de comprados.
   */
  async checkOwnership(
    userId: string,
    bookId: string,
  ): Promise<ApiResponse<BookOwnershipDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const user = await this.usersRepository.findActiveById(userId);
      if (!user) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }
      const book = await this.booksRepository.findById(bookId);
      if (!book) {
        throw new NotFoundError('book', 'Libro no encontrado');
      }

      return ApiResponse.ok<BookOwnershipDTO>(
        HttpStatus.OK,
        { bookId, owned: user.hasPurchased(bookId) },
        undefined,
        { requestId },
      );
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        this.logError(requestId, 'checkOwnership', error);
      }
      return toFailureResponse<BookOwnershipDTO>(
        error,
        requestId,
        'Error al verificar la propiedad del libro',
      );
    }
  }

  private logError(requestId: string, operation: string, error: unknown): void {
    const errorMsg = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `[${requestId}] ${operation} failed: ${errorMsg}`,
      error instanceof Error ? error.stack : undefined,
    );
  }
}
