import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { v4 as uuidv4 } from 'uuid';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  ConflictError,
  NotFoundError,
  PolicyViolationError,
  isDomainError,
} from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { ApiResponse } from '../../../common/types/api-response.type';
import { AuditService } from '../../audit/application/audit.service';
import type { IBooksRepository } from '../../books/domain/ports/books.port';
import type { IUsersRepository } from '../../users/domain/ports/users.port';
import {
  DEFAULT_MAX_DOWNLOADS,
  Purchase,
  PurchaseStatus,
} from '../domain/entities/purchase.entity';
import {
  PurchaseCompletedEvent,
  PurchaseFailedEvent,
  PurchaseRefundedEvent,
} from '../domain/events/purchase.events';
import type { IPurchasesRepository } from '../domain/ports/purchases.port';
import { assertTransition } from '../domain/state-machines/purchase.state-machine';
import {
  PurchaseDTO,
  PurchaseResultDTO,
  downloadReference,
  toPurchaseDTO,
} from '../dto';

/**
 * Servicio de compras.
 *
 * Flujo de compra:
 * 1. Usuario activo, libro existente y disponible
 * 2. Rechaza si ya hay una compra completada (ALREADY_OWNED), reponiendo
 *    antes el libro en el set de comprados si faltaba
 * 3. Crea la compra en `pending` con snapshot del precio
 * 4. pending → completed. El índice único parcial decide las carreras:
 *    el perdedor pasa a `failed` y recibe ALREADY_OWNED
 * 5. Agrega el libro al set de comprados del usuario
 */
@Injectable()
export class PurchaseService {
  private readonly logger = new Logger(PurchaseService.name);
  private readonly maxDownloads: number;

  constructor(
    @Inject(INJECTION_TOKENS.PURCHASES_REPOSITORY)
    private readonly purchasesRepository: IPurchasesRepository,
    @Inject(INJECTION_TOKENS.BOOKS_REPOSITORY)
    private readonly booksRepository: IBooksRepository,
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    private readonly asyncContextService: AsyncContextService,
    private readonly auditService: AuditService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.maxDownloads =
      configService.get<number>('MAX_DOWNLOADS_PER_PURCHASE') ?? DEFAULT_MAX_DOWNLOADS;
  }

  async purchase(
    userId: string,
    bookId: string,
    paymentMethod: string,
  ): Promise<ApiResponse<PurchaseResultDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      this.logger.log(`[${requestId}] User ${userId} purchasing book ${bookId}`);

      const user = await this.usersRepository.findActiveById(userId);
      if (!user) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }

      const book = await this.booksRepository.findById(bookId);
      if (!book) {
        throw new NotFoundError('book', 'Libro no encontrado');
      }
      if (!book.isAvailable) {
        throw new PolicyViolationError(
          'BOOK_UNAVAILABLE',
          'El libro no está disponible para la venta',
          HttpStatus.UNPROCESSABLE_ENTITY,
        );
      }

      const owned = await this.purchasesRepository.findCompleted(userId, bookId);
      if (owned) {
        // El set de comprados puede haber quedado atrás si falló la escritura tras completar
        if (!user.hasPurchased(bookId)) {
          this.logger.warn(
            `[${requestId}] Restoring book ${bookId} in purchased set of user ${userId}`,
          );
          await this.usersRepository.addPurchasedBook(userId, bookId);
        }
        throw new ConflictError('ALREADY_OWNED', 'Ya posees este libro');
      }

      const pending = await this.purchasesRepository.create(
        new Purchase({
          userId,
          bookId,
          purchasePrice: book.price,
          paymentMethod,
          status: PurchaseStatus.PENDING,
          maxDownloads: this.maxDownloads,
        }),
      );

      const completed = await this.complete(pending, requestId);

      await this.usersRepository.addPurchasedBook(userId, bookId);

      this.auditService.logAllow('PURCHASE_COMPLETED', 'purchase', userId, {
        module: 'purchases',
        severity: 'HIGH',
        tags: ['purchase', 'payment'],
        resourceId: completed.id,
        changes: {
          after: {
            bookId,
            purchasePrice: completed.purchasePrice,
            paymentMethod,
            status: completed.status,
          },
        },
      });

      this.eventEmitter.emit(
        'purchase.completed',
        new PurchaseCompletedEvent(
          completed.id,
          userId,
          bookId,
          completed.purchasePrice,
          paymentMethod,
          completed.transactionId ?? '',
          requestId,
        ),
      );

      this.logger.log(`[${requestId}] Purchase completed: ${completed.id}`);
      return ApiResponse.ok<PurchaseResultDTO>(
        HttpStatus.CREATED,
        {
          purchaseId: completed.id,
          status: completed.status,
          bookId,
          purchasePrice: completed.purchasePrice,
          transactionId: completed.transactionId,
          downloadUrl: downloadReference(bookId),
        },
        'Libro comprado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<PurchaseResultDTO>(
        'PURCHASE',
        userId,
        error,
        'Error al procesar la compra',
      );
    }
  }

  /**
   * Reembolso: completed → refunded. Solo el dueño puede reembolsar.
   * La compra se conserva; la descarga queda revocada.
   */
  async refund(
    userId: string,
    purchaseId: string,
  ): Promise<ApiResponse<PurchaseDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const purchase = await this.purchasesRepository.findById(purchaseId);
      if (!purchase || purchase.userId !== userId) {
        throw new NotFoundError('purchase', 'Compra no encontrada');
      }

      assertTransition(purchase.status, PurchaseStatus.REFUNDED);

      const refunded = await this.purchasesRepository.transition(
        purchase.id,
        PurchaseStatus.COMPLETED,
        PurchaseStatus.REFUNDED,
      );
      if (!refunded) {
        throw new ConflictError(
          'INVALID_TRANSITION',
          'La compra cambió de estado durante el reembolso',
        );
      }

      await this.usersRepository.removePurchasedBook(userId, purchase.bookId);

      this.auditService.logAllow('PURCHASE_REFUNDED', 'purchase', userId, {
        module: 'purchases',
        severity: 'HIGH',
        tags: ['purchase', 'refund'],
        resourceId: purchase.id,
        changes: {
          before: { status: purchase.status },
          after: { status: refunded.status },
        },
      });

      this.eventEmitter.emit(
        'purchase.refunded',
        new PurchaseRefundedEvent(purchase.id, userId, purchase.bookId, requestId),
      );

      return ApiResponse.ok<PurchaseDTO>(
        HttpStatus.OK,
        toPurchaseDTO(refunded),
        'Compra reembolsada exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<PurchaseDTO>('PURCHASE_REFUND', userId, error, 'Error al reembolsar');
    }
  }

  /**
   * pending → completed. Si otra compra del mismo par ganó la carrera, la
   * fila propia pasa a `failed` y se propaga ALREADY_OWNED.
   */
  private async complete(pending: Purchase, requestId: string): Promise<Purchase> {
    assertTransition(pending.status, PurchaseStatus.COMPLETED);

    try {
      const completed = await this.purchasesRepository.transition(
        pending.id,
        PurchaseStatus.PENDING,
        PurchaseStatus.COMPLETED,
        { transactionId: `txn_${uuidv4()}` },
      );
      if (!completed) {
        throw new ConflictError(
          'INVALID_TRANSITION',
          'La compra cambió de estado antes de completarse',
        );
      }
      return completed;
    } catch (error) {
      if (error instanceof ConflictError && error.code === 'ALREADY_OWNED') {
        this.logger.warn(
          `[${requestId}] Purchase ${pending.id} lost the race for book ${pending.bookId}`,
        );
        await this.purchasesRepository.transition(
          pending.id,
          PurchaseStatus.PENDING,
          PurchaseStatus.FAILED,
        );
        this.eventEmitter.emit(
          'purchase.failed',
          new PurchaseFailedEvent(
            pending.id,
            pending.userId,
            pending.bookId,
            error.code,
            requestId,
          ),
        );
      }
      throw error;
    }
  }

  private fail<T>(
    action: string,
    userId: string,
    error: unknown,
    fallbackMessage: string,
  ): ApiResponse<T> {
    const requestId = this.asyncContextService.getRequestId();
    const errorMsg = error instanceof Error ? error.message : String(error);

    if (isDomainError(error)) {
      this.logger.warn(`[${requestId}] ${action} denied: ${error.code}`);
      this.auditService.logDeny(`${action}_DENIED`, 'purchase', userId, error.code, {
        module: 'purchases',
        severity: 'MEDIUM',
        tags: ['purchase'],
      });
    } else {
      this.logger.error(
        `[${requestId}] ${action} failed: ${errorMsg}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logError(
        `${action}_FAILED`,
        'purchase',
        userId,
        error instanceof Error ? error : new Error(errorMsg),
        { module: 'purchases', severity: 'HIGH', tags: ['purchase', 'error'] },
      );
    }

    return toFailureResponse<T>(error, requestId, fallbackMessage);
  }
}
