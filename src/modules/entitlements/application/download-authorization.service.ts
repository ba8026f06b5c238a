import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  NotFoundError,
  PolicyViolationError,
  isDomainError,
} from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { ApiResponse } from '../../../common/types/api-response.type';
import { AuditService } from '../../audit/application/audit.service';
import type { IBooksRepository } from '../../books/domain/ports/books.port';
import type { IPurchasesRepository } from '../../purchases/domain/ports/purchases.port';
import type { User } from '../../users/domain/entities/user.entity';
import type { IUsersRepository } from '../../users/domain/ports/users.port';
import { DownloadDecision, decideDownload } from '../domain/download-policy';
import { DownloadGrantedEvent } from '../domain/events/download-granted.event';
import { DownloadGrantDTO, downloadLink } from '../dto';

const DEFAULT_LINK_TTL_SECONDS = 3600;

/**
 * Autorización de descargas: combina el estado de la compra y del
 * dispositivo registrado.
 */
@Injectable()
export class DownloadAuthorizationService {
  private readonly logger = new Logger(DownloadAuthorizationService.name);
  private readonly linkTtlSeconds: number;

  constructor(
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    @Inject(INJECTION_TOKENS.BOOKS_REPOSITORY)
    private readonly booksRepository: IBooksRepository,
    @Inject(INJECTION_TOKENS.PURCHASES_REPOSITORY)
    private readonly purchasesRepository: IPurchasesRepository,
    private readonly asyncContextService: AsyncContextService,
    private readonly auditService: AuditService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.linkTtlSeconds =
      configService.get<number>('DOWNLOAD_LINK_TTL_SECONDS') ?? DEFAULT_LINK_TTL_SECONDS;
  }

  /**
   * Decisión de descarga sin efectos. Tanto el permiso como la denegación
   * son 200; la denegación trae `reason` (NOT_PURCHASED | NO_DEVICE).
   */
  async authorizeDownload(
    userId: string,
    bookId: string,
  ): Promise<ApiResponse<DownloadDecision>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const decision = await this.evaluate(userId, bookId);

      this.logger.debug(
        `[${requestId}] Download check user=${userId} book=${bookId}: ${
          decision.permitted ? 'PERMIT' : decision.reason
        }`,
      );

      return ApiResponse.ok<DownloadDecision>(
        HttpStatus.OK,
        decision,
        decision.permitted ? 'Descarga permitida' : decision.message,
        { requestId },
      );
    } catch (error) {
      return this.fail<DownloadDecision>(
        'DOWNLOAD_AUTHORIZATION',
        userId,
        error,
        'Error al verificar la descarga',
      );
    }
  }

  /**
   * Misma verificación que authorizeDownload y, si permite, consume una
   * descarga de la compra. Las denegaciones son 403 con el código de motivo.
   */
  async download(
    userId: string,
    bookId: string,
  ): Promise<ApiResponse<DownloadGrantDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const book = await this.booksRepository.findById(bookId);
      if (!book) {
        throw new NotFoundError('book', 'Libro no encontrado');
      }

      const decision = await this.evaluate(userId, bookId);
      if (!decision.permitted) {
        throw new PolicyViolationError(decision.reason, decision.message);
      }

      const consumed = await this.purchasesRepository.incrementDownloadCount(
        decision.purchaseId,
      );
      if (!consumed) {
        throw new PolicyViolationError(
          'DOWNLOAD_LIMIT_REACHED',
          'Límite de descargas alcanzado para este libro',
        );
      }

      this.auditService.logAllow('DOWNLOAD_GRANTED', 'book', userId, {
        module: 'entitlements',
        severity: 'LOW',
        tags: ['download'],
        resourceId: bookId,
        metadata: {
          purchaseId: consumed.id,
          deviceId: decision.deviceId,
          downloadCount: consumed.downloadCount,
        },
      });

      this.eventEmitter.emit(
        'download.granted',
        new DownloadGrantedEvent(
          userId,
          bookId,
          consumed.id,
          decision.deviceId,
          consumed.downloadCount,
          requestId,
        ),
      );

      return ApiResponse.ok<DownloadGrantDTO>(
        HttpStatus.OK,
        {
          downloadUrl: downloadLink(bookId, consumed.id),
          expiresIn: this.linkTtlSeconds,
          downloadsRemaining: consumed.downloadsRemaining(),
        },
        'Enlace de descarga generado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<DownloadGrantDTO>(
        'DOWNLOAD',
        userId,
        error,
        'Error al generar la descarga',
      );
    }
  }

  private async evaluate(userId: string, bookId: string): Promise<DownloadDecision> {
    const user: User | null = await this.usersRepository.findActiveById(userId);
    if (!user) {
      throw new NotFoundError('user', 'Usuario no encontrado');
    }
    const purchase = await this.purchasesRepository.findCompleted(userId, bookId);
    return decideDownload(user, purchase);
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
      this.auditService.logDeny(`${action}_DENIED`, 'book', userId, error.code, {
        module: 'entitlements',
        severity: 'MEDIUM',
        tags: ['download'],
      });
    } else {
      this.logger.error(
        `[${requestId}] ${action} failed: ${errorMsg}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logError(
        `${action}_FAILED`,
        'book',
        userId,
        error instanceof Error ? error : new Error(errorMsg),
        { module: 'entitlements', severity: 'MEDIUM', tags: ['download', 'error'] },
      );
    }

    return toFailureResponse<T>(error, requestId, fallbackMessage);
  }
}
