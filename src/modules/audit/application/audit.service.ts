import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { AsyncContextService } from '../../../common/context/async-context.service';
import type { AuditOptions, AuditResult } from '../domain/audit.types';
import { AuditEvent } from '../infrastructure/schemas/audit-event.schema';

/**
 * Servicio de auditoría.
 *
 * Cada operación sensible deja un documento en `audit_events`. La escritura es
 * fire-and-forget: un fallo al auditar se registra en el log y nunca rompe la
 * request que lo originó.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectModel(AuditEvent.name)
    private readonly auditEventModel: Model<AuditEvent>,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  logAllow(
    action: string,
    resource: string,
    actorId: string | undefined,
    options: AuditOptions,
  ): void {
    this.record('ALLOW', action, resource, actorId, options);
  }

  logDeny(
    action: string,
    resource: string,
    actorId: string | undefined,
    reason: string,
    options: AuditOptions,
  ): void {
    this.record('DENY', action, resource, actorId, options, reason);
  }

  logError(
    action: string,
    resource: string,
    actorId: string | undefined,
    error: Error,
    options: AuditOptions,
  ): void {
    this.record('ERROR', action, resource, actorId, options, error.message);
  }

  private record(
    result: AuditResult,
    action: string,
    resource: string,
    actorId: string | undefined,
    options: AuditOptions,
    reason?: string,
  ): void {
    const requestId = this.asyncContextService.getRequestId();

    this.auditEventModel
      .create({
        requestId,
        action,
        resource,
        resourceId: options.resourceId,
        actorId,
        result,
        reason,
        module: options.module,
        severity: options.severity,
        tags: options.tags ?? [],
        changes: options.changes,
        metadata: options.metadata,
      })
      .catch((error: unknown) => {
        const errorMsg = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `[${requestId}] Failed to persist audit event ${action}: ${errorMsg}`,
        );
      });
  }
}
