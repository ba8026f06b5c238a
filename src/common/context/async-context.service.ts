import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ClsService } from 'nestjs-cls';

import { Actor, AppClsStore, HttpRequestMetadata } from './cls-store.interface';

/**
 * AsyncContextService: wrapper tipado sobre ClsService<AppClsStore>.
 *
 * nestjs-cls propaga el contexto a través de middlewares, guards,
 * interceptores y todas las operaciones async de la request.
 */
@Injectable()
export class AsyncContextService {
  constructor(private readonly cls: ClsService<AppClsStore>) {}

  /**
   * Establecer información del actor
   */
  setActor(actor: Actor): void {
    this.cls.set('actor', actor);
  }

  setHttpMetadata(metadata: HttpRequestMetadata): void {
    const current = this.cls.get('httpMetadata');
    this.cls.set('httpMetadata', { ...current, ...metadata });
  }

  /**
   * Obtener el ID de la request actual
   * Retorna el ID asignado por nestjs-cls o 'unknown' si no está disponible
   */
  getRequestId(): string {
    if (!this.cls.isActive()) return 'unknown';
    const requestId = this.cls.getId() ?? this.cls.get('requestId');
    return requestId ?? 'unknown';
  }

  getActor(): Actor | undefined {
    if (!this.cls.isActive()) return undefined;
    return this.cls.get('actor');
  }

  getActorId(): string | undefined {
    return this.getActor()?.actorId;
  }

  /**
   * Id del usuario autenticado. Lanza 401 si la request no trae actor.
   */
  requireActorId(): string {
    const actorId = this.getActorId();
    if (!actorId) {
      throw new UnauthorizedException('Authentication required');
    }
    return actorId;
  }

  getHttpMetadata(): HttpRequestMetadata | undefined {
    if (!this.cls.isActive()) return undefined;
    return this.cls.get('httpMetadata');
  }
}
