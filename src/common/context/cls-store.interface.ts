import { ClsStore } from 'nestjs-cls';

import { Actor } from '../interfaces/actor.interface';

export type { Actor };

/**
 * HTTP Metadata capturada por el middleware de logging
 */
export interface HttpRequestMetadata {
  method: string;
  path: string;
  userAgent?: string;
  ipAddress?: string;
  statusCode?: number;
  responseTime?: number;
}

/**
 * Interfaz tipada para el contexto de nestjs-cls.
 */
export interface AppClsStore extends ClsStore {
  // Identificador único de la request
  requestId: string;

  // Usuario autenticado (lo fija el interceptor de autenticación)
  actor?: Actor;

  httpMetadata?: HttpRequestMetadata;
}
