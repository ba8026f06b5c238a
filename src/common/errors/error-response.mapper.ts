import { HttpStatus } from '@nestjs/common';

import { ApiResponse } from '../types/api-response.type';
import { isDomainError } from './domain.errors';

/**
 * Traduce un error capturado en un servicio de aplicación a ApiResponse.
 *
 * - Errores de dominio: su status y su code.
 * - Cualquier otro error (almacenamiento, red): 500, el cliente puede reintentar.
 */
export function toFailureResponse<T>(
  error: unknown,
  requestId: string,
  fallbackMessage: string,
): ApiResponse<T> {
  if (isDomainError(error)) {
    return ApiResponse.fail<T>(error.httpStatus, error.code, error.message, {
      requestId,
    });
  }

  const errorMsg = error instanceof Error ? error.message : String(error);
  return ApiResponse.fail<T>(
    HttpStatus.INTERNAL_SERVER_ERROR,
    errorMsg,
    fallbackMessage,
    { requestId, retryable: true },
  );
}
