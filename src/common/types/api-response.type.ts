import { HttpStatus } from '@nestjs/common';

/**
 * Sobre común de las respuestas HTTP.
 *
 * Los servicios de aplicación devuelven un ApiResponse en lugar de lanzar y el
 * controller lo serializa usando `statusCode` como status de la respuesta.
 * En un fallo `errors` lleva el código estable (`ALREADY_OWNED`, `NO_DEVICE`...)
 * y `message` el texto para el usuario.
 */
export class ApiResponse<T = void> {
  private constructor(
    readonly ok: boolean,
    readonly statusCode: HttpStatus,
    readonly data?: T,
    readonly errors?: string | string[],
    readonly message?: string,
    readonly meta?: Record<string, unknown>,
  ) {}

  static ok<T = void>(
    statusCode: HttpStatus,
    data?: T,
    message?: string,
    meta?: Record<string, unknown>,
  ): ApiResponse<T> {
    return new ApiResponse<T>(true, statusCode, data, undefined, message, meta);
  }

  static fail<T = void>(
    statusCode: HttpStatus,
    errors: string | string[],
    message?: string,
    meta?: Record<string, unknown>,
  ): ApiResponse<T> {
    return new ApiResponse<T>(false, statusCode, undefined, errors, message, meta);
  }
}
