import { HttpStatus } from '@nestjs/common';

/**
 * Base de los errores de dominio.
 *
 * Cada error lleva un `code` estable (lo consume el cliente para decidir la
 * remediación) y el status HTTP con el que se reporta en la frontera.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: HttpStatus;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Recurso inexistente (usuario, libro, compra).
 */
export class NotFoundError extends DomainError {
  readonly httpStatus = HttpStatus.NOT_FOUND;

  constructor(
    readonly resource: 'user' | 'book' | 'purchase',
    message: string,
    readonly code: string = `${resource.toUpperCase()}_NOT_FOUND`,
  ) {
    super(message);
  }
}

/**
 * Conflicto con el estado persistido: compra duplicada, email en uso,
 * transición de estado inválida.
 */
export class ConflictError extends DomainError {
  readonly httpStatus = HttpStatus.CONFLICT;

  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
  }
}

/**
 * La operación es válida pero la política de negocio la rechaza
 * (descarga sin dispositivo, libro no disponible, límite de descargas).
 */
export class PolicyViolationError extends DomainError {
  constructor(
    readonly code: string,
    message: string,
    readonly httpStatus: HttpStatus = HttpStatus.FORBIDDEN,
  ) {
    super(message);
  }
}

/**
 * Entrada mal formada que llegó más allá de la validación de DTOs.
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_FAILED';
  readonly httpStatus = HttpStatus.BAD_REQUEST;

  constructor(
    message: string,
    readonly fields: string[] = [],
  ) {
    super(message);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
