import { HttpStatus } from '@nestjs/common';

import {
  ConflictError,
  NotFoundError,
  PolicyViolationError,
  ValidationError,
} from './domain.errors';
import { toFailureResponse } from './error-response.mapper';
import { isDuplicateKeyError } from './mongo-errors';

describe('toFailureResponse', () => {
  it('maps a NotFoundError to 404 with a resource-derived code', () => {
    const response = toFailureResponse<void>(
      new NotFoundError('book', 'Libro no encontrado'),
      'req-1',
      'fallback',
    );

    expect(response.ok).toBe(false);
    expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
    expect(response.errors).toBe('BOOK_NOT_FOUND');
    expect(response.message).toBe('Libro no encontrado');
    expect(response.meta).toEqual({ requestId: 'req-1' });
  });

  it('maps a ConflictError to 409 with its code', () => {
    const response = toFailureResponse<void>(
      new ConflictError('ALREADY_OWNED', 'Ya posees este libro'),
      'req-2',
      'fallback',
    );

    expect(response.statusCode).toBe(HttpStatus.CONFLICT);
    expect(response.errors).toBe('ALREADY_OWNED');
  });

  it('keeps the status chosen for a PolicyViolationError', () => {
    const forbidden = toFailureResponse<void>(
      new PolicyViolationError('NO_DEVICE', 'Registra un dispositivo'),
      'req-3',
      'fallback',
    );
    const unprocessable = toFailureResponse<void>(
      new PolicyViolationError('BOOK_UNAVAILABLE', 'No disponible', HttpStatus.UNPROCESSABLE_ENTITY),
      'req-3',
      'fallback',
    );

    expect(forbidden.statusCode).toBe(HttpStatus.FORBIDDEN);
    expect(unprocessable.statusCode).toBe(HttpStatus.UNPROCESSABLE_ENTITY);
  });

  it('maps a ValidationError to 400 VALIDATION_FAILED', () => {
    const response = toFailureResponse<void>(
      new ValidationError('bookId requerido', ['bookId']),
      'req-4',
      'fallback',
    );

    expect(response.statusCode).toBe(HttpStatus.BAD_REQUEST);
    expect(response.errors).toBe('VALIDATION_FAILED');
  });

  it('maps unknown errors to a retryable 500 with the fallback message', () => {
    const response = toFailureResponse<void>(
      new Error('connection reset'),
      'req-5',
      'Error al procesar la compra',
    );

    expect(response.statusCode).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(response.errors).toBe('connection reset');
    expect(response.message).toBe('Error al procesar la compra');
    expect(response.meta).toEqual({ requestId: 'req-5', retryable: true });
  });
});

describe('isDuplicateKeyError', () => {
  it('recognizes the MongoDB duplicate key code', () => {
    expect(isDuplicateKeyError({ code: 11000 })).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isDuplicateKeyError({ code: 121 })).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000'))).toBe(false);
    expect(isDuplicateKeyError(null)).toBe(false);
  });
});
