/**
 * Código de MongoDB para violación de índice único (E11000).
 */
export const MONGO_DUPLICATE_KEY_CODE = 11000;

/**
 * Detecta un error de clave duplicada sin depender de la clase concreta del
 * driver (MongoServerError, MongoBulkWriteError, etc).
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === MONGO_DUPLICATE_KEY_CODE;
}
