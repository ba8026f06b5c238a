/**
 * Injection tokens for dependency injection across the application.
 * Used for interface-based dependencies (ports) bound to adapters.
 */
export const INJECTION_TOKENS = {
  // Repositories
  USERS_REPOSITORY: Symbol('USERS_REPOSITORY'),
  BOOKS_REPOSITORY: Symbol('BOOKS_REPOSITORY'),
  PURCHASES_REPOSITORY: Symbol('PURCHASES_REPOSITORY'),

  // Auth
  JWT_TOKEN_PORT: Symbol('JWT_TOKEN_PORT'),
};
