export type TokenType = 'access' | 'refresh';

/**
 * Claims propios que viajan en cada token. `sub` usa el formato `user:{id}`.
 */
export interface TokenClaims {
  sub: string;
  jti: string;
  typ: TokenType;
}

export interface IssuedToken {
  token: string;
  jti: string;
  expiresIn: number;
}

/**
 * Puerto: emisión y verificación de JWT.
 */
export interface IJwtTokenPort {
  sign(subject: string, type: TokenType): IssuedToken;

  /**
   * Verifica firma, expiración, emisor y audiencia.
   * Devuelve null si el token no es válido.
   */
  verify(token: string): TokenClaims | null;
}
