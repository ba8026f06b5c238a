import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import * as jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';

import type {
  IJwtTokenPort,
  IssuedToken,
  TokenClaims,
  TokenType,
} from '../../domain/ports/jwt-token.port';

const DEFAULT_ACCESS_TTL_SECONDS = 3600;
const DEFAULT_REFRESH_TTL_SECONDS = 2_592_000;

export function isTokenType(value: unknown): value is TokenType {
  return value === 'access' || value === 'refresh';
}

/**
 * Adaptador JWT HS256 sobre jsonwebtoken.
 * Secreto, emisor, audiencia y TTLs vienen de configuración.
 */
@Injectable()
export class JwtTokenAdapter implements IJwtTokenPort {
  private readonly logger = new Logger(JwtTokenAdapter.name);
  private readonly secret: string;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly ttl: Record<TokenType, number>;

  constructor(configService: ConfigService) {
    this.secret = configService.getOrThrow<string>('JWT_SECRET');
    this.issuer = configService.get<string>('JWT_ISSUER') ?? 'bookvault-api';
    this.audience = configService.get<string>('JWT_AUDIENCE') ?? 'bookvault';
    this.ttl = {
      access:
        configService.get<number>('JWT_ACCESS_TTL_SECONDS') ?? DEFAULT_ACCESS_TTL_SECONDS,
      refresh:
        configService.get<number>('JWT_REFRESH_TTL_SECONDS') ?? DEFAULT_REFRESH_TTL_SECONDS,
    };
  }

  sign(subject: string, type: TokenType): IssuedToken {
    const jti = uuidv4();
    const expiresIn = this.ttl[type];
    const token = jwt.sign({ typ: type }, this.secret, {
      algorithm: 'HS256',
      subject,
      jwtid: jti,
      issuer: this.issuer,
      audience: this.audience,
      expiresIn,
    });
    return { token, jti, expiresIn };
  }

  verify(token: string): TokenClaims | null {
    try {
      const payload = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        issuer: this.issuer,
        audience: this.audience,
      });
      if (typeof payload === 'string') {
        return null;
      }

      const { sub, jti, typ } = payload;
      if (typeof sub !== 'string' || typeof jti !== 'string' || !isTokenType(typ)) {
        return null;
      }
      return { sub, jti, typ };
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Token rejected: ${errorMsg}`);
      return null;
    }
  }
}
