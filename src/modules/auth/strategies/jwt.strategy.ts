import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';

import { ExtractJwt, Strategy } from 'passport-jwt';

import { Actor, parseSubject } from '../../../common/interfaces/actor.interface';

/**
 * Estrategia JWT (HS256).
 * - Token desde `Authorization: Bearer`.
 * - Valida firma, expiración, emisor y audiencia.
 * - Solo acepta access tokens; un refresh token no autentica requests.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
      algorithms: ['HS256'],
      issuer: configService.get<string>('JWT_ISSUER') ?? 'bookvault-api',
      audience: configService.get<string>('JWT_AUDIENCE') ?? 'bookvault',
    });
  }

  validate(payload: unknown): Actor {
    if (typeof payload !== 'object' || payload === null) {
      throw new UnauthorizedException('Invalid token payload');
    }

    const sub = 'sub' in payload && typeof payload.sub === 'string' ? payload.sub : undefined;
    if (!sub) {
      throw new UnauthorizedException('Missing sub claim');
    }

    if (!('typ' in payload) || payload.typ !== 'access') {
      throw new UnauthorizedException('Access token required');
    }

    const jti = 'jti' in payload && typeof payload.jti === 'string' ? payload.jti : undefined;

    const parsed = parseSubject(sub);
    if (!parsed) {
      throw new UnauthorizedException('Invalid subject format');
    }
    return { ...parsed, sub, jti };
  }
}
