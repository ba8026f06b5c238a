import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { UsersModule } from '../users/users.module';
import { AuthService } from './application/auth.service';
import { AuthController } from './infrastructure/controllers/auth.controller';
import { JwtTokenAdapter } from './infrastructure/adapters/jwt-token.adapter';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * Módulo de autenticación.
 * - JWT HS256 firmado con JWT_SECRET.
 * - passport-jwt valida el header Authorization en las rutas protegidas.
 *
 * Exports:
 * - PassportModule y JwtStrategy: para JwtAuthGuard en otros módulos
 * - JWT_TOKEN_PORT: para emitir y validar tokens
 */
@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' }), UsersModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    JwtStrategy,
    {
      provide: INJECTION_TOKENS.JWT_TOKEN_PORT,
      useClass: JwtTokenAdapter,
    },
  ],
  exports: [PassportModule, AuthService, INJECTION_TOKENS.JWT_TOKEN_PORT],
})
export class AuthModule {}
