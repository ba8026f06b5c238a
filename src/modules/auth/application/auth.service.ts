import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  ConflictError,
  NotFoundError,
  PolicyViolationError,
  isDomainError,
} from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { parseSubject, toSubject } from '../../../common/interfaces/actor.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import { AuditService } from '../../audit/application/audit.service';
import { UsersService } from '../../users/application/users.service';
import type { User } from '../../users/domain/entities/user.entity';
import { UserRegisteredEvent } from '../../users/domain/events/user.events';
import type { IUsersRepository } from '../../users/domain/ports/users.port';
import { UserDTO, toUserDTO } from '../../users/dto/user.dto';
import type { IJwtTokenPort } from '../domain/ports/jwt-token.port';
import {
  AccessTokenDTO,
  AuthSessionDTO,
  LoginDto,
  RefreshTokenDto,
  SignupDto,
} from '../dto';

/**
 * Servicio de autenticación.
 *
 * - Registro con email único y contraseña Argon2
 * - Login con par access/refresh (JWT HS256)
 * - Renovación del access token a partir del refresh token
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(INJECTION_TOKENS.JWT_TOKEN_PORT)
    private readonly jwtTokenPort: IJwtTokenPort,
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    private readonly usersService: UsersService,
    private readonly asyncContext: AsyncContextService,
    private readonly auditService: AuditService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async signup(dto: SignupDto): Promise<ApiResponse<AuthSessionDTO>> {
    const requestId = this.asyncContext.getRequestId();
    const email = dto.email.toLowerCase();
    try {
      this.logger.log(`[${requestId}] Signup attempt for ${email}`);

      if (await this.usersRepository.existsByEmail(email)) {
        throw new ConflictError('EMAIL_TAKEN', 'El email ya está registrado');
      }

      const passwordHash = await this.usersService.hashPassword(dto.password);
      const user = await this.usersRepository.create({
        email,
        passwordHash,
        firstName: dto.firstName,
        lastName: dto.lastName,
      });

      this.auditService.logAllow('AUTH_SIGNUP', 'user', user.id, {
        module: 'auth',
        severity: 'MEDIUM',
        tags: ['authentication', 'signup'],
        resourceId: user.id,
      });

      this.eventEmitter.emit(
        'user.registered',
        new UserRegisteredEvent(user.id, user.email, requestId),
      );

      return ApiResponse.ok<AuthSessionDTO>(
        HttpStatus.CREATED,
        this.issueSession(user),
        'Usuario registrado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<AuthSessionDTO>('AUTH_SIGNUP', email, error, 'Error al registrar usuario');
    }
  }

  /**
   * Credenciales inválidas y cuenta deshabilitada responden igual (401).
   */
  async login(dto: LoginDto): Promise<ApiResponse<AuthSessionDTO>> {
    const requestId = this.asyncContext.getRequestId();
    const email = dto.email.toLowerCase();
    try {
      const user = await this.usersRepository.findActiveByEmail(email);
      const valid =
        user !== null &&
        (await this.usersService.verifyPassword(dto.password, user.passwordHash));

      if (!user || !valid) {
        throw new PolicyViolationError(
          'INVALID_CREDENTIALS',
          'Email o contraseña inválidos',
          HttpStatus.UNAUTHORIZED,
        );
      }

      this.auditService.logAllow('AUTH_LOGIN', 'user', user.id, {
        module: 'auth',
        severity: 'HIGH',
        tags: ['authentication', 'successful-login'],
      });

      this.logger.log(`[${requestId}] User ${user.id} logged in`);
      return ApiResponse.ok<AuthSessionDTO>(
        HttpStatus.OK,
        this.issueSession(user),
        'Login exitoso',
        { requestId },
      );
    } catch (error) {
      return this.fail<AuthSessionDTO>('AUTH_LOGIN', email, error, 'Error al iniciar sesión');
    }
  }

  async refresh(dto: RefreshTokenDto): Promise<ApiResponse<AccessTokenDTO>> {
    const requestId = this.asyncContext.getRequestId();
    try {
      const claims = this.jwtTokenPort.verify(dto.refreshToken);
      const subject = claims ? parseSubject(claims.sub) : null;
      if (!claims || claims.typ !== 'refresh' || !subject) {
        throw new PolicyViolationError(
          'INVALID_REFRESH_TOKEN',
          'Refresh token inválido o expirado',
          HttpStatus.UNAUTHORIZED,
        );
      }

      const user = await this.usersRepository.findActiveById(subject.actorId);
      if (!user) {
        throw new NotFoundError('user', 'Usuario no encontrado o inactivo');
      }

      const access = this.jwtTokenPort.sign(toSubject(user.id), 'access');
      this.auditService.logAllow('AUTH_REFRESH_TOKEN', 'token', user.id, {
        module: 'auth',
        severity: 'LOW',
        tags: ['authentication', 'token-refresh'],
        metadata: { refreshJti: claims.jti },
      });

      return ApiResponse.ok<AccessTokenDTO>(
        HttpStatus.OK,
        { accessToken: access.token, tokenType: 'Bearer', expiresIn: access.expiresIn },
        'Token renovado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<AccessTokenDTO>('AUTH_REFRESH_TOKEN', 'anonymous', error, 'Error al renovar token');
    }
  }

  /**
   * Los tokens no se guardan en servidor: el logout queda auditado y el
   * cliente descarta su sesión.
   */
  logout(userId: string): ApiResponse<void> {
    const requestId = this.asyncContext.getRequestId();
    this.auditService.logAllow('AUTH_LOGOUT', 'user', userId, {
      module: 'auth',
      severity: 'LOW',
      tags: ['authentication', 'logout'],
    });
    this.logger.log(`[${requestId}] User ${userId} logged out`);
    return ApiResponse.ok<void>(HttpStatus.OK, undefined, 'Logout exitoso', { requestId });
  }

  async me(userId: string): Promise<ApiResponse<UserDTO>> {
    return this.usersService.getProfile(userId);
  }

  private issueSession(user: User): AuthSessionDTO {
    const subject = toSubject(user.id);
    const access = this.jwtTokenPort.sign(subject, 'access');
    const refresh = this.jwtTokenPort.sign(subject, 'refresh');
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'Bearer',
      expiresIn: access.expiresIn,
      user: toUserDTO(user),
    };
  }

  private fail<T>(
    action: string,
    subject: string,
    error: unknown,
    fallbackMessage: string,
  ): ApiResponse<T> {
    const requestId = this.asyncContext.getRequestId();
    const errorMsg = error instanceof Error ? error.message : String(error);

    if (isDomainError(error)) {
      this.logger.warn(`[${requestId}] ${action} denied for ${subject}: ${error.code}`);
      this.auditService.logDeny(action, 'user', subject, error.code, {
        module: 'auth',
        severity: 'MEDIUM',
        tags: ['authentication', 'denied'],
      });
    } else {
      this.logger.error(
        `[${requestId}] ${action} failed: ${errorMsg}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logError(
        action,
        'user',
        subject,
        error instanceof Error ? error : new Error(errorMsg),
        { module: 'auth', severity: 'CRITICAL', tags: ['authentication', 'error'] },
      );
    }

    return toFailureResponse<T>(error, requestId, fallbackMessage);
  }
}
