import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';

import * as argon2 from 'argon2';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  ConflictError,
  NotFoundError,
  PolicyViolationError,
  isDomainError,
} from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { ApiResponse } from '../../../common/types/api-response.type';
import { AuditService } from '../../audit/application/audit.service';
import type { User } from '../domain/entities/user.entity';
import type { IUsersRepository } from '../domain/ports/users.port';
import {
  ChangePasswordDto,
  UpdateProfileDto,
  UserDTO,
  toUserDTO,
} from '../dto';

/**
 * Servicio de perfil de usuario.
 *
 * - Lectura y edición del propio perfil
 * - Cambio de contraseña (Argon2)
 * - Borrado lógico de la cuenta
 * - Auditoría de cada operación
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    private readonly asyncContextService: AsyncContextService,
    private readonly auditService: AuditService,
  ) {}

  async getProfile(userId: string): Promise<ApiResponse<UserDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const user = await this.requireActiveUser(userId);
      return ApiResponse.ok<UserDTO>(HttpStatus.OK, toUserDTO(user), undefined, {
        requestId,
      });
    } catch (error) {
      return this.fail<UserDTO>('USER_READ', userId, error, 'Error al obtener perfil');
    }
  }

  async updateProfile(
    userId: string,
    dto: UpdateProfileDto,
  ): Promise<ApiResponse<UserDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      this.logger.log(`[${requestId}] Updating profile for user ${userId}`);
      const current = await this.requireActiveUser(userId);

      if (
        dto.email !== undefined &&
        dto.email.toLowerCase() !== current.email &&
        (await this.usersRepository.existsByEmail(dto.email))
      ) {
        throw new ConflictError('EMAIL_TAKEN', 'El email ya está registrado');
      }

      const updated = await this.usersRepository.updateProfile(userId, dto);
      if (!updated) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }

      this.auditService.logAllow('USER_PROFILE_UPDATED', 'user', userId, {
        module: 'users',
        severity: 'MEDIUM',
        tags: ['user', 'profile'],
        resourceId: userId,
        changes: {
          before: {
            email: current.email,
            firstName: current.firstName,
            lastName: current.lastName,
          },
          after: {
            email: updated.email,
            firstName: updated.firstName,
            lastName: updated.lastName,
          },
        },
      });

      return ApiResponse.ok<UserDTO>(
        HttpStatus.OK,
        toUserDTO(updated),
        'Perfil actualizado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<UserDTO>(
        'USER_PROFILE_UPDATE',
        userId,
        error,
        'Error al actualizar perfil',
      );
    }
  }

  async changePassword(
    userId: string,
    dto: ChangePasswordDto,
  ): Promise<ApiResponse<void>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const user = await this.requireActiveUser(userId);

      const valid = await this.verifyPassword(dto.currentPassword, user.passwordHash);
      if (!valid) {
        throw new PolicyViolationError(
          'INVALID_CURRENT_PASSWORD',
          'La contraseña actual es incorrecta',
          HttpStatus.BAD_REQUEST,
        );
      }

      const passwordHash = await this.hashPassword(dto.newPassword);
      await this.usersRepository.updatePassword(userId, passwordHash);

      this.auditService.logAllow('USER_PASSWORD_CHANGED', 'user', userId, {
        module: 'users',
        severity: 'HIGH',
        tags: ['user', 'password', 'security'],
        resourceId: userId,
      });

      this.logger.log(`[${requestId}] Password changed for user ${userId}`);
      return ApiResponse.ok<void>(
        HttpStatus.OK,
        undefined,
        'Contraseña actualizada exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<void>(
        'USER_PASSWORD_CHANGE',
        userId,
        error,
        'Error al cambiar contraseña',
      );
    }
  }

  /**
   * Borrado lógico: la cuenta pasa a `disabled`. Las compras se conservan.
   */
  async deleteAccount(userId: string): Promise<ApiResponse<void>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const disabled = await this.usersRepository.disable(userId);
      if (!disabled) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }

      this.auditService.logAllow('USER_DISABLED', 'user', userId, {
        module: 'users',
        severity: 'HIGH',
        tags: ['user', 'deletion'],
        resourceId: userId,
      });

      this.logger.log(`[${requestId}] Account disabled: ${userId}`);
      return ApiResponse.ok<void>(
        HttpStatus.OK,
        undefined,
        'Cuenta eliminada exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<void>('USER_DISABLE', userId, error, 'Error al eliminar cuenta');
    }
  }

  /**
   * Hash de contraseña con Argon2.
   */
  async hashPassword(password: string): Promise<string> {
    return argon2.hash(password);
  }

  /**
   * Verificar contraseña contra hash.
   */
  async verifyPassword(password: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error verifying password: ${errorMsg}`);
      return false;
    }
  }

  private async requireActiveUser(userId: string): Promise<User> {
    const user = await this.usersRepository.findActiveById(userId);
    if (!user) {
      throw new NotFoundError('user', 'Usuario no encontrado');
    }
    return user;
  }

  private fail<T>(
    action: string,
    userId: string,
    error: unknown,
    fallbackMessage: string,
  ): ApiResponse<T> {
    const requestId = this.asyncContextService.getRequestId();
    const errorMsg = error instanceof Error ? error.message : String(error);

    if (isDomainError(error)) {
      this.logger.warn(`[${requestId}] ${action} denied: ${error.code}`);
      this.auditService.logDeny(`${action}_DENIED`, 'user', userId, error.code, {
        module: 'users',
        severity: 'LOW',
        tags: ['user'],
      });
    } else {
      this.logger.error(
        `[${requestId}] ${action} failed: ${errorMsg}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logError(
        `${action}_FAILED`,
        'user',
        userId,
        error instanceof Error ? error : new Error(errorMsg),
        { module: 'users', severity: 'MEDIUM', tags: ['user', 'error'] },
      );
    }

    return toFailureResponse<T>(error, requestId, fallbackMessage);
  }
}
