import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { NotFoundError, isDomainError } from '../../../common/errors/domain.errors';
import { toFailureResponse } from '../../../common/errors/error-response.mapper';
import { ApiResponse } from '../../../common/types/api-response.type';
import { AuditService } from '../../audit/application/audit.service';
import type { DeviceRegistration } from '../../users/domain/entities/user.entity';
import type { IUsersRepository } from '../../users/domain/ports/users.port';
import {
  DeviceRegisteredEvent,
  DeviceUnregisteredEvent,
} from '../domain/events/device.events';
import type {
  DeviceRegistrationResultDTO,
  DeviceRemovalResultDTO,
} from '../dto';

/**
 * Política de registro de dispositivo: un único slot por cuenta.
 *
 * - Registrar sobrescribe el slot sin confirmación (last-writer-wins)
 * - Desregistrar es idempotente
 * - La única condición de error es usuario inexistente o deshabilitado
 */
@Injectable()
export class DeviceRegistrationService {
  private readonly logger = new Logger(DeviceRegistrationService.name);

  constructor(
    @Inject(INJECTION_TOKENS.USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    private readonly asyncContextService: AsyncContextService,
    private readonly auditService: AuditService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async registerDevice(
    userId: string,
    deviceId: string,
    deviceName: string,
  ): Promise<ApiResponse<DeviceRegistrationResultDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      this.logger.log(`[${requestId}] Registering device ${deviceId} for user ${userId}`);

      const change = await this.usersRepository.setRegisteredDevice(userId, {
        deviceId,
        deviceName,
        registeredAt: new Date(),
      });
      if (!change) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }

      const { previousDeviceId } = change;
      const registration = change.user.getDevice();
      if (!registration) {
        throw new Error('Device slot empty after registration');
      }

      if (previousDeviceId && previousDeviceId !== deviceId) {
        this.logger.log(
          `[${requestId}] Device ${previousDeviceId} replaced by ${deviceId} for user ${userId}`,
        );
      }

      this.auditService.logAllow('DEVICE_REGISTERED', 'device', userId, {
        module: 'devices',
        severity: 'MEDIUM',
        tags: ['device', 'registration'],
        resourceId: deviceId,
        changes: {
          before: { deviceId: previousDeviceId },
          after: { deviceId, deviceName },
        },
      });

      this.eventEmitter.emit(
        'device.registered',
        new DeviceRegisteredEvent(userId, deviceId, deviceName, previousDeviceId, requestId),
      );

      return ApiResponse.ok<DeviceRegistrationResultDTO>(
        HttpStatus.OK,
        {
          ...registration,
          previousDeviceId,
          replaced: previousDeviceId !== null,
        },
        'Dispositivo registrado exitosamente',
        { requestId },
      );
    } catch (error) {
      return this.fail<DeviceRegistrationResultDTO>(
        'DEVICE_REGISTER',
        userId,
        error,
        'Error al registrar dispositivo',
      );
    }
  }

  async unregisterDevice(
    userId: string,
  ): Promise<ApiResponse<DeviceRemovalResultDTO>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const change = await this.usersRepository.clearRegisteredDevice(userId);
      if (!change) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }

      const removedDeviceId = change.previousDeviceId;
      if (removedDeviceId) {
        this.auditService.logAllow('DEVICE_UNREGISTERED', 'device', userId, {
          module: 'devices',
          severity: 'MEDIUM',
          tags: ['device', 'registration'],
          resourceId: removedDeviceId,
        });
        this.eventEmitter.emit(
          'device.unregistered',
          new DeviceUnregisteredEvent(userId, removedDeviceId, requestId),
        );
      }

      return ApiResponse.ok<DeviceRemovalResultDTO>(
        HttpStatus.OK,
        { removedDeviceId },
        removedDeviceId
          ? 'Dispositivo eliminado exitosamente'
          : 'No hay dispositivo registrado',
        { requestId },
      );
    } catch (error) {
      return this.fail<DeviceRemovalResultDTO>(
        'DEVICE_UNREGISTER',
        userId,
        error,
        'Error al eliminar dispositivo',
      );
    }
  }

  async getRegisteredDevice(
    userId: string,
  ): Promise<ApiResponse<DeviceRegistration | null>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const user = await this.usersRepository.findActiveById(userId);
      if (!user) {
        throw new NotFoundError('user', 'Usuario no encontrado');
      }
      return ApiResponse.ok<DeviceRegistration | null>(
        HttpStatus.OK,
        user.getDevice(),
        undefined,
        { requestId },
      );
    } catch (error) {
      return this.fail<DeviceRegistration | null>(
        'DEVICE_READ',
        userId,
        error,
        'Error al obtener dispositivo',
      );
    }
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
      this.auditService.logDeny(`${action}_DENIED`, 'device', userId, error.code, {
        module: 'devices',
        severity: 'LOW',
        tags: ['device'],
      });
    } else {
      this.logger.error(
        `[${requestId}] ${action} failed: ${errorMsg}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.auditService.logError(
        `${action}_FAILED`,
        'device',
        userId,
        error instanceof Error ? error : new Error(errorMsg),
        { module: 'devices', severity: 'MEDIUM', tags: ['device', 'error'] },
      );
    }

    return toFailureResponse<T>(error, requestId, fallbackMessage);
  }
}
