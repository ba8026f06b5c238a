import type { DeviceRegistration } from '../../users/domain/entities/user.entity';

/**
 * Respuesta de POST /device.
 */
export interface DeviceRegistrationResultDTO extends DeviceRegistration {
  previousDeviceId: string | null;
  replaced: boolean;
}

/**
 * Respuesta de DELETE /device. `removedDeviceId` es null si no había nada registrado.
 */
export interface DeviceRemovalResultDTO {
  removedDeviceId: string | null;
}
