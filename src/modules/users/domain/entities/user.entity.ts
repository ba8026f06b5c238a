import { v4 as uuidv4 } from 'uuid';

import { UserStatus } from '../enums/enums';

/**
 * Dispositivo registrado en la cuenta (un único slot por usuario).
 */
export interface DeviceRegistration {
  deviceId: string;
  deviceName: string;
  registeredAt: Date;
}

/**
 * Entidad: User
 * Identidad, perfil, dispositivo registrado y set denormalizado de libros comprados.
 */
export class User {
  id: string;
  email: string; // único, en minúsculas
  passwordHash: string;
  firstName: string;
  lastName: string;
  status: UserStatus;
  registeredDeviceId: string | null;
  registeredDeviceName: string | null;
  deviceRegisteredAt: Date | null;
  purchasedBookIds: string[];
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<User> = {}) {
    this.id = partial.id ?? uuidv4();
    this.email = partial.email ?? '';
    this.passwordHash = partial.passwordHash ?? '';
    this.firstName = partial.firstName ?? '';
    this.lastName = partial.lastName ?? '';
    this.status = partial.status ?? UserStatus.ACTIVE;
    this.registeredDeviceId = partial.registeredDeviceId ?? null;
    this.registeredDeviceName = partial.registeredDeviceName ?? null;
    this.deviceRegisteredAt = partial.deviceRegisteredAt ?? null;
    this.purchasedBookIds = partial.purchasedBookIds ?? [];
    this.createdAt = partial.createdAt ?? new Date();
    this.updatedAt = partial.updatedAt ?? new Date();
  }

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`.trim();
  }

  isActive(): boolean {
    return this.status === UserStatus.ACTIVE;
  }

  /**
   * Registro actual, o null si el slot está vacío.
   */
  getDevice(): DeviceRegistration | null {
    if (!this.registeredDeviceId) return null;
    return {
      deviceId: this.registeredDeviceId,
      deviceName: this.registeredDeviceName ?? '',
      registeredAt: this.deviceRegisteredAt ?? this.updatedAt,
    };
  }

  hasPurchased(bookId: string): boolean {
    return this.purchasedBookIds.includes(bookId);
  }
}
