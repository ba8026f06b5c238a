import type { DeviceRegistration, User } from '../domain/entities/user.entity';
import type { UserStatus } from '../domain/enums/enums';

/**
 * Representación pública del usuario (sin passwordHash).
 */
export interface UserDTO {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  status: UserStatus;
  registeredDevice: DeviceRegistration | null;
  purchasedBookIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

export function toUserDTO(user: User): UserDTO {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    status: user.status,
    registeredDevice: user.getDevice(),
    purchasedBookIds: [...user.purchasedBookIds],
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
