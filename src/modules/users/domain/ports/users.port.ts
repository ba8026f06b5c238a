import type { User } from '../entities/user.entity';

export interface CreateUserPayload {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
}

export interface UpdateProfilePayload {
  firstName?: string;
  lastName?: string;
  email?: string;
}

export interface SetDevicePayload {
  deviceId: string;
  deviceName: string;
  registeredAt: Date;
}

/**
 * Resultado de mutar el slot de dispositivo: el usuario actualizado y el
 * dispositivo que ocupaba el slot antes de la escritura.
 */
export interface DeviceSlotChange {
  user: User;
  previousDeviceId: string | null;
}

/**
 * Puerto: persistencia de usuarios.
 * Todas las lecturas y escrituras operan solo sobre usuarios activos.
 */
export interface IUsersRepository {
  /**
   * Crea el usuario. Email duplicado → ConflictError EMAIL_TAKEN.
   */
  create(payload: CreateUserPayload): Promise<User>;

  findActiveById(id: string): Promise<User | null>;

  findActiveByEmail(email: string): Promise<User | null>;

  /**
   * Incluye cuentas deshabilitadas: el email sigue reservado.
   */
  existsByEmail(email: string): Promise<boolean>;

  updateProfile(id: string, payload: UpdateProfilePayload): Promise<User | null>;

  updatePassword(id: string, passwordHash: string): Promise<User | null>;

  /**
   * Sobrescribe el slot de dispositivo (last-writer-wins).
   */
  setRegisteredDevice(
    id: string,
    payload: SetDevicePayload,
  ): Promise<DeviceSlotChange | null>;

  clearRegisteredDevice(id: string): Promise<DeviceSlotChange | null>;

  /**
   * Agrega el libro al set denormalizado de comprados ($addToSet).
   */
  addPurchasedBook(id: string, bookId: string): Promise<boolean>;

  removePurchasedBook(id: string, bookId: string): Promise<boolean>;

  /**
   * Borrado lógico (status = disabled).
   */
  disable(id: string): Promise<boolean>;
}
