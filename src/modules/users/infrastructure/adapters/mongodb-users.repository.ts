import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import { ConflictError } from '../../../../common/errors/domain.errors';
import { isDuplicateKeyError } from '../../../../common/errors/mongo-errors';
import { User } from '../../domain/entities/user.entity';
import { UserStatus } from '../../domain/enums/enums';
import type {
  CreateUserPayload,
  DeviceSlotChange,
  IUsersRepository,
  SetDevicePayload,
  UpdateProfilePayload,
} from '../../domain/ports/users.port';
import { UserSchema } from '../schemas/user.schema';

/**
 * Adaptador MongoDB para Users.
 * Implementa el patrón Repository, aislando la lógica de persistencia.
 */
@Injectable()
export class MongoDbUsersRepository implements IUsersRepository {
  private readonly logger = new Logger(MongoDbUsersRepository.name);

  constructor(
    @InjectModel(UserSchema.name)
    private readonly userModel: Model<UserSchema>,
  ) {}

  async create(payload: CreateUserPayload): Promise<User> {
    try {
      const created = await this.userModel.create({
        email: payload.email.toLowerCase(),
        passwordHash: payload.passwordHash,
        firstName: payload.firstName,
        lastName: payload.lastName,
        status: UserStatus.ACTIVE,
      });
      return this.mapToDomain(created);
    } catch (error) {
      throw this.translateError(error, 'creando usuario');
    }
  }

  async findActiveById(id: string): Promise<User | null> {
    const document = await this.userModel
      .findOne({ id, status: UserStatus.ACTIVE })
      .exec();
    return document ? this.mapToDomain(document) : null;
  }

  async findActiveByEmail(email: string): Promise<User | null> {
    const document = await this.userModel
      .findOne({ email: email.toLowerCase(), status: UserStatus.ACTIVE })
      .exec();
    return document ? this.mapToDomain(document) : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    const count = await this.userModel
      .countDocuments({ email: email.toLowerCase() })
      .exec();
    return count > 0;
  }

  async updateProfile(
    id: string,
    payload: UpdateProfilePayload,
  ): Promise<User | null> {
    const updateData: UpdateProfilePayload = {};

    if (payload.firstName !== undefined) {
      updateData.firstName = payload.firstName;
    }
    if (payload.lastName !== undefined) {
      updateData.lastName = payload.lastName;
    }
    if (payload.email !== undefined) {
      updateData.email = payload.email.toLowerCase();
    }

    try {
      const updated = await this.userModel
        .findOneAndUpdate(
          { id, status: UserStatus.ACTIVE },
          { $set: updateData },
          { new: true },
        )
        .exec();
      return updated ? this.mapToDomain(updated) : null;
    } catch (error) {
      throw this.translateError(error, 'actualizando perfil');
    }
  }

  async updatePassword(id: string, passwordHash: string): Promise<User | null> {
    const updated = await this.userModel
      .findOneAndUpdate(
        { id, status: UserStatus.ACTIVE },
        { $set: { passwordHash } },
        { new: true },
      )
      .exec();
    return updated ? this.mapToDomain(updated) : null;
  }

  async setRegisteredDevice(
    id: string,
    payload: SetDevicePayload,
  ): Promise<DeviceSlotChange | null> {
    // new: false → devuelve el documento previo, así conocemos el dispositivo reemplazado
    const previous = await this.userModel
      .findOneAndUpdate(
        { id, status: UserStatus.ACTIVE },
        {
          $set: {
            registeredDeviceId: payload.deviceId,
            registeredDeviceName: payload.deviceName,
            deviceRegisteredAt: payload.registeredAt,
          },
        },
        { new: false },
      )
      .exec();

    if (!previous) return null;

    const before = this.mapToDomain(previous);
    return {
      previousDeviceId: before.registeredDeviceId,
      user: new User({
        ...before,
        registeredDeviceId: payload.deviceId,
        registeredDeviceName: payload.deviceName,
        deviceRegisteredAt: payload.registeredAt,
        updatedAt: new Date(),
      }),
    };
  }

  async clearRegisteredDevice(id: string): Promise<DeviceSlotChange | null> {
    const previous = await this.userModel
      .findOneAndUpdate(
        { id, status: UserStatus.ACTIVE },
        {
          $set: {
            registeredDeviceId: null,
            registeredDeviceName: null,
            deviceRegisteredAt: null,
          },
        },
        { new: false },
      )
      .exec();

    if (!previous) return null;

    const before = this.mapToDomain(previous);
    return {
      previousDeviceId: before.registeredDeviceId,
      user: new User({
        ...before,
        registeredDeviceId: null,
        registeredDeviceName: null,
        deviceRegisteredAt: null,
        updatedAt: new Date(),
      }),
    };
  }

  async addPurchasedBook(id: string, bookId: string): Promise<boolean> {
    const result = await this.userModel
      .updateOne(
        { id, status: UserStatus.ACTIVE },
        { $addToSet: { purchasedBookIds: bookId } },
      )
      .exec();
    return result.matchedCount > 0;
  }

  async removePurchasedBook(id: string, bookId: string): Promise<boolean> {
    const result = await this.userModel
      .updateOne({ id }, { $pull: { purchasedBookIds: bookId } })
      .exec();
    return result.matchedCount > 0;
  }

  async disable(id: string): Promise<boolean> {
    const result = await this.userModel
      .updateOne(
        { id, status: UserStatus.ACTIVE },
        { $set: { status: UserStatus.DISABLED } },
      )
      .exec();
    return result.matchedCount > 0;
  }

  /**
   * E11000 sobre `email` → ConflictError. El resto se propaga tal cual.
   */
  private translateError(error: unknown, operation: string): unknown {
    if (isDuplicateKeyError(error)) {
      return new ConflictError('EMAIL_TAKEN', 'El email ya está registrado');
    }
    const errorMsg = error instanceof Error ? error.message : String(error);
    this.logger.error(`Error ${operation}: ${errorMsg}`);
    return error;
  }

  /**
   * Mapea documento de MongoDB a entidad de dominio
   */
  private mapToDomain(document: UserSchema): User {
    return new User({
      id: document.id,
      email: document.email,
      passwordHash: document.passwordHash,
      firstName: document.firstName,
      lastName: document.lastName,
      status: document.status,
      registeredDeviceId: document.registeredDeviceId ?? null,
      registeredDeviceName: document.registeredDeviceName ?? null,
      deviceRegisteredAt: document.deviceRegisteredAt ?? null,
      purchasedBookIds: [...(document.purchasedBookIds ?? [])],
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }
}
