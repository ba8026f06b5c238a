import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';

import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import { UserStatus } from '../../domain/enums/enums';

export type UserDocument = HydratedDocument<UserSchema>;

/**
 * Schema: Usuario
 * El dispositivo registrado vive inline (un slot, sin historial).
 */
@Schema({ timestamps: true, collection: 'users' })
export class UserSchema extends AbstractSchema {
  @Prop({ type: String, required: true, trim: true, lowercase: true })
  email!: string;

  @Prop({ type: String, required: true })
  passwordHash!: string;

  @Prop({ type: String, required: true, trim: true })
  firstName!: string;

  @Prop({ type: String, required: true, trim: true })
  lastName!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(UserStatus),
    default: UserStatus.ACTIVE,
  })
  status!: UserStatus;

  @Prop({ type: String, default: null })
  registeredDeviceId!: string | null;

  @Prop({ type: String, default: null })
  registeredDeviceName!: string | null;

  @Prop({ type: Date, default: null })
  deviceRegisteredAt!: Date | null;

  @Prop({ type: [String], default: [] })
  purchasedBookIds!: string[];
}

export const UserSchemaFactory = SchemaFactory.createForClass(UserSchema);

// Índices adicionales
UserSchemaFactory.index({ email: 1 }, { unique: true });
UserSchemaFactory.index({ status: 1 });
UserSchemaFactory.index({ createdAt: -1 });
