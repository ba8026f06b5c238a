import { Prop } from '@nestjs/mongoose';

import { v4 as uuidv4 } from 'uuid';

/**
 * Base de los documentos persistidos: id de dominio (uuid) distinto de `_id`.
 * `createdAt` y `updatedAt` los mantiene Mongoose con `timestamps: true`.
 */
export abstract class AbstractSchema {
  @Prop({ type: String, required: true, unique: true, default: () => uuidv4() })
  id!: string;

  createdAt!: Date;

  updatedAt!: Date;
}
