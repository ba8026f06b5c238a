import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import {
  DEFAULT_MAX_DOWNLOADS,
  PurchaseStatus,
} from '../../domain/entities/purchase.entity';

/**
 * Schema: Compra
 * Extiende AbstractSchema para tener id, createdAt, updatedAt automáticos
 */
@Schema({ collection: 'purchases', timestamps: true })
export class PurchaseSchema extends AbstractSchema {
  @Prop({ type: String, required: true, index: true })
  userId!: string;

  @Prop({ type: String, required: true, index: true })
  bookId!: string;

  @Prop({ type: Number, required: true, min: 0 })
  purchasePrice!: number;

  @Prop({ type: String, required: true })
  paymentMethod!: string;

  @Prop({
    type: String,
    enum: Object.values(PurchaseStatus),
    default: PurchaseStatus.PENDING,
  })
  status!: PurchaseStatus;

  @Prop({ type: String, default: null })
  transactionId!: string | null;

  @Prop({ type: Number, default: 0, min: 0 })
  downloadCount!: number;

  @Prop({ type: Number, default: DEFAULT_MAX_DOWNLOADS, min: 0 })
  maxDownloads!: number;
}

export const PurchaseSchemaFactory = SchemaFactory.createForClass(PurchaseSchema);

// A lo sumo una compra completada por (usuario, libro)
PurchaseSchemaFactory.index(
  { userId: 1, bookId: 1 },
  {
    unique: true,
    partialFilterExpression: { status: PurchaseStatus.COMPLETED },
    name: 'uniq_completed_purchase_per_user_book',
  },
);
PurchaseSchemaFactory.index({ userId: 1, createdAt: -1 });
PurchaseSchemaFactory.index({ userId: 1, bookId: 1, status: 1 });
