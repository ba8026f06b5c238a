import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';

import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { AuditResult, AuditSeverity } from '../../domain/audit.types';

export type AuditEventDocument = HydratedDocument<AuditEvent>;

@Schema({ timestamps: true, collection: 'audit_events' })
export class AuditEvent extends AbstractSchema {
  @Prop({ type: String, required: true })
  requestId!: string;

  @Prop({ type: String, required: true })
  action!: string;

  @Prop({ type: String, required: true })
  resource!: string;

  @Prop({ type: String })
  resourceId?: string;

  @Prop({ type: String })
  actorId?: string;

  @Prop({ type: String, required: true, enum: ['ALLOW', 'DENY', 'ERROR'] })
  result!: AuditResult;

  @Prop({ type: String })
  reason?: string;

  @Prop({ type: String, required: true })
  module!: string;

  @Prop({
    type: String,
    required: true,
    enum: ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'],
  })
  severity!: AuditSeverity;

  @Prop({ type: [String], default: [] })
  tags!: string[];

  @Prop({ type: Object })
  changes?: Record<string, unknown>;

  @Prop({ type: Object })
  metadata?: Record<string, unknown>;
}

export const AuditEventSchema = SchemaFactory.createForClass(AuditEvent);

AuditEventSchema.index({ actorId: 1, createdAt: -1 });
AuditEventSchema.index({ action: 1 });
AuditEventSchema.index({ requestId: 1 });
