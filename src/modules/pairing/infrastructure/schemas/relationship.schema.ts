import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';

/**
 * Schema: relación padre ↔ hijo (colección `parent_child_relationships`)
 */
@Schema({ collection: 'parent_child_relationships', timestamps: false, strict: true })
export class RelationshipSchema extends AbstractSchema {
  @Prop({ type: String, required: true, index: true })
  parentUserId!: string;

  @Prop({ type: String, required: true, index: true })
  childUserId!: string;

  @Prop({ type: String, required: true })
  childName!: string;

  @Prop({ type: String, required: true })
  deviceName!: string;

  @Prop({ type: String, required: true })
  pairingCode!: string;

  @Prop({ type: Boolean, required: true, default: true })
  isActive!: boolean;

  @Prop({ type: Date })
  lastSyncAt?: Date;

  @Prop({ type: Date })
  lastHeartbeatAt?: Date;

  @Prop({ type: Number, required: true, default: 0, min: 0 })
  missedHeartbeats!: number;

  @Prop({ type: Boolean, required: true, default: false })
  isNormalClosure!: boolean;

  @Prop({ type: Object })
  childDeviceInfo?: DeviceInfo;

  @Prop({ type: Date })
  unlinkedAt?: Date;

  @Prop({ type: String })
  unlinkedBy?: string;

  @Prop({ type: Date })
  lastGracefulShutdownAt?: Date;
}

export const RelationshipSchemaFactory =
  SchemaFactory.createForClass(RelationshipSchema);

// Una sola relación activa por pareja padre/hijo
RelationshipSchemaFactory.index(
  { parentUserId: 1, childUserId: 1 },
  { unique: true, partialFilterExpression: { isActive: true } },
);
// Barrido de heartbeats perdidos
RelationshipSchemaFactory.index({ isActive: 1, isNormalClosure: 1, lastHeartbeatAt: 1 });

export type RelationshipDocument = HydratedDocument<RelationshipSchema>;
