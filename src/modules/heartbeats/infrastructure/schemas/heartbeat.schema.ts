import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import { ACTIVITY_TYPES, ActivityType } from '../../domain/models/activity-type';

@Schema({ collection: 'heartbeats', timestamps: true, strict: true })
export class HeartbeatSchema extends AbstractSchema {
  @Prop({ type: String, required: true, unique: true })
  childUserId!: string;

  @Prop({ type: Date, required: true })
  timestamp!: Date;

  @Prop({ type: String, enum: ACTIVITY_TYPES, required: true })
  activityType!: ActivityType;

  @Prop({ type: Boolean, required: true, default: true })
  isActive!: boolean;

  @Prop({ type: Object })
  deviceInfo?: DeviceInfo;
}

export const HeartbeatSchemaFactory = SchemaFactory.createForClass(HeartbeatSchema);

export type HeartbeatDocument = HydratedDocument<HeartbeatSchema>;
