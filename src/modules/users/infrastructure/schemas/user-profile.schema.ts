import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import type { DeviceInfo } from '../../../../common/interfaces/device-info.interface';
import {
  ACTIVITY_TYPES,
  ActivityType,
} from '../../../heartbeats/domain/models/activity-type';
import { USER_TYPES, UserType } from '../../domain/models/user-profile.model';

/**
 * Schema: perfil de supervisión (colección `users`)
 */
@Schema({ collection: 'users', timestamps: true, strict: true })
export class UserProfileSchema extends AbstractSchema {
  @Prop({ type: String, enum: USER_TYPES, required: true, index: true })
  userType!: UserType;

  @Prop({ type: Boolean, required: true, default: false })
  isDevicePaired!: boolean;

  @Prop({ type: String })
  pairedWithParent?: string;

  @Prop({ type: Date })
  pairedAt?: Date;

  @Prop({ type: Date })
  unlinkedAt?: Date;

  @Prop({ type: Date, index: true })
  lastActiveAt?: Date;

  @Prop({ type: String, enum: ACTIVITY_TYPES })
  lastActivityType?: ActivityType;

  @Prop({ type: Object })
  deviceInfo?: DeviceInfo;
}

export const UserProfileSchemaFactory =
  SchemaFactory.createForClass(UserProfileSchema);

// Barrido de inactividad
UserProfileSchemaFactory.index({ userType: 1, lastActiveAt: 1 });

export type UserProfileDocument = HydratedDocument<UserProfileSchema>;
