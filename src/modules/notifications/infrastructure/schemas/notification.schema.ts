import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import { AbstractSchema } from '../../../../common/schemas/abstract.schema';
import { NOTIFICATION_TYPES } from '../../domain/constants/notifications.constants';
import type { NotificationData, NotificationType } from '../../domain/models/notification.model';

@Schema({ collection: 'notifications', timestamps: true, strict: true })
export class NotificationSchema extends AbstractSchema {
  @Prop({ type: String, required: true, index: true })
  recipientId!: string;

  @Prop({ type: String, enum: NOTIFICATION_TYPES, required: true })
  type!: NotificationType;

  @Prop({ type: String, required: true })
  title!: string;

  @Prop({ type: String, required: true })
  message!: string;

  @Prop({ type: Object, default: {} })
  data!: NotificationData;

  @Prop({ type: Date, required: true })
  timestamp!: Date;

  @Prop({ type: Boolean, required: true, default: false })
  isRead!: boolean;
}

export const NotificationSchemaFactory = SchemaFactory.createForClass(NotificationSchema);

NotificationSchemaFactory.index({ recipientId: 1, timestamp: -1 });

export type NotificationDocument = HydratedDocument<NotificationSchema>;
