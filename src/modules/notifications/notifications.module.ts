import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AuthModule } from '../auth/auth.module';

import { NotificationEventsListener } from './application/notification-events.listener';
import { NotificationsService } from './application/notifications.service';
import { NOTIFICATIONS_INJECTION_TOKENS } from './domain/constants/notifications.constants';
import { LoggingNotificationDispatcher } from './infrastructure/adapters/logging-notification.dispatcher';
import { MongoDbNotificationsRepository } from './infrastructure/adapters/mongodb-notifications.repository';
import { NotificationsController } from './infrastructure/controllers/notifications.controller';
import {
  NotificationSchema,
  NotificationSchemaFactory,
} from './infrastructure/schemas/notification.schema';

@Module({
  imports: [
    AuthModule,
    MongooseModule.forFeature([
      {
        name: NotificationSchema.name,
        schema: NotificationSchemaFactory,
      },
    ]),
  ],
  controllers: [NotificationsController],
  providers: [
    {
      provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATIONS_REPOSITORY,
      useClass: MongoDbNotificationsRepository,
    },
    {
      provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATION_DISPATCHER,
      useClass: LoggingNotificationDispatcher,
    },
    NotificationsService,
    NotificationEventsListener,
  ],
})
export class NotificationsModule {}
