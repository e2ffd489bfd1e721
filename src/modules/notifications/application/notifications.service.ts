import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import { ApiResponse } from '../../../common/types/api-response.type';
import {
  NOTIFICATIONS_INJECTION_TOKENS,
  NOTIFICATIONS_PAGE_SIZE,
} from '../domain/constants/notifications.constants';
import type { Notification, NotificationDraft } from '../domain/models/notification.model';
import type { INotificationDispatcher } from '../domain/ports/notification-dispatcher.port';
import type { INotificationsRepository } from '../domain/ports/notifications.port';
import type { NotificationDto } from '../dto/notification.dto';

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    @Inject(NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATIONS_REPOSITORY)
    private readonly notificationsRepository: INotificationsRepository,
    @Inject(NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATION_DISPATCHER)
    private readonly dispatcher: INotificationDispatcher,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  /**
   * Guarda el aviso en la bandeja del destinatario y lo entrega
   */
  async deliver(draft: NotificationDraft): Promise<Notification> {
    const notification = await this.notificationsRepository.create({
      ...draft,
      id: uuidv4(),
      isRead: false,
    });
    await this.dispatcher.dispatch(notification);
    return notification;
  }

  async listNotifications(): Promise<ApiResponse<NotificationDto[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const recipientId = this.requireActorId();
      const notifications = await this.notificationsRepository.findByRecipient(
        recipientId,
        NOTIFICATIONS_PAGE_SIZE,
      );
      const data = notifications.map((notification) => this.toDto(notification));

      return ApiResponse.ok<NotificationDto[]>(HttpStatus.OK, data, 'Avisos', {
        requestId,
        total: data.length,
        unread: data.filter((notification) => !notification.isRead).length,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error listando avisos: ${errorMessage(error)}`);
      return failFromError<NotificationDto[]>(error, { requestId });
    }
  }

  async markAsRead(id: string): Promise<ApiResponse<NotificationDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const recipientId = this.requireActorId();
      const updated = await this.notificationsRepository.markRead(id, recipientId);
      if (!updated) {
        const existing = await this.notificationsRepository.findById(id);
        throw existing
          ? new DomainError('PERMISSION_DENIED')
          : new DomainError('NOT_FOUND', 'El aviso no existe.');
      }

      return ApiResponse.ok<NotificationDto>(HttpStatus.OK, this.toDto(updated), 'Aviso leído', {
        requestId,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error marcando aviso ${id}: ${errorMessage(error)}`);
      return failFromError<NotificationDto>(error, { requestId });
    }
  }

  private toDto(notification: Notification): NotificationDto {
    return {
      id: notification.id,
      type: notification.type,
      title: notification.title,
      message: notification.message,
      data: notification.data,
      timestamp: notification.timestamp,
      isRead: notification.isRead,
    };
  }

  private requireActorId(): string {
    const actorId = this.asyncContextService.getActorId();
    if (!actorId) {
      throw new DomainError('UNAUTHENTICATED');
    }
    return actorId;
  }
}
