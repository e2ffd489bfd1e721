import { Injectable, Logger } from '@nestjs/common';

import type { Notification } from '../../domain/models/notification.model';
import type { INotificationDispatcher } from '../../domain/ports/notification-dispatcher.port';

/**
 * Adapter: deja constancia del envío en el log.
 * El transporte push vive fuera de este servicio.
 */
@Injectable()
export class LoggingNotificationDispatcher implements INotificationDispatcher {
  private readonly logger = new Logger(LoggingNotificationDispatcher.name);

  async dispatch(notification: Notification): Promise<void> {
    this.logger.log(
      `Aviso ${notification.type} para ${notification.recipientId}: ${notification.title}`,
    );
  }
}
