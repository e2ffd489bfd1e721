import type { Notification } from '../models/notification.model';

/**
 * Puerto: entrega del aviso fuera del servidor (push al dispositivo del padre)
 */
export interface INotificationDispatcher {
  dispatch(notification: Notification): Promise<void>;
}
