import type { Notification } from '../models/notification.model';

/**
 * Puerto: bandeja de avisos de cada destinatario
 * Implementación: MongoDB adapter
 */
export interface INotificationsRepository {
  create(notification: Notification): Promise<Notification>;

  /**
   * Más recientes primero
   */
  findByRecipient(recipientId: string, limit: number): Promise<Notification[]>;

  findById(id: string): Promise<Notification | null>;

  markRead(id: string, recipientId: string): Promise<Notification | null>;
}
