import { NOTIFICATION_TYPES } from '../constants/notifications.constants';

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export function isNotificationType(value: unknown): value is NotificationType {
  return NOTIFICATION_TYPES.some((type) => type === value);
}

export type NotificationData = Record<string, string | number | boolean>;

export interface Notification {
  id: string;
  recipientId: string;
  type: NotificationType;
  title: string;
  message: string;
  data: NotificationData;
  timestamp: Date;
  isRead: boolean;
}

/**
 * Lo que produce un listener antes de asignar id y estado de lectura
 */
export type NotificationDraft = Omit<Notification, 'id' | 'isRead'>;
