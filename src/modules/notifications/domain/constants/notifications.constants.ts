export const NOTIFICATIONS_INJECTION_TOKENS = {
  NOTIFICATIONS_REPOSITORY: 'INotificationsRepository',
  NOTIFICATION_DISPATCHER: 'INotificationDispatcher',
} as const;

export const NOTIFICATION_TYPES = [
  'device_paired',
  'device_unlinked',
  'missed_heartbeat',
  'inactivity_alert',
  'limit_exceeded',
  'new_app_detected',
] as const;

// Tamaño máximo de la bandeja devuelta por GET /notifications
export const NOTIFICATIONS_PAGE_SIZE = 50;
