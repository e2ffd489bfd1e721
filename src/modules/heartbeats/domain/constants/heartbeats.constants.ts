import type { ActivityType } from '../models/activity-type';

export const HEARTBEATS_INJECTION_TOKENS = {
  HEARTBEATS_REPOSITORY: 'IHeartbeatsRepository',
} as const;

// Sin heartbeat en 24 horas el dispositivo se muestra desconectado
export const CHILD_OFFLINE_THRESHOLD_MS = 24 * 60 * 60 * 1000;

// Actividades tras las que la app deja de estar en primer plano
export const INACTIVE_ACTIVITY_TYPES: readonly ActivityType[] = [
  'app_background',
  'app_shutdown',
  'monitoring_stopped',
];
