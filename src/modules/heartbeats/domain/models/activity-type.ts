/**
 * Tipos de señal que envía el dispositivo hijo
 */
export const ACTIVITY_TYPES = [
  'app_opened',
  'app_active',
  'app_background',
  'app_shutdown',
  'heartbeat',
  'monitoring_started',
  'monitoring_stopped',
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export function isActivityType(value: unknown): value is ActivityType {
  return ACTIVITY_TYPES.some((type) => type === value);
}
