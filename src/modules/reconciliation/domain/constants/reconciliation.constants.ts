// Intervalo esperado entre heartbeats del dispositivo hijo
export const HEARTBEAT_INTERVAL_MS = 15 * 60 * 1000;

// Margen antes de considerar que falta un heartbeat
export const MISSED_HEARTBEAT_GRACE_MS = 20 * 60 * 1000;

// Hijos sin actividad en 3 días generan aviso al padre
export const CHILD_INACTIVITY_THRESHOLD_MS = 3 * 24 * 60 * 60 * 1000;

// Códigos emitidos hace más de 24 horas se eliminan
export const STALE_CODE_RETENTION_MS = 24 * 60 * 60 * 1000;

export const RECONCILIATION_EVENTS = {
  CHILD_INACTIVE: 'child.inactive',
  HEARTBEAT_MISSED: 'heartbeat.missed',
} as const;
