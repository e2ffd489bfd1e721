export const RESTRICTIONS_INJECTION_TOKENS = {
  APP_RESTRICTIONS_REPOSITORY: 'IAppRestrictionsRepository',
  BEDTIME_SETTINGS_REPOSITORY: 'IBedtimeSettingsRepository',
  NEW_APP_DETECTIONS_REPOSITORY: 'INewAppDetectionsRepository',
  DEVICE_STATE_CACHE: 'IDeviceStateCache',
} as const;

// Reintentos ante conflicto de versión en lectura-modificación-escritura
export const RESTRICTION_WRITE_ATTEMPTS = 3;

// Límite por defecto al pasar una app detectada a supervisión: 2 horas
export const MONITORED_APP_DEFAULT_LIMIT_SECONDS = 2 * 60 * 60;

export const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const RESTRICTION_EVENTS = {
  LIMIT_EXCEEDED: 'restriction.limit_exceeded',
  APP_DETECTED: 'app.detected',
} as const;
