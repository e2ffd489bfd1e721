import { localDay } from './local-day';

/**
 * Restricción de un padre sobre una app del hijo.
 * Clave natural (parentId, bundleId); `version` es el token de concurrencia optimista.
 */
export interface AppRestriction {
  id: string;
  parentId: string;
  bundleId: string;
  /** Segundos diarios; 0 = sin límite */
  timeLimit: number;
  isDisabled: boolean;
  /** Segundos usados en `lastResetDate` */
  dailyUsage: number;
  lastResetDate: string;
  timezone: string;
  version: number;
  limitExceededAt?: Date;
  updatedAt: Date;
}

export interface UsageOutcome {
  restriction: AppRestriction;
  limitExceeded: boolean;
}

export function isOverLimit(restriction: Pick<AppRestriction, 'timeLimit' | 'dailyUsage'>): boolean {
  return restriction.timeLimit > 0 && restriction.dailyUsage >= restriction.timeLimit;
}

/**
 * Cambio de día en la zona del dispositivo: el uso vuelve a 0 y,
 * si la app estaba bloqueada por el límite, se desbloquea.
 * Un bloqueo manual se mantiene.
 */
export function rollOver(restriction: AppRestriction, now: Date): AppRestriction {
  const today = localDay(now, restriction.timezone);
  if (today === restriction.lastResetDate) {
    return restriction;
  }

  const blockedByLimit = restriction.limitExceededAt !== undefined;
  return {
    ...restriction,
    dailyUsage: 0,
    lastResetDate: today,
    isDisabled: blockedByLimit ? false : restriction.isDisabled,
    limitExceededAt: undefined,
  };
}

/**
 * Suma uso. Solo el cruce del límite desde desbloqueada produce `limitExceeded`.
 */
export function applyUsage(
  restriction: AppRestriction,
  elapsedSeconds: number,
  now: Date,
): UsageOutcome {
  const current = rollOver(restriction, now);
  const next: AppRestriction = {
    ...current,
    dailyUsage: current.dailyUsage + elapsedSeconds,
    updatedAt: now,
  };

  const limitExceeded = !current.isDisabled && isOverLimit(next);
  if (limitExceeded) {
    next.isDisabled = true;
    next.limitExceededAt = now;
  }

  return { restriction: next, limitExceeded };
}

/**
 * Nuevo límite conservando el uso de hoy. No emite aviso aunque ya esté superado.
 */
export function withTimeLimit(
  restriction: AppRestriction,
  timeLimit: number,
  now: Date,
): AppRestriction {
  const current = rollOver(restriction, now);
  const manuallyDisabled = current.isDisabled && current.limitExceededAt === undefined;
  const overLimit = isOverLimit({ timeLimit, dailyUsage: current.dailyUsage });

  return {
    ...current,
    timeLimit,
    isDisabled: manuallyDisabled || overLimit,
    limitExceededAt: overLimit ? (current.limitExceededAt ?? now) : undefined,
    updatedAt: now,
  };
}
