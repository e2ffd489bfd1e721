import { IANAZone } from 'luxon';

import { CLOCK_TIME_PATTERN } from '../constants/restrictions.constants';
import { inZone } from './local-day';

/**
 * Horario de descanso de un padre para sus hijos.
 * `enabledDays` usa días ISO: 1 = lunes … 7 = domingo.
 */
export interface BedtimeSettings {
  userId: string;
  isEnabled: boolean;
  startTime: string;
  endTime: string;
  enabledDays: number[];
  timezone: string;
  updatedAt: Date;
}

export type BedtimeSchedule = Pick<
  BedtimeSettings,
  'startTime' | 'endTime' | 'enabledDays' | 'timezone'
>;

export function minutesOfDay(clockTime: string): number | null {
  if (!CLOCK_TIME_PATTERN.test(clockTime)) {
    return null;
  }
  const [hours, minutes] = clockTime.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Motivo de rechazo, o null si el horario es válido
 */
export function bedtimeScheduleProblem(schedule: BedtimeSchedule): string | null {
  if (minutesOfDay(schedule.startTime) === null || minutesOfDay(schedule.endTime) === null) {
    return 'startTime y endTime deben tener formato HH:mm.';
  }
  if (schedule.enabledDays.some((day) => !Number.isInteger(day) || day < 1 || day > 7)) {
    return 'enabledDays solo admite valores de 1 (lunes) a 7 (domingo).';
  }
  if (!IANAZone.isValidZone(schedule.timezone)) {
    return `La zona horaria ${schedule.timezone} no es válida.`;
  }
  return null;
}

/**
 * Ventana el mismo día: start ≤ ahora < end.
 * Ventana nocturna (start > end): ahora ≥ start o ahora < end; el tramo tras
 * la medianoche pertenece al día en que empezó. start == end es una ventana vacía.
 */
export function isBedtimeNow(schedule: BedtimeSchedule, now: Date): boolean {
  const start = minutesOfDay(schedule.startTime);
  const end = minutesOfDay(schedule.endTime);
  if (start === null || end === null || start === end) {
    return false;
  }

  const local = inZone(now, schedule.timezone);
  const minutes = local.hour * 60 + local.minute;

  if (start < end) {
    return minutes >= start && minutes < end && schedule.enabledDays.includes(local.weekday);
  }
  if (minutes >= start) {
    return schedule.enabledDays.includes(local.weekday);
  }
  if (minutes < end) {
    return schedule.enabledDays.includes(local.minus({ days: 1 }).weekday);
  }
  return false;
}
