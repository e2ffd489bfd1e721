import { DateTime, IANAZone } from 'luxon';

/**
 * Instante visto en la zona del dispositivo; zona inválida → UTC
 */
export function inZone(now: Date, timezone: string): DateTime {
  const zone = IANAZone.isValidZone(timezone) ? timezone : 'utc';
  return DateTime.fromJSDate(now, { zone });
}

/**
 * Día natural `yyyy-MM-dd` en la zona indicada
 */
export function localDay(now: Date, timezone: string): string {
  return inZone(now, timezone).toFormat('yyyy-MM-dd');
}
