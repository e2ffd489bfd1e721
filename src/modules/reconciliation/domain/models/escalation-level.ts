import { HEARTBEAT_INTERVAL_MS } from '../constants/reconciliation.constants';

export type EscalationLevel =
  | 'first_miss'
  | 'second_miss'
  | 'multiple_misses'
  | 'extended_failure';

/**
 * Nivel de alerta para un número de heartbeats perdidos; null si no falta ninguno
 */
export function escalationLevelFor(missedHeartbeats: number): EscalationLevel | null {
  if (missedHeartbeats >= 5) return 'extended_failure';
  if (missedHeartbeats >= 3) return 'multiple_misses';
  if (missedHeartbeats === 2) return 'second_miss';
  if (missedHeartbeats === 1) return 'first_miss';
  return null;
}

export function missedHeartbeatsSince(lastHeartbeatAt: Date, now: Date): number {
  const elapsed = now.getTime() - lastHeartbeatAt.getTime();
  return elapsed > 0 ? Math.floor(elapsed / HEARTBEAT_INTERVAL_MS) : 0;
}
