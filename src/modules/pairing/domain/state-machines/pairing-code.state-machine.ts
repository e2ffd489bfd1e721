import { getNextSnapshot, setup } from 'xstate';

import type { PairingCode } from '../models/pairing-code.model';

/**
 * Máquina de estados: ciclo de vida de un código de emparejamiento
 * Estados: issued → {active | expired}
 *
 * Transiciones:
 * - issued → active (un padre consume el código)
 * - issued → expired (vence el plazo o lo marca el barrido)
 */

export type PairingCodeState = 'issued' | 'active' | 'expired';

export const PAIRING_CODE_STATES: readonly PairingCodeState[] = [
  'issued',
  'active',
  'expired',
];

export type PairingCodeEvent = { type: 'CONSUME' } | { type: 'EXPIRE' };

export const pairingCodeStateMachine = setup({
  types: {
    events: {} as PairingCodeEvent,
  },
}).createMachine({
  id: 'pairing-code-lifecycle',
  initial: 'issued',
  states: {
    issued: {
      on: {
        CONSUME: { target: 'active' },
        EXPIRE: { target: 'expired' },
      },
    },
    active: {
      type: 'final',
    },
    expired: {
      type: 'final',
    },
  },
});

/**
 * Estado efectivo de un código: vence por reloj aunque el barrido no haya pasado
 */
export function pairingCodeStateOf(
  pairingCode: Pick<PairingCode, 'isActive' | 'isExpired' | 'expiresAt'>,
  now: Date,
): PairingCodeState {
  if (pairingCode.isActive) {
    return 'active';
  }
  if (pairingCode.isExpired || pairingCode.expiresAt.getTime() <= now.getTime()) {
    return 'expired';
  }
  return 'issued';
}

/**
 * Aplica un evento; si la máquina no lo acepta el estado no cambia
 */
export function transitionPairingCode(
  from: PairingCodeState,
  event: PairingCodeEvent,
): PairingCodeState {
  const snapshot = pairingCodeStateMachine.resolveState({ value: from });
  const next = getNextSnapshot(pairingCodeStateMachine, snapshot, event);
  return PAIRING_CODE_STATES.find((state) => next.matches(state)) ?? from;
}
