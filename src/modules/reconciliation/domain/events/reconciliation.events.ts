import { BaseDomainEvent } from '../../../../common/events/base-domain.event';
import { RECONCILIATION_EVENTS } from '../constants/reconciliation.constants';
import type { EscalationLevel } from '../models/escalation-level';

/**
 * Hijo sin actividad reciente; uno por (hijo, padre) en cada barrido
 */
export class ChildInactiveEvent extends BaseDomainEvent {
  readonly eventName = RECONCILIATION_EVENTS.CHILD_INACTIVE;

  constructor(
    public readonly childUserId: string,
    public readonly parentUserId: string,
    public readonly childName: string,
    public readonly lastActiveAt: Date,
    occurredAt: Date,
  ) {
    super(occurredAt);
  }
}

export class HeartbeatMissedEvent extends BaseDomainEvent {
  readonly eventName = RECONCILIATION_EVENTS.HEARTBEAT_MISSED;

  constructor(
    public readonly relationshipId: string,
    public readonly parentUserId: string,
    public readonly childUserId: string,
    public readonly childName: string,
    public readonly missedHeartbeats: number,
    public readonly level: EscalationLevel,
    public readonly lastHeartbeatAt: Date,
    occurredAt: Date,
  ) {
    super(occurredAt);
  }
}
