import { BaseDomainEvent } from '../../../../common/events/base-domain.event';
import { PAIRING_EVENTS } from '../constants/pairing.constants';

export class RelationshipCreatedEvent extends BaseDomainEvent {
  readonly eventName = PAIRING_EVENTS.RELATIONSHIP_CREATED;

  constructor(
    readonly relationshipId: string,
    readonly parentUserId: string,
    readonly childUserId: string,
    readonly childName: string,
    readonly deviceName: string,
    occurredAt: Date,
    requestId?: string,
  ) {
    super(occurredAt, requestId);
  }
}

export class RelationshipUnlinkedEvent extends BaseDomainEvent {
  readonly eventName = PAIRING_EVENTS.RELATIONSHIP_UNLINKED;

  constructor(
    readonly relationshipId: string,
    readonly parentUserId: string,
    readonly childUserId: string,
    readonly childName: string,
    readonly unlinkedBy: string,
    occurredAt: Date,
    requestId?: string,
  ) {
    super(occurredAt, requestId);
  }
}
