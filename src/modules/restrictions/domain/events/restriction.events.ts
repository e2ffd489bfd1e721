import { BaseDomainEvent } from '../../../../common/events/base-domain.event';
import { RESTRICTION_EVENTS } from '../constants/restrictions.constants';

export class RestrictionLimitExceededEvent extends BaseDomainEvent {
  readonly eventName = RESTRICTION_EVENTS.LIMIT_EXCEEDED;

  constructor(
    readonly parentId: string,
    readonly childUserId: string,
    readonly bundleId: string,
    readonly appName: string,
    readonly dailyUsage: number,
    readonly timeLimit: number,
    occurredAt: Date,
    requestId?: string,
  ) {
    super(occurredAt, requestId);
  }
}

export class AppDetectedEvent extends BaseDomainEvent {
  readonly eventName = RESTRICTION_EVENTS.APP_DETECTED;

  constructor(
    readonly detectionId: string,
    readonly parentId: string,
    readonly childUserId: string,
    readonly bundleId: string,
    readonly appName: string,
    occurredAt: Date,
    requestId?: string,
  ) {
    super(occurredAt, requestId);
  }
}
