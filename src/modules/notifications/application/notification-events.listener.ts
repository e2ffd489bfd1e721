import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { errorMessage } from '../../../common/errors/domain.error';
import { PAIRING_EVENTS } from '../../pairing/domain/constants/pairing.constants';
import {
  RelationshipCreatedEvent,
  RelationshipUnlinkedEvent,
} from '../../pairing/domain/events/pairing.events';
import { RECONCILIATION_EVENTS } from '../../reconciliation/domain/constants/reconciliation.constants';
import {
  ChildInactiveEvent,
  HeartbeatMissedEvent,
} from '../../reconciliation/domain/events/reconciliation.events';
import { RESTRICTION_EVENTS } from '../../restrictions/domain/constants/restrictions.constants';
import {
  AppDetectedEvent,
  RestrictionLimitExceededEvent,
} from '../../restrictions/domain/events/restriction.events';
import {
  devicePairedText,
  deviceUnlinkedText,
  inactivityText,
  limitExceededText,
  missedHeartbeatText,
  newAppText,
  supervisionEndedText,
} from '../domain/models/notification-templates';
import type { NotificationDraft } from '../domain/models/notification.model';
import { NotificationsService } from './notifications.service';

/**
 * Convierte los eventos de dominio en avisos para el padre (o el hijo al desvincular).
 * Un fallo de entrega se registra; nunca afecta a la operación que emitió el evento.
 */
@Injectable()
export class NotificationEventsListener {
  private readonly logger = new Logger(NotificationEventsListener.name);

  constructor(private readonly notificationsService: NotificationsService) {}

  @OnEvent(PAIRING_EVENTS.RELATIONSHIP_CREATED)
  async handleRelationshipCreated(event: RelationshipCreatedEvent): Promise<void> {
    await this.send(event.eventName, {
      recipientId: event.parentUserId,
      type: 'device_paired',
      ...devicePairedText(event.childName, event.deviceName),
      data: { relationshipId: event.relationshipId, childUserId: event.childUserId },
      timestamp: event.timestamp,
    });
  }

  /**
   * Avisa a la otra parte de la relación
   */
  @OnEvent(PAIRING_EVENTS.RELATIONSHIP_UNLINKED)
  async handleRelationshipUnlinked(event: RelationshipUnlinkedEvent): Promise<void> {
    if (event.unlinkedBy === event.parentUserId) {
      await this.send(event.eventName, {
        recipientId: event.childUserId,
        type: 'device_unlinked',
        ...supervisionEndedText(),
        data: { relationshipId: event.relationshipId, parentUserId: event.parentUserId },
        timestamp: event.timestamp,
      });
      return;
    }
    await this.send(event.eventName, {
      recipientId: event.parentUserId,
      type: 'device_unlinked',
      ...deviceUnlinkedText(event.childName),
      data: { relationshipId: event.relationshipId, childUserId: event.childUserId },
      timestamp: event.timestamp,
    });
  }

  @OnEvent(RECONCILIATION_EVENTS.HEARTBEAT_MISSED)
  async handleHeartbeatMissed(event: HeartbeatMissedEvent): Promise<void> {
    await this.send(event.eventName, {
      recipientId: event.parentUserId,
      type: 'missed_heartbeat',
      ...missedHeartbeatText(event.missedHeartbeats, event.childName),
      data: {
        relationshipId: event.relationshipId,
        childUserId: event.childUserId,
        missedHeartbeats: event.missedHeartbeats,
        level: event.level,
        lastHeartbeatAt: event.lastHeartbeatAt.toISOString(),
      },
      timestamp: event.timestamp,
    });
  }

  @OnEvent(RECONCILIATION_EVENTS.CHILD_INACTIVE)
  async handleChildInactive(event: ChildInactiveEvent): Promise<void> {
    await this.send(event.eventName, {
      recipientId: event.parentUserId,
      type: 'inactivity_alert',
      ...inactivityText(event.childName),
      data: {
        childUserId: event.childUserId,
        lastActiveAt: event.lastActiveAt.toISOString(),
      },
      timestamp: event.timestamp,
    });
  }

  @OnEvent(RESTRICTION_EVENTS.LIMIT_EXCEEDED)
  async handleLimitExceeded(event: RestrictionLimitExceededEvent): Promise<void> {
    await this.send(event.eventName, {
      recipientId: event.parentId,
      type: 'limit_exceeded',
      ...limitExceededText(event.appName, event.timeLimit),
      data: {
        childUserId: event.childUserId,
        bundleId: event.bundleId,
        dailyUsage: event.dailyUsage,
        timeLimit: event.timeLimit,
      },
      timestamp: event.timestamp,
    });
  }

  @OnEvent(RESTRICTION_EVENTS.APP_DETECTED)
  async handleAppDetected(event: AppDetectedEvent): Promise<void> {
    await this.send(event.eventName, {
      recipientId: event.parentId,
      type: 'new_app_detected',
      ...newAppText(event.appName),
      data: {
        detectionId: event.detectionId,
        childUserId: event.childUserId,
        bundleId: event.bundleId,
      },
      timestamp: event.timestamp,
    });
  }

  private async send(eventName: string, draft: NotificationDraft): Promise<void> {
    try {
      await this.notificationsService.deliver(draft);
    } catch (error) {
      this.logger.warn(`Error entregando aviso de ${eventName}: ${errorMessage(error)}`);
    }
  }
}
