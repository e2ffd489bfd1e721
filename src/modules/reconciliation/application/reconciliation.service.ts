import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { errorMessage } from '../../../common/errors/domain.error';
import type { IClock } from '../../../common/interfaces/clock.interface';
import type { SweepResult } from '../../../common/types/sweep-result.type';
import type { Relationship } from '../../pairing/domain/models/relationship.model';
import type { IPairingCodesRepository } from '../../pairing/domain/ports/pairing-codes.port';
import type { IRelationshipsRepository } from '../../pairing/domain/ports/relationships.port';
import type { IUserProfilesRepository } from '../../users/domain/ports/user-profiles.port';
import {
  CHILD_INACTIVITY_THRESHOLD_MS,
  MISSED_HEARTBEAT_GRACE_MS,
  RECONCILIATION_EVENTS,
  STALE_CODE_RETENTION_MS,
} from '../domain/constants/reconciliation.constants';
import { ChildInactiveEvent, HeartbeatMissedEvent } from '../domain/events/reconciliation.events';
import { escalationLevelFor, missedHeartbeatsSince } from '../domain/models/escalation-level';

/**
 * Barridos periódicos de reconciliación.
 * Cada barrido es una lectura por lotes seguida de escrituras idempotentes:
 * ejecutarlo dos veces, o en dos instancias a la vez, converge al mismo estado.
 */
@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);

  constructor(
    @Inject(INJECTION_TOKENS.PAIRING_CODES_REPOSITORY)
    private readonly codesRepository: IPairingCodesRepository,
    @Inject(INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY)
    private readonly relationshipsRepository: IRelationshipsRepository,
    @Inject(INJECTION_TOKENS.USER_PROFILES_REPOSITORY)
    private readonly profilesRepository: IUserProfilesRepository,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Marca como expirados los códigos disponibles cuyo plazo ya pasó
   */
  async sweepExpiredCodes(): Promise<SweepResult> {
    try {
      const count = await this.codesRepository.expireOverdue(this.clock.now());
      return { isSuccess: true, count };
    } catch (error) {
      return this.failed('expirando códigos', error);
    }
  }

  /**
   * Elimina códigos emitidos hace más de 24 horas, consumidos o no
   */
  async purgeStaleCodes(): Promise<SweepResult> {
    try {
      const cutoff = new Date(this.clock.now().getTime() - STALE_CODE_RETENTION_MS);
      const count = await this.codesRepository.deleteCreatedBefore(cutoff);
      return { isSuccess: true, count };
    } catch (error) {
      return this.failed('eliminando códigos antiguos', error);
    }
  }

  /**
   * Avisa a cada padre de los hijos sin actividad en 3 días
   */
  async sweepInactiveChildren(): Promise<SweepResult> {
    try {
      const now = this.clock.now();
      const cutoff = new Date(now.getTime() - CHILD_INACTIVITY_THRESHOLD_MS);
      const children = await this.profilesRepository.findInactiveChildren(cutoff);

      const notified = new Set<string>();
      for (const child of children) {
        if (!child.lastActiveAt) continue;

        const relationships = await this.relationshipsRepository.findActiveByChild(child.id);
        for (const relationship of relationships) {
          const key = `${child.id}:${relationship.parentUserId}`;
          if (notified.has(key)) continue;
          notified.add(key);

          this.eventEmitter.emit(
            RECONCILIATION_EVENTS.CHILD_INACTIVE,
            new ChildInactiveEvent(
              child.id,
              relationship.parentUserId,
              relationship.childName,
              child.lastActiveAt,
              now,
            ),
          );
        }
      }

      return { isSuccess: true, count: notified.size };
    } catch (error) {
      return this.failed('buscando hijos inactivos', error);
    }
  }

  /**
   * Escala el contador de heartbeats perdidos. Solo sube: un nivel ya avisado
   * no se repite y solo un heartbeat o un cierre ordenado lo reinicia.
   */
  async sweepMissedHeartbeats(): Promise<SweepResult> {
    try {
      const now = this.clock.now();
      const cutoff = new Date(now.getTime() - MISSED_HEARTBEAT_GRACE_MS);
      const overdue = await this.relationshipsRepository.findOverdueHeartbeats(cutoff);

      let escalated = 0;
      for (const relationship of overdue) {
        try {
          if (await this.escalate(relationship, now)) {
            escalated++;
          }
        } catch (error) {
          this.logger.error(
            `Error escalando heartbeats de la relación ${relationship.id}: ${errorMessage(error)}`,
          );
        }
      }

      return { isSuccess: true, count: escalated };
    } catch (error) {
      return this.failed('revisando heartbeats perdidos', error);
    }
  }

  private async escalate(relationship: Relationship, now: Date): Promise<boolean> {
    const { lastHeartbeatAt } = relationship;
    if (!lastHeartbeatAt) {
      return false;
    }

    const missedHeartbeats = missedHeartbeatsSince(lastHeartbeatAt, now);
    const level = escalationLevelFor(missedHeartbeats);
    if (!level || missedHeartbeats <= relationship.missedHeartbeats) {
      return false;
    }

    const persisted = await this.relationshipsRepository.escalateMissedHeartbeats({
      id: relationship.id,
      expectedMissedHeartbeats: relationship.missedHeartbeats,
      expectedLastHeartbeatAt: lastHeartbeatAt,
      missedHeartbeats,
    });
    if (!persisted) {
      // Otro barrido o un heartbeat nuevo se adelantó
      return false;
    }

    this.eventEmitter.emit(
      RECONCILIATION_EVENTS.HEARTBEAT_MISSED,
      new HeartbeatMissedEvent(
        relationship.id,
        relationship.parentUserId,
        relationship.childUserId,
        relationship.childName,
        missedHeartbeats,
        level,
        lastHeartbeatAt,
        now,
      ),
    );
    return true;
  }

  private failed(action: string, error: unknown): SweepResult {
    const message = errorMessage(error);
    this.logger.error(`Error ${action}: ${message}`);
    return { isSuccess: false, count: 0, error: message };
  }
}
