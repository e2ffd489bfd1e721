import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import type { IClock } from '../../../common/interfaces/clock.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import type {
  IRelationshipsRepository,
  LivenessSignal,
} from '../../pairing/domain/ports/relationships.port';
import type { IUserProfilesRepository } from '../../users/domain/ports/user-profiles.port';
import {
  CHILD_OFFLINE_THRESHOLD_MS,
  HEARTBEATS_INJECTION_TOKENS,
  INACTIVE_ACTIVITY_TYPES,
} from '../domain/constants/heartbeats.constants';
import type { ActivityType } from '../domain/models/activity-type';
import type { IHeartbeatsRepository } from '../domain/ports/heartbeats.port';
import type {
  ChildStatusDto,
  RecordActivityDto,
  RecordActivityResultDto,
} from '../dto/activity.dto';

/**
 * Señales de actividad del dispositivo hijo.
 *
 * Cada escritura es compare-and-set sobre el timestamp de la señal,
 * así una señal antigua que llega tarde no pisa estado más reciente.
 */
@Injectable()
export class ActivityService {
  private readonly logger = new Logger(ActivityService.name);

  constructor(
    @Inject(HEARTBEATS_INJECTION_TOKENS.HEARTBEATS_REPOSITORY)
    private readonly heartbeatsRepository: IHeartbeatsRepository,
    @Inject(INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY)
    private readonly relationshipsRepository: IRelationshipsRepository,
    @Inject(INJECTION_TOKENS.USER_PROFILES_REPOSITORY)
    private readonly profilesRepository: IUserProfilesRepository,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  async recordActivity(dto: RecordActivityDto): Promise<ApiResponse<RecordActivityResultDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      const at = this.signalTime(dto.occurredAt);

      const recorded = await this.heartbeatsRepository.upsertIfNewer({
        childUserId,
        timestamp: at,
        activityType: dto.activityType,
        isActive: !INACTIVE_ACTIVITY_TYPES.includes(dto.activityType),
        deviceInfo: dto.deviceInfo,
      });

      await this.profilesRepository.recordActivity({
        userId: childUserId,
        activityType: dto.activityType,
        deviceInfo: dto.deviceInfo,
        at,
      });

      const relationshipsUpdated = await this.applyToRelationships(dto.activityType, {
        childUserId,
        at,
        deviceInfo: dto.deviceInfo,
      });

      this.logger.debug(
        `[${requestId}] Actividad ${dto.activityType} de ${childUserId}: ${relationshipsUpdated} relaciones actualizadas`,
      );
      return ApiResponse.ok<RecordActivityResultDto>(
        HttpStatus.OK,
        { recorded, relationshipsUpdated },
        'Actividad registrada',
        { requestId },
      );
    } catch (error) {
      // El dispositivo reintentará con la siguiente señal
      this.logger.error(`[${requestId}] Error registrando actividad: ${errorMessage(error)}`);
      return failFromError<RecordActivityResultDto>(error, { requestId, success: false });
    }
  }

  /**
   * Estado de conexión de cada hijo del padre autenticado
   */
  async getChildStatus(): Promise<ApiResponse<ChildStatusDto[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentUserId = this.requireActorId();
      const relationships = await this.relationshipsRepository.findActiveByParent(parentUserId);
      const now = this.clock.now().getTime();

      const statuses = await Promise.all(
        relationships.map(async (relationship): Promise<ChildStatusDto> => {
          const heartbeat = await this.heartbeatsRepository.findByChild(relationship.childUserId);
          const lastHeartbeatAt = heartbeat?.timestamp ?? relationship.lastHeartbeatAt;
          const isOnline =
            lastHeartbeatAt !== undefined &&
            now - lastHeartbeatAt.getTime() <= CHILD_OFFLINE_THRESHOLD_MS;

          return {
            relationshipId: relationship.id,
            childUserId: relationship.childUserId,
            childName: relationship.childName,
            deviceName: relationship.deviceName,
            status: isOnline ? 'online' : 'offline',
            lastHeartbeatAt,
            lastSyncAt: relationship.lastSyncAt,
            missedHeartbeats: relationship.missedHeartbeats,
            isNormalClosure: relationship.isNormalClosure,
            deviceInfo: heartbeat?.deviceInfo ?? relationship.childDeviceInfo,
          };
        }),
      );

      return ApiResponse.ok<ChildStatusDto[]>(HttpStatus.OK, statuses, 'Estado de los dispositivos', {
        requestId,
        total: statuses.length,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error consultando estado: ${errorMessage(error)}`);
      return failFromError<ChildStatusDto[]>(error, { requestId });
    }
  }

  private applyToRelationships(activityType: ActivityType, signal: LivenessSignal): Promise<number> {
    switch (activityType) {
      case 'heartbeat':
        return this.relationshipsRepository.applyHeartbeat(signal);
      case 'app_shutdown':
        return this.relationshipsRepository.applyShutdown(signal);
      default:
        return this.relationshipsRepository.applySync(signal);
    }
  }

  /**
   * Una fecha futura del dispositivo se recorta a la hora del servidor
   */
  private signalTime(occurredAt?: string): Date {
    const now = this.clock.now();
    if (!occurredAt) {
      return now;
    }
    const at = new Date(occurredAt);
    if (Number.isNaN(at.getTime())) {
      throw new DomainError('INVALID_FORMAT', 'occurredAt no es una fecha válida.');
    }
    return at.getTime() > now.getTime() ? now : at;
  }

  private requireActorId(): string {
    const actorId = this.asyncContextService.getActorId();
    if (!actorId) {
      throw new DomainError('UNAUTHENTICATED');
    }
    return actorId;
  }
}
