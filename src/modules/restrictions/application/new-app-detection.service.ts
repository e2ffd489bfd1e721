import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import type { IClock } from '../../../common/interfaces/clock.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { IRelationshipsRepository } from '../../pairing/domain/ports/relationships.port';
import {
  MONITORED_APP_DEFAULT_LIMIT_SECONDS,
  RESTRICTION_EVENTS,
  RESTRICTIONS_INJECTION_TOKENS,
} from '../domain/constants/restrictions.constants';
import { AppDetectedEvent } from '../domain/events/restriction.events';
import { appNameFor } from '../domain/models/app-catalog';
import type {
  DetectionResolution,
  NewAppDetection,
} from '../domain/models/new-app-detection.model';
import { detectionId } from '../domain/models/new-app-detection.model';
import type { IAppRestrictionsRepository } from '../domain/ports/app-restrictions.port';
import type { INewAppDetectionsRepository } from '../domain/ports/new-app-detections.port';
import type {
  NewAppDetectionDto,
  ReportInstalledAppsDto,
  ReportInstalledAppsResultDto,
} from '../dto/restrictions.dto';
import { AppRestrictionsService } from './app-restrictions.service';

/**
 * Apps nuevas en el dispositivo hijo.
 * Cada padre decide si la supervisa (límite de 2 horas) o la ignora;
 * una detección procesada no vuelve a abrirse.
 */
@Injectable()
export class NewAppDetectionService {
  private readonly logger = new Logger(NewAppDetectionService.name);

  constructor(
    @Inject(RESTRICTIONS_INJECTION_TOKENS.NEW_APP_DETECTIONS_REPOSITORY)
    private readonly detectionsRepository: INewAppDetectionsRepository,
    @Inject(RESTRICTIONS_INJECTION_TOKENS.APP_RESTRICTIONS_REPOSITORY)
    private readonly restrictionsRepository: IAppRestrictionsRepository,
    @Inject(INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY)
    private readonly relationshipsRepository: IRelationshipsRepository,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly appRestrictionsService: AppRestrictionsService,
    private readonly asyncContextService: AsyncContextService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * El hijo envía sus apps instaladas; se abre una detección por cada
   * bundle que el padre no conozca todavía
   */
  async reportInstalledApps(
    dto: ReportInstalledAppsDto,
  ): Promise<ApiResponse<ReportInstalledAppsResultDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      const bundleIds = [
        ...new Set(dto.bundleIds.map((bundleId) => bundleId.trim()).filter(Boolean)),
      ];
      const relationships = await this.relationshipsRepository.findActiveByChild(childUserId);
      const parentIds = [...new Set(relationships.map((relationship) => relationship.parentUserId))];
      const now = this.clock.now();
      let detected = 0;

      for (const parentId of parentIds) {
        const known = await this.knownBundleIds(parentId);
        for (const bundleId of bundleIds.filter((candidate) => !known.has(candidate))) {
          const detection: NewAppDetection = {
            id: detectionId(parentId, bundleId),
            parentId,
            deviceId: childUserId,
            bundleId,
            appName: appNameFor(bundleId),
            detectedAt: now,
            isProcessed: false,
          };
          if (!(await this.detectionsRepository.createIfAbsent(detection))) {
            continue;
          }

          detected += 1;
          this.eventEmitter.emit(
            RESTRICTION_EVENTS.APP_DETECTED,
            new AppDetectedEvent(
              detection.id,
              parentId,
              childUserId,
              bundleId,
              detection.appName,
              now,
              requestId,
            ),
          );
        }
      }

      this.logger.log(`[${requestId}] ${detected} apps nuevas detectadas en ${childUserId}`);
      return ApiResponse.ok<ReportInstalledAppsResultDto>(
        HttpStatus.OK,
        { detected },
        'Apps instaladas registradas',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error registrando apps instaladas: ${errorMessage(error)}`);
      return failFromError<ReportInstalledAppsResultDto>(error, { requestId });
    }
  }

  async listPendingDetections(): Promise<ApiResponse<NewAppDetectionDto[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const pending = await this.detectionsRepository.findPendingByParent(parentId);
      const data = pending.map((detection) => this.toDto(detection));

      return ApiResponse.ok<NewAppDetectionDto[]>(HttpStatus.OK, data, 'Apps pendientes de revisión', {
        requestId,
        total: data.length,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error listando detecciones: ${errorMessage(error)}`);
      return failFromError<NewAppDetectionDto[]>(error, { requestId });
    }
  }

  /**
   * Pasa la app a supervisión con el límite por defecto
   */
  async addDetectionToMonitoring(id: string): Promise<ApiResponse<NewAppDetectionDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const detection = await this.pendingDetection(id, parentId);
      await this.appRestrictionsService.applyLimit(
        parentId,
        detection.bundleId,
        MONITORED_APP_DEFAULT_LIMIT_SECONDS,
      );
      const processed = await this.resolve(detection.id, 'monitored');

      return ApiResponse.ok<NewAppDetectionDto>(
        HttpStatus.OK,
        this.toDto(processed),
        `${processed.appName} añadida a supervisión`,
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error supervisando la detección ${id}: ${errorMessage(error)}`);
      return failFromError<NewAppDetectionDto>(error, { requestId });
    }
  }

  async ignoreDetection(id: string): Promise<ApiResponse<NewAppDetectionDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const detection = await this.pendingDetection(id, parentId);
      const processed = await this.resolve(detection.id, 'ignored');

      return ApiResponse.ok<NewAppDetectionDto>(
        HttpStatus.OK,
        this.toDto(processed),
        `${processed.appName} ignorada`,
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error ignorando la detección ${id}: ${errorMessage(error)}`);
      return failFromError<NewAppDetectionDto>(error, { requestId });
    }
  }

  private async knownBundleIds(parentId: string): Promise<Set<string>> {
    const detected = await this.detectionsRepository.findDetectedBundleIds(parentId);
    const restricted = await this.restrictionsRepository.findByParent(parentId);
    return new Set([...detected, ...restricted.map((restriction) => restriction.bundleId)]);
  }

  private async pendingDetection(id: string, parentId: string): Promise<NewAppDetection> {
    const detection = await this.detectionsRepository.findById(id);
    if (!detection) {
      throw new DomainError('NOT_FOUND', 'La detección no existe.');
    }
    if (detection.parentId !== parentId) {
      throw new DomainError('PERMISSION_DENIED');
    }
    if (detection.isProcessed) {
      throw new DomainError('ALREADY_EXISTS', 'La detección ya fue procesada.');
    }
    return detection;
  }

  private async resolve(id: string, resolution: DetectionResolution): Promise<NewAppDetection> {
    const processed = await this.detectionsRepository.markProcessed(id, resolution, this.clock.now());
    if (!processed) {
      throw new DomainError('ALREADY_EXISTS', 'La detección ya fue procesada.');
    }
    return processed;
  }

  private toDto(detection: NewAppDetection): NewAppDetectionDto {
    return {
      id: detection.id,
      bundleId: detection.bundleId,
      appName: detection.appName,
      deviceId: detection.deviceId,
      detectedAt: detection.detectedAt,
      isProcessed: detection.isProcessed,
      resolution: detection.resolution,
    };
  }

  private requireActorId(): string {
    const actorId = this.asyncContextService.getActorId();
    if (!actorId) {
      throw new DomainError('UNAUTHENTICATED');
    }
    return actorId;
  }
}
