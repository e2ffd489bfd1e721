import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { IANAZone } from 'luxon';
import { v4 as uuidv4 } from 'uuid';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import type { IClock } from '../../../common/interfaces/clock.interface';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { SweepResult } from '../../../common/types/sweep-result.type';
import type { IRelationshipsRepository } from '../../pairing/domain/ports/relationships.port';
import {
  RESTRICTION_EVENTS,
  RESTRICTION_WRITE_ATTEMPTS,
  RESTRICTIONS_INJECTION_TOKENS,
} from '../domain/constants/restrictions.constants';
import { RestrictionLimitExceededEvent } from '../domain/events/restriction.events';
import type { AppRestriction, UsageOutcome } from '../domain/models/app-restriction.model';
import { applyUsage, rollOver, withTimeLimit } from '../domain/models/app-restriction.model';
import { appNameFor } from '../domain/models/app-catalog';
import { toDeviceAppRestriction, toDeviceBedtime } from '../domain/models/device-payloads';
import { localDay } from '../domain/models/local-day';
import type { IAppRestrictionsRepository } from '../domain/ports/app-restrictions.port';
import type { IBedtimeSettingsRepository } from '../domain/ports/bedtime-settings.port';
import type { DeviceScope, IDeviceStateCache } from '../domain/ports/device-state-cache.port';
import type {
  AppRestrictionDto,
  DeviceRestrictionsDto,
  RecordUsageDto,
  RecordUsageResultDto,
  SetAppLimitDto,
} from '../dto/restrictions.dto';

type RestrictionChange = (current: AppRestriction | null, now: Date) => UsageOutcome | null;

/**
 * Restricciones por app de cada padre y su uso diario.
 *
 * Toda escritura es lectura-modificación-escritura sobre `version`;
 * ante conflicto se relee y se reintenta. Tras escribir se empuja el
 * estado a la caché que leen los dispositivos.
 */
@Injectable()
export class AppRestrictionsService {
  private readonly logger = new Logger(AppRestrictionsService.name);
  private readonly defaultTimezone: string;

  constructor(
    @Inject(RESTRICTIONS_INJECTION_TOKENS.APP_RESTRICTIONS_REPOSITORY)
    private readonly restrictionsRepository: IAppRestrictionsRepository,
    @Inject(RESTRICTIONS_INJECTION_TOKENS.BEDTIME_SETTINGS_REPOSITORY)
    private readonly bedtimeRepository: IBedtimeSettingsRepository,
    @Inject(RESTRICTIONS_INJECTION_TOKENS.DEVICE_STATE_CACHE)
    private readonly deviceStateCache: IDeviceStateCache,
    @Inject(INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY)
    private readonly relationshipsRepository: IRelationshipsRepository,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly asyncContextService: AsyncContextService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.defaultTimezone = configService.get<string>('DEFAULT_TIMEZONE') ?? 'UTC';
  }

  async setLimit(bundleId: string, dto: SetAppLimitDto): Promise<ApiResponse<AppRestrictionDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const restriction = await this.applyLimit(parentId, bundleId, dto.timeLimit, dto.timezone);

      this.logger.log(`[${requestId}] Límite de ${bundleId} fijado en ${dto.timeLimit}s por ${parentId}`);
      return ApiResponse.ok<AppRestrictionDto>(
        HttpStatus.OK,
        this.toDto(restriction),
        'Límite actualizado',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error fijando límite de ${bundleId}: ${errorMessage(error)}`);
      return failFromError<AppRestrictionDto>(error, { requestId });
    }
  }

  async disable(bundleId: string): Promise<ApiResponse<AppRestrictionDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const restriction = await this.mutate(parentId, bundleId, (current, now) => ({
        restriction: {
          ...rollOver(current ?? this.newRestriction(parentId, bundleId, this.defaultTimezone, now), now),
          isDisabled: true,
          limitExceededAt: undefined,
          updatedAt: now,
        },
        limitExceeded: false,
      }));

      return ApiResponse.ok<AppRestrictionDto>(
        HttpStatus.OK,
        this.toDto(restriction),
        'App bloqueada',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error bloqueando ${bundleId}: ${errorMessage(error)}`);
      return failFromError<AppRestrictionDto>(error, { requestId });
    }
  }

  async enable(bundleId: string): Promise<ApiResponse<AppRestrictionDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const restriction = await this.mutate(parentId, bundleId, (current, now) => {
        if (!current) {
          throw new DomainError('NOT_FOUND', 'La app no tiene restricciones.');
        }
        return {
          restriction: {
            ...rollOver(current, now),
            isDisabled: false,
            limitExceededAt: undefined,
            updatedAt: now,
          },
          limitExceeded: false,
        };
      });

      return ApiResponse.ok<AppRestrictionDto>(
        HttpStatus.OK,
        this.toDto(restriction),
        'App desbloqueada',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error desbloqueando ${bundleId}: ${errorMessage(error)}`);
      return failFromError<AppRestrictionDto>(error, { requestId });
    }
  }

  async remove(bundleId: string): Promise<ApiResponse<null>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const deleted = await this.restrictionsRepository.delete(parentId, bundleId);
      if (!deleted) {
        throw new DomainError('NOT_FOUND', 'La app no tiene restricciones.');
      }
      await this.deviceStateCache.pushAppRestriction(parentId, bundleId, null, this.clock.now());

      return ApiResponse.ok<null>(HttpStatus.OK, null, 'Restricción eliminada', { requestId });
    } catch (error) {
      this.logger.error(`[${requestId}] Error eliminando restricción de ${bundleId}: ${errorMessage(error)}`);
      return failFromError<null>(error, { requestId });
    }
  }

  async listRestrictions(): Promise<ApiResponse<AppRestrictionDto[]>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const parentId = this.requireActorId();
      const now = this.clock.now();
      const restrictions = await this.restrictionsRepository.findByParent(parentId);
      const data = restrictions.map((restriction) => this.toDto(rollOver(restriction, now)));

      return ApiResponse.ok<AppRestrictionDto[]>(HttpStatus.OK, data, 'Restricciones', {
        requestId,
        total: data.length,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error listando restricciones: ${errorMessage(error)}`);
      return failFromError<AppRestrictionDto[]>(error, { requestId });
    }
  }

  /**
   * Uso reportado por el dispositivo hijo; se aplica en el ámbito de cada padre vinculado
   */
  async recordUsage(dto: RecordUsageDto): Promise<ApiResponse<RecordUsageResultDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      if (!Number.isInteger(dto.elapsedSeconds) || dto.elapsedSeconds < 0) {
        throw new DomainError('INVALID_FORMAT', 'elapsedSeconds debe ser un entero no negativo.');
      }
      const timezone = this.validTimezone(dto.timezone);

      const relationships = await this.relationshipsRepository.findActiveByChild(childUserId);
      let restrictionsUpdated = 0;
      let isDisabled = false;

      for (const { parentUserId } of relationships) {
        const outcome = await this.mutateOutcome(parentUserId, dto.bundleId, (current, now) =>
          current
            ? applyUsage({ ...current, timezone: timezone ?? current.timezone }, dto.elapsedSeconds, now)
            : null,
        );
        if (!outcome) {
          continue;
        }

        restrictionsUpdated += 1;
        isDisabled = isDisabled || outcome.restriction.isDisabled;
        if (outcome.limitExceeded) {
          this.emitLimitExceeded(outcome.restriction, childUserId, requestId);
        }
      }

      return ApiResponse.ok<RecordUsageResultDto>(
        HttpStatus.OK,
        { restrictionsUpdated, isDisabled },
        'Uso registrado',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error registrando uso de ${dto.bundleId}: ${errorMessage(error)}`);
      return failFromError<RecordUsageResultDto>(error, { requestId });
    }
  }

  /**
   * Vista del dispositivo hijo: un ámbito por padre y las apps bloqueadas ahora
   */
  async getDeviceRestrictions(): Promise<ApiResponse<DeviceRestrictionsDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const childUserId = this.requireActorId();
      const now = this.clock.now();
      const relationships = await this.relationshipsRepository.findActiveByChild(childUserId);
      const parentIds = [...new Set(relationships.map((relationship) => relationship.parentUserId))];

      const scopes: DeviceScope[] = [];
      for (const parentId of parentIds) {
        const cached = (await this.deviceStateCache.isWarm(parentId))
          ? await this.deviceStateCache.readScope(parentId)
          : null;
        scopes.push(cached ?? (await this.warmScope(parentId, now)));
      }

      const isBedtime = scopes.some((scope) => scope.bedtime?.isActiveNow === true);
      const blocked = new Set<string>();
      for (const scope of scopes) {
        const bedtimeActive = scope.bedtime?.isActiveNow === true;
        for (const restriction of scope.appRestrictions) {
          if (restriction.isDisabled || bedtimeActive) {
            blocked.add(restriction.bundleId);
          }
        }
      }

      return ApiResponse.ok<DeviceRestrictionsDto>(
        HttpStatus.OK,
        { scopes, blockedBundleIds: [...blocked].sort(), isBedtimeNow: isBedtime },
        'Restricciones del dispositivo',
        { requestId },
      );
    } catch (error) {
      this.logger.error(`[${requestId}] Error leyendo restricciones del dispositivo: ${errorMessage(error)}`);
      return failFromError<DeviceRestrictionsDto>(error, { requestId });
    }
  }

  /**
   * Desbloquea las apps bloqueadas por límite cuyo día ya terminó en su zona.
   * Sin uso no hay cambio de día, y una app bloqueada no reporta uso.
   */
  async sweepDailyRollover(): Promise<SweepResult> {
    try {
      const now = this.clock.now();
      const blocked = await this.restrictionsRepository.findLimitBlocked();
      let count = 0;

      for (const candidate of blocked) {
        if (localDay(now, candidate.timezone) === candidate.lastResetDate) {
          continue;
        }
        const outcome = await this.mutateOutcome(candidate.parentId, candidate.bundleId, (current, at) =>
          current ? { restriction: { ...rollOver(current, at), updatedAt: at }, limitExceeded: false } : null,
        );
        if (outcome) {
          count += 1;
        }
      }
      return { isSuccess: true, count };
    } catch (error) {
      this.logger.error(`Error reiniciando el uso diario: ${errorMessage(error)}`);
      return { isSuccess: false, count: 0, error: errorMessage(error) };
    }
  }

  /**
   * Fija el límite diario creando la restricción si no existe.
   * Compartido con la supervisión de apps detectadas.
   */
  async applyLimit(
    parentId: string,
    bundleId: string,
    timeLimit: number,
    timezone?: string,
  ): Promise<AppRestriction> {
    if (!Number.isInteger(timeLimit) || timeLimit < 0) {
      throw new DomainError('INVALID_FORMAT', 'timeLimit debe ser un entero no negativo.');
    }
    const zone = this.validTimezone(timezone);

    return this.mutate(parentId, bundleId, (current, now) => {
      const base = current ?? this.newRestriction(parentId, bundleId, zone ?? this.defaultTimezone, now);
      return {
        restriction: withTimeLimit({ ...base, timezone: zone ?? base.timezone }, timeLimit, now),
        limitExceeded: false,
      };
    });
  }

  private async mutate(
    parentId: string,
    bundleId: string,
    change: RestrictionChange,
  ): Promise<AppRestriction> {
    const outcome = await this.mutateOutcome(parentId, bundleId, change);
    if (!outcome) {
      throw new DomainError('NOT_FOUND', 'La app no tiene restricciones.');
    }
    return outcome.restriction;
  }

  /**
   * null si `change` decide no escribir
   */
  private async mutateOutcome(
    parentId: string,
    bundleId: string,
    change: RestrictionChange,
  ): Promise<UsageOutcome | null> {
    for (let attempt = 1; attempt <= RESTRICTION_WRITE_ATTEMPTS; attempt++) {
      const current = await this.restrictionsRepository.find(parentId, bundleId);
      const outcome = change(current, this.clock.now());
      if (!outcome) {
        return null;
      }

      const written = current
        ? await this.restrictionsRepository.replace(
            { ...outcome.restriction, version: current.version + 1 },
            current.version,
          )
        : await this.restrictionsRepository.create({ ...outcome.restriction, version: 1 });

      if (written) {
        const restriction: AppRestriction = {
          ...outcome.restriction,
          version: current ? current.version + 1 : 1,
        };
        await this.deviceStateCache.pushAppRestriction(
          parentId,
          bundleId,
          toDeviceAppRestriction(restriction),
          restriction.updatedAt,
        );
        return { restriction, limitExceeded: outcome.limitExceeded };
      }

      this.logger.warn(`Conflicto de versión en ${parentId}/${bundleId} (intento ${attempt})`);
    }

    throw new DomainError(
      'TRANSIENT_STORE_FAILURE',
      'La restricción cambió mientras se actualizaba. Inténtalo de nuevo.',
    );
  }

  /**
   * Reconstruye el ámbito desde el almacén cuando la caché está fría
   */
  private async warmScope(parentId: string, now: Date): Promise<DeviceScope> {
    const restrictions = await this.restrictionsRepository.findByParent(parentId);
    const settings = await this.bedtimeRepository.findByUser(parentId);

    const scope: DeviceScope = { parentId, appRestrictions: [], bedtime: null };

    for (const restriction of restrictions) {
      const payload = toDeviceAppRestriction(rollOver(restriction, now));
      scope.appRestrictions.push(payload);
      await this.deviceStateCache.pushAppRestriction(parentId, restriction.bundleId, payload, restriction.updatedAt);
    }
    if (settings?.isEnabled) {
      scope.bedtime = toDeviceBedtime(settings, now);
      await this.deviceStateCache.pushBedtime(parentId, scope.bedtime, settings.updatedAt);
    }
    await this.deviceStateCache.markWarm(parentId);
    return scope;
  }

  private emitLimitExceeded(restriction: AppRestriction, childUserId: string, requestId: string): void {
    this.logger.log(
      `[${requestId}] ${restriction.bundleId} superó el límite de ${restriction.parentId}: ${restriction.dailyUsage}/${restriction.timeLimit}s`,
    );
    this.eventEmitter.emit(
      RESTRICTION_EVENTS.LIMIT_EXCEEDED,
      new RestrictionLimitExceededEvent(
        restriction.parentId,
        childUserId,
        restriction.bundleId,
        appNameFor(restriction.bundleId),
        restriction.dailyUsage,
        restriction.timeLimit,
        restriction.updatedAt,
        requestId,
      ),
    );
  }

  private newRestriction(
    parentId: string,
    bundleId: string,
    timezone: string,
    now: Date,
  ): AppRestriction {
    return {
      id: uuidv4(),
      parentId,
      bundleId,
      timeLimit: 0,
      isDisabled: false,
      dailyUsage: 0,
      lastResetDate: localDay(now, timezone),
      timezone,
      version: 0,
      updatedAt: now,
    };
  }

  private validTimezone(timezone?: string): string | undefined {
    if (timezone === undefined) {
      return undefined;
    }
    if (!IANAZone.isValidZone(timezone)) {
      throw new DomainError('INVALID_FORMAT', `La zona horaria ${timezone} no es válida.`);
    }
    return timezone;
  }

  private toDto(restriction: AppRestriction): AppRestrictionDto {
    return {
      bundleId: restriction.bundleId,
      appName: appNameFor(restriction.bundleId),
      timeLimit: restriction.timeLimit,
      isDisabled: restriction.isDisabled,
      dailyUsage: restriction.dailyUsage,
      lastResetDate: restriction.lastResetDate,
      timezone: restriction.timezone,
      limitExceededAt: restriction.limitExceededAt,
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
