import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

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
import { RESTRICTIONS_INJECTION_TOKENS } from '../domain/constants/restrictions.constants';
import type { BedtimeSettings } from '../domain/models/bedtime-settings.model';
import { bedtimeScheduleProblem } from '../domain/models/bedtime-settings.model';
import { toDeviceBedtime } from '../domain/models/device-payloads';
import type { IBedtimeSettingsRepository } from '../domain/ports/bedtime-settings.port';
import type { IDeviceStateCache } from '../domain/ports/device-state-cache.port';
import type { BedtimeSettingsDto, SetBedtimeDto } from '../dto/restrictions.dto';

/**
 * Horario de descanso. La aplicación nunca toca las restricciones por app:
 * solo publica `isActiveNow` y el dispositivo bloquea mientras dure.
 */
@Injectable()
export class BedtimeService {
  private readonly logger = new Logger(BedtimeService.name);
  private readonly defaultTimezone: string;

  constructor(
    @Inject(RESTRICTIONS_INJECTION_TOKENS.BEDTIME_SETTINGS_REPOSITORY)
    private readonly bedtimeRepository: IBedtimeSettingsRepository,
    @Inject(RESTRICTIONS_INJECTION_TOKENS.DEVICE_STATE_CACHE)
    private readonly deviceStateCache: IDeviceStateCache,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: IClock,
    private readonly asyncContextService: AsyncContextService,
    configService: ConfigService,
  ) {
    this.defaultTimezone = configService.get<string>('DEFAULT_TIMEZONE') ?? 'UTC';
  }

  async setBedtime(dto: SetBedtimeDto): Promise<ApiResponse<BedtimeSettingsDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const userId = this.requireActorId();
      const now = this.clock.now();
      const settings: BedtimeSettings = {
        userId,
        isEnabled: dto.isEnabled,
        startTime: dto.startTime,
        endTime: dto.endTime,
        enabledDays: [...new Set(dto.enabledDays)].sort((a, b) => a - b),
        timezone: dto.timezone ?? this.defaultTimezone,
        updatedAt: now,
      };

      const problem = bedtimeScheduleProblem(settings);
      if (problem) {
        throw new DomainError('INVALID_FORMAT', problem);
      }

      // Si otro horario más reciente ganó, el dispositivo recibe ese y no el rechazado
      let effective = settings;
      const saved = await this.bedtimeRepository.save(settings);
      if (!saved) {
        this.logger.warn(`[${requestId}] Horario de ${userId} ignorado: existe uno más reciente`);
        effective = (await this.bedtimeRepository.findByUser(userId)) ?? settings;
      }

      const payload = toDeviceBedtime(effective, now);
      await this.deviceStateCache.pushBedtime(
        userId,
        effective.isEnabled ? payload : null,
        effective.updatedAt,
      );

      return ApiResponse.ok<BedtimeSettingsDto>(HttpStatus.OK, payload, 'Horario de descanso guardado', {
        requestId,
      });
    } catch (error) {
      this.logger.error(`[${requestId}] Error guardando horario de descanso: ${errorMessage(error)}`);
      return failFromError<BedtimeSettingsDto>(error, { requestId });
    }
  }

  /**
   * Recalcula `isActiveNow` de cada horario activo y lo publica.
   * Idempotente: repetir la pasada en el mismo minuto publica lo mismo.
   */
  async enforceBedtime(): Promise<SweepResult> {
    try {
      const now = this.clock.now();
      const enabled = await this.bedtimeRepository.findEnabled();
      let count = 0;

      for (const settings of enabled) {
        const pushed = await this.deviceStateCache.pushBedtime(
          settings.userId,
          toDeviceBedtime(settings, now),
          settings.updatedAt,
        );
        if (pushed) {
          count += 1;
        }
      }
      return { isSuccess: true, count };
    } catch (error) {
      this.logger.error(`Error aplicando horarios de descanso: ${errorMessage(error)}`);
      return { isSuccess: false, count: 0, error: errorMessage(error) };
    }
  }

  private requireActorId(): string {
    const actorId = this.asyncContextService.getActorId();
    if (!actorId) {
      throw new DomainError('UNAUTHENTICATED');
    }
    return actorId;
  }
}
