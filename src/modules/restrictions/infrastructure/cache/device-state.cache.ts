import { Inject, Injectable } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import type { ICacheService } from '../../../../common/interfaces/cache.interface';
import type {
  DeviceAppRestriction,
  DeviceBedtime,
  DeviceScope,
  IDeviceStateCache,
} from '../../domain/ports/device-state-cache.port';

interface DeviceCacheEntry<T> {
  payload: T | null;
  updatedAt: number;
}

const APP_RESTRICTION_PREFIX = 'app_restriction_';
const BEDTIME_KEY = 'bedtime_settings';
const WARM_KEY = 'scope_warm';

/**
 * Adapter: estado de dispositivo sobre ICacheService.
 * Claves `device:{parentId}:app_restriction_{bundleId}` y `device:{parentId}:bedtime_settings`.
 * `device:{parentId}:scope_warm` indica que el ámbito se cargó entero desde el almacén;
 * sin ella puede haber solo las entradas empujadas tras un reinicio.
 */
@Injectable()
export class DeviceStateCache implements IDeviceStateCache {
  constructor(
    @Inject(INJECTION_TOKENS.CACHE_SERVICE)
    private readonly cacheService: ICacheService,
  ) {}

  pushAppRestriction(
    parentId: string,
    bundleId: string,
    payload: DeviceAppRestriction | null,
    updatedAt: Date,
  ): Promise<boolean> {
    return this.push(`${this.scopePrefix(parentId)}${APP_RESTRICTION_PREFIX}${bundleId}`, payload, updatedAt);
  }

  pushBedtime(parentId: string, payload: DeviceBedtime | null, updatedAt: Date): Promise<boolean> {
    return this.push(`${this.scopePrefix(parentId)}${BEDTIME_KEY}`, payload, updatedAt);
  }

  async readScope(parentId: string): Promise<DeviceScope | null> {
    const prefix = this.scopePrefix(parentId);
    const keys = await this.cacheService.keys(prefix);
    if (keys.length === 0) {
      return null;
    }

    const scope: DeviceScope = { parentId, appRestrictions: [], bedtime: null };
    for (const key of keys.sort()) {
      const name = key.slice(prefix.length);
      if (name === BEDTIME_KEY) {
        const entry = await this.cacheService.get<DeviceCacheEntry<DeviceBedtime>>(key);
        scope.bedtime = entry?.payload ?? null;
      } else if (name.startsWith(APP_RESTRICTION_PREFIX)) {
        const entry = await this.cacheService.get<DeviceCacheEntry<DeviceAppRestriction>>(key);
        if (entry?.payload) {
          scope.appRestrictions.push(entry.payload);
        }
      }
    }
    return scope;
  }

  async markWarm(parentId: string): Promise<void> {
    await this.cacheService.set<boolean>(`${this.scopePrefix(parentId)}${WARM_KEY}`, true);
  }

  async isWarm(parentId: string): Promise<boolean> {
    return (await this.cacheService.get<boolean>(`${this.scopePrefix(parentId)}${WARM_KEY}`)) === true;
  }

  private async push<T>(key: string, payload: T | null, updatedAt: Date): Promise<boolean> {
    const current = await this.cacheService.get<DeviceCacheEntry<T>>(key);
    if (current && current.updatedAt > updatedAt.getTime()) {
      return false;
    }
    await this.cacheService.set<DeviceCacheEntry<T>>(key, { payload, updatedAt: updatedAt.getTime() });
    return true;
  }

  private scopePrefix(parentId: string): string {
    return `device:${parentId}:`;
  }
}
