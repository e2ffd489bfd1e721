import type { DeviceAppRestriction, DeviceBedtime } from '../ports/device-state-cache.port';
import type { AppRestriction } from './app-restriction.model';
import type { BedtimeSettings } from './bedtime-settings.model';
import { isBedtimeNow } from './bedtime-settings.model';

export function toDeviceAppRestriction(restriction: AppRestriction): DeviceAppRestriction {
  return {
    bundleId: restriction.bundleId,
    timeLimit: restriction.timeLimit,
    isDisabled: restriction.isDisabled,
    dailyUsage: restriction.dailyUsage,
    lastResetDate: restriction.lastResetDate,
  };
}

export function toDeviceBedtime(settings: BedtimeSettings, now: Date): DeviceBedtime {
  return {
    isEnabled: settings.isEnabled,
    startTime: settings.startTime,
    endTime: settings.endTime,
    enabledDays: [...settings.enabledDays],
    timezone: settings.timezone,
    isActiveNow: settings.isEnabled && isBedtimeNow(settings, now),
  };
}
