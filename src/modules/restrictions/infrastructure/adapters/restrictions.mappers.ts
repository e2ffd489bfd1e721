import type { AppRestriction } from '../../domain/models/app-restriction.model';
import type { BedtimeSettings } from '../../domain/models/bedtime-settings.model';
import type { NewAppDetection } from '../../domain/models/new-app-detection.model';
import { CLOCK_TIME_PATTERN } from '../../domain/constants/restrictions.constants';
import type { AppRestrictionSchema } from '../schemas/app-restriction.schema';
import type { BedtimeSettingsSchema } from '../schemas/bedtime-settings.schema';
import type { NewAppDetectionSchema } from '../schemas/new-app-detection.schema';

const isDate = (value: unknown): value is Date =>
  value instanceof Date && !Number.isNaN(value.getTime());

const isCount = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0;

const LOCAL_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toAppRestriction(document: AppRestrictionSchema): AppRestriction | null {
  if (
    !document.id ||
    !document.parentId ||
    !document.bundleId ||
    !isCount(document.timeLimit) ||
    !isCount(document.dailyUsage) ||
    !Number.isInteger(document.version) ||
    typeof document.isDisabled !== 'boolean' ||
    !LOCAL_DAY_PATTERN.test(document.lastResetDate) ||
    !document.timezone ||
    !isDate(document.updatedAt)
  ) {
    return null;
  }

  return {
    id: document.id,
    parentId: document.parentId,
    bundleId: document.bundleId,
    timeLimit: document.timeLimit,
    isDisabled: document.isDisabled,
    dailyUsage: document.dailyUsage,
    lastResetDate: document.lastResetDate,
    timezone: document.timezone,
    version: document.version,
    limitExceededAt: document.limitExceededAt ?? undefined,
    updatedAt: document.updatedAt,
  };
}

export function toBedtimeSettings(document: BedtimeSettingsSchema): BedtimeSettings | null {
  if (
    !document.userId ||
    typeof document.isEnabled !== 'boolean' ||
    !CLOCK_TIME_PATTERN.test(document.startTime) ||
    !CLOCK_TIME_PATTERN.test(document.endTime) ||
    !Array.isArray(document.enabledDays) ||
    !document.timezone ||
    !isDate(document.updatedAt)
  ) {
    return null;
  }

  return {
    userId: document.userId,
    isEnabled: document.isEnabled,
    startTime: document.startTime,
    endTime: document.endTime,
    enabledDays: [...document.enabledDays],
    timezone: document.timezone,
    updatedAt: document.updatedAt,
  };
}

export function toNewAppDetection(document: NewAppDetectionSchema): NewAppDetection | null {
  if (
    !document.id ||
    !document.parentId ||
    !document.bundleId ||
    !isDate(document.detectedAt) ||
    typeof document.isProcessed !== 'boolean'
  ) {
    return null;
  }

  return {
    id: document.id,
    parentId: document.parentId,
    deviceId: document.deviceId,
    bundleId: document.bundleId,
    appName: document.appName,
    detectedAt: document.detectedAt,
    isProcessed: document.isProcessed,
    resolution: document.resolution ?? undefined,
    processedAt: document.processedAt ?? undefined,
  };
}
