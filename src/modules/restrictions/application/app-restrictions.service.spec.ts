import { HttpStatus, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { InMemoryCacheService } from '../../../common/cache/in-memory-cache.service';
import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { FixedClock } from '../../../testing/fixed-clock';
import { InMemoryAppRestrictionsRepository } from '../../../testing/in-memory-app-restrictions.repository';
import { InMemoryBedtimeSettingsRepository } from '../../../testing/in-memory-bedtime-settings.repository';
import { InMemoryRelationshipsRepository } from '../../../testing/in-memory-relationships.repository';
import type { Relationship } from '../../pairing/domain/models/relationship.model';
import {
  RESTRICTION_EVENTS,
  RESTRICTIONS_INJECTION_TOKENS,
} from '../domain/constants/restrictions.constants';
import type { AppRestriction } from '../domain/models/app-restriction.model';
import { DeviceStateCache } from '../infrastructure/cache/device-state.cache';
import { AppRestrictionsService } from './app-restrictions.service';

describe('AppRestrictionsService', () => {
  let service: AppRestrictionsService;
  let clock: FixedClock;
  let restrictions: InMemoryAppRestrictionsRepository;
  let bedtimes: InMemoryBedtimeSettingsRepository;
  let relationships: InMemoryRelationshipsRepository;
  let deviceStateCache: DeviceStateCache;
  let mockEventEmitter: { emit: jest.Mock };
  let mockAsyncContextService: {
    getRequestId: jest.Mock<string, []>;
    getActorId: jest.Mock<string | undefined, []>;
  };

  // 10:00 en Madrid
  const T0 = '2025-03-10T09:00:00.000Z';
  const YOUTUBE = 'com.google.ios.youtube';

  const actAs = (userId: string) => mockAsyncContextService.getActorId.mockReturnValue(userId);

  const seedRelationship = (overrides: Partial<Relationship> = {}) => {
    const relationship: Relationship = {
      id: 'rel-1',
      parentUserId: 'parent-1',
      childUserId: 'child-1',
      childName: 'Lucía',
      deviceName: 'iPad de Lucía',
      pairingCode: '482913',
      createdAt: new Date(T0),
      isActive: true,
      lastSyncAt: new Date(T0),
      missedHeartbeats: 0,
      isNormalClosure: false,
      ...overrides,
    };
    relationships.relationships.set(relationship.id, relationship);
  };

  const seedRestriction = (overrides: Partial<AppRestriction> = {}) => {
    const restriction: AppRestriction = {
      id: 'restriction-1',
      parentId: 'parent-1',
      bundleId: YOUTUBE,
      timeLimit: 3600,
      isDisabled: false,
      dailyUsage: 0,
      lastResetDate: '2025-03-10',
      timezone: 'Europe/Madrid',
      version: 1,
      updatedAt: new Date(T0),
      ...overrides,
    };
    restrictions.restrictions.set(`${restriction.parentId}/${restriction.bundleId}`, restriction);
  };

  const stored = (parentId = 'parent-1', bundleId = YOUTUBE) =>
    restrictions.restrictions.get(`${parentId}/${bundleId}`);

  beforeEach(async () => {
    clock = new FixedClock(T0);
    restrictions = new InMemoryAppRestrictionsRepository();
    bedtimes = new InMemoryBedtimeSettingsRepository();
    relationships = new InMemoryRelationshipsRepository();
    deviceStateCache = new DeviceStateCache(new InMemoryCacheService(clock));
    mockEventEmitter = { emit: jest.fn() };
    mockAsyncContextService = {
      getRequestId: jest.fn<string, []>().mockReturnValue('test-request-id-123'),
      getActorId: jest.fn<string | undefined, []>().mockReturnValue('parent-1'),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AppRestrictionsService,
        { provide: RESTRICTIONS_INJECTION_TOKENS.APP_RESTRICTIONS_REPOSITORY, useValue: restrictions },
        { provide: RESTRICTIONS_INJECTION_TOKENS.BEDTIME_SETTINGS_REPOSITORY, useValue: bedtimes },
        { provide: RESTRICTIONS_INJECTION_TOKENS.DEVICE_STATE_CACHE, useValue: deviceStateCache },
        { provide: INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY, useValue: relationships },
        { provide: INJECTION_TOKENS.CLOCK, useValue: clock },
        { provide: AsyncContextService, useValue: mockAsyncContextService },
        { provide: EventEmitter2, useValue: mockEventEmitter },
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue('Europe/Madrid') } },
      ],
    }).compile();

    service = module.get<AppRestrictionsService>(AppRestrictionsService);

    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('setLimit', () => {
    it('should create the restriction in the default timezone', async () => {
      const result = await service.setLimit(YOUTUBE, { timeLimit: 3600 });

      expect(result.ok).toBe(true);
      expect(result.statusCode).toBe(HttpStatus.OK);
      expect(result.data).toEqual({
        bundleId: YOUTUBE,
        appName: 'YouTube',
        timeLimit: 3600,
        isDisabled: false,
        dailyUsage: 0,
        lastResetDate: '2025-03-10',
        timezone: 'Europe/Madrid',
        limitExceededAt: undefined,
      });
      expect(stored()?.version).toBe(1);
    });

    it('should bump the version on every change', async () => {
      await service.setLimit(YOUTUBE, { timeLimit: 3600 });
      await service.setLimit(YOUTUBE, { timeLimit: 1800 });

      expect(stored()?.timeLimit).toBe(1800);
      expect(stored()?.version).toBe(2);
    });

    it('should retry after a version conflict', async () => {
      seedRestriction();
      const replace = jest.spyOn(restrictions, 'replace').mockResolvedValueOnce(false);

      const result = await service.setLimit(YOUTUBE, { timeLimit: 1800 });

      expect(result.ok).toBe(true);
      expect(replace).toHaveBeenCalledTimes(2);
      expect(stored()?.timeLimit).toBe(1800);
    });

    it('should give up after repeated version conflicts', async () => {
      seedRestriction();
      const replace = jest.spyOn(restrictions, 'replace').mockResolvedValue(false);

      const result = await service.setLimit(YOUTUBE, { timeLimit: 1800 });

      expect(result.ok).toBe(false);
      expect(result.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(result.errors).toBe('TRANSIENT_STORE_FAILURE');
      expect(result.message).toBe('La restricción cambió mientras se actualizaba. Inténtalo de nuevo.');
      expect(replace).toHaveBeenCalledTimes(3);
    });

    it('should reject an unknown timezone', async () => {
      const result = await service.setLimit(YOUTUBE, { timeLimit: 3600, timezone: 'Mars/Olympus' });

      expect(result.statusCode).toBe(HttpStatus.BAD_REQUEST);
      expect(result.errors).toBe('INVALID_FORMAT');
      expect(restrictions.restrictions.size).toBe(0);
    });

    it('should fail with UNAUTHENTICATED when no identity is bound', async () => {
      mockAsyncContextService.getActorId.mockReturnValue(undefined);

      const result = await service.setLimit(YOUTUBE, { timeLimit: 3600 });

      expect(result.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(result.errors).toBe('UNAUTHENTICATED');
    });
  });

  describe('disable / enable / remove', () => {
    it('should create a blocked restriction without limit on disable', async () => {
      const result = await service.disable(YOUTUBE);

      expect(result.data?.isDisabled).toBe(true);
      expect(result.data?.timeLimit).toBe(0);
    });

    it('should unblock on enable', async () => {
      await service.disable(YOUTUBE);

      const result = await service.enable(YOUTUBE);

      expect(result.data?.isDisabled).toBe(false);
      expect(stored()?.version).toBe(2);
    });

    it('should return NOT_FOUND when enabling an app without restriction', async () => {
      const result = await service.enable(YOUTUBE);

      expect(result.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(result.message).toBe('La app no tiene restricciones.');
    });

    it('should delete the restriction and clear it from the device', async () => {
      seedRelationship();
      await service.disable(YOUTUBE);

      const result = await service.remove(YOUTUBE);
      actAs('child-1');
      const device = await service.getDeviceRestrictions();

      expect(result.ok).toBe(true);
      expect(stored()).toBeUndefined();
      expect(device.data?.scopes).toEqual([{ parentId: 'parent-1', appRestrictions: [], bedtime: null }]);
      expect(device.data?.blockedBundleIds).toEqual([]);
    });

    it('should return NOT_FOUND when removing an unknown restriction', async () => {
      const result = await service.remove(YOUTUBE);

      expect(result.statusCode).toBe(HttpStatus.NOT_FOUND);
    });
  });

  describe('recordUsage', () => {
    beforeEach(() => {
      seedRelationship();
      seedRestriction();
      actAs('child-1');
    });

    it('should block once and emit a single event when usage crosses the limit', async () => {
      const first = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 3500 });
      expect(first.data).toEqual({ restrictionsUpdated: 1, isDisabled: false });
      expect(mockEventEmitter.emit).not.toHaveBeenCalled();

      const second = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 200 });
      expect(second.data).toEqual({ restrictionsUpdated: 1, isDisabled: true });
      expect(mockEventEmitter.emit).toHaveBeenCalledTimes(1);
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        RESTRICTION_EVENTS.LIMIT_EXCEEDED,
        expect.objectContaining({
          parentId: 'parent-1',
          childUserId: 'child-1',
          bundleId: YOUTUBE,
          appName: 'YouTube',
          dailyUsage: 3700,
          timeLimit: 3600,
          requestId: 'test-request-id-123',
        }),
      );

      const third = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 50 });
      expect(third.data).toEqual({ restrictionsUpdated: 1, isDisabled: true });
      expect(mockEventEmitter.emit).toHaveBeenCalledTimes(1);
      expect(stored()?.dailyUsage).toBe(3750);
    });

    it('should publish the block to the device', async () => {
      await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 3700 });

      const device = await service.getDeviceRestrictions();

      expect(device.data?.blockedBundleIds).toEqual([YOUTUBE]);
    });

    it('should reset usage on the next local day', async () => {
      await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 3700 });
      clock.set('2025-03-11T08:00:00.000Z');

      const result = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 60 });

      expect(result.data).toEqual({ restrictionsUpdated: 1, isDisabled: false });
      expect(stored()?.dailyUsage).toBe(60);
      expect(stored()?.lastResetDate).toBe('2025-03-11');
    });

    it('should apply usage in the scope of every linked parent', async () => {
      seedRelationship({ id: 'rel-2', parentUserId: 'parent-2' });
      seedRestriction({ id: 'restriction-2', parentId: 'parent-2', timeLimit: 7200 });

      const result = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 3700 });

      expect(result.data).toEqual({ restrictionsUpdated: 2, isDisabled: true });
      expect(stored('parent-2')?.dailyUsage).toBe(3700);
      expect(stored('parent-2')?.isDisabled).toBe(false);
      expect(mockEventEmitter.emit).toHaveBeenCalledTimes(1);
    });

    it('should ignore apps without restriction', async () => {
      const result = await service.recordUsage({ bundleId: 'com.roblox.client', elapsedSeconds: 600 });

      expect(result.data).toEqual({ restrictionsUpdated: 0, isDisabled: false });
    });

    it('should reject negative elapsed time', async () => {
      const result = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: -5 });

      expect(result.errors).toBe('INVALID_FORMAT');
      expect(stored()?.dailyUsage).toBe(0);
    });

    it('should return 503 when the store fails', async () => {
      jest.spyOn(relationships, 'findActiveByChild').mockRejectedValueOnce(new Error('socket closed'));

      const result = await service.recordUsage({ bundleId: YOUTUBE, elapsedSeconds: 60 });

      expect(result.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(result.meta).toEqual({ requestId: 'test-request-id-123' });
    });
  });

  describe('getDeviceRestrictions', () => {
    it('should rebuild a cold scope from the store and block everything during bedtime', async () => {
      seedRelationship();
      seedRestriction();
      seedRestriction({ id: 'restriction-2', bundleId: 'com.roblox.client', isDisabled: true, timeLimit: 0 });
      bedtimes.settings.set('parent-1', {
        userId: 'parent-1',
        isEnabled: true,
        startTime: '22:00',
        endTime: '08:00',
        enabledDays: [1, 2, 3, 4, 5, 6, 7],
        timezone: 'UTC',
        updatedAt: new Date(T0),
      });
      clock.set('2025-03-10T23:30:00.000Z');
      actAs('child-1');

      const result = await service.getDeviceRestrictions();

      expect(result.ok).toBe(true);
      expect(result.data?.isBedtimeNow).toBe(true);
      expect(result.data?.blockedBundleIds).toEqual(['com.google.ios.youtube', 'com.roblox.client']);
      expect(await deviceStateCache.readScope('parent-1')).not.toBeNull();
    });

    it('should rebuild a scope that only holds the bedtime entry pushed after a restart', async () => {
      seedRelationship();
      seedRestriction();
      seedRestriction({ id: 'restriction-2', bundleId: 'com.roblox.client', isDisabled: true, timeLimit: 0 });
      bedtimes.settings.set('parent-1', {
        userId: 'parent-1',
        isEnabled: true,
        startTime: '22:00',
        endTime: '08:00',
        enabledDays: [1, 2, 3, 4, 5, 6, 7],
        timezone: 'UTC',
        updatedAt: new Date(T0),
      });
      await deviceStateCache.pushBedtime(
        'parent-1',
        {
          isEnabled: true,
          startTime: '22:00',
          endTime: '08:00',
          enabledDays: [1, 2, 3, 4, 5, 6, 7],
          timezone: 'UTC',
          isActiveNow: false,
        },
        new Date(T0),
      );
      actAs('child-1');

      const result = await service.getDeviceRestrictions();

      expect(result.data?.blockedBundleIds).toEqual(['com.roblox.client']);
      expect(result.data?.scopes[0].appRestrictions.map((r) => r.bundleId)).toEqual([
        'com.google.ios.youtube',
        'com.roblox.client',
      ]);
      expect(await deviceStateCache.isWarm('parent-1')).toBe(true);
    });

    it('should serve a warm scope from the cache', async () => {
      seedRelationship();
      seedRestriction({ id: 'restriction-2', bundleId: 'com.roblox.client', isDisabled: true, timeLimit: 0 });
      actAs('child-1');
      await service.getDeviceRestrictions();
      const findByParent = jest.spyOn(restrictions, 'findByParent');

      const result = await service.getDeviceRestrictions();

      expect(findByParent).not.toHaveBeenCalled();
      expect(result.data?.blockedBundleIds).toEqual(['com.roblox.client']);
    });

    it('should block only disabled apps outside bedtime', async () => {
      seedRelationship();
      seedRestriction();
      seedRestriction({ id: 'restriction-2', bundleId: 'com.roblox.client', isDisabled: true, timeLimit: 0 });
      actAs('child-1');

      const result = await service.getDeviceRestrictions();

      expect(result.data?.isBedtimeNow).toBe(false);
      expect(result.data?.blockedBundleIds).toEqual(['com.roblox.client']);
    });
  });

  describe('sweepDailyRollover', () => {
    it('should unblock limit blocks whose day is over', async () => {
      seedRestriction({
        lastResetDate: '2025-03-09',
        dailyUsage: 3700,
        isDisabled: true,
        limitExceededAt: new Date('2025-03-09T20:00:00.000Z'),
      });
      seedRestriction({
        id: 'restriction-2',
        bundleId: 'com.roblox.client',
        dailyUsage: 3700,
        isDisabled: true,
        limitExceededAt: new Date('2025-03-10T08:00:00.000Z'),
      });

      const result = await service.sweepDailyRollover();

      expect(result).toEqual({ isSuccess: true, count: 1 });
      expect(stored()).toEqual(
        expect.objectContaining({ isDisabled: false, dailyUsage: 0, lastResetDate: '2025-03-10', version: 2 }),
      );
      expect(stored()?.limitExceededAt).toBeUndefined();
      expect(stored('parent-1', 'com.roblox.client')?.isDisabled).toBe(true);
    });

    it('should report a failed read without throwing', async () => {
      jest.spyOn(restrictions, 'findLimitBlocked').mockRejectedValueOnce(new Error('socket closed'));

      const result = await service.sweepDailyRollover();

      expect(result).toEqual({ isSuccess: false, count: 0, error: 'socket closed' });
    });
  });
});
