import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { FixedClock } from '../../../testing/fixed-clock';
import { InMemoryPairingCodesRepository } from '../../../testing/in-memory-pairing-codes.repository';
import { InMemoryRelationshipsRepository } from '../../../testing/in-memory-relationships.repository';
import { InMemoryUserProfilesRepository } from '../../../testing/in-memory-user-profiles.repository';
import type { PairingCode } from '../../pairing/domain/models/pairing-code.model';
import type { Relationship } from '../../pairing/domain/models/relationship.model';
import { RECONCILIATION_EVENTS } from '../domain/constants/reconciliation.constants';
import type {
  ChildInactiveEvent,
  HeartbeatMissedEvent,
} from '../domain/events/reconciliation.events';
import { ReconciliationService } from './reconciliation.service';

describe('ReconciliationService', () => {
  let service: ReconciliationService;
  let clock: FixedClock;
  let codes: InMemoryPairingCodesRepository;
  let relationships: InMemoryRelationshipsRepository;
  let profiles: InMemoryUserProfilesRepository;
  let mockEventEmitter: { emit: jest.Mock };

  const T0 = '2025-03-10T09:00:00.000Z';
  const at = (minutes: number) => new Date(new Date(T0).getTime() + minutes * 60_000);

  const seedRelationship = (overrides: Partial<Relationship> = {}) => {
    const relationship: Relationship = {
      id: 'rel-1',
      parentUserId: 'parent-1',
      childUserId: 'child-1',
      childName: 'Lucía',
      deviceName: 'iPad de Lucía',
      pairingCode: '482913',
      createdAt: at(-120),
      isActive: true,
      lastSyncAt: at(0),
      lastHeartbeatAt: at(0),
      missedHeartbeats: 0,
      isNormalClosure: false,
      ...overrides,
    };
    relationships.relationships.set(relationship.id, relationship);
  };

  const seedCode = (overrides: Partial<PairingCode>) => {
    const pairingCode: PairingCode = {
      id: 'code-1',
      code: '482913',
      childUserId: 'child-1',
      childName: 'Lucía',
      deviceName: 'iPad',
      createdAt: at(0),
      expiresAt: at(10),
      isActive: false,
      isExpired: false,
      ...overrides,
    };
    codes.codes.set(pairingCode.id, pairingCode);
  };

  const emitted = <T>(eventName: string): T[] =>
    mockEventEmitter.emit.mock.calls
      .filter(([name]) => name === eventName)
      .map(([, event]) => event);

  beforeEach(async () => {
    clock = new FixedClock(T0);
    codes = new InMemoryPairingCodesRepository();
    relationships = new InMemoryRelationshipsRepository();
    profiles = new InMemoryUserProfilesRepository();
    mockEventEmitter = { emit: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReconciliationService,
        { provide: INJECTION_TOKENS.PAIRING_CODES_REPOSITORY, useValue: codes },
        { provide: INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY, useValue: relationships },
        { provide: INJECTION_TOKENS.USER_PROFILES_REPOSITORY, useValue: profiles },
        { provide: INJECTION_TOKENS.CLOCK, useValue: clock },
        { provide: EventEmitter2, useValue: mockEventEmitter },
      ],
    }).compile();

    service = module.get<ReconciliationService>(ReconciliationService);
  });

  describe('sweepMissedHeartbeats', () => {
    it('should escalate to first and then second miss without repeating a level', async () => {
      seedRelationship();

      clock.set(at(21));
      expect(await service.sweepMissedHeartbeats()).toEqual({ isSuccess: true, count: 1 });
      expect((await relationships.findById('rel-1'))?.missedHeartbeats).toBe(1);

      expect(await service.sweepMissedHeartbeats()).toEqual({ isSuccess: true, count: 0 });

      clock.set(at(42));
      await service.sweepMissedHeartbeats();
      expect((await relationships.findById('rel-1'))?.missedHeartbeats).toBe(2);

      const events = emitted<HeartbeatMissedEvent>(RECONCILIATION_EVENTS.HEARTBEAT_MISSED);
      expect(events.map((e) => [e.missedHeartbeats, e.level])).toEqual([
        [1, 'first_miss'],
        [2, 'second_miss'],
      ]);
      expect(events[0]).toMatchObject({
        relationshipId: 'rel-1',
        parentUserId: 'parent-1',
        childUserId: 'child-1',
        childName: 'Lucía',
        lastHeartbeatAt: at(0),
        timestamp: at(21),
      });
    });

    it('should not flag relationships inside the grace period', async () => {
      seedRelationship();

      clock.set(at(19));
      await service.sweepMissedHeartbeats();

      expect(mockEventEmitter.emit).not.toHaveBeenCalled();
    });

    it('should restart from the first level after a new heartbeat', async () => {
      seedRelationship();
      clock.set(at(42));
      await service.sweepMissedHeartbeats();

      await relationships.applyHeartbeat({ childUserId: 'child-1', at: at(43) });
      clock.set(at(43 + 21));
      await service.sweepMissedHeartbeats();

      const events = emitted<HeartbeatMissedEvent>(RECONCILIATION_EVENTS.HEARTBEAT_MISSED);
      expect(events.map((e) => e.level)).toEqual(['second_miss', 'first_miss']);
    });

    it('should jump straight to the level matching a long silence', async () => {
      seedRelationship();

      clock.set(at(80));
      await service.sweepMissedHeartbeats();

      const [event] = emitted<HeartbeatMissedEvent>(RECONCILIATION_EVENTS.HEARTBEAT_MISSED);
      expect(event.missedHeartbeats).toBe(5);
      expect(event.level).toBe('extended_failure');
    });

    it('should skip relationships closed normally or without heartbeats', async () => {
      seedRelationship({ id: 'rel-1', isNormalClosure: true });
      seedRelationship({ id: 'rel-2', lastHeartbeatAt: undefined });
      seedRelationship({ id: 'rel-3', isActive: false });

      clock.set(at(90));
      expect(await service.sweepMissedHeartbeats()).toEqual({ isSuccess: true, count: 0 });
      expect(mockEventEmitter.emit).not.toHaveBeenCalled();
    });

    it('should not emit when another writer changed the counter first', async () => {
      seedRelationship();
      jest.spyOn(relationships, 'escalateMissedHeartbeats').mockResolvedValueOnce(false);

      clock.set(at(21));
      expect(await service.sweepMissedHeartbeats()).toEqual({ isSuccess: true, count: 0 });
      expect(mockEventEmitter.emit).not.toHaveBeenCalled();
    });

    it('should keep going when one relationship fails', async () => {
      seedRelationship({ id: 'rel-1' });
      seedRelationship({ id: 'rel-2', childUserId: 'child-2' });
      jest
        .spyOn(relationships, 'escalateMissedHeartbeats')
        .mockRejectedValueOnce(new Error('write conflict'));

      clock.set(at(21));
      expect(await service.sweepMissedHeartbeats()).toEqual({ isSuccess: true, count: 1 });
    });

    it('should report a failed read', async () => {
      jest
        .spyOn(relationships, 'findOverdueHeartbeats')
        .mockRejectedValueOnce(new Error('socket closed'));

      expect(await service.sweepMissedHeartbeats()).toEqual({
        isSuccess: false,
        count: 0,
        error: 'socket closed',
      });
    });
  });

  describe('sweepInactiveChildren', () => {
    it('should notify every parent of a child inactive for three days once', async () => {
      await profiles.recordActivity({
        userId: 'child-1',
        activityType: 'app_background',
        at: at(-4 * 24 * 60),
      });
      await profiles.recordActivity({
        userId: 'child-2',
        activityType: 'heartbeat',
        at: at(-24 * 60),
      });
      seedRelationship({ id: 'rel-1', parentUserId: 'parent-1' });
      seedRelationship({ id: 'rel-2', parentUserId: 'parent-2' });
      seedRelationship({ id: 'rel-3', parentUserId: 'parent-1', childUserId: 'child-2' });

      expect(await service.sweepInactiveChildren()).toEqual({ isSuccess: true, count: 2 });

      const events = emitted<ChildInactiveEvent>(RECONCILIATION_EVENTS.CHILD_INACTIVE);
      expect(events.map((e) => [e.childUserId, e.parentUserId])).toEqual([
        ['child-1', 'parent-1'],
        ['child-1', 'parent-2'],
      ]);
      expect(events[0].lastActiveAt).toEqual(at(-4 * 24 * 60));
    });
  });

  describe('pairing code sweeps', () => {
    it('should expire only available codes past their deadline', async () => {
      seedCode({ id: 'overdue', expiresAt: at(-1) });
      seedCode({ id: 'pending', expiresAt: at(5) });
      seedCode({ id: 'consumed', expiresAt: at(-1), isActive: true });

      expect(await service.sweepExpiredCodes()).toEqual({ isSuccess: true, count: 1 });
      expect(codes.codes.get('overdue')).toMatchObject({ isExpired: true, cleanedUpAt: at(0) });
      expect(codes.codes.get('pending')?.isExpired).toBe(false);
      expect(codes.codes.get('consumed')?.isExpired).toBe(false);
    });

    it('should be idempotent', async () => {
      seedCode({ id: 'overdue', expiresAt: at(-1) });
      await service.sweepExpiredCodes();

      expect(await service.sweepExpiredCodes()).toEqual({ isSuccess: true, count: 0 });
    });

    it('should purge codes issued more than a day ago', async () => {
      seedCode({ id: 'old', createdAt: at(-25 * 60), isActive: true });
      seedCode({ id: 'recent', createdAt: at(-23 * 60), isExpired: true });

      expect(await service.purgeStaleCodes()).toEqual({ isSuccess: true, count: 1 });
      expect([...codes.codes.keys()]).toEqual(['recent']);
    });
  });
});
