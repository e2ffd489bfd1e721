import { HttpStatus } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import { DOMAIN_ERROR_MESSAGES } from '../../../common/errors/domain.error';
import { FixedClock } from '../../../testing/fixed-clock';
import { InMemoryPairingCodesRepository } from '../../../testing/in-memory-pairing-codes.repository';
import { InMemoryPairingUnitOfWork } from '../../../testing/in-memory-pairing.unit-of-work';
import { InMemoryRelationshipsRepository } from '../../../testing/in-memory-relationships.repository';
import { InMemoryUserProfilesRepository } from '../../../testing/in-memory-user-profiles.repository';
import {
  PAIRING_EVENTS,
  PAIRING_INJECTION_TOKENS,
} from '../domain/constants/pairing.constants';
import {
  RelationshipCreatedEvent,
  RelationshipUnlinkedEvent,
} from '../domain/events/pairing.events';
import { PairingCodeExpiryScheduler } from '../infrastructure/schedulers/pairing-code-expiry.scheduler';
import { PairingCodeGenerator } from './pairing-code.generator';
import { PairingService } from './pairing.service';

describe('PairingService', () => {
  let service: PairingService;
  let clock: FixedClock;
  let codes: InMemoryPairingCodesRepository;
  let relationships: InMemoryRelationshipsRepository;
  let profiles: InMemoryUserProfilesRepository;
  let mockGenerator: { generate: jest.Mock };
  let mockExpiryScheduler: { schedule: jest.Mock; cancel: jest.Mock };
  let mockEventEmitter: { emit: jest.Mock };
  let mockAsyncContextService: {
    getRequestId: jest.Mock<string, []>;
    getActorId: jest.Mock<string | undefined, []>;
  };

  const T0 = '2025-03-10T09:00:00.000Z';

  const actAs = (userId: string | undefined) => {
    mockAsyncContextService.getActorId.mockReturnValue(userId);
  };

  const issueCode = async (childUserId = 'child-1', code = '482913') => {
    mockGenerator.generate.mockResolvedValueOnce(code);
    actAs(childUserId);
    return service.generateCode({ childName: 'Lucía', deviceName: 'iPhone de Lucía' });
  };

  beforeEach(async () => {
    clock = new FixedClock(T0);
    codes = new InMemoryPairingCodesRepository();
    relationships = new InMemoryRelationshipsRepository();
    profiles = new InMemoryUserProfilesRepository();

    mockGenerator = { generate: jest.fn() };
    mockExpiryScheduler = { schedule: jest.fn(), cancel: jest.fn() };
    mockEventEmitter = { emit: jest.fn() };
    mockAsyncContextService = {
      getRequestId: jest.fn<string, []>().mockReturnValue('test-request-id-123'),
      getActorId: jest.fn<string | undefined, []>(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PairingService,
        { provide: INJECTION_TOKENS.PAIRING_CODES_REPOSITORY, useValue: codes },
        { provide: INJECTION_TOKENS.RELATIONSHIPS_REPOSITORY, useValue: relationships },
        { provide: INJECTION_TOKENS.USER_PROFILES_REPOSITORY, useValue: profiles },
        {
          provide: PAIRING_INJECTION_TOKENS.PAIRING_UNIT_OF_WORK,
          useValue: new InMemoryPairingUnitOfWork(codes, relationships, profiles),
        },
        { provide: INJECTION_TOKENS.CLOCK, useValue: clock },
        { provide: PairingCodeGenerator, useValue: mockGenerator },
        { provide: PairingCodeExpiryScheduler, useValue: mockExpiryScheduler },
        { provide: AsyncContextService, useValue: mockAsyncContextService },
        { provide: EventEmitter2, useValue: mockEventEmitter },
      ],
    }).compile();

    service = module.get<PairingService>(PairingService);
  });

  describe('generateCode', () => {
    it('should issue a code valid for ten minutes', async () => {
      const response = await issueCode();

      expect(response.ok).toBe(true);
      expect(response.statusCode).toBe(HttpStatus.CREATED);
      expect(response.data).toEqual({
        code: '482913',
        expiresAt: new Date('2025-03-10T09:10:00.000Z'),
        expiresInSeconds: 600,
      });

      const [stored] = [...codes.codes.values()];
      expect(stored).toMatchObject({
        code: '482913',
        childUserId: 'child-1',
        childName: 'Lucía',
        deviceName: 'iPhone de Lucía',
        isActive: false,
        isExpired: false,
      });
      expect(mockExpiryScheduler.schedule).toHaveBeenCalledWith(stored);
    });

    it('should create the child profile on first issue', async () => {
      await issueCode('child-7');

      expect(await profiles.findById('child-7')).toEqual({
        id: 'child-7',
        userType: 'child',
        isDevicePaired: false,
      });
    });

    it('should check candidates against available codes', async () => {
      await issueCode('child-1', '111111');
      mockGenerator.generate.mockImplementationOnce(
        async (isTaken: (candidate: string) => Promise<boolean>) =>
          (await isTaken('111111')) ? '222222' : '111111',
      );

      const response = await service.generateCode({
        childName: 'Lucía',
        deviceName: 'iPhone de Lucía',
      });

      expect(response.data?.code).toBe('222222');
    });

    it('should reject blank names', async () => {
      actAs('child-1');

      const response = await service.generateCode({ childName: '  ', deviceName: 'iPad' });

      expect(response.ok).toBe(false);
      expect(response.statusCode).toBe(HttpStatus.BAD_REQUEST);
      expect(response.errors).toBe('INVALID_FORMAT');
      expect(codes.codes.size).toBe(0);
    });

    it('should reject requests without an authenticated actor', async () => {
      actAs(undefined);

      const response = await service.generateCode({ childName: 'Lucía', deviceName: 'iPad' });

      expect(response.statusCode).toBe(HttpStatus.UNAUTHORIZED);
      expect(response.errors).toBe('UNAUTHENTICATED');
      expect(response.message).toBe(DOMAIN_ERROR_MESSAGES.UNAUTHENTICATED);
    });

    it('should map store failures to TRANSIENT_STORE_FAILURE', async () => {
      jest.spyOn(codes, 'create').mockRejectedValueOnce(new Error('socket closed'));

      const response = await issueCode();

      expect(response.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(response.errors).toBe('TRANSIENT_STORE_FAILURE');
      expect(response.meta).toEqual({ requestId: 'test-request-id-123' });
    });
  });

  describe('pair', () => {
    it('should pair within the validity window and report a repeat as ALREADY_PAIRED', async () => {
      await issueCode();

      clock.advanceMinutes(5);
      actAs('parent-1');
      const first = await service.pair('482913');

      expect(first.ok).toBe(true);
      expect(first.statusCode).toBe(HttpStatus.CREATED);
      expect(first.data).toMatchObject({
        childUserId: 'child-1',
        childName: 'Lucía',
        deviceName: 'iPhone de Lucía',
      });

      const relationshipId = first.data?.relationshipId ?? '';
      expect(await relationships.findById(relationshipId)).toMatchObject({
        parentUserId: 'parent-1',
        childUserId: 'child-1',
        pairingCode: '482913',
        isActive: true,
        missedHeartbeats: 0,
        isNormalClosure: false,
        createdAt: new Date('2025-03-10T09:05:00.000Z'),
        lastSyncAt: new Date('2025-03-10T09:05:00.000Z'),
      });
      expect(await profiles.findById('child-1')).toMatchObject({
        isDevicePaired: true,
        pairedWithParent: 'parent-1',
        pairedAt: new Date('2025-03-10T09:05:00.000Z'),
      });

      clock.advanceMinutes(1);
      const second = await service.pair('482913');

      expect(second.ok).toBe(false);
      expect(second.statusCode).toBe(HttpStatus.CONFLICT);
      expect(second.errors).toBe('ALREADY_PAIRED');
      expect(second.message).toBe(DOMAIN_ERROR_MESSAGES.ALREADY_PAIRED);
      expect(relationships.relationships.size).toBe(1);
    });

    it('should consume the code and cancel its expiry timer', async () => {
      await issueCode();
      const [issued] = [...codes.codes.values()];

      actAs('parent-1');
      await service.pair('482913');

      expect(codes.codes.get(issued.id)).toMatchObject({
        isActive: true,
        parentUserId: 'parent-1',
        pairedAt: new Date(T0),
      });
      expect(mockExpiryScheduler.cancel).toHaveBeenCalledWith(issued.id);
    });

    it('should emit relationship.created once committed', async () => {
      await issueCode();
      actAs('parent-1');

      await service.pair('482913');

      expect(mockEventEmitter.emit).toHaveBeenCalledTimes(1);
      expect(mockEventEmitter.emit).toHaveBeenCalledWith(
        PAIRING_EVENTS.RELATIONSHIP_CREATED,
        expect.any(RelationshipCreatedEvent),
      );
    });

    it('should return CODE_EXPIRED after the validity window even before the sweep', async () => {
      await issueCode();

      clock.advanceMinutes(11);
      actAs('parent-1');
      const response = await service.pair('482913');

      expect(response.statusCode).toBe(HttpStatus.GONE);
      expect(response.errors).toBe('CODE_EXPIRED');
      expect(response.message).toBe(DOMAIN_ERROR_MESSAGES.CODE_EXPIRED);
      expect(relationships.relationships.size).toBe(0);
    });

    it('should return CODE_EXPIRED once the expiry timer has marked the code', async () => {
      await issueCode();
      const [issued] = [...codes.codes.values()];

      clock.advanceMinutes(10);
      await codes.markExpired(issued.id);
      clock.advanceMinutes(1);
      actAs('parent-1');
      const response = await service.pair('482913');

      expect(response.statusCode).toBe(HttpStatus.GONE);
      expect(response.errors).toBe('CODE_EXPIRED');
      expect(relationships.relationships.size).toBe(0);
    });

    it('should return CODE_EXPIRED for a code closed by the sweep', async () => {
      await issueCode();

      clock.advanceMinutes(11);
      await codes.expireOverdue(clock.now());
      actAs('parent-1');
      const response = await service.pair('482913');

      expect(response.errors).toBe('CODE_EXPIRED');
    });

    it('should treat a code as expired exactly at expiresAt', async () => {
      await issueCode();

      clock.advanceMinutes(10);
      actAs('parent-1');
      const response = await service.pair('482913');

      expect(response.errors).toBe('CODE_EXPIRED');
    });

    it('should return CODE_NOT_FOUND for unknown codes', async () => {
      actAs('parent-1');

      const response = await service.pair('000000');

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('CODE_NOT_FOUND');
    });

    it('should return CODE_NOT_FOUND when another parent already consumed the code', async () => {
      await issueCode();
      actAs('parent-1');
      await service.pair('482913');

      actAs('parent-2');
      const response = await service.pair('482913');

      expect(response.errors).toBe('CODE_NOT_FOUND');
    });

    it.each(['48291', '4829134', '48a913', ' 482913', ''])(
      'should reject malformed code "%s" with INVALID_FORMAT',
      async (code) => {
        actAs('parent-1');

        const response = await service.pair(code);

        expect(response.statusCode).toBe(HttpStatus.BAD_REQUEST);
        expect(response.errors).toBe('INVALID_FORMAT');
        expect(response.message).toBe(DOMAIN_ERROR_MESSAGES.INVALID_FORMAT);
      },
    );

    it('should reject a second code for a child the parent is already paired with', async () => {
      await issueCode('child-1', '482913');
      actAs('parent-1');
      await service.pair('482913');

      await issueCode('child-1', '111111');
      actAs('parent-1');
      const response = await service.pair('111111');

      expect(response.errors).toBe('ALREADY_PAIRED');
      expect(await codes.findAvailable('111111')).not.toBeNull();
    });

    it('should let exactly one of two concurrent parents pair', async () => {
      await issueCode();
      mockAsyncContextService.getActorId
        .mockReturnValueOnce('parent-a')
        .mockReturnValueOnce('parent-b');

      const [a, b] = await Promise.all([service.pair('482913'), service.pair('482913')]);

      expect(a.ok).toBe(true);
      expect(b.ok).toBe(false);
      expect(b.errors).toBe('CODE_NOT_FOUND');
      expect(relationships.relationships.size).toBe(1);
    });

    it('should report ALREADY_PAIRED to the losing duplicate submission of the same parent', async () => {
      await issueCode();
      actAs('parent-1');

      const results = await Promise.all([service.pair('482913'), service.pair('482913')]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.filter((r) => r.errors === 'ALREADY_PAIRED')).toHaveLength(1);
      expect(relationships.relationships.size).toBe(1);
    });

    it('should allow one parent to pair several children', async () => {
      await issueCode('child-1', '111111');
      await issueCode('child-2', '222222');
      actAs('parent-1');

      const first = await service.pair('111111');
      const second = await service.pair('222222');

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(true);
      expect(await relationships.findActiveByParent('parent-1')).toHaveLength(2);
    });
  });

  describe('unpair', () => {
    const pairChild = async () => {
      await issueCode();
      actAs('parent-1');
      const response = await service.pair('482913');
      return response.data?.relationshipId ?? '';
    };

    it('should deactivate the relationship and clear the child profile', async () => {
      const relationshipId = await pairChild();
      clock.advanceMinutes(30);

      actAs('child-1');
      const response = await service.unpair(relationshipId);

      expect(response.ok).toBe(true);
      expect(response.statusCode).toBe(HttpStatus.OK);
      expect(response.message).toBe('Dispositivo desvinculado');
      expect(await relationships.findById(relationshipId)).toMatchObject({
        isActive: false,
        unlinkedBy: 'child-1',
        unlinkedAt: new Date('2025-03-10T09:30:00.000Z'),
      });
      expect(await profiles.findById('child-1')).toMatchObject({
        isDevicePaired: false,
        unlinkedAt: new Date('2025-03-10T09:30:00.000Z'),
      });
      expect(mockEventEmitter.emit).toHaveBeenLastCalledWith(
        PAIRING_EVENTS.RELATIONSHIP_UNLINKED,
        expect.any(RelationshipUnlinkedEvent),
      );
    });

    it('should return NOT_FOUND for an already unlinked relationship', async () => {
      const relationshipId = await pairChild();
      await service.unpair(relationshipId);

      const response = await service.unpair(relationshipId);

      expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
      expect(response.errors).toBe('NOT_FOUND');
      expect(response.message).toBe('La relación no existe o ya fue desvinculada.');
    });

    it('should return PERMISSION_DENIED to users outside the relationship', async () => {
      const relationshipId = await pairChild();

      actAs('stranger');
      const response = await service.unpair(relationshipId);

      expect(response.statusCode).toBe(HttpStatus.FORBIDDEN);
      expect(response.errors).toBe('PERMISSION_DENIED');
      expect((await relationships.findById(relationshipId))?.isActive).toBe(true);
    });

    it('should create a new relationship when pairing again after unlinking', async () => {
      const relationshipId = await pairChild();
      await service.unpair(relationshipId);

      await issueCode('child-1', '555555');
      actAs('parent-1');
      const response = await service.pair('555555');

      expect(response.ok).toBe(true);
      expect(response.data?.relationshipId).not.toBe(relationshipId);
      expect(relationships.relationships.size).toBe(2);
    });
  });

  describe('listChildren', () => {
    it('should list active children newest first with their online flag', async () => {
      await issueCode('child-1', '111111');
      actAs('parent-1');
      await service.pair('111111');

      clock.advanceMinutes(3);
      await issueCode('child-2', '222222');
      actAs('parent-1');
      await service.pair('222222');

      clock.advanceMinutes(4);
      const response = await service.listChildren();

      expect(response.meta).toEqual({ requestId: 'test-request-id-123', total: 2 });
      expect(response.data?.map((c) => [c.childUserId, c.isOnline])).toEqual([
        ['child-2', true],
        ['child-1', false],
      ]);
    });
  });

  describe('getCodeStatus', () => {
    it('should follow the code through issued and active', async () => {
      await issueCode();
      expect((await service.getCodeStatus('482913')).data?.status).toBe('issued');

      actAs('parent-1');
      await service.pair('482913');

      actAs('child-1');
      const response = await service.getCodeStatus('482913');
      expect(response.data).toEqual({
        code: '482913',
        status: 'active',
        expiresAt: new Date('2025-03-10T09:10:00.000Z'),
        pairedAt: new Date(T0),
      });
    });

    it('should report expired once the window has passed', async () => {
      await issueCode();
      clock.advanceMinutes(12);

      const response = await service.getCodeStatus('482913');

      expect(response.data?.status).toBe('expired');
    });

    it('should not reveal codes issued by another child', async () => {
      await issueCode('child-1');

      actAs('child-2');
      const response = await service.getCodeStatus('482913');

      expect(response.errors).toBe('CODE_NOT_FOUND');
    });
  });
});
