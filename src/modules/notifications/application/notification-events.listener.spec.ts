import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { AsyncContextService } from '../../../common/context/async-context.service';
import { InMemoryNotificationsRepository } from '../../../testing/in-memory-notifications.repository';
import {
  RelationshipCreatedEvent,
  RelationshipUnlinkedEvent,
} from '../../pairing/domain/events/pairing.events';
import {
  ChildInactiveEvent,
  HeartbeatMissedEvent,
} from '../../reconciliation/domain/events/reconciliation.events';
import {
  AppDetectedEvent,
  RestrictionLimitExceededEvent,
} from '../../restrictions/domain/events/restriction.events';
import { NOTIFICATIONS_INJECTION_TOKENS } from '../domain/constants/notifications.constants';
import { NotificationEventsListener } from './notification-events.listener';
import { NotificationsService } from './notifications.service';

describe('NotificationEventsListener', () => {
  let listener: NotificationEventsListener;
  let notifications: InMemoryNotificationsRepository;
  let mockDispatcher: { dispatch: jest.Mock };

  const at = new Date('2025-03-10T09:21:00.000Z');

  const delivered = () => [...notifications.notifications.values()];

  beforeEach(async () => {
    notifications = new InMemoryNotificationsRepository();
    mockDispatcher = { dispatch: jest.fn().mockResolvedValue(undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NotificationEventsListener,
        NotificationsService,
        { provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATIONS_REPOSITORY, useValue: notifications },
        { provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATION_DISPATCHER, useValue: mockDispatcher },
        {
          provide: AsyncContextService,
          useValue: { getRequestId: jest.fn().mockReturnValue('test-request-id-123'), getActorId: jest.fn() },
        },
      ],
    }).compile();

    listener = module.get<NotificationEventsListener>(NotificationEventsListener);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it.each([
    [1, 'Primer heartbeat perdido'],
    [2, 'Segundo heartbeat perdido'],
    [3, 'Tercer heartbeat perdido'],
    [4, 'Cuarto heartbeat perdido'],
    [5, 'Dispositivo sin conexión prolongada'],
    [9, 'Dispositivo sin conexión prolongada'],
  ])('should title a notice for %i missed heartbeats as "%s"', async (missed, title) => {
    await listener.handleHeartbeatMissed(
      new HeartbeatMissedEvent(
        'rel-1',
        'parent-1',
        'child-1',
        'Lucía',
        missed,
        'first_miss',
        new Date('2025-03-10T09:00:00.000Z'),
        at,
      ),
    );

    expect(delivered()).toHaveLength(1);
    expect(delivered()[0]).toEqual(
      expect.objectContaining({ recipientId: 'parent-1', type: 'missed_heartbeat', title, timestamp: at }),
    );
    expect(delivered()[0].data).toEqual(
      expect.objectContaining({ missedHeartbeats: missed, lastHeartbeatAt: '2025-03-10T09:00:00.000Z' }),
    );
  });

  it('should tell the parent about a new pairing', async () => {
    await listener.handleRelationshipCreated(
      new RelationshipCreatedEvent('rel-1', 'parent-1', 'child-1', 'Lucía', 'iPad', at),
    );

    expect(delivered()[0]).toEqual(
      expect.objectContaining({
        type: 'device_paired',
        message: 'iPad de Lucía ya está vinculado a tu cuenta.',
      }),
    );
  });

  it('should tell the parent when the child unlinked', async () => {
    await listener.handleRelationshipUnlinked(
      new RelationshipUnlinkedEvent('rel-1', 'parent-1', 'child-1', 'Lucía', 'child-1', at),
    );

    expect(delivered()[0]).toEqual(
      expect.objectContaining({
        type: 'device_unlinked',
        message: 'El dispositivo de Lucía se ha desvinculado de tu cuenta.',
      }),
    );
  });

  it('should tell the child when the parent unlinked', async () => {
    await listener.handleRelationshipUnlinked(
      new RelationshipUnlinkedEvent('rel-1', 'parent-1', 'child-1', 'Lucía', 'parent-1', at),
    );

    expect(delivered()).toHaveLength(1);
    expect(delivered()[0]).toEqual(
      expect.objectContaining({
        recipientId: 'child-1',
        type: 'device_unlinked',
        title: 'Supervisión finalizada',
        message: 'Tu dispositivo ya no está vinculado a la cuenta que lo supervisaba.',
        data: { relationshipId: 'rel-1', parentUserId: 'parent-1' },
      }),
    );
  });

  it('should alert about an inactive child', async () => {
    await listener.handleChildInactive(
      new ChildInactiveEvent('child-1', 'parent-1', 'Lucía', new Date('2025-03-07T08:00:00.000Z'), at),
    );

    expect(delivered()[0]).toEqual(
      expect.objectContaining({
        type: 'inactivity_alert',
        message: 'Lucía no ha abierto la app en 3 días. Revisa su dispositivo.',
        data: { childUserId: 'child-1', lastActiveAt: '2025-03-07T08:00:00.000Z' },
      }),
    );
  });

  it('should report an exceeded limit in minutes', async () => {
    await listener.handleLimitExceeded(
      new RestrictionLimitExceededEvent('parent-1', 'child-1', 'com.google.ios.youtube', 'YouTube', 3700, 3600, at),
    );

    expect(delivered()[0].message).toBe(
      'YouTube ha alcanzado su límite de 60 minutos y queda bloqueada hasta mañana.',
    );
  });

  it('should announce a detected app', async () => {
    await listener.handleAppDetected(
      new AppDetectedEvent('parent-1_com.roblox.client', 'parent-1', 'child-1', 'com.roblox.client', 'Roblox', at),
    );

    expect(delivered()[0]).toEqual(
      expect.objectContaining({
        type: 'new_app_detected',
        title: 'App nueva detectada',
        data: { detectionId: 'parent-1_com.roblox.client', childUserId: 'child-1', bundleId: 'com.roblox.client' },
      }),
    );
  });

  it('should log and swallow a delivery failure', async () => {
    const warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    mockDispatcher.dispatch.mockRejectedValueOnce(new Error('push unavailable'));

    await expect(
      listener.handleChildInactive(new ChildInactiveEvent('child-1', 'parent-1', 'Lucía', at, at)),
    ).resolves.toBeUndefined();
    expect(warnSpy).toHaveBeenCalledWith('Error entregando aviso de child.inactive: push unavailable');
  });
});
