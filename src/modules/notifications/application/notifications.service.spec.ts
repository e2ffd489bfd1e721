import { HttpStatus, Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';

import { AsyncContextService } from '../../../common/context/async-context.service';
import { InMemoryNotificationsRepository } from '../../../testing/in-memory-notifications.repository';
import { NOTIFICATIONS_INJECTION_TOKENS } from '../domain/constants/notifications.constants';
import type { Notification } from '../domain/models/notification.model';
import { NotificationsService } from './notifications.service';

describe('NotificationsService', () => {
  let service: NotificationsService;
  let notifications: InMemoryNotificationsRepository;
  let mockDispatcher: { dispatch: jest.Mock };
  let mockAsyncContextService: {
    getRequestId: jest.Mock<string, []>;
    getActorId: jest.Mock<string | undefined, []>;
  };

  const seed = (overrides: Partial<Notification> = {}) => {
    const notification: Notification = {
      id: 'notification-1',
      recipientId: 'parent-1',
      type: 'inactivity_alert',
      title: 'Dispositivo inactivo',
      message: 'Lucía no ha abierto la app en 3 días. Revisa su dispositivo.',
      data: { childUserId: 'child-1' },
      timestamp: new Date('2025-03-10T09:00:00.000Z'),
      isRead: false,
      ...overrides,
    };
    notifications.notifications.set(notification.id, notification);
  };

  beforeEach(async () => {
    notifications = new InMemoryNotificationsRepository();
    mockDispatcher = { dispatch: jest.fn().mockResolvedValue(undefined) };
    mockAsyncContextService = {
      getRequestId: jest.fn<string, []>().mockReturnValue('test-request-id-123'),
      getActorId: jest.fn<string | undefined, []>().mockReturnValue('parent-1'),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NotificationsService,
        { provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATIONS_REPOSITORY, useValue: notifications },
        { provide: NOTIFICATIONS_INJECTION_TOKENS.NOTIFICATION_DISPATCHER, useValue: mockDispatcher },
        { provide: AsyncContextService, useValue: mockAsyncContextService },
      ],
    }).compile();

    service = module.get<NotificationsService>(NotificationsService);

    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should persist a delivered notification as unread and dispatch it', async () => {
    const delivered = await service.deliver({
      recipientId: 'parent-1',
      type: 'limit_exceeded',
      title: 'Límite diario alcanzado',
      message: 'YouTube ha alcanzado su límite de 60 minutos y queda bloqueada hasta mañana.',
      data: { bundleId: 'com.google.ios.youtube' },
      timestamp: new Date('2025-03-10T18:00:00.000Z'),
    });

    expect(delivered.isRead).toBe(false);
    expect(notifications.notifications.get(delivered.id)).toEqual(delivered);
    expect(mockDispatcher.dispatch).toHaveBeenCalledWith(delivered);
  });

  it('should list the recipient notifications newest first', async () => {
    seed();
    seed({ id: 'notification-2', timestamp: new Date('2025-03-11T09:00:00.000Z'), isRead: true });
    seed({ id: 'notification-3', recipientId: 'parent-2' });

    const result = await service.listNotifications();

    expect(result.ok).toBe(true);
    expect(result.data?.map((notification) => notification.id)).toEqual([
      'notification-2',
      'notification-1',
    ]);
    expect(result.meta).toEqual({ requestId: 'test-request-id-123', total: 2, unread: 1 });
  });

  it('should mark a notification as read', async () => {
    seed();

    const result = await service.markAsRead('notification-1');

    expect(result.data?.isRead).toBe(true);
    expect(notifications.notifications.get('notification-1')?.isRead).toBe(true);
  });

  it('should return PERMISSION_DENIED for a notification of someone else', async () => {
    seed({ recipientId: 'parent-2' });

    const result = await service.markAsRead('notification-1');

    expect(result.statusCode).toBe(HttpStatus.FORBIDDEN);
    expect(notifications.notifications.get('notification-1')?.isRead).toBe(false);
  });

  it('should return NOT_FOUND for an unknown notification', async () => {
    const result = await service.markAsRead('missing');

    expect(result.statusCode).toBe(HttpStatus.NOT_FOUND);
    expect(result.message).toBe('El aviso no existe.');
  });

  it('should return 503 when the store fails', async () => {
    jest.spyOn(notifications, 'findByRecipient').mockRejectedValueOnce(new Error('socket closed'));

    const result = await service.listNotifications();

    expect(result.statusCode).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    expect(result.errors).toBe('TRANSIENT_STORE_FAILURE');
  });
});
