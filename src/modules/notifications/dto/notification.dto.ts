import { ApiProperty } from '@nestjs/swagger';

import { NOTIFICATION_TYPES } from '../domain/constants/notifications.constants';
import type { NotificationData, NotificationType } from '../domain/models/notification.model';

export class NotificationDto {
  @ApiProperty({ example: '4b8e3c1a-2f6d-4a7e-9b1c-0d2e3f4a5b6c' })
  id!: string;

  @ApiProperty({ enum: [...NOTIFICATION_TYPES], example: 'missed_heartbeat' })
  type!: NotificationType;

  @ApiProperty({ example: 'Primer heartbeat perdido' })
  title!: string;

  @ApiProperty({ example: 'El dispositivo de Lucía no envió su primer heartbeat.' })
  message!: string;

  @ApiProperty({ example: { childUserId: 'child-id', missedHeartbeats: 1 } })
  data!: NotificationData;

  @ApiProperty({ example: '2025-01-15T18:00:00.000Z' })
  timestamp!: Date;

  @ApiProperty({ example: false })
  isRead!: boolean;
}
