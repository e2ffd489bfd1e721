import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsIn, IsObject, IsOptional } from 'class-validator';

import type { DeviceInfo } from '../../../common/interfaces/device-info.interface';
import { ACTIVITY_TYPES, ActivityType } from '../domain/models/activity-type';

export class RecordActivityDto {
  @ApiProperty({ enum: [...ACTIVITY_TYPES], example: 'heartbeat' })
  @IsIn(ACTIVITY_TYPES, { message: 'activityType no es un tipo de actividad válido' })
  activityType!: ActivityType;

  @ApiPropertyOptional({
    description: 'Información opaca del dispositivo',
    example: { batteryLevel: 0.82, isCharging: false, networkStatus: 'wifi' },
  })
  @IsOptional()
  @IsObject({ message: 'deviceInfo debe ser un objeto' })
  deviceInfo?: DeviceInfo;

  @ApiPropertyOptional({
    description: 'Momento de la señal en el dispositivo; por defecto, ahora',
    example: '2025-01-15T14:30:25.123Z',
  })
  @IsOptional()
  @IsDateString({}, { message: 'occurredAt debe ser una fecha ISO 8601' })
  occurredAt?: string;
}

export class RecordActivityResultDto {
  @ApiProperty({ description: 'Falso si ya había una señal más reciente', example: true })
  recorded!: boolean;

  @ApiProperty({ example: 1 })
  relationshipsUpdated!: number;
}

export class ChildStatusDto {
  @ApiProperty({ example: 'c0a8012e-7f3b-4c55-a2a4-1d8e3c1f6b90' })
  relationshipId!: string;

  @ApiProperty({ example: 'b3c1f8e2-6a0d-4a43-9d0f-2f1f7d7c9e11' })
  childUserId!: string;

  @ApiProperty({ example: 'Lucía' })
  childName!: string;

  @ApiProperty({ example: 'iPhone de Lucía' })
  deviceName!: string;

  @ApiProperty({ enum: ['online', 'offline'], example: 'online' })
  status!: 'online' | 'offline';

  @ApiPropertyOptional({ example: '2025-01-15T14:30:25.123Z' })
  lastHeartbeatAt?: Date;

  @ApiPropertyOptional({ example: '2025-01-15T14:31:02.000Z' })
  lastSyncAt?: Date;

  @ApiProperty({ example: 0 })
  missedHeartbeats!: number;

  @ApiProperty({ description: 'La app se cerró de forma ordenada', example: false })
  isNormalClosure!: boolean;

  @ApiPropertyOptional()
  deviceInfo?: DeviceInfo;
}
