import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import type { UserType } from '../domain/models/user-profile.model';

export class UserProfileDto {
  @ApiProperty({ example: 'b3c1f8e2-6a0d-4a43-9d0f-2f1f7d7c9e11' })
  id!: string;

  @ApiProperty({ enum: ['parent', 'child'], example: 'child' })
  userType!: UserType;

  @ApiProperty({ example: true })
  isDevicePaired!: boolean;

  @ApiPropertyOptional({ example: '2025-01-15T14:30:25.123Z' })
  pairedAt?: Date;

  @ApiPropertyOptional({ example: '2025-01-15T14:30:25.123Z' })
  lastActiveAt?: Date;

  @ApiPropertyOptional({ example: 'heartbeat' })
  lastActivityType?: string;
}
