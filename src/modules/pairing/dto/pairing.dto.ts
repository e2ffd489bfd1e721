import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

import type { DeviceInfo } from '../../../common/interfaces/device-info.interface';
import type { PairingCodeState } from '../domain/state-machines/pairing-code.state-machine';

export class GenerateCodeDto {
  @ApiProperty({ description: 'Nombre del hijo', example: 'Lucía' })
  @IsString({ message: 'childName debe ser texto' })
  @IsNotEmpty({ message: 'childName es obligatorio' })
  @MaxLength(60, { message: 'childName no puede superar 60 caracteres' })
  childName!: string;

  @ApiProperty({ description: 'Nombre del dispositivo', example: 'iPhone de Lucía' })
  @IsString({ message: 'deviceName debe ser texto' })
  @IsNotEmpty({ message: 'deviceName es obligatorio' })
  @MaxLength(80, { message: 'deviceName no puede superar 80 caracteres' })
  deviceName!: string;

  @ApiPropertyOptional({
    description: 'Información opaca del dispositivo',
    example: { model: 'iPhone14,2', systemVersion: '17.4' },
  })
  @IsOptional()
  @IsObject({ message: 'deviceInfo debe ser un objeto' })
  deviceInfo?: DeviceInfo;
}

/**
 * El formato del código lo valida el servicio (INVALID_FORMAT con mensaje propio)
 */
export class SubmitCodeDto {
  @ApiProperty({ description: 'Código de 6 dígitos', example: '482913' })
  @IsString({ message: 'code debe ser texto' })
  code!: string;
}

export class GeneratedCodeDto {
  @ApiProperty({ example: '482913' })
  code!: string;

  @ApiProperty({ example: '2025-01-15T14:40:25.123Z' })
  expiresAt!: Date;

  @ApiProperty({ example: 600 })
  expiresInSeconds!: number;
}

export class PairingResultDto {
  @ApiProperty({ example: 'c0a8012e-7f3b-4c55-a2a4-1d8e3c1f6b90' })
  relationshipId!: string;

  @ApiProperty({ example: 'b3c1f8e2-6a0d-4a43-9d0f-2f1f7d7c9e11' })
  childUserId!: string;

  @ApiProperty({ example: 'Lucía' })
  childName!: string;

  @ApiProperty({ example: 'iPhone de Lucía' })
  deviceName!: string;
}

export class PairedChildDto extends PairingResultDto {
  @ApiProperty({ example: '2025-01-15T14:35:00.000Z' })
  pairedAt!: Date;

  @ApiPropertyOptional({ example: '2025-01-15T18:02:11.000Z' })
  lastSyncAt?: Date;

  @ApiProperty({ description: 'Sincronizó en los últimos 5 minutos', example: true })
  isOnline!: boolean;
}

export class PairingCodeStatusDto {
  @ApiProperty({ example: '482913' })
  code!: string;

  @ApiProperty({ enum: ['issued', 'active', 'expired'], example: 'issued' })
  status!: PairingCodeState;

  @ApiProperty({ example: '2025-01-15T14:40:25.123Z' })
  expiresAt!: Date;

  @ApiPropertyOptional({ example: '2025-01-15T14:35:00.000Z' })
  pairedAt?: Date;
}
