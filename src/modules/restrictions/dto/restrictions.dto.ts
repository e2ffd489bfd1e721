import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

import { CLOCK_TIME_PATTERN } from '../domain/constants/restrictions.constants';

export class SetAppLimitDto {
  @ApiProperty({ description: 'Segundos diarios permitidos; 0 elimina el límite', example: 3600 })
  @Type(() => Number)
  @IsInt({ message: 'timeLimit debe ser un número entero de segundos' })
  @Min(0, { message: 'timeLimit no puede ser negativo' })
  @Max(86_400, { message: 'timeLimit no puede superar un día' })
  timeLimit!: number;

  @ApiPropertyOptional({ description: 'Zona IANA del dispositivo hijo', example: 'Europe/Madrid' })
  @IsOptional()
  @IsString()
  timezone?: string;
}

export class RecordUsageDto {
  @ApiProperty({ example: 'com.google.ios.youtube' })
  @IsString()
  @IsNotEmpty({ message: 'bundleId es obligatorio' })
  bundleId!: string;

  @ApiProperty({ description: 'Segundos de uso desde el último envío', example: 300 })
  @Type(() => Number)
  @IsInt({ message: 'elapsedSeconds debe ser un número entero' })
  @Min(0, { message: 'elapsedSeconds no puede ser negativo' })
  elapsedSeconds!: number;

  @ApiPropertyOptional({ description: 'Zona IANA del dispositivo', example: 'Europe/Madrid' })
  @IsOptional()
  @IsString()
  timezone?: string;
}

export class SetBedtimeDto {
  @ApiProperty({ example: true })
  @IsBoolean()
  isEnabled!: boolean;

  @ApiProperty({ example: '22:00' })
  @Matches(CLOCK_TIME_PATTERN, { message: 'startTime debe tener formato HH:mm' })
  startTime!: string;

  @ApiProperty({ example: '07:30' })
  @Matches(CLOCK_TIME_PATTERN, { message: 'endTime debe tener formato HH:mm' })
  endTime!: string;

  @ApiProperty({ description: 'Días ISO: 1 = lunes … 7 = domingo', example: [1, 2, 3, 4, 5] })
  @IsArray()
  @ArrayUnique()
  @ArrayMaxSize(7)
  @IsInt({ each: true })
  @Min(1, { each: true })
  @Max(7, { each: true })
  enabledDays!: number[];

  @ApiPropertyOptional({ example: 'Europe/Madrid' })
  @IsOptional()
  @IsString()
  timezone?: string;
}

export class ReportInstalledAppsDto {
  @ApiProperty({ example: ['com.google.ios.youtube', 'com.roblox.client'] })
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  bundleIds!: string[];
}

export class AppRestrictionDto {
  @ApiProperty({ example: 'com.google.ios.youtube' })
  bundleId!: string;

  @ApiProperty({ example: 'YouTube' })
  appName!: string;

  @ApiProperty({ example: 3600 })
  timeLimit!: number;

  @ApiProperty({ example: false })
  isDisabled!: boolean;

  @ApiProperty({ example: 1200 })
  dailyUsage!: number;

  @ApiProperty({ example: '2025-01-15' })
  lastResetDate!: string;

  @ApiProperty({ example: 'Europe/Madrid' })
  timezone!: string;

  @ApiPropertyOptional({ example: '2025-01-15T18:00:00.000Z' })
  limitExceededAt?: Date;
}

export class RecordUsageResultDto {
  @ApiProperty({ example: 1 })
  restrictionsUpdated!: number;

  @ApiProperty({ description: 'La app quedó bloqueada para algún padre', example: false })
  isDisabled!: boolean;
}

export class BedtimeSettingsDto {
  @ApiProperty({ example: true })
  isEnabled!: boolean;

  @ApiProperty({ example: '22:00' })
  startTime!: string;

  @ApiProperty({ example: '07:30' })
  endTime!: string;

  @ApiProperty({ example: [1, 2, 3, 4, 5] })
  enabledDays!: number[];

  @ApiProperty({ example: 'Europe/Madrid' })
  timezone!: string;

  @ApiProperty({ example: false })
  isActiveNow!: boolean;
}

export class DeviceScopeDto {
  @ApiProperty({ example: 'parent-id' })
  parentId!: string;

  @ApiProperty({ type: [AppRestrictionDto] })
  appRestrictions!: Omit<AppRestrictionDto, 'appName' | 'timezone' | 'limitExceededAt'>[];

  @ApiPropertyOptional({ type: BedtimeSettingsDto })
  bedtime!: BedtimeSettingsDto | null;
}

export class DeviceRestrictionsDto {
  @ApiProperty({ type: [DeviceScopeDto] })
  scopes!: DeviceScopeDto[];

  @ApiProperty({ description: 'Bundle ids bloqueados ahora', example: ['com.roblox.client'] })
  blockedBundleIds!: string[];

  @ApiProperty({ example: false })
  isBedtimeNow!: boolean;
}

export class NewAppDetectionDto {
  @ApiProperty({ example: 'parent-id_com.roblox.client' })
  id!: string;

  @ApiProperty({ example: 'com.roblox.client' })
  bundleId!: string;

  @ApiProperty({ example: 'Roblox' })
  appName!: string;

  @ApiProperty({ example: 'child-id' })
  deviceId!: string;

  @ApiProperty({ example: '2025-01-15T18:00:00.000Z' })
  detectedAt!: Date;

  @ApiProperty({ example: false })
  isProcessed!: boolean;

  @ApiPropertyOptional({ enum: ['monitored', 'ignored'] })
  resolution?: string;
}

export class ReportInstalledAppsResultDto {
  @ApiProperty({ example: 2 })
  detected!: number;
}
