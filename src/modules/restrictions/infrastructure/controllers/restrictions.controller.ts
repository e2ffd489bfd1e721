import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiParam,
  ApiResponse as ApiDocResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { AppRestrictionsService } from '../../application/app-restrictions.service';
import { BedtimeService } from '../../application/bedtime.service';
import { NewAppDetectionService } from '../../application/new-app-detection.service';
import {
  AppRestrictionDto,
  BedtimeSettingsDto,
  DeviceRestrictionsDto,
  NewAppDetectionDto,
  RecordUsageDto,
  RecordUsageResultDto,
  ReportInstalledAppsDto,
  ReportInstalledAppsResultDto,
  SetAppLimitDto,
  SetBedtimeDto,
} from '../../dto/restrictions.dto';

@Controller('restrictions')
@ApiTags('Restrictions')
@ApiBearerAuth('Bearer Token')
@ApiSecurity('x-api-key')
@UseGuards(JwtAuthGuard)
export class RestrictionsController {
  constructor(
    private readonly appRestrictionsService: AppRestrictionsService,
    private readonly bedtimeService: BedtimeService,
    private readonly newAppDetectionService: NewAppDetectionService,
  ) {}

  /**
   * ============================================
   * Padre: restricciones por app
   * ============================================
   */

  @Get('apps')
  @ApiOperation({ summary: 'Listar las restricciones del padre' })
  @ApiDocResponse({ status: HttpStatus.OK, type: [AppRestrictionDto] })
  async listRestrictions(): Promise<ApiResponse<AppRestrictionDto[]>> {
    return this.appRestrictionsService.listRestrictions();
  }

  @Put('apps/:bundleId/limit')
  @ApiOperation({ summary: 'Fijar el límite diario de una app' })
  @ApiParam({ name: 'bundleId', example: 'com.google.ios.youtube' })
  @ApiDocResponse({ status: HttpStatus.OK, type: AppRestrictionDto })
  @ApiDocResponse({ status: HttpStatus.BAD_REQUEST, description: 'Límite o zona horaria inválidos' })
  async setLimit(
    @Param('bundleId') bundleId: string,
    @Body() dto: SetAppLimitDto,
  ): Promise<ApiResponse<AppRestrictionDto>> {
    return this.appRestrictionsService.setLimit(bundleId, dto);
  }

  @Post('apps/:bundleId/disable')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Bloquear una app' })
  @ApiDocResponse({ status: HttpStatus.OK, type: AppRestrictionDto })
  async disable(@Param('bundleId') bundleId: string): Promise<ApiResponse<AppRestrictionDto>> {
    return this.appRestrictionsService.disable(bundleId);
  }

  @Post('apps/:bundleId/enable')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Desbloquear una app' })
  @ApiDocResponse({ status: HttpStatus.OK, type: AppRestrictionDto })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'La app no tiene restricciones' })
  async enable(@Param('bundleId') bundleId: string): Promise<ApiResponse<AppRestrictionDto>> {
    return this.appRestrictionsService.enable(bundleId);
  }

  @Delete('apps/:bundleId')
  @ApiOperation({ summary: 'Eliminar la restricción de una app' })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'La app no tiene restricciones' })
  async remove(@Param('bundleId') bundleId: string): Promise<ApiResponse<null>> {
    return this.appRestrictionsService.remove(bundleId);
  }

  @Put('bedtime')
  @ApiOperation({ summary: 'Guardar el horario de descanso' })
  @ApiDocResponse({ status: HttpStatus.OK, type: BedtimeSettingsDto })
  async setBedtime(@Body() dto: SetBedtimeDto): Promise<ApiResponse<BedtimeSettingsDto>> {
    return this.bedtimeService.setBedtime(dto);
  }

  @Get('detections')
  @ApiOperation({ summary: 'Apps nuevas pendientes de revisión' })
  @ApiDocResponse({ status: HttpStatus.OK, type: [NewAppDetectionDto] })
  async listPendingDetections(): Promise<ApiResponse<NewAppDetectionDto[]>> {
    return this.newAppDetectionService.listPendingDetections();
  }

  @Post('detections/:id/monitor')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Supervisar una app detectada con límite de 2 horas' })
  @ApiDocResponse({ status: HttpStatus.OK, type: NewAppDetectionDto })
  @ApiDocResponse({ status: HttpStatus.CONFLICT, description: 'Detección ya procesada' })
  async addToMonitoring(@Param('id') id: string): Promise<ApiResponse<NewAppDetectionDto>> {
    return this.newAppDetectionService.addDetectionToMonitoring(id);
  }

  @Post('detections/:id/ignore')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Ignorar una app detectada' })
  @ApiDocResponse({ status: HttpStatus.OK, type: NewAppDetectionDto })
  @ApiDocResponse({ status: HttpStatus.CONFLICT, description: 'Detección ya procesada' })
  async ignore(@Param('id') id: string): Promise<ApiResponse<NewAppDetectionDto>> {
    return this.newAppDetectionService.ignoreDetection(id);
  }

  /**
   * ============================================
   * Dispositivo hijo
   * ============================================
   */

  @Post('usage')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reportar uso de una app' })
  @ApiDocResponse({ status: HttpStatus.OK, type: RecordUsageResultDto })
  async recordUsage(@Body() dto: RecordUsageDto): Promise<ApiResponse<RecordUsageResultDto>> {
    return this.appRestrictionsService.recordUsage(dto);
  }

  @Get('device')
  @ApiOperation({
    summary: 'Restricciones vigentes en el dispositivo',
    description: 'Un ámbito por padre vinculado y las apps bloqueadas ahora.',
  })
  @ApiDocResponse({ status: HttpStatus.OK, type: DeviceRestrictionsDto })
  async getDeviceRestrictions(): Promise<ApiResponse<DeviceRestrictionsDto>> {
    return this.appRestrictionsService.getDeviceRestrictions();
  }

  @Post('detections/report')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reportar las apps instaladas' })
  @ApiDocResponse({ status: HttpStatus.OK, type: ReportInstalledAppsResultDto })
  async reportInstalledApps(
    @Body() dto: ReportInstalledAppsDto,
  ): Promise<ApiResponse<ReportInstalledAppsResultDto>> {
    return this.newAppDetectionService.reportInstalledApps(dto);
  }
}
