import { Body, Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse as ApiDocResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { ActivityService } from '../../application/activity.service';
import {
  ChildStatusDto,
  RecordActivityDto,
  RecordActivityResultDto,
} from '../../dto/activity.dto';

@Controller('activity')
@ApiTags('Activity')
@ApiBearerAuth('Bearer Token')
@ApiSecurity('x-api-key')
@UseGuards(JwtAuthGuard)
export class ActivityController {
  constructor(private readonly activityService: ActivityService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Registrar actividad del dispositivo hijo',
    description: 'Heartbeat, cierre ordenado o cualquier otra señal de la app.',
  })
  @ApiDocResponse({ status: HttpStatus.OK, type: RecordActivityResultDto })
  @ApiDocResponse({ status: HttpStatus.SERVICE_UNAVAILABLE, description: 'Reintentar más tarde' })
  async recordActivity(
    @Body() dto: RecordActivityDto,
  ): Promise<ApiResponse<RecordActivityResultDto>> {
    return this.activityService.recordActivity(dto);
  }

  @Get('children')
  @ApiOperation({ summary: 'Estado de conexión de los hijos del padre' })
  @ApiDocResponse({ status: HttpStatus.OK, type: [ChildStatusDto] })
  async getChildStatus(): Promise<ApiResponse<ChildStatusDto[]>> {
    return this.activityService.getChildStatus();
  }
}
