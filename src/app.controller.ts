import { Controller, Get, HttpStatus } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiResponse } from './common/types/api-response.type';

export interface HealthStatus {
  status: 'ok';
  uptimeSeconds: number;
}

@Controller()
@ApiTags('Health')
export class AppController {
  @Get('health')
  @ApiOperation({ summary: 'Comprobación de vida del servicio' })
  health(): ApiResponse<HealthStatus> {
    return ApiResponse.ok(
      HttpStatus.OK,
      { status: 'ok', uptimeSeconds: Math.floor(process.uptime()) },
      'Servicio operativo',
    );
  }
}
