import { Controller, Get, HttpStatus, Param, Patch, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse as ApiDocResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { NotificationsService } from '../../application/notifications.service';
import { NotificationDto } from '../../dto/notification.dto';

@Controller('notifications')
@ApiTags('Notifications')
@ApiBearerAuth('Bearer Token')
@ApiSecurity('x-api-key')
@UseGuards(JwtAuthGuard)
export class NotificationsController {
  constructor(private readonly notificationsService: NotificationsService) {}

  @Get()
  @ApiOperation({ summary: 'Avisos del usuario autenticado, más recientes primero' })
  @ApiDocResponse({ status: HttpStatus.OK, type: [NotificationDto] })
  async listNotifications(): Promise<ApiResponse<NotificationDto[]>> {
    return this.notificationsService.listNotifications();
  }

  @Patch(':id/read')
  @ApiOperation({ summary: 'Marcar un aviso como leído' })
  @ApiDocResponse({ status: HttpStatus.OK, type: NotificationDto })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'El aviso no existe' })
  async markAsRead(@Param('id') id: string): Promise<ApiResponse<NotificationDto>> {
    return this.notificationsService.markAsRead(id);
  }
}
