import { Controller, Get, HttpStatus, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse as ApiDocResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';

import type { Actor } from '../../../../common/interfaces/actor.interface';
import { ApiResponse } from '../../../../common/types/api-response.type';
import { CurrentActor } from '../../../auth/decorators/current-actor.decorator';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { UserProfilesService } from '../../application/user-profiles.service';
import { UserProfileDto } from '../../dto/user-profile.dto';

@Controller('users')
@ApiTags('Users')
@ApiBearerAuth('Bearer Token')
@ApiSecurity('x-api-key')
@UseGuards(JwtAuthGuard)
export class ProfileController {
  constructor(private readonly userProfilesService: UserProfilesService) {}

  @Get('me')
  @ApiOperation({ summary: 'Perfil de supervisión del usuario autenticado' })
  @ApiDocResponse({ status: HttpStatus.OK, type: UserProfileDto })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'Perfil inexistente' })
  async me(@CurrentActor() actor: Actor): Promise<ApiResponse<UserProfileDto>> {
    return this.userProfilesService.getProfile(actor.actorId);
  }
}
