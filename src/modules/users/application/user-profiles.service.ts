import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';

import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { AsyncContextService } from '../../../common/context/async-context.service';
import {
  DomainError,
  errorMessage,
  failFromError,
} from '../../../common/errors/domain.error';
import { ApiResponse } from '../../../common/types/api-response.type';
import type { IUserProfilesRepository } from '../domain/ports/user-profiles.port';
import type { UserProfileDto } from '../dto/user-profile.dto';

/**
 * Consulta del perfil de supervisión del usuario autenticado
 */
@Injectable()
export class UserProfilesService {
  private readonly logger = new Logger(UserProfilesService.name);

  constructor(
    @Inject(INJECTION_TOKENS.USER_PROFILES_REPOSITORY)
    private readonly profilesRepository: IUserProfilesRepository,
    private readonly asyncContextService: AsyncContextService,
  ) {}

  async getProfile(userId: string): Promise<ApiResponse<UserProfileDto>> {
    const requestId = this.asyncContextService.getRequestId();
    try {
      const profile = await this.profilesRepository.findById(userId);
      if (!profile) {
        throw new DomainError('NOT_FOUND', 'El perfil no existe todavía.');
      }

      return ApiResponse.ok<UserProfileDto>(
        HttpStatus.OK,
        {
          id: profile.id,
          userType: profile.userType,
          isDevicePaired: profile.isDevicePaired,
          pairedAt: profile.pairedAt,
          lastActiveAt: profile.lastActiveAt,
          lastActivityType: profile.lastActivityType,
        },
        'Perfil obtenido',
        { requestId },
      );
    } catch (error) {
      this.logger.error(
        `[${requestId}] Error obteniendo perfil ${userId}: ${errorMessage(error)}`,
      );
      return failFromError<UserProfileDto>(error, { requestId });
    }
  }
}
