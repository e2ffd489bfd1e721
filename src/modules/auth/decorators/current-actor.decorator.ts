import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';

import { DOMAIN_ERROR_MESSAGES } from '../../../common/errors/domain.error';
import { isActor } from '../../../common/interceptors/authentication.interceptor';
import type { Actor } from '../../../common/interfaces/actor.interface';

/**
 * Inyecta el actor autenticado; sin actor la request es UNAUTHENTICATED
 */
export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!isActor(request.user)) {
      throw new UnauthorizedException(DOMAIN_ERROR_MESSAGES.UNAUTHENTICATED);
    }
    return request.user;
  },
);
