import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

import { AsyncContextService } from '../context/async-context.service';
import type { Actor } from '../interfaces/actor.interface';

export function isActor(value: unknown): value is Actor {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'actorId' in value &&
    typeof value.actorId === 'string' &&
    'actorType' in value &&
    (value.actorType === 'user' || value.actorType === 'service')
  );
}

/**
 * AuthenticationInterceptor: copia el actor autenticado al contexto async.
 *
 * Se ejecuta después de JwtAuthGuard, que deja el actor en `request.user`
 * (poblado por JwtStrategy.validate()).
 */
@Injectable()
export class AuthenticationInterceptor implements NestInterceptor {
  constructor(private readonly asyncContextService: AsyncContextService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<Request>();

    if (isActor(req.user)) {
      this.asyncContextService.setActor(req.user);
    }

    return next.handle();
  }
}
