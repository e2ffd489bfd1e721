import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable, tap } from 'rxjs';

import { ApiResponse } from '../types/api-response.type';

/**
 * Copia el statusCode del envelope ApiResponse al status HTTP de la respuesta
 */
@Injectable()
export class ApiResponseStatusInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      tap((body: unknown) => {
        if (body instanceof ApiResponse) {
          context.switchToHttp().getResponse<Response>().status(body.statusCode);
        }
      }),
    );
  }
}
