import { Injectable, Logger, NestMiddleware } from '@nestjs/common';

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

import { AsyncContextService } from '../common/context/async-context.service';

/**
 * RequestIdMiddleware: asigna el requestId de la request.
 *
 * - Respeta x-request-id entrante si es un UUID válido
 * - Lo guarda en nestjs-cls y lo devuelve en el header de respuesta
 * - Registra inicio y fin de la request
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger(RequestIdMiddleware.name);

  constructor(private readonly asyncContextService: AsyncContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.get('x-request-id');
    const requestId = incoming && isUuid(incoming) ? incoming : uuidv4();

    this.asyncContextService.setRequestId(requestId);
    res.setHeader('x-request-id', requestId);

    const startedAt = Date.now();
    this.logger.log(`[${requestId}] ${req.method} ${req.originalUrl} - Request iniciada`);

    res.on('finish', () => {
      this.logger.log(
        `[${requestId}] ${req.method} ${req.originalUrl} - ${res.statusCode} (${Date.now() - startedAt} ms)`,
      );
    });

    next();
  }
}
