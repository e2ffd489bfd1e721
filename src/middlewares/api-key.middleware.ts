// Nest Modules
import { HttpStatus, Injectable, Logger, NestMiddleware } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NextFunction, Request, Response } from 'express';

import { ApiResponse } from '../common/types/api-response.type';

/**
 * Valida el header x-api-key antes que cualquier otro procesamiento.
 * Se excluye `/health` al registrarlo en AppModule.
 */
@Injectable()
export class ApiKeyMiddleware implements NestMiddleware {
  private readonly logger = new Logger(ApiKeyMiddleware.name);

  constructor(private readonly configService: ConfigService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const apiKey = req.get('x-api-key');
    const validApiKey = this.configService.get<string>('API_KEY');

    if (!apiKey || apiKey !== validApiKey) {
      this.logger.warn(
        `${req.method} ${req.originalUrl} rechazada: x-api-key ${apiKey ? 'inválida' : 'ausente'}`,
      );
      res
        .status(HttpStatus.UNAUTHORIZED)
        .json(
          ApiResponse.fail(
            HttpStatus.UNAUTHORIZED,
            'UNAUTHENTICATED',
            apiKey ? 'x-api-key inválida' : 'Falta el header x-api-key',
          ),
        );
      return;
    }

    next();
  }
}
