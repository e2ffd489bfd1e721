import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';

/**
 * LoggingMiddleware: traza de depuración de cada request entrante,
 * incluidos los preflight CORS
 */
@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger(LoggingMiddleware.name);

  use(req: Request, _res: Response, next: NextFunction): void {
    if (req.method === 'OPTIONS') {
      this.logger.debug(
        `Preflight CORS ${req.originalUrl} desde ${req.get('origin') ?? 'origen desconocido'}`,
      );
    } else {
      this.logger.debug(
        `${req.method} ${req.originalUrl} content-type=${req.get('content-type') ?? '-'}`,
      );
    }

    next();
  }
}
