import { Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';

import { AsyncContextService } from '../common/context/async-context.service';

/**
 * LoggingMiddleware: una línea por request con método, ruta, status y latencia.
 */
@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  constructor(private readonly asyncContextService: AsyncContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();
    const requestId = this.asyncContextService.getRequestId();
    const path = req.originalUrl;

    this.asyncContextService.setHttpMetadata({
      method: req.method,
      path,
      userAgent: req.get('user-agent'),
      ipAddress: req.ip,
    });

    res.on('finish', () => {
      const responseTime = Date.now() - startedAt;
      const line = `[${requestId}] ${req.method} ${path} ${res.statusCode} - ${responseTime}ms`;
      if (res.statusCode >= 500) {
        this.logger.error(line);
      } else if (res.statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
