import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { ClsService } from 'nestjs-cls';

import type { AppClsStore } from '../common/context/cls-store.interface';

/**
 * RequestIdMiddleware: publica el id que generó ClsModule.
 *
 * - Lo guarda en el store como `requestId`
 * - Lo devuelve al cliente en el header `x-request-id`
 */
@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  constructor(private readonly cls: ClsService<AppClsStore>) {}

  use(_req: Request, res: Response, next: NextFunction): void {
    const requestId = this.cls.getId();
    this.cls.set('requestId', requestId);
    res.locals.requestId = requestId;
    res.setHeader('x-request-id', requestId);
    next();
  }
}
