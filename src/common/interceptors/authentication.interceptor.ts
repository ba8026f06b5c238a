import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';

import { AsyncContextService } from '../context/async-context.service';
import { isActor } from '../interfaces/actor.interface';

/**
 * AuthenticationInterceptor: copia el actor autenticado al contexto async.
 *
 * Debe ejecutarse DESPUÉS de JwtAuthGuard: lee request.user, que
 * JwtStrategy.validate() ya pobló.
 */
@Injectable()
export class AuthenticationInterceptor implements NestInterceptor {
  private readonly logger = new Logger(AuthenticationInterceptor.name);

  constructor(private readonly asyncContextService: AsyncContextService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const req = context.switchToHttp().getRequest<Request>();

    if (isActor(req.user)) {
      this.asyncContextService.setActor(req.user);
    } else {
      this.logger.debug(`${req.method} ${req.path} - No actor in request`);
    }

    return next.handle();
  }
}
