import { Global, Module } from '@nestjs/common';
import type { Request } from 'express';
import { ClsModule } from 'nestjs-cls';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

import { AsyncContextService } from '../common/context/async-context.service';

/**
 * Id de la request: respeta un `x-request-id` entrante si es un UUID válido.
 */
export function resolveRequestId(req: Request): string {
  const incoming = req.headers['x-request-id'];
  return typeof incoming === 'string' && isUuid(incoming) ? incoming : uuidv4();
}

/**
 * SharedContextModule: contexto async (nestjs-cls) para toda la aplicación.
 *
 * Debe importarse PRIMERO en AppModule para que ClsService esté disponible
 * antes que los módulos que dependen de él.
 */
@Global()
@Module({
  imports: [
    ClsModule.forRoot({
      global: true,
      middleware: {
        mount: true,
        generateId: true,
        idGenerator: resolveRequestId,
      },
    }),
  ],
  providers: [AsyncContextService],
  exports: [ClsModule, AsyncContextService],
})
export class SharedContextModule {}
