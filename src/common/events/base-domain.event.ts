import { randomUUID } from 'crypto';

/**
 * Base de los eventos emitidos por EventEmitter2 (`purchase.completed`,
 * `device.registered`, ...). Cada evento lleva su propio id, el instante en
 * que ocurrió y el id de la request que lo originó.
 */
export abstract class BaseDomainEvent {
  readonly eventId: string = randomUUID();
  readonly occurredAt: Date = new Date();

  protected constructor(readonly requestId?: string) {}
}
