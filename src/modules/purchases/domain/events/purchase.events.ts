import { BaseDomainEvent } from '../../../../common/events/base-domain.event';

export class PurchaseCompletedEvent extends BaseDomainEvent {
  constructor(
    readonly purchaseId: string,
    readonly userId: string,
    readonly bookId: string,
    readonly purchasePrice: number,
    readonly paymentMethod: string,
    readonly transactionId: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}

export class PurchaseFailedEvent extends BaseDomainEvent {
  constructor(
    readonly purchaseId: string,
    readonly userId: string,
    readonly bookId: string,
    readonly reason: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}

export class PurchaseRefundedEvent extends BaseDomainEvent {
  constructor(
    readonly purchaseId: string,
    readonly userId: string,
    readonly bookId: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}
