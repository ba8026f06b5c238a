import { BaseDomainEvent } from '../../../../common/events/base-domain.event';

export class DownloadGrantedEvent extends BaseDomainEvent {
  constructor(
    readonly userId: string,
    readonly bookId: string,
    readonly purchaseId: string,
    readonly deviceId: string,
    readonly downloadCount: number,
    requestId?: string,
  ) {
    super(requestId);
  }
}
