import { BaseDomainEvent } from '../../../../common/events/base-domain.event';

export class UserRegisteredEvent extends BaseDomainEvent {
  constructor(
    readonly userId: string,
    readonly email: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}
