import { BaseDomainEvent } from '../../../../common/events/base-domain.event';

/**
 * Emitido al ocupar el slot de dispositivo. `previousDeviceId` indica
 * el dispositivo reemplazado, si lo había.
 */
export class DeviceRegisteredEvent extends BaseDomainEvent {
  constructor(
    readonly userId: string,
    readonly deviceId: string,
    readonly deviceName: string,
    readonly previousDeviceId: string | null,
    requestId?: string,
  ) {
    super(requestId);
  }
}

export class DeviceUnregisteredEvent extends BaseDomainEvent {
  constructor(
    readonly userId: string,
    readonly deviceId: string,
    requestId?: string,
  ) {
    super(requestId);
  }
}
