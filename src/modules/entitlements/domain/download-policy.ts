import type { Purchase } from '../../purchases/domain/entities/purchase.entity';
import type { User } from '../../users/domain/entities/user.entity';

export type DownloadDenialReason = 'NOT_PURCHASED' | 'NO_DEVICE';

export type DownloadDecision =
  | {
      permitted: true;
      purchaseId: string;
      deviceId: string;
      downloadsRemaining: number;
    }
  | {
      permitted: false;
      reason: DownloadDenialReason;
      message: string;
    };

export const DENIAL_MESSAGES: Record<DownloadDenialReason, string> = {
  NOT_PURCHASED: 'No has comprado este libro',
  NO_DEVICE: 'Registra un dispositivo para descargar libros',
};

/**
 * Decide si `user` puede descargar el libro de `purchase`.
 *
 * Permitido sii hay compra completada Y la cuenta tiene un dispositivo
 * registrado (cualquiera; no se valida qué dispositivo hace la petición).
 * NOT_PURCHASED tiene prioridad sobre NO_DEVICE.
 */
export function decideDownload(
  user: Pick<User, 'registeredDeviceId'>,
  purchase: Purchase | null,
): DownloadDecision {
  if (!purchase || !purchase.grantsEntitlement()) {
    return deny('NOT_PURCHASED');
  }

  if (!user.registeredDeviceId) {
    return deny('NO_DEVICE');
  }

  return {
    permitted: true,
    purchaseId: purchase.id,
    deviceId: user.registeredDeviceId,
    downloadsRemaining: purchase.downloadsRemaining(),
  };
}

function deny(reason: DownloadDenialReason): DownloadDecision {
  return { permitted: false, reason, message: DENIAL_MESSAGES[reason] };
}
