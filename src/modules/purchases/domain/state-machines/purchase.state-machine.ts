import { createActor, setup } from 'xstate';

import { ConflictError } from '../../../../common/errors/domain.errors';
import { PurchaseStatus } from '../entities/purchase.entity';

/**
 * Máquina de estados: ciclo de vida de una compra
 * Estados: pending → {completed | failed}, completed → refunded
 *
 * Transiciones:
 * - pending → completed (pago registrado)
 * - pending → failed (perdió la carrera contra otra compra del mismo libro)
 * - completed → refunded (reembolso; revoca la descarga sin borrar el registro)
 */

export type PurchaseEvent =
  | { type: 'COMPLETE' }
  | { type: 'FAIL' }
  | { type: 'REFUND' };

export const purchaseStateMachine = setup({
  types: {
    events: {} as PurchaseEvent,
  },
}).createMachine({
  id: 'purchase-lifecycle',
  initial: PurchaseStatus.PENDING,
  states: {
    [PurchaseStatus.PENDING]: {
      on: {
        COMPLETE: { target: PurchaseStatus.COMPLETED },
        FAIL: { target: PurchaseStatus.FAILED },
      },
    },
    [PurchaseStatus.COMPLETED]: {
      on: {
        REFUND: { target: PurchaseStatus.REFUNDED },
      },
    },
    [PurchaseStatus.FAILED]: {
      type: 'final',
    },
    [PurchaseStatus.REFUNDED]: {
      type: 'final',
    },
  },
});

const EVENT_FOR_TARGET: Record<PurchaseStatus, PurchaseEvent['type'] | null> = {
  [PurchaseStatus.PENDING]: null,
  [PurchaseStatus.COMPLETED]: 'COMPLETE',
  [PurchaseStatus.FAILED]: 'FAIL',
  [PurchaseStatus.REFUNDED]: 'REFUND',
};

export function isPurchaseStatus(value: unknown): value is PurchaseStatus {
  return Object.values(PurchaseStatus).some((status) => status === value);
}

/**
 * Ejecuta `event` sobre la máquina restaurada en `from`.
 * Retorna el estado destino, o null si el evento no aplica en ese estado.
 */
export function nextPurchaseStatus(
  from: PurchaseStatus,
  event: PurchaseEvent,
): PurchaseStatus | null {
  const snapshot = purchaseStateMachine.resolveState({ value: from, context: {} });
  if (!snapshot.can(event)) {
    return null;
  }

  const actor = createActor(purchaseStateMachine, { snapshot });
  actor.start();
  actor.send(event);
  const value = actor.getSnapshot().value;
  actor.stop();

  return isPurchaseStatus(value) ? value : null;
}

/**
 * Helper: Valida si una transición es válida según la máquina de estados
 */
export function isValidTransition(from: PurchaseStatus, to: PurchaseStatus): boolean {
  const type = EVENT_FOR_TARGET[to];
  if (!type) return false;
  return nextPurchaseStatus(from, { type }) === to;
}

/**
 * Lanza ConflictError INVALID_TRANSITION si `from → to` no está permitido.
 */
export function assertTransition(from: PurchaseStatus, to: PurchaseStatus): void {
  if (!isValidTransition(from, to)) {
    throw new ConflictError(
      'INVALID_TRANSITION',
      `Transición inválida de la compra: ${from} → ${to}`,
    );
  }
}

/**
 * Helper: Obtiene los eventos disponibles para un estado
 */
export function getAvailableEvents(state: PurchaseStatus): PurchaseEvent['type'][] {
  const snapshot = purchaseStateMachine.resolveState({ value: state, context: {} });
  const candidates: PurchaseEvent[] = [
    { type: 'COMPLETE' },
    { type: 'FAIL' },
    { type: 'REFUND' },
  ];
  return candidates.filter((event) => snapshot.can(event)).map((event) => event.type);
}
