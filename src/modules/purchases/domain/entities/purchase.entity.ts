import { v4 as uuidv4 } from 'uuid';

export enum PurchaseStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  FAILED = 'failed',
  REFUNDED = 'refunded',
}

export const DEFAULT_MAX_DOWNLOADS = 5;

/**
 * Entidad: Purchase
 * Registro de compra de un libro. Nunca se borra; solo cambia de estado.
 */
export class Purchase {
  id: string;
  userId: string;
  bookId: string;
  purchasePrice: number; // snapshot del precio al comprar
  paymentMethod: string;
  status: PurchaseStatus;
  transactionId: string | null;
  downloadCount: number;
  maxDownloads: number;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<Purchase> = {}) {
    this.id = partial.id ?? uuidv4();
    this.userId = partial.userId ?? '';
    this.bookId = partial.bookId ?? '';
    this.purchasePrice = partial.purchasePrice ?? 0;
    this.paymentMethod = partial.paymentMethod ?? '';
    this.status = partial.status ?? PurchaseStatus.PENDING;
    this.transactionId = partial.transactionId ?? null;
    this.downloadCount = partial.downloadCount ?? 0;
    this.maxDownloads = partial.maxDownloads ?? DEFAULT_MAX_DOWNLOADS;
    this.createdAt = partial.createdAt ?? new Date();
    this.updatedAt = partial.updatedAt ?? new Date();
  }

  /**
   * Solo una compra completada da derecho a descarga.
   */
  grantsEntitlement(): boolean {
    return this.status === PurchaseStatus.COMPLETED;
  }

  downloadsRemaining(): number {
    return Math.max(this.maxDownloads - this.downloadCount, 0);
  }

  isFinal(): boolean {
    return [PurchaseStatus.FAILED, PurchaseStatus.REFUNDED].includes(this.status);
  }
}
