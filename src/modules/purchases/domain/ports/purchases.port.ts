import type { Purchase, PurchaseStatus } from '../entities/purchase.entity';

export interface PurchaseTransitionUpdates {
  transactionId?: string;
}

/**
 * Puerto: persistencia de compras
 * Implementación: MongoDB adapter
 */
export interface IPurchasesRepository {
  create(purchase: Purchase): Promise<Purchase>;

  findById(id: string): Promise<Purchase | null>;

  /**
   * La compra completada de (userId, bookId), si existe. A lo sumo hay una.
   */
  findCompleted(userId: string, bookId: string): Promise<Purchase | null>;

  /**
   * Historial del usuario, más reciente primero.
   */
  findByUserId(userId: string, status?: PurchaseStatus): Promise<Purchase[]>;

  /**
   * Compare-and-set sobre `status`: solo aplica si el estado actual es `from`.
   * Retorna null si el estado ya no es `from`.
   * Violación del índice único → ConflictError ALREADY_OWNED.
   */
  transition(
    id: string,
    from: PurchaseStatus,
    to: PurchaseStatus,
    updates?: PurchaseTransitionUpdates,
  ): Promise<Purchase | null>;

  /**
   * Consume una descarga de forma atómica.
   * Retorna null si la compra no está completada o ya alcanzó maxDownloads.
   */
  incrementDownloadCount(id: string): Promise<Purchase | null>;
}
