import type { BookDTO } from '../../books/dto/book.dto';
import type { Purchase, PurchaseStatus } from '../domain/entities/purchase.entity';

export interface PurchaseDTO {
  id: string;
  bookId: string;
  purchasePrice: number;
  paymentMethod: string;
  status: PurchaseStatus;
  transactionId: string | null;
  downloadCount: number;
  maxDownloads: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Respuesta de POST /purchase
 */
export interface PurchaseResultDTO {
  purchaseId: string;
  status: PurchaseStatus;
  bookId: string;
  purchasePrice: number;
  transactionId: string | null;
  downloadUrl: string;
}

/**
 * Libro comprado junto con los contadores de su compra.
 */
export interface PurchasedBookDTO {
  purchaseId: string;
  purchasedAt: Date;
  purchasePrice: number;
  downloadCount: number;
  downloadsRemaining: number;
  book: BookDTO;
}

/**
 * Respuesta de GET /books/check-ownership/:bookId
 */
export interface BookOwnershipDTO {
  bookId: string;
  owned: boolean;
}

export function toPurchaseDTO(purchase: Purchase): PurchaseDTO {
  return {
    id: purchase.id,
    bookId: purchase.bookId,
    purchasePrice: purchase.purchasePrice,
    paymentMethod: purchase.paymentMethod,
    status: purchase.status,
    transactionId: purchase.transactionId,
    downloadCount: purchase.downloadCount,
    maxDownloads: purchase.maxDownloads,
    createdAt: purchase.createdAt,
    updatedAt: purchase.updatedAt,
  };
}

export function downloadReference(bookId: string): string {
  return `/books/${bookId}/download`;
}
