/**
 * Respuesta de GET /books/:bookId/download
 */
export interface DownloadGrantDTO {
  downloadUrl: string;
  expiresIn: number; // segundos
  downloadsRemaining: number;
}

export function downloadLink(bookId: string, purchaseId: string): string {
  return `/downloads/${bookId}/${purchaseId}`;
}
