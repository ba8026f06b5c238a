import type { PaginationMeta } from '../types/common.types';

/**
 * Metadatos de paginación de un listado. `page` y `limit` llegan ya
 * normalizados por el servicio (page >= 1, 1 <= limit <= máximo).
 */
export function createPaginationMeta(
  total: number,
  page: number,
  limit: number,
): PaginationMeta {
  const totalPages = Math.ceil(total / limit);
  const hasMore = page < totalPages;

  return {
    page,
    limit,
    total,
    totalPages,
    hasMore,
    nextPage: hasMore ? page + 1 : null,
    prevPage: page > 1 ? page - 1 : null,
  };
}
