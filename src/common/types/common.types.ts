export type SortOrder = 'asc' | 'desc';

/**
 * Metadatos de paginación que viajan en `meta.pagination`.
 */
export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  nextPage: number | null;
  prevPage: number | null;
  hasMore: boolean;
}

/**
 * Parámetros de listado que entiende buildMongoQuery.
 * `filters` agrupa los filtros de igualdad propios de cada colección.
 */
export interface QueryParams<F = Record<string, unknown>> {
  page?: number;
  limit?: number;
  search?: string;
  sortBy?: string;
  sortOrder?: SortOrder;
  filters?: F;
}
