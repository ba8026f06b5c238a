import { FilterQuery, SortOrder as MongoSortOrder } from 'mongoose';

import { QueryParams } from '../types/common.types';

export interface MongoQuery<T> {
  mongoFilter: FilterQuery<T>;
  options: {
    limit: number;
    skip: number;
    sort: Record<string, MongoSortOrder>;
  };
}

export function buildMongoQuery<T, F extends Record<string, unknown>>(
  params: QueryParams<F>,
  searchFields: string[] = [],
  defaultSortField = 'createdAt',
): MongoQuery<T> {
  const {
    page = 1,
    limit = 10,
    sortBy,
    sortOrder = 'desc',
    search,
    filters,
  } = params;

  // 1. Filtros base, descartando los vacíos
  const mongoFilter: FilterQuery<T> = {};
  Object.entries(filters ?? {}).forEach(([key, value]) => {
    if (value !== undefined && value !== null && value !== '') {
      Object.assign(mongoFilter, { [key]: value });
    }
  });

  // 2. Búsqueda global (regex escapado, case-insensitive)
  if (search && searchFields.length > 0) {
    const pattern = escapeRegex(search);
    Object.assign(mongoFilter, {
      $or: searchFields.map((field) => ({
        [field]: { $regex: pattern, $options: 'i' },
      })),
    });
  }

  const direction: MongoSortOrder = sortOrder === 'asc' ? 1 : -1;

  return {
    mongoFilter,
    options: {
      limit: Number(limit),
      skip: (Number(page) - 1) * Number(limit),
      sort: { [sortBy ?? defaultSortField]: direction },
    },
  };
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
