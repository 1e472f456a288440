export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

export type SortOrder = 'ASC' | 'DESC';

export interface PaginationOptions {
  page?: number;
  limit?: number;
  sortBy?: string;
  sortOrder?: SortOrder;
}

export interface PaginatedResult<T> {
  total: number;
  page: number;
  limit: number;
  data: T[];
}

export interface ResolvedPagination {
  page: number;
  limit: number;
  offset: number;
  order: [string, SortOrder][];
}

/**
 * Clamps page/limit and resolves the sort column against an allow-list.
 * Unknown sort fields fall back to `createdAt`.
 */
export const resolvePagination = (
  options: PaginationOptions = {},
  sortable: readonly string[] = ['createdAt'],
): ResolvedPagination => {
  const rawPage = Number(options.page);
  const rawLimit = Number(options.limit);
  const page = Number.isFinite(rawPage) && rawPage >= 1 ? Math.floor(rawPage) : DEFAULT_PAGE;
  const limit = Number.isFinite(rawLimit) && rawLimit >= 1 ? Math.min(MAX_LIMIT, Math.floor(rawLimit)) : DEFAULT_LIMIT;

  const sortBy = options.sortBy && sortable.includes(options.sortBy) ? options.sortBy : 'createdAt';
  const sortOrder: SortOrder = options.sortOrder === 'ASC' ? 'ASC' : 'DESC';

  return {
    page,
    limit,
    offset: (page - 1) * limit,
    order: [[sortBy, sortOrder], ['id', sortOrder]],
  };
};

export const toPage = <T>(
  rows: T[],
  total: number,
  pagination: Pick<ResolvedPagination, 'page' | 'limit'>,
): PaginatedResult<T> => ({
  total,
  page: pagination.page,
  limit: pagination.limit,
  data: rows,
});
