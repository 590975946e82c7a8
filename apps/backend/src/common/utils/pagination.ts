import { pagination } from '../constants/app.constants';

export interface PaginationMeta {
  total: number;
  page: number;
  limit: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface Paginated<T> {
  data: T[];
  meta: PaginationMeta;
}

export interface PageWindow {
  page: number;
  limit: number;
  offset: number;
}

export const resolvePage = (query: {
  page?: number;
  limit?: number;
}): PageWindow => {
  const page = query.page ?? pagination.DEFAULT_PAGE;
  const limit = query.limit ?? pagination.DEFAULT_LIMIT;
  return { page, limit, offset: (page - 1) * limit };
};

export const toPaginated = <T>(
  data: T[],
  total: number,
  { page, limit }: PageWindow,
): Paginated<T> => {
  const totalPages = Math.ceil(total / limit);
  return {
    data,
    meta: {
      total,
      page,
      limit,
      totalPages,
      hasNext: page < totalPages,
      hasPrev: page > 1,
    },
  };
};

// Escapes LIKE wildcards so user input matches literally (paired with ESCAPE '\')
export const likePattern = (term: string): string =>
  `%${term.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
