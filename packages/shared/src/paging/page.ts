/**
 * packages/shared/src/paging/page.ts
 *
 * WHY:
 * - List endpoints on both services take the same `page`, `size`, `sort` query
 *   and answer with the same page envelope.
 *
 * RULES:
 * - `page` is 0-based.
 * - `sort` is `<field>[,asc|desc]`; the field must be one the module whitelists.
 * - Stores receive an already-validated PageQuery and return a PageSlice;
 *   the envelope (totalPages etc.) is computed here, once.
 */

import { z } from 'zod';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export type SortDirection = 'asc' | 'desc';

export type SortSpec<F extends string> = {
  field: F;
  direction: SortDirection;
};

export type PageQuery<F extends string> = {
  page: number;
  size: number;
  sort: SortSpec<F>;
};

export type PageSlice<T> = {
  items: T[];
  totalElements: number;
};

export type Page<T> = {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
};

function parseDirection(raw: string | undefined): SortDirection | null {
  if (raw === undefined || raw === '') return 'asc';
  const lowered = raw.toLowerCase();
  if (lowered === 'asc' || lowered === 'desc') return lowered;
  return null;
}

export function pageQuerySchema<F extends string>(sortFields: readonly [F, ...F[]]) {
  const isSortField = (value: string): value is F => sortFields.some((f) => f === value);
  const defaultSort: SortSpec<F> = { field: sortFields[0], direction: 'asc' };

  return z
    .object({
      page: z.coerce.number().int().min(0).default(0),
      size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
      sort: z.string().optional(),
    })
    .transform((q, ctx): PageQuery<F> => {
      if (q.sort === undefined || q.sort.trim() === '') {
        return { page: q.page, size: q.size, sort: defaultSort };
      }

      const [rawField = '', rawDirection] = q.sort.split(',').map((s) => s.trim());
      const direction = parseDirection(rawDirection);

      if (!isSortField(rawField) || direction === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sort'],
          message: `sort must be one of ${sortFields.join(', ')} optionally followed by ,asc or ,desc`,
        });
        return z.NEVER;
      }

      return { page: q.page, size: q.size, sort: { field: rawField, direction } };
    });
}

export function offsetOf(query: PageQuery<string>): number {
  return query.page * query.size;
}

export function toPage<T>(slice: PageSlice<T>, query: PageQuery<string>): Page<T> {
  return {
    content: slice.items,
    page: query.page,
    size: query.size,
    totalElements: slice.totalElements,
    totalPages: Math.ceil(slice.totalElements / query.size),
  };
}
