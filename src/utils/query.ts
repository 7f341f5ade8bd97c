// src/utils/query.ts
/** Shared list-endpoint plumbing: page/limit parsing, `ordering=-field` parsing, page envelope. */
import { z } from "zod";

export type Page<T> = { page: number; limit: number; hasMore: boolean; items: T[] };

export type SortSpec<F extends string> = { field: F; direction: 1 | -1 };

export const PageQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(50).default(20),
});

/**
 * Zod schema for an `ordering` query param over `fields` (API name -> record field).
 * Accepts "price" or "-price"; falls back to `fallback` when absent.
 */
export function orderingParam<F extends string>(fields: { [name: string]: F }, fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((v, ctx): SortSpec<F> => {
      const descending = v.startsWith("-");
      const name = descending ? v.slice(1) : v;
      if (!Object.hasOwn(fields, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `ordering must be one of: ${Object.keys(fields).join(", ")} (prefix with - for descending)`,
        });
        return z.NEVER;
      }
      return { field: fields[name], direction: descending ? -1 : 1 };
    });
}

/** Fetch-one-extra pagination helper: callers pass up to `limit + 1` rows. */
export function toPage<T>(rows: T[], page: number, limit: number): Page<T> {
  const hasMore = rows.length > limit;
  return { page, limit, hasMore, items: hasMore ? rows.slice(0, limit) : rows };
}

export function skipFor(page: number, limit: number): number {
  return (page - 1) * limit;
}

/** `:id` route param: 24-hex ObjectId string. */
export const IdParam = z.object({ id: z.string().regex(/^[0-9a-f]{24}$/i, "Invalid id") });
