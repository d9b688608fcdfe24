import { z } from "zod";
import { InvalidInputError } from "./errors.js";

export const DEFAULT_PAGE_LIMIT = 25;

const IntegerParam = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number);

const PaginationQuerySchema = z.object({
  page: IntegerParam.optional(),
  limit: IntegerParam.pipe(z.number().int().min(1)).optional(),
});

export interface PaginationInput {
  page: number;
  limit: number;
}

/**
 * Reads `page` and `limit` from the query string. Pages outside the
 * result are clamped later; a malformed value or a limit below 1 is
 * rejected.
 */
export function readPagination(
  query: Readonly<Record<string, string>>,
  defaultLimit: number = DEFAULT_PAGE_LIMIT,
): PaginationInput {
  const result = PaginationQuerySchema.safeParse({
    page: query.page,
    limit: query.limit,
  });

  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.map(String).join(".")} ${issue.message}`)
      .join("; ");
    throw new InvalidInputError(`Invalid pagination parameters: ${detail}`);
  }

  return {
    page: result.data.page ?? 1,
    limit: result.data.limit ?? defaultLimit,
  };
}

export interface Page<T> {
  items: T[];
  page: number;
  limit: number;
  totalItems: number;
  lastPage: number;
}

/**
 * Slices one page out of `items`. `page` is clamped into
 * `[1, lastPage]`; an empty set still has a single, empty page.
 */
export function paginate<T>(items: readonly T[], page: number, limit: number): Page<T> {
  const totalItems = items.length;
  const lastPage = Math.max(1, Math.ceil(totalItems / limit));
  const current = Math.min(Math.max(page, 1), lastPage);
  const start = (current - 1) * limit;

  return {
    items: items.slice(start, start + limit),
    page: current,
    limit,
    totalItems,
    lastPage,
  };
}
