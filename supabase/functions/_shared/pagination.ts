/**
 * Pagination Utilities
 *
 * Page-number pagination that fetches one row beyond the page to learn
 * whether another page exists, without counting the whole set.
 */

export interface PageRequest {
  /** 1-based page number */
  page: number;
  /** Rows per page (1..100) */
  perPage: number;
}

export interface PageResult<T> {
  items: T[];
  hasMore: boolean;
}

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;

function toInt(value: number | string | undefined): number {
  if (value === undefined) return Number.NaN;
  return typeof value === "string" ? parseInt(value, 10) : Math.trunc(value);
}

/**
 * Clamp a per-page value into 1..max, falling back to the default.
 */
export function normalizePerPage(
  perPage?: number | string,
  fallback: number = DEFAULT_PER_PAGE,
  max: number = MAX_PER_PAGE,
): number {
  const parsed = toInt(perPage);
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(Math.max(parsed, 1), max);
}

export function normalizePage(page?: number | string): number {
  const parsed = toInt(page);
  if (Number.isNaN(parsed) || parsed < 1) return 1;
  return parsed;
}

export function normalizePageRequest(page?: number | string, perPage?: number | string): PageRequest {
  return { page: normalizePage(page), perPage: normalizePerPage(perPage) };
}

/**
 * Inclusive row range for a page, one row longer than the page itself.
 *
 * @example
 * ```typescript
 * const { from, to } = pageRange({ page: 2, perPage: 20 });
 * // from = 20, to = 40 (21 rows)
 * query.range(from, to);
 * ```
 */
export function pageRange(request: PageRequest): { from: number; to: number } {
  const from = (request.page - 1) * request.perPage;
  return { from, to: from + request.perPage };
}

/**
 * Trim the look-ahead row off a fetched page.
 */
export function processPageResult<T>(rows: T[], perPage: number): PageResult<T> {
  const hasMore = rows.length > perPage;
  return { items: hasMore ? rows.slice(0, perPage) : rows, hasMore };
}
