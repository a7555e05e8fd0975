/**
 * Pagination Constants
 *
 * Centralized pagination limits for all modules.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default number of records per page */
export const DEFAULT_PAGE_SIZE = 20;

/** Maximum allowed records per page */
export const MAX_PAGE_SIZE = 100;

/** Default offset for pagination */
export const DEFAULT_OFFSET = 0;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PageInfo {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface OffsetPage<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clamps a limit value to the allowed range.
 *
 * @example
 * clampLimit(undefined)    // Returns 20 (default)
 * clampLimit(50)           // Returns 50
 * clampLimit(500)          // Returns 100 (max)
 * clampLimit(-1)           // Returns 1 (min)
 */
export function clampLimit(
  limit: number | undefined | null,
  defaultValue: number = DEFAULT_PAGE_SIZE,
  maxValue: number = MAX_PAGE_SIZE
): number {
  if (limit === undefined || limit === null) {
    return defaultValue;
  }
  return Math.min(Math.max(1, Math.trunc(limit)), maxValue);
}

/**
 * Validates and clamps pagination parameters.
 */
export function normalizePagination(params: { limit?: number | null; offset?: number | null }): {
  limit: number;
  offset: number;
} {
  return {
    limit: clampLimit(params.limit),
    offset: Math.max(0, Math.trunc(params.offset ?? DEFAULT_OFFSET)),
  };
}

/**
 * Page-number metadata for a result set of `total` rows.
 */
export function buildPageInfo(params: { page: number; limit: number; total: number }): PageInfo {
  const { page, limit, total } = params;
  const totalPages = total === 0 ? 0 : Math.ceil(total / limit);

  return {
    page,
    limit,
    total,
    totalPages,
    hasNext: page < totalPages,
    hasPrev: page > 1,
  };
}
