import { ConfigurationError } from '../errors/index.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 100;

export interface PaginationPolicy {
  readonly defaultPageSize: number;
  readonly maxPageSize: number;
}

export interface PaginationInfo {
  page: number;
  pageSize: number;
  total: number;
  pages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

/**
 * Normalized, request-scoped pagination input.
 * `page` is 1-based; `pageSize` is always within the policy's bounds.
 */
export interface PaginationParams {
  readonly page: number;
  readonly pageSize: number;
  /** Number of leading items to omit. */
  getSkip(): number;
  /** Maximum number of items to return. */
  getLimit(): number;
  getPaginationInfo(totalItems: number): PaginationInfo;
}

export const DEFAULT_PAGINATION_POLICY: PaginationPolicy = Object.freeze({
  defaultPageSize: DEFAULT_PAGE_SIZE,
  maxPageSize: MAX_PAGE_SIZE,
});

export function createPaginationPolicy(
  overrides: Partial<PaginationPolicy> = {},
): PaginationPolicy {
  const maxPageSize = overrides.maxPageSize ?? MAX_PAGE_SIZE;
  const defaultPageSize = overrides.defaultPageSize ?? Math.min(DEFAULT_PAGE_SIZE, maxPageSize);

  if (!Number.isInteger(maxPageSize) || maxPageSize < MIN_PAGE_SIZE) {
    throw new ConfigurationError(`maxPageSize must be an integer >= ${MIN_PAGE_SIZE}`);
  }
  if (
    !Number.isInteger(defaultPageSize) ||
    defaultPageSize < MIN_PAGE_SIZE ||
    defaultPageSize > maxPageSize
  ) {
    throw new ConfigurationError(
      `defaultPageSize must be an integer between ${MIN_PAGE_SIZE} and ${maxPageSize}`,
    );
  }

  return Object.freeze({ defaultPageSize, maxPageSize });
}

// NaN counts as absent; magnitudes saturate at the safe-integer range and
// fractions truncate toward zero.
const toInteger = (value: number | null | undefined): number | undefined => {
  if (value === null || value === undefined || Number.isNaN(value)) {
    return undefined;
  }
  return Math.trunc(
    Math.min(Number.MAX_SAFE_INTEGER, Math.max(Number.MIN_SAFE_INTEGER, value)),
  );
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

function createParams(page: number, pageSize: number): PaginationParams {
  return Object.freeze({
    page,
    pageSize,
    getSkip: () => (page - 1) * pageSize,
    getLimit: () => pageSize,
    getPaginationInfo: (totalItems: number): PaginationInfo => {
      const pages = totalItems > 0 ? Math.floor((totalItems + pageSize - 1) / pageSize) : 0;
      return {
        page,
        pageSize,
        total: totalItems,
        pages,
        hasNext: page < pages,
        hasPrev: page > 1,
      };
    },
  });
}

/**
 * Clamps raw page input into valid bounds. Never throws: absent values take the
 * defaults, out-of-range values take the nearest bound.
 */
export function normalizePagination(
  rawPage?: number | null,
  rawPageSize?: number | null,
  policy: PaginationPolicy = DEFAULT_PAGINATION_POLICY,
): PaginationParams {
  const page = Math.max(DEFAULT_PAGE, toInteger(rawPage) ?? DEFAULT_PAGE);
  const pageSize = clamp(
    toInteger(rawPageSize) ?? policy.defaultPageSize,
    MIN_PAGE_SIZE,
    policy.maxPageSize,
  );

  return createParams(page, pageSize);
}
