import { BadRequestError } from '../errors/index.js';
import {
  DEFAULT_PAGINATION_POLICY,
  normalizePagination,
  type PaginationParams,
  type PaginationPolicy,
} from './pagination.js';

export interface PageQueryOptions {
  /** Reject present-but-malformed values with a 400 instead of falling back to defaults. */
  strict?: boolean;
  policy?: PaginationPolicy;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

const readInteger = (
  query: Record<string, unknown>,
  names: readonly string[],
  strict: boolean,
): number | undefined => {
  for (const name of names) {
    const raw = query[name];
    if (raw === undefined) {
      continue;
    }

    const text = typeof raw === 'string' ? raw.trim() : undefined;
    if (text !== undefined && INTEGER_PATTERN.test(text)) {
      return Number(text);
    }
    if (strict) {
      throw new BadRequestError('Invalid pagination parameter', `${name} must be an integer`);
    }
    return undefined;
  }
  return undefined;
};

/**
 * Reads `page` and `page_size` (or `pageSize`) from a parsed query string and
 * normalizes them.
 */
export function parsePageQuery(
  query: Record<string, unknown>,
  options: PageQueryOptions = {},
): PaginationParams {
  const strict = options.strict ?? false;
  const page = readInteger(query, ['page'], strict);
  const pageSize = readInteger(query, ['page_size', 'pageSize'], strict);

  return normalizePagination(page, pageSize, options.policy ?? DEFAULT_PAGINATION_POLICY);
}
