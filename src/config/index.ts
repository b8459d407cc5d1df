/**
 * Application Configuration
 *
 * Reads server, logging and pagination settings from environment variables
 */

import { ConfigurationError } from '../errors/index.js';
import { createPaginationPolicy, type PaginationPolicy } from '../lib/pagination.js';
import { isLogLevel, type LogLevel } from '../logger.js';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  pagination: PaginationPolicy;
  strictPagination: boolean;
}

type Env = Record<string, string | undefined>;

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (raw !== 'true' && raw !== 'false') {
    throw new ConfigurationError(`${name} must be true or false, got "${raw}"`);
  }
  return raw === 'true';
}

function readInteger(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/**
 * Builds configuration from the given environment (defaults to process.env)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error`);
  }

  return {
    port: readInteger(env, 'PORT') ?? 3000,
    logLevel,
    pagination: createPaginationPolicy({
      defaultPageSize: readInteger(env, 'PAGINATION_DEFAULT_PAGE_SIZE'),
      maxPageSize: readInteger(env, 'PAGINATION_MAX_PAGE_SIZE'),
    }),
    strictPagination: readBoolean(env, 'PAGINATION_STRICT') ?? false,
  };
}
