import { Router, type Request, type Response, type NextFunction } from 'express';
import { BadRequestError } from '../errors/index.js';
import { parsePageQuery, type PageQueryOptions } from '../lib/pageQuery.js';
import { logger } from '../logger.js';
import { fetchPage } from '../repositories/pageSource.js';
import type { UserFilters, UserRepository } from '../repositories/userRepository.js';

interface UserRouterDependencies {
  userRepository: UserRepository;
  pagination?: PageQueryOptions;
}

const readString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const readBoolean = (value: unknown, name: string): boolean | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw new BadRequestError('Invalid filter', `${name} must be true or false`);
};

export function parseUserFilters(query: Record<string, unknown>): UserFilters {
  const filters: UserFilters = {};

  const username = readString(query.username);
  if (username) filters.username = username;

  const email = readString(query.email);
  if (email) filters.email = email;

  const role = readString(query.role);
  if (role) filters.role = role;

  const isAdmin = readBoolean(query.is_admin, 'is_admin');
  if (isAdmin !== undefined) filters.isAdmin = isAdmin;

  const active = readBoolean(query.active, 'active');
  if (active !== undefined) filters.active = active;

  return filters;
}

export function createUserRouter(deps: UserRouterDependencies): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = parsePageQuery(req.query, deps.pagination);
      const filters = parseUserFilters(req.query);
      logger.info(
        `Listing users page=${params.page} pageSize=${params.pageSize} filters=${JSON.stringify(filters)}`
      );

      res.json(await fetchPage(deps.userRepository, params, filters));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
