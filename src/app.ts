import express from 'express';

import { DEFAULT_PAGINATION_POLICY, type PaginationPolicy } from './lib/pagination.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { InMemoryUserRepository, type UserRepository } from './repositories/userRepository.js';
import { createUserRouter } from './routes/users.js';

interface AppDependencies {
  userRepository: UserRepository;
  paginationPolicy: PaginationPolicy;
  /** Reject malformed `page` / `page_size` values instead of using defaults. */
  strictPagination: boolean;
}

export const createApp = (dependencies?: Partial<AppDependencies>) => {
  const app = express();
  const userRepository = dependencies?.userRepository ?? new InMemoryUserRepository();

  app.use(requestIdMiddleware);
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', service: 'pagewise-api' });
  });

  app.use(
    '/api/users',
    createUserRouter({
      userRepository,
      pagination: {
        policy: dependencies?.paginationPolicy ?? DEFAULT_PAGINATION_POLICY,
        strict: dependencies?.strictPagination ?? false,
      },
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};
