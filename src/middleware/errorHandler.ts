import type { Request, Response, NextFunction } from 'express';
import { AppError, NotFoundError } from '../errors/index.js';
import { errorResponse } from '../lib/responses.js';
import { logger } from '../logger.js';

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new NotFoundError('Route not found', `${req.method} ${req.path}`));
};

export const errorHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
): void => {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error(`${err.name}: ${err.message}`);
    } else {
      logger.warn(`${err.name}: ${err.message}`);
    }
    res.status(err.statusCode).json(errorResponse(err.message, err.detail, err.code));
    return;
  }

  logger.error('Unhandled error:', err);
  res.status(500).json(errorResponse('Internal server error', undefined, 'INTERNAL_ERROR'));
};
