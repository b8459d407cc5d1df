import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../logger.js';

const REQUEST_ID_HEADER = 'x-request-id';

export interface RequestIdLocals {
  requestId?: string;
}

/**
 * Reuses the caller's `x-request-id` when present, otherwise mints one, and runs the
 * rest of the chain inside that request's logging context.
 */
export const requestIdMiddleware = (
  req: Request,
  res: Response<unknown, RequestIdLocals>,
  next: NextFunction
): void => {
  const headerValue = req.header(REQUEST_ID_HEADER)?.trim();
  const requestId = headerValue?.length ? headerValue : uuidv4();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  runWithRequestContext({ requestId }, () => next());
};
