/**
 * Error Handling Middleware
 *
 * Maps errors to { error, detail }:
 * - RestaurantSearchError -> its own status and category
 * - malformed JSON body    -> 400
 * - anything else          -> 500 with a fixed, non-leaking detail
 */

import type { Request, Response, NextFunction } from 'express';
import type { ApiErrorBody } from '@api';
import { isRestaurantSearchError } from '../lib/errors/search-errors.js';
import { requestLogger } from './requestContext.middleware.js';

const INTERNAL_ERROR_DETAIL = 'An unexpected error occurred';

function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export function toErrorResponse(err: unknown): { status: number; body: ApiErrorBody } {
  if (isRestaurantSearchError(err)) {
    return { status: err.statusCode, body: { error: err.category, detail: err.message } };
  }

  if (isBodyParserError(err)) {
    return { status: err.status, body: { error: 'Validation error', detail: err.message } };
  }

  return { status: 500, body: { error: 'Internal server error', detail: INTERNAL_ERROR_DETAIL } };
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiErrorBody = { error: 'Not found', detail: `No route for ${req.method} ${req.path}` };
  res.status(404).json(body);
}

export function errorHandlerMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = toErrorResponse(err);
  const error = err instanceof Error ? { name: err.name, message: err.message } : { message: String(err) };

  const log = requestLogger(req);
  if (status >= 500) {
    log.error({ event: 'request_failed', statusCode: status, category: body.error, error }, '[HTTP] Request failed');
  } else {
    log.warn({ event: 'request_rejected', statusCode: status, category: body.error, error }, '[HTTP] Request rejected');
  }

  res.status(status).json(body);
}
