/**
 * HTTP Logging Middleware
 *
 * - One log line per request (method, path, query)
 * - One log line per response (status, duration)
 * - Log level follows the status code
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    method: req.method,
    path: req.path,
    query: req.query
  }, 'HTTP request');

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error'
      : res.statusCode >= 400 ? 'warn'
        : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    }, 'HTTP response');
  });

  next();
}
