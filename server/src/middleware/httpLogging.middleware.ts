/**
 * HTTP Logging Middleware
 *
 * One log line per request and one per response, level chosen by status.
 * Query strings are never logged: `code` and `state` are credentials.
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.debug({
    method: req.method,
    path: req.path,
    event: 'http_request'
  }, 'HTTP request');

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      event: 'http_response'
    }, 'HTTP response');
  });

  next();
}
