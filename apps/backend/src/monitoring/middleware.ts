/**
 * Metrics Middleware
 * Counts and times HTTP requests by route pattern
 */

import type { NextFunction, Request, Response } from 'express';
import { httpRequestCounter, httpRequestDuration } from './metrics';

/**
 * Route pattern (/api/v1/positions/:id/close) rather than the concrete path
 */
function routeLabel(req: Request): string {
  const pattern: unknown = req.route?.path;
  return typeof pattern === 'string' ? `${req.baseUrl}${pattern}` : 'unmatched';
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const route = routeLabel(req);
    httpRequestCounter.inc({ method: req.method, route, status_code: String(res.statusCode) });
    endTimer({ method: req.method, route });
  });

  next();
}
