/**
 * Request Validation Middleware
 */

import type { NextFunction, Request, Response } from 'express';

/**
 * A POST that carries a body must send it as JSON; an empty POST is allowed
 */
export function validateContentType(req: Request, res: Response, next: NextFunction): void {
  if (req.method !== 'POST') {
    next();
    return;
  }

  const length = parseInt(req.headers['content-length'] || '0', 10);
  const contentType = req.headers['content-type'];

  if (length > 0 && (!contentType || !contentType.includes('application/json'))) {
    res.status(415).json({
      error: 'UNSUPPORTED_MEDIA_TYPE',
      message: 'Content-Type must be application/json for POST requests with a body',
    });
    return;
  }

  next();
}
