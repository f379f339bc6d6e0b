/**
 * Error Handling Middleware
 * Maps trading errors to HTTP statuses in the { error, message } format
 */

import type { ApiError } from '@bracket-trader/shared';
import type { NextFunction, Request, Response } from 'express';
import { TradingError, type TradingErrorCode } from '../../common/errors';
import { errorCounter } from '../../monitoring/metrics';

const STATUS_BY_CODE: Record<TradingErrorCode, number> = {
  NOT_FOUND: 404,
  ORDER_VALIDATION_FAILED: 400,
  INVALID_BRACKET_TRANSITION: 409,
  EXCHANGE_REJECTED: 422,
  TRANSPORT_ERROR: 503,
  INVARIANT_VIOLATION: 500,
  UNPROTECTED_POSITION: 500,
};

/**
 * Thrown by route handlers for malformed requests
 */
export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export function statusForError(error: TradingError): number {
  return STATUS_BY_CODE[error.code];
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiError = {
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  };
  res.status(404).json(body);
}

export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  // Avoid sending headers twice
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof RequestValidationError) {
    const body: ApiError = { error: 'INVALID_REQUEST', message: err.message };
    res.status(400).json(body);
    return;
  }

  if (err instanceof TradingError) {
    errorCounter.inc({ type: err.code, service: 'api' });
    const body: ApiError = { error: err.code, message: err.message };
    if (err.details) {
      body.details = err.details;
    }
    res.status(statusForError(err)).json(body);
    return;
  }

  errorCounter.inc({ type: 'INTERNAL', service: 'api' });
  // eslint-disable-next-line no-console
  console.error('[API] Unhandled error:', err);

  res.status(500).json({
    error: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
  });
}
