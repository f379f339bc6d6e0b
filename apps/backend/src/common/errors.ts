/**
 * Trading Errors
 * Typed failures shared by the exchange adapter, bracket manager and scheduler
 */

import type { RiskSeverity } from '@bracket-trader/shared';

export type TradingErrorCode =
  | 'TRANSPORT_ERROR'
  | 'EXCHANGE_REJECTED'
  | 'ORDER_VALIDATION_FAILED'
  | 'INVALID_BRACKET_TRANSITION'
  | 'INVARIANT_VIOLATION'
  | 'UNPROTECTED_POSITION'
  | 'NOT_FOUND';

export class TradingError extends Error {
  constructor(
    message: string,
    public readonly code: TradingErrorCode,
    public readonly severity: RiskSeverity = 'MEDIUM',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TradingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Network failure, timeout, open circuit or exchange overload.
 * Retried on the next scheduled tick, never in a tight loop.
 */
export class TransportError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', 'MEDIUM', details);
    this.name = 'TransportError';
  }
}

/**
 * Exchange refused the request (invalid order, insufficient funds, unknown order)
 */
export class ExchangeRejectionError extends TradingError {
  constructor(
    message: string,
    public readonly exchangeErrors: string[] = []
  ) {
    super(message, 'EXCHANGE_REJECTED', 'MEDIUM', { exchangeErrors });
    this.name = 'ExchangeRejectionError';
  }
}

export class OrderValidationError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ORDER_VALIDATION_FAILED', 'LOW', details);
    this.name = 'OrderValidationError';
  }
}

export class BracketStateError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_BRACKET_TRANSITION', 'MEDIUM', details);
    this.name = 'BracketStateError';
  }
}

export class InvariantViolationError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', 'HIGH', details);
    this.name = 'InvariantViolationError';
  }
}

/**
 * A filled position without a live stop-loss and take-profit pair.
 * Retried by every reconciliation until both children are live.
 */
export class UnprotectedPositionError extends TradingError {
  constructor(
    public readonly positionId: string,
    public readonly failures: string[]
  ) {
    super(
      `Position ${positionId} is unprotected: ${failures.join('; ')}`,
      'UNPROTECTED_POSITION',
      'HIGH',
      { positionId, failures }
    );
    this.name = 'UnprotectedPositionError';
  }
}

export class NotFoundError extends TradingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 'LOW', details);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown throwable; anything not already typed is treated as transport-level
 */
export function toTradingError(error: unknown): TradingError {
  if (error instanceof TradingError) {
    return error;
  }
  return new TransportError(errorMessage(error));
}

/**
 * Render an error for the cycle result error list
 */
export function describeError(context: string, error: unknown): string {
  const tradingError = toTradingError(error);
  return `[${tradingError.severity}] ${context}: ${tradingError.message}`;
}
