/**
 * Result values for operations whose failures callers branch on
 */

import type { TradingError } from './errors';

export type Result<T, E = TradingError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
