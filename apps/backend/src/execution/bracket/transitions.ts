/**
 * Bracket and Order Transitions
 *
 * Bracket lifecycle:
 *   SIGNALED → ENTRY_PLACED → ENTRY_FILLED → PROTECTED → CLOSED
 *                                  ↑   ↓         ↓
 *                                  └ CLOSING ←───┘
 *   CANCELED is reachable from every state before CLOSED.
 *   PROTECTED → ENTRY_FILLED when a protective order is lost.
 *
 * Order lifecycle: PENDING → OPEN → CLOSED | CANCELED | EXPIRED
 */

import type { BracketState, OrderStatus } from '@bracket-trader/shared';
import { BracketStateError } from '../../common/errors';

const BRACKET_TRANSITIONS: Record<BracketState, BracketState[]> = {
  SIGNALED: ['ENTRY_PLACED', 'CANCELED'],
  ENTRY_PLACED: ['ENTRY_FILLED', 'CANCELED'],
  ENTRY_FILLED: ['PROTECTED', 'CLOSING', 'CLOSED', 'CANCELED'],
  PROTECTED: ['ENTRY_FILLED', 'CLOSING', 'CLOSED', 'CANCELED'],
  CLOSING: ['ENTRY_FILLED', 'CLOSED', 'CANCELED'],
  CLOSED: [], // Final state
  CANCELED: [], // Final state
};

const ORDER_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  PENDING: ['OPEN', 'CLOSED', 'CANCELED', 'EXPIRED'],
  OPEN: ['CLOSED', 'CANCELED', 'EXPIRED'],
  CLOSED: [],
  CANCELED: [],
  EXPIRED: [],
};

export const LIVE_ORDER_STATUSES: readonly OrderStatus[] = ['PENDING', 'OPEN'];

export function isValidBracketTransition(from: BracketState, to: BracketState): boolean {
  return BRACKET_TRANSITIONS[from].includes(to);
}

export function assertBracketTransition(
  positionId: string,
  from: BracketState,
  to: BracketState
): void {
  if (!isValidBracketTransition(from, to)) {
    throw new BracketStateError(`Invalid bracket transition: ${from} → ${to}`, {
      positionId,
      from,
      to,
    });
  }
}

/**
 * Same-status reports are not transitions and are always accepted
 */
export function isValidOrderTransition(from: OrderStatus, to: OrderStatus): boolean {
  return from === to || ORDER_TRANSITIONS[from].includes(to);
}

export function isLiveOrderStatus(status: OrderStatus): boolean {
  return LIVE_ORDER_STATUSES.includes(status);
}

export function isFinalBracketState(state: BracketState): boolean {
  return BRACKET_TRANSITIONS[state].length === 0;
}
