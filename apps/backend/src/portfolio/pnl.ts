/**
 * Side-aware profit and loss helpers
 */

import type { OrderSide, Position, PositionSide, SignalDirection } from '@bracket-trader/shared';

export const AMOUNT_EPSILON = 1e-9;

export function calculatePnl(
  side: PositionSide,
  entryPrice: number,
  exitPrice: number,
  amount: number
): number {
  const perUnit = side === 'LONG' ? exitPrice - entryPrice : entryPrice - exitPrice;
  return perUnit * amount;
}

export function entrySide(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'BUY' : 'SELL';
}

/**
 * Side of the orders that reduce the position (stop, target, close)
 */
export function exitSide(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'SELL' : 'BUY';
}

export function positionSideFor(direction: SignalDirection): PositionSide | null {
  switch (direction) {
    case 'BUY':
    case 'STRONG_BUY':
      return 'LONG';
    case 'SELL':
    case 'STRONG_SELL':
      return 'SHORT';
    default:
      return null;
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Positions whose entry has filled and still carry inventory
 */
export function isMarkable(position: Position): boolean {
  return (
    position.isOpen &&
    (position.bracketState === 'ENTRY_FILLED' ||
      position.bracketState === 'PROTECTED' ||
      position.bracketState === 'CLOSING')
  );
}

export interface PositionMark {
  currentPrice: number;
  unrealizedPnl: number;
  maxFavorableExcursion: number;
  maxAdverseExcursion: number;
}

/**
 * Unrealized P&L at `price` on the remaining amount; excursions only widen
 */
export function markToPrice(position: Position, price: number): PositionMark {
  const unrealizedPnl = calculatePnl(
    position.side,
    position.entryPrice,
    price,
    position.remainingAmount
  );

  return {
    currentPrice: price,
    unrealizedPnl,
    maxFavorableExcursion: Math.max(position.maxFavorableExcursion, unrealizedPnl),
    maxAdverseExcursion: Math.min(position.maxAdverseExcursion, unrealizedPnl),
  };
}
