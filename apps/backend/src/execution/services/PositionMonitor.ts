/**
 * Position Monitor
 * Marks open positions against the ticker and trails protective stops
 */

import type { Position } from '@bracket-trader/shared';
import { OrderValidationError, type TradingError, toTradingError } from '../../common/errors';
import { isMarkable } from '../../portfolio/pnl';
import type { PositionStore } from '../../portfolio/repositories/PositionRepository';
import type { ExchangeGateway } from '../exchange/ExchangeGateway';
import { type BracketOrderManager, isTighterStop } from './BracketOrderManager';

export interface MonitorResult {
  positionsMonitored: number;
  stopsAdjusted: number;
  errors: TradingError[];
}

/**
 * Stop implied by the trailing distance at `price`, or null when it would
 * not tighten the current stop
 */
export function trailingStopFor(position: Position, price: number): number | null {
  if (position.trailingStopDistance === null) {
    return null;
  }

  const candidate =
    position.side === 'LONG'
      ? price - position.trailingStopDistance
      : price + position.trailingStopDistance;

  return isTighterStop(position.side, position.stopLossPrice, candidate) ? candidate : null;
}

export class PositionMonitor {
  constructor(
    private readonly positions: PositionStore,
    private readonly exchange: ExchangeGateway,
    private readonly manager: BracketOrderManager
  ) {}

  async monitor(): Promise<MonitorResult> {
    const open = (await this.positions.findOpen()).filter(isMarkable);
    if (open.length === 0) {
      return { positionsMonitored: 0, stopsAdjusted: 0, errors: [] };
    }

    const pairs = [...new Set(open.map((position) => position.pairSymbol))];

    let prices: Map<string, number>;
    try {
      prices = await this.exchange.getTicker(pairs);
    } catch (error) {
      return { positionsMonitored: 0, stopsAdjusted: 0, errors: [toTradingError(error)] };
    }

    const errors: TradingError[] = [];
    const marked: Position[] = [];

    for (const position of open) {
      const price = prices.get(position.pairSymbol);
      if (price === undefined) {
        continue;
      }
      try {
        // Re-read under the position lock; a close may have landed since findOpen
        const updated = await this.manager.markPosition(position.id, price);
        if (updated) {
          marked.push(updated);
        }
      } catch (error) {
        errors.push(toTradingError(error));
      }
    }

    let stopsAdjusted = 0;

    for (const position of marked) {
      if (position.bracketState !== 'PROTECTED' || position.currentPrice === null) {
        continue;
      }

      const newStop = trailingStopFor(position, position.currentPrice);
      if (newStop === null) {
        continue;
      }

      const result = await this.manager.adjustStop(position.id, newStop);
      if (result.ok) {
        stopsAdjusted++;
      } else if (result.error instanceof OrderValidationError) {
        // Rounded to the same price tick
        // eslint-disable-next-line no-console
        console.log(`[PositionMonitor] ${result.error.message}`);
      } else {
        errors.push(result.error);
      }
    }

    return { positionsMonitored: marked.length, stopsAdjusted, errors };
  }
}
