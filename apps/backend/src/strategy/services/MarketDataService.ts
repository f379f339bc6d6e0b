/**
 * Market Data Service
 * Pulls OHLC bars for every active pair and keeps the latest indicator snapshot current
 */

import type { TradingPair } from '@bracket-trader/shared';
import { type TradingError, toTradingError } from '../../common/errors';
import type { ExchangeGateway } from '../../execution/exchange/ExchangeGateway';
import { MIN_HISTORY_BARS, computeIndicatorSnapshot } from '../indicators/technical';
import type { PairStore } from '../repositories/PairRepository';
import type { PriceBarStore } from '../repositories/PriceBarRepository';

/**
 * Only the newest candles of each OHLC response are stored
 */
export const CANDLES_PER_REFRESH = 10;

/**
 * Bars loaded for indicator and signal computation
 */
export const HISTORY_WINDOW = 100;

export interface PairRefreshFailure {
  pairSymbol: string;
  error: TradingError;
}

export interface MarketDataRefreshResult {
  pairsRefreshed: number;
  barsInserted: number;
  snapshotsUpdated: number;
  failures: PairRefreshFailure[];
}

interface PairRefresh {
  barsInserted: number;
  snapshotUpdated: boolean;
}

export class MarketDataService {
  constructor(
    private readonly pairs: PairStore,
    private readonly priceBars: PriceBarStore,
    private readonly exchange: ExchangeGateway,
    private readonly intervalMinutes = 1
  ) {}

  /**
   * Refresh every active pair; one pair failing does not affect the others
   */
  async refreshAll(): Promise<MarketDataRefreshResult> {
    const pairs = await this.pairs.findAll(true);
    const settled = await Promise.allSettled(pairs.map((pair) => this.refreshPair(pair)));

    const result: MarketDataRefreshResult = {
      pairsRefreshed: 0,
      barsInserted: 0,
      snapshotsUpdated: 0,
      failures: [],
    };

    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        result.pairsRefreshed++;
        result.barsInserted += outcome.value.barsInserted;
        if (outcome.value.snapshotUpdated) {
          result.snapshotsUpdated++;
        }
        return;
      }

      const error = toTradingError(outcome.reason);
      result.failures.push({ pairSymbol: pairs[i].symbol, error });
      // eslint-disable-next-line no-console
      console.error(`[MarketData] Refresh of ${pairs[i].symbol} failed:`, error.message);
    });

    return result;
  }

  private async refreshPair(pair: TradingPair): Promise<PairRefresh> {
    const candles = await this.exchange.getOHLC(pair.symbol, this.intervalMinutes);

    let barsInserted = 0;
    for (const candle of candles.slice(-CANDLES_PER_REFRESH)) {
      const inserted = await this.priceBars.insertIfAbsent({ pairSymbol: pair.symbol, ...candle });
      if (inserted) {
        barsInserted++;
      }
    }

    const history = await this.priceBars.findRecent(pair.symbol, HISTORY_WINDOW);
    const latest = history[history.length - 1];
    if (!latest || history.length < MIN_HISTORY_BARS) {
      return { barsInserted, snapshotUpdated: false };
    }

    const snapshot = computeIndicatorSnapshot(history.map((bar) => bar.close));
    if (!snapshot) {
      return { barsInserted, snapshotUpdated: false };
    }

    await this.priceBars.updateIndicators(latest.id, snapshot);
    return { barsInserted, snapshotUpdated: true };
  }
}
