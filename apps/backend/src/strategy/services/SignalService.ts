/**
 * Signal Service
 * Runs the signal generator over stored bars and persists the candidates
 */

import type { TradingSignal } from '@bracket-trader/shared';
import { toTradingError } from '../../common/errors';
import { signalCounter } from '../../monitoring/metrics';
import type { PairStore } from '../repositories/PairRepository';
import type { PriceBarStore } from '../repositories/PriceBarRepository';
import type { SignalStore } from '../repositories/SignalRepository';
import type { SignalGenerator } from '../signals/SignalGenerator';
import { HISTORY_WINDOW, type PairRefreshFailure } from './MarketDataService';

export interface SignalGenerationResult {
  signals: TradingSignal[];
  expired: number;
  failures: PairRefreshFailure[];
}

export class SignalService {
  constructor(
    private readonly pairs: PairStore,
    private readonly priceBars: PriceBarStore,
    private readonly signals: SignalStore,
    private readonly generator: SignalGenerator
  ) {}

  /**
   * Expire stale signals, then evaluate every active pair once
   */
  async generateSignals(now: Date = new Date()): Promise<SignalGenerationResult> {
    const expired = await this.signals.deactivateExpired(now);
    const pairs = await this.pairs.findAll(true);
    const created: TradingSignal[] = [];
    const failures: PairRefreshFailure[] = [];

    for (const pair of pairs) {
      try {
        const bars = await this.priceBars.findRecent(pair.symbol, HISTORY_WINDOW);
        const candidate = this.generator.generateSignal(pair.symbol, bars, now);
        if (!candidate) {
          continue;
        }

        const signal = await this.signals.create(candidate);
        signalCounter.inc({ pair: signal.pairSymbol, direction: signal.direction });
        created.push(signal);

        // eslint-disable-next-line no-console
        console.log(
          `[SignalService] ${signal.direction} ${signal.pairSymbol} @ ${signal.entryPrice} ` +
            `(confidence ${signal.confidence.toFixed(2)})`
        );
      } catch (error) {
        const failure = toTradingError(error);
        failures.push({ pairSymbol: pair.symbol, error: failure });
        // eslint-disable-next-line no-console
        console.error(`[SignalService] ${pair.symbol} failed:`, failure.message);
      }
    }

    return { signals: created, expired, failures };
  }

  /**
   * Highest-confidence unconsumed signals first
   */
  async getActiveSignals(now: Date = new Date()): Promise<TradingSignal[]> {
    return this.signals.findActive(now);
  }
}
