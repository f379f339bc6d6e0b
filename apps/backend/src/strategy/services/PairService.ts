/**
 * Pair Service
 * Bootstraps TradingPair rows from the exchange's asset-pair metadata
 */

import type { TradingPair } from '@bracket-trader/shared';
import type { ExchangeGateway } from '../../execution/exchange/ExchangeGateway';
import type { PairStore } from '../repositories/PairRepository';

export interface PairInitializationResult {
  pairs: TradingPair[];
  /** Configured symbols the exchange does not list */
  missing: string[];
}

export class PairService {
  constructor(
    private readonly pairs: PairStore,
    private readonly exchange: ExchangeGateway
  ) {}

  /**
   * Create a row for every configured symbol the exchange lists; existing rows are kept
   */
  async initializePairs(symbols: string[]): Promise<PairInitializationResult> {
    const infos = await this.exchange.getAssetPairs(symbols);
    const bySymbol = new Map(infos.map((info) => [info.symbol, info]));

    const pairs: TradingPair[] = [];
    const missing: string[] = [];

    for (const symbol of symbols) {
      const info = bySymbol.get(symbol);
      if (!info) {
        missing.push(symbol);
        continue;
      }
      pairs.push(await this.pairs.createIfAbsent(info));
    }

    if (missing.length > 0) {
      // eslint-disable-next-line no-console
      console.warn(`[PairService] Exchange does not list: ${missing.join(', ')}`);
    }

    // eslint-disable-next-line no-console
    console.log(`[PairService] ${pairs.length} trading pairs ready`);

    return { pairs, missing };
  }

  async getActivePairs(): Promise<TradingPair[]> {
    return this.pairs.findAll(true);
  }
}
