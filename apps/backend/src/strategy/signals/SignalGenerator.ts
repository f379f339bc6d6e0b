/**
 * Signal Generator Interface
 * Pure functions over price bars
 */

import type { PriceBar, TradingSignal } from '@bracket-trader/shared';

/**
 * Signal fields known before persistence assigns an id
 */
export type SignalCandidate = Omit<TradingSignal, 'id' | 'isActive' | 'consumedAt'>;

export interface SignalGenerator {
  /**
   * Evaluate bars and produce at most one signal for the pair
   * Must be deterministic: same inputs → same output
   *
   * @param bars - Price bars ordered by timestamp ASC (oldest first)
   * @returns Candidate signal, or null for HOLD / low confidence / insufficient data
   */
  generateSignal(pairSymbol: string, bars: PriceBar[], now: Date): SignalCandidate | null;
}
