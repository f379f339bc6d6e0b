/**
 * Bracket Correlation Registry
 * In-memory map from entry order id to the data needed to protect its fill.
 * A cache over the Order/Position rows, rebuilt at startup.
 */

import type { PositionSide } from '@bracket-trader/shared';

export interface BracketCorrelation {
  entryOrderId: string;
  positionId: string;
  signalId: string | null;
  side: PositionSide;
  amount: number;
  stopLossPrice: number;
  takeProfitPrice: number;
}

export class BracketCorrelationRegistry {
  private readonly entries = new Map<string, BracketCorrelation>();

  register(correlation: BracketCorrelation): void {
    this.entries.set(correlation.entryOrderId, correlation);
  }

  get(entryOrderId: string): BracketCorrelation | undefined {
    return this.entries.get(entryOrderId);
  }

  /**
   * Read and delete in one step; only the first caller gets the entry
   */
  take(entryOrderId: string): BracketCorrelation | undefined {
    const correlation = this.entries.get(entryOrderId);
    this.entries.delete(entryOrderId);
    return correlation;
  }

  has(entryOrderId: string): boolean {
    return this.entries.has(entryOrderId);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
