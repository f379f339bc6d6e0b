/**
 * Price Bar Repository
 * Data access layer for market.price_bars (append-only, one bar per pair and timestamp)
 */

import type { IndicatorSnapshot, PriceBar } from '@bracket-trader/shared';
import type { Pool, PoolClient } from 'pg';
import { toDate, toNumber } from '../../common/sql';

export interface NewPriceBar {
  pairSymbol: string;
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceBarStore {
  /** Returns false when a bar for the same pair and timestamp already exists */
  insertIfAbsent(bar: NewPriceBar): Promise<boolean>;
  /** Latest bars ordered by timestamp ASC (oldest first) */
  findRecent(pairSymbol: string, limit: number): Promise<PriceBar[]>;
  updateIndicators(id: string, snapshot: IndicatorSnapshot): Promise<void>;
}

const SNAPSHOT_FIELDS = [
  'rsi14',
  'macd',
  'macdSignal',
  'macdHistogram',
  'bollingerUpper',
  'bollingerMiddle',
  'bollingerLower',
  'sma20',
  'sma50',
  'ema12',
  'ema26',
] as const;

function readNullableNumber(source: Record<string, unknown>, field: string): number | null {
  const value = source[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSONB indicator column; missing or non-numeric fields become unavailable
 */
export function parseIndicatorSnapshot(value: unknown): IndicatorSnapshot | null {
  if (!isRecord(value)) {
    return null;
  }

  const snapshot: IndicatorSnapshot = {
    rsi14: null,
    macd: null,
    macdSignal: null,
    macdHistogram: null,
    bollingerUpper: null,
    bollingerMiddle: null,
    bollingerLower: null,
    sma20: null,
    sma50: null,
    ema12: null,
    ema26: null,
  };

  for (const field of SNAPSHOT_FIELDS) {
    snapshot[field] = readNullableNumber(value, field);
  }

  return snapshot;
}

export class PriceBarRepository implements PriceBarStore {
  constructor(private readonly pool: Pool) {}

  async insertIfAbsent(bar: NewPriceBar, client?: PoolClient): Promise<boolean> {
    const db = client ?? this.pool;

    const result = await db.query(
      `
        INSERT INTO market.price_bars (pair_symbol, timestamp, open, high, low, close, volume)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        ON CONFLICT (pair_symbol, timestamp) DO NOTHING
      `,
      [bar.pairSymbol, bar.timestamp, bar.open, bar.high, bar.low, bar.close, bar.volume]
    );

    return (result.rowCount ?? 0) > 0;
  }

  async findRecent(pairSymbol: string, limit: number, client?: PoolClient): Promise<PriceBar[]> {
    const db = client ?? this.pool;

    const result = await db.query<{
      id: string;
      pair_symbol: string;
      timestamp: string | Date;
      open: string;
      high: string;
      low: string;
      close: string;
      volume: string;
      indicators: unknown;
    }>(
      `
        SELECT id, pair_symbol, timestamp, open, high, low, close, volume, indicators
        FROM (
          SELECT id, pair_symbol, timestamp, open, high, low, close, volume, indicators
          FROM market.price_bars
          WHERE pair_symbol = $1
          ORDER BY timestamp DESC
          LIMIT $2
        ) latest
        ORDER BY timestamp ASC
      `,
      [pairSymbol, limit]
    );

    return result.rows.map((row) => ({
      id: row.id,
      pairSymbol: row.pair_symbol,
      timestamp: toDate(row.timestamp),
      open: toNumber(row.open),
      high: toNumber(row.high),
      low: toNumber(row.low),
      close: toNumber(row.close),
      volume: toNumber(row.volume),
      indicators: parseIndicatorSnapshot(row.indicators),
    }));
  }

  async updateIndicators(id: string, snapshot: IndicatorSnapshot): Promise<void> {
    await this.pool.query('UPDATE market.price_bars SET indicators = $2 WHERE id = $1', [
      id,
      JSON.stringify(snapshot),
    ]);
  }
}
