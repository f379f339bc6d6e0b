/**
 * Trading Pair Repository
 * Data access layer for market.trading_pairs
 */

import type { TradingPair } from '@bracket-trader/shared';
import type { Pool } from 'pg';
import { toDate, toNumber } from '../../common/sql';

type PairRow = {
  symbol: string;
  base_asset: string;
  quote_asset: string;
  min_order_size: string;
  price_precision: number;
  volume_precision: number;
  is_active: boolean;
  created_at: string | Date;
};

export type NewTradingPair = Omit<TradingPair, 'isActive' | 'createdAt'>;

export interface PairStore {
  findAll(activeOnly?: boolean): Promise<TradingPair[]>;
  findBySymbol(symbol: string): Promise<TradingPair | null>;
  /** Pairs are immutable once created; an existing symbol is left as is */
  createIfAbsent(pair: NewTradingPair): Promise<TradingPair>;
  setActive(symbol: string, isActive: boolean): Promise<void>;
}

const PAIR_COLUMNS = `
  symbol, base_asset, quote_asset, min_order_size, price_precision,
  volume_precision, is_active, created_at
`;

export class PairRepository implements PairStore {
  constructor(private readonly pool: Pool) {}

  async findAll(activeOnly = true): Promise<TradingPair[]> {
    const result = await this.pool.query<PairRow>(
      `
        SELECT ${PAIR_COLUMNS}
        FROM market.trading_pairs
        WHERE ($1::boolean IS FALSE OR is_active)
        ORDER BY symbol ASC
      `,
      [activeOnly]
    );

    return result.rows.map((row) => this.mapRowToPair(row));
  }

  async findBySymbol(symbol: string): Promise<TradingPair | null> {
    const result = await this.pool.query<PairRow>(
      `SELECT ${PAIR_COLUMNS} FROM market.trading_pairs WHERE symbol = $1`,
      [symbol]
    );

    return result.rows.length === 0 ? null : this.mapRowToPair(result.rows[0]);
  }

  async createIfAbsent(pair: NewTradingPair): Promise<TradingPair> {
    await this.pool.query(
      `
        INSERT INTO market.trading_pairs (
          symbol, base_asset, quote_asset, min_order_size, price_precision, volume_precision
        )
        VALUES ($1, $2, $3, $4, $5, $6)
        ON CONFLICT (symbol) DO NOTHING
      `,
      [
        pair.symbol,
        pair.baseAsset,
        pair.quoteAsset,
        pair.minOrderSize,
        pair.pricePrecision,
        pair.volumePrecision,
      ]
    );

    const stored = await this.findBySymbol(pair.symbol);
    if (!stored) {
      throw new Error(`Trading pair not persisted: ${pair.symbol}`);
    }
    return stored;
  }

  async setActive(symbol: string, isActive: boolean): Promise<void> {
    await this.pool.query('UPDATE market.trading_pairs SET is_active = $2 WHERE symbol = $1', [
      symbol,
      isActive,
    ]);
  }

  private mapRowToPair(row: PairRow): TradingPair {
    return {
      symbol: row.symbol,
      baseAsset: row.base_asset,
      quoteAsset: row.quote_asset,
      minOrderSize: toNumber(row.min_order_size),
      pricePrecision: row.price_precision,
      volumePrecision: row.volume_precision,
      isActive: row.is_active,
      createdAt: toDate(row.created_at),
    };
  }
}
