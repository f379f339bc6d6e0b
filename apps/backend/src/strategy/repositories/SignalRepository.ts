/**
 * Trading Signal Repository
 * Data access layer for strategy.trading_signals
 */

import type {
  SignalDirection,
  StrategyType,
  TradingSignal,
  VolumeRegime,
} from '@bracket-trader/shared';
import type { Pool } from 'pg';
import { toDate, toNullableDate, toNullableNumber, toNumber } from '../../common/sql';
import type { SignalCandidate } from '../signals/SignalGenerator';

type SignalRow = {
  id: string;
  pair_symbol: string;
  direction: SignalDirection;
  score: string;
  confidence: string;
  entry_price: string;
  target_price: string;
  stop_loss_price: string;
  trend_strength: string | null;
  volatility: string | null;
  volume_regime: VolumeRegime | null;
  support_level: string | null;
  resistance_level: string | null;
  position_size_pct: string;
  strategy_type: StrategyType;
  time_horizon_minutes: number;
  is_active: boolean;
  consumed_at: string | Date | null;
  created_at: string | Date;
  expires_at: string | Date;
};

export interface SignalStore {
  create(candidate: SignalCandidate): Promise<TradingSignal>;
  findById(id: string): Promise<TradingSignal | null>;
  /** Unconsumed, unexpired signals */
  findActive(now: Date): Promise<TradingSignal[]>;
  /**
   * Consume a signal at most once. Resolves null when it is already consumed,
   * deactivated or expired.
   */
  claim(id: string, now: Date): Promise<TradingSignal | null>;
  deactivateExpired(now: Date): Promise<number>;
}

const SIGNAL_COLUMNS = `
  id, pair_symbol, direction, score, confidence, entry_price, target_price,
  stop_loss_price, trend_strength, volatility, volume_regime, support_level,
  resistance_level, position_size_pct, strategy_type, time_horizon_minutes,
  is_active, consumed_at, created_at, expires_at
`;

export class SignalRepository implements SignalStore {
  constructor(private readonly pool: Pool) {}

  async create(candidate: SignalCandidate): Promise<TradingSignal> {
    const result = await this.pool.query<SignalRow>(
      `
      INSERT INTO strategy.trading_signals (
        pair_symbol, direction, score, confidence, entry_price, target_price,
        stop_loss_price, trend_strength, volatility, volume_regime, support_level,
        resistance_level, position_size_pct, strategy_type, time_horizon_minutes,
        created_at, expires_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
      RETURNING ${SIGNAL_COLUMNS}
      `,
      [
        candidate.pairSymbol,
        candidate.direction,
        candidate.score,
        candidate.confidence,
        candidate.entryPrice,
        candidate.targetPrice,
        candidate.stopLossPrice,
        candidate.trendStrength,
        candidate.volatility,
        candidate.volumeRegime,
        candidate.supportLevel,
        candidate.resistanceLevel,
        candidate.positionSizePct,
        candidate.strategyType,
        candidate.timeHorizonMinutes,
        candidate.createdAt,
        candidate.expiresAt,
      ]
    );

    return this.mapRowToSignal(result.rows[0]);
  }

  async findById(id: string): Promise<TradingSignal | null> {
    const result = await this.pool.query<SignalRow>(
      `SELECT ${SIGNAL_COLUMNS} FROM strategy.trading_signals WHERE id = $1`,
      [id]
    );

    return result.rows.length === 0 ? null : this.mapRowToSignal(result.rows[0]);
  }

  async findActive(now: Date): Promise<TradingSignal[]> {
    const result = await this.pool.query<SignalRow>(
      `
      SELECT ${SIGNAL_COLUMNS}
      FROM strategy.trading_signals
      WHERE is_active AND consumed_at IS NULL AND expires_at > $1
      ORDER BY confidence DESC, created_at ASC
      `,
      [now]
    );

    return result.rows.map((row) => this.mapRowToSignal(row));
  }

  async claim(id: string, now: Date): Promise<TradingSignal | null> {
    const result = await this.pool.query<SignalRow>(
      `
      UPDATE strategy.trading_signals
      SET consumed_at = $2, is_active = FALSE
      WHERE id = $1 AND is_active AND consumed_at IS NULL AND expires_at > $2
      RETURNING ${SIGNAL_COLUMNS}
      `,
      [id, now]
    );

    return result.rows.length === 0 ? null : this.mapRowToSignal(result.rows[0]);
  }

  async deactivateExpired(now: Date): Promise<number> {
    const result = await this.pool.query(
      `
      UPDATE strategy.trading_signals
      SET is_active = FALSE
      WHERE is_active AND expires_at <= $1
      `,
      [now]
    );

    return result.rowCount ?? 0;
  }

  private mapRowToSignal(row: SignalRow): TradingSignal {
    return {
      id: row.id,
      pairSymbol: row.pair_symbol,
      direction: row.direction,
      score: toNumber(row.score),
      confidence: toNumber(row.confidence),
      entryPrice: toNumber(row.entry_price),
      targetPrice: toNumber(row.target_price),
      stopLossPrice: toNumber(row.stop_loss_price),
      trendStrength: toNullableNumber(row.trend_strength),
      volatility: toNullableNumber(row.volatility),
      volumeRegime: row.volume_regime,
      supportLevel: toNullableNumber(row.support_level),
      resistanceLevel: toNullableNumber(row.resistance_level),
      positionSizePct: toNumber(row.position_size_pct),
      strategyType: row.strategy_type,
      timeHorizonMinutes: row.time_horizon_minutes,
      isActive: row.is_active,
      consumedAt: toNullableDate(row.consumed_at),
      createdAt: toDate(row.created_at),
      expiresAt: toDate(row.expires_at),
    };
  }
}
