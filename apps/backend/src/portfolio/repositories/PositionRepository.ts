/**
 * Position Repository
 * Data access layer for portfolio.positions table
 */

import type {
  BracketState,
  CloseReason,
  Position,
  PositionSide,
} from '@bracket-trader/shared';
import type { Pool, PoolClient } from 'pg';
import {
  buildSetClause,
  toDate,
  toNullableDate,
  toNullableNumber,
  toNumber,
} from '../../common/sql';

type PositionRow = {
  id: string;
  pair_symbol: string;
  signal_id: string | null;
  entry_order_id: string;
  side: PositionSide;
  amount: string;
  remaining_amount: string;
  entry_price: string;
  current_price: string | null;
  stop_loss_price: string;
  take_profit_price: string;
  realized_pnl: string;
  unrealized_pnl: string;
  fees: string;
  max_favorable_excursion: string;
  max_adverse_excursion: string;
  trailing_stop_distance: string | null;
  bracket_state: BracketState;
  is_open: boolean;
  close_reason: CloseReason | null;
  close_order_id: string | null;
  opened_at: string | Date;
  filled_at: string | Date | null;
  closed_at: string | Date | null;
  updated_at: string | Date;
};

export interface CreatePositionParams {
  pairSymbol: string;
  signalId: string | null;
  entryOrderId: string;
  side: PositionSide;
  amount: number;
  entryPrice: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  trailingStopDistance: number | null;
}

export interface PositionUpdate {
  amount?: number;
  remainingAmount?: number;
  entryPrice?: number;
  currentPrice?: number | null;
  stopLossPrice?: number;
  realizedPnl?: number;
  unrealizedPnl?: number;
  fees?: number;
  maxFavorableExcursion?: number;
  maxAdverseExcursion?: number;
  bracketState?: BracketState;
  isOpen?: boolean;
  closeReason?: CloseReason | null;
  closeOrderId?: string | null;
  filledAt?: Date | null;
  closedAt?: Date | null;
}

export interface PositionStore {
  create(params: CreatePositionParams): Promise<Position>;
  findById(id: string): Promise<Position | null>;
  findByEntryOrderId(entryOrderId: string): Promise<Position | null>;
  findOpen(): Promise<Position[]>;
  /** Full ledger, open and closed, for metric recomputation */
  findAll(): Promise<Position[]>;
  findRecent(limit: number, offset: number): Promise<Position[]>;
  countAll(): Promise<number>;
  update(id: string, patch: PositionUpdate): Promise<Position>;
}

const POSITION_COLUMNS = `
  id, pair_symbol, signal_id, entry_order_id, side, amount, remaining_amount,
  entry_price, current_price, stop_loss_price, take_profit_price, realized_pnl,
  unrealized_pnl, fees, max_favorable_excursion, max_adverse_excursion,
  trailing_stop_distance, bracket_state, is_open, close_reason, close_order_id,
  opened_at, filled_at, closed_at, updated_at
`;

const UPDATE_COLUMNS = [
  ['amount', 'amount'],
  ['remainingAmount', 'remaining_amount'],
  ['entryPrice', 'entry_price'],
  ['currentPrice', 'current_price'],
  ['stopLossPrice', 'stop_loss_price'],
  ['realizedPnl', 'realized_pnl'],
  ['unrealizedPnl', 'unrealized_pnl'],
  ['fees', 'fees'],
  ['maxFavorableExcursion', 'max_favorable_excursion'],
  ['maxAdverseExcursion', 'max_adverse_excursion'],
  ['bracketState', 'bracket_state'],
  ['isOpen', 'is_open'],
  ['closeReason', 'close_reason'],
  ['closeOrderId', 'close_order_id'],
  ['filledAt', 'filled_at'],
  ['closedAt', 'closed_at'],
] as const;

export class PositionRepository implements PositionStore {
  constructor(private readonly pool: Pool) {}

  /**
   * Create position for a placed (not yet filled) entry order
   */
  async create(params: CreatePositionParams, client?: PoolClient): Promise<Position> {
    const db = client || this.pool;

    const query = `
      INSERT INTO portfolio.positions (
        pair_symbol, signal_id, entry_order_id, side, amount, remaining_amount,
        entry_price, stop_loss_price, take_profit_price, trailing_stop_distance,
        bracket_state, is_open
      )
      VALUES ($1, $2, $3, $4, $5, $5, $6, $7, $8, $9, 'ENTRY_PLACED', TRUE)
      RETURNING ${POSITION_COLUMNS}
    `;

    const result = await db.query<PositionRow>(query, [
      params.pairSymbol,
      params.signalId,
      params.entryOrderId,
      params.side,
      params.amount,
      params.entryPrice,
      params.stopLossPrice,
      params.takeProfitPrice,
      params.trailingStopDistance,
    ]);

    return this.mapRowToPosition(result.rows[0]);
  }

  async findById(id: string, client?: PoolClient): Promise<Position | null> {
    const db = client || this.pool;

    const result = await db.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM portfolio.positions WHERE id = $1`,
      [id]
    );

    return result.rows.length === 0 ? null : this.mapRowToPosition(result.rows[0]);
  }

  async findByEntryOrderId(entryOrderId: string): Promise<Position | null> {
    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM portfolio.positions WHERE entry_order_id = $1`,
      [entryOrderId]
    );

    return result.rows.length === 0 ? null : this.mapRowToPosition(result.rows[0]);
  }

  async findOpen(): Promise<Position[]> {
    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM portfolio.positions WHERE is_open ORDER BY opened_at ASC`
    );

    return result.rows.map((row) => this.mapRowToPosition(row));
  }

  async findAll(): Promise<Position[]> {
    const result = await this.pool.query<PositionRow>(
      `SELECT ${POSITION_COLUMNS} FROM portfolio.positions ORDER BY opened_at ASC`
    );

    return result.rows.map((row) => this.mapRowToPosition(row));
  }

  async findRecent(limit = 100, offset = 0): Promise<Position[]> {
    const query = `
      SELECT ${POSITION_COLUMNS}
      FROM portfolio.positions
      ORDER BY opened_at DESC
      LIMIT $1 OFFSET $2
    `;

    const result = await this.pool.query<PositionRow>(query, [limit, offset]);

    return result.rows.map((row) => this.mapRowToPosition(row));
  }

  async countAll(): Promise<number> {
    const result = await this.pool.query<{ total: string }>(
      'SELECT COUNT(*) AS total FROM portfolio.positions'
    );

    return Number(result.rows[0]?.total ?? 0);
  }

  async update(id: string, patch: PositionUpdate, client?: PoolClient): Promise<Position> {
    const db = client || this.pool;
    const { clauses, values } = buildSetClause(patch, UPDATE_COLUMNS);

    const query = `
      UPDATE portfolio.positions
      SET ${[...clauses, 'updated_at = NOW()'].join(', ')}
      WHERE id = $1
      RETURNING ${POSITION_COLUMNS}
    `;

    const result = await db.query<PositionRow>(query, [id, ...values]);

    if (result.rows.length === 0) {
      throw new Error(`Position not found: ${id}`);
    }

    return this.mapRowToPosition(result.rows[0]);
  }

  private mapRowToPosition(row: PositionRow): Position {
    return {
      id: row.id,
      pairSymbol: row.pair_symbol,
      signalId: row.signal_id,
      entryOrderId: row.entry_order_id,
      side: row.side,
      amount: toNumber(row.amount),
      remainingAmount: toNumber(row.remaining_amount),
      entryPrice: toNumber(row.entry_price),
      currentPrice: toNullableNumber(row.current_price),
      stopLossPrice: toNumber(row.stop_loss_price),
      takeProfitPrice: toNumber(row.take_profit_price),
      realizedPnl: toNumber(row.realized_pnl),
      unrealizedPnl: toNumber(row.unrealized_pnl),
      fees: toNumber(row.fees),
      maxFavorableExcursion: toNumber(row.max_favorable_excursion),
      maxAdverseExcursion: toNumber(row.max_adverse_excursion),
      trailingStopDistance: toNullableNumber(row.trailing_stop_distance),
      bracketState: row.bracket_state,
      isOpen: row.is_open,
      closeReason: row.close_reason,
      closeOrderId: row.close_order_id,
      openedAt: toDate(row.opened_at),
      filledAt: toNullableDate(row.filled_at),
      closedAt: toNullableDate(row.closed_at),
      updatedAt: toDate(row.updated_at),
    };
  }
}
