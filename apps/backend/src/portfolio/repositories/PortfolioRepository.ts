/**
 * Portfolio Repository
 * Data access layer for the portfolio.portfolio singleton row
 */

import type { Portfolio, PortfolioLimits, PortfolioMetrics } from '@bracket-trader/shared';
import type { Pool } from 'pg';
import { buildSetClause, toDate, toNumber } from '../../common/sql';

type PortfolioRow = {
  id: string;
  balance: string;
  available_balance: string;
  locked_balance: string;
  quote_asset: string;
  total_exposure: string;
  realized_pnl: string;
  unrealized_pnl: string;
  total_pnl: string;
  daily_pnl: string;
  total_trades: number;
  winning_trades: number;
  losing_trades: number;
  win_rate: string;
  average_win: string;
  average_loss: string;
  profit_factor: string;
  peak_pnl: string;
  current_drawdown: string;
  max_drawdown: string;
  open_positions: number;
  max_position_size_pct: string;
  max_daily_loss_pct: string;
  updated_at: string | Date;
};

export interface PortfolioDefaults extends PortfolioLimits {
  quoteAsset: string;
}

export interface PortfolioUpdate extends Partial<PortfolioMetrics> {
  balance?: number;
  availableBalance?: number;
  lockedBalance?: number;
}

export interface PortfolioStore {
  /** Returns the singleton row, inserting it with defaults when absent */
  getOrCreate(defaults: PortfolioDefaults): Promise<Portfolio>;
  update(id: string, patch: PortfolioUpdate): Promise<Portfolio>;
}

const PORTFOLIO_COLUMNS = `
  id, balance, available_balance, locked_balance, quote_asset, total_exposure,
  realized_pnl, unrealized_pnl, total_pnl, daily_pnl, total_trades, winning_trades,
  losing_trades, win_rate, average_win, average_loss, profit_factor, peak_pnl,
  current_drawdown, max_drawdown, open_positions, max_position_size_pct,
  max_daily_loss_pct, updated_at
`;

const UPDATE_COLUMNS = [
  ['balance', 'balance'],
  ['availableBalance', 'available_balance'],
  ['lockedBalance', 'locked_balance'],
  ['totalExposure', 'total_exposure'],
  ['realizedPnl', 'realized_pnl'],
  ['unrealizedPnl', 'unrealized_pnl'],
  ['totalPnl', 'total_pnl'],
  ['dailyPnl', 'daily_pnl'],
  ['totalTrades', 'total_trades'],
  ['winningTrades', 'winning_trades'],
  ['losingTrades', 'losing_trades'],
  ['winRate', 'win_rate'],
  ['averageWin', 'average_win'],
  ['averageLoss', 'average_loss'],
  ['profitFactor', 'profit_factor'],
  ['peakPnl', 'peak_pnl'],
  ['currentDrawdown', 'current_drawdown'],
  ['maxDrawdown', 'max_drawdown'],
  ['openPositions', 'open_positions'],
] as const;

export class PortfolioRepository implements PortfolioStore {
  constructor(private readonly pool: Pool) {}

  async getOrCreate(defaults: PortfolioDefaults): Promise<Portfolio> {
    const existing = await this.pool.query<PortfolioRow>(
      `SELECT ${PORTFOLIO_COLUMNS} FROM portfolio.portfolio ORDER BY updated_at ASC LIMIT 1`
    );

    if (existing.rows.length > 0) {
      return this.mapRowToPortfolio(existing.rows[0]);
    }

    const created = await this.pool.query<PortfolioRow>(
      `
      INSERT INTO portfolio.portfolio (quote_asset, max_position_size_pct, max_daily_loss_pct)
      VALUES ($1, $2, $3)
      RETURNING ${PORTFOLIO_COLUMNS}
      `,
      [defaults.quoteAsset, defaults.maxPositionSizePct, defaults.maxDailyLossPct]
    );

    return this.mapRowToPortfolio(created.rows[0]);
  }

  /**
   * Single UPDATE so recomputed metrics land together
   */
  async update(id: string, patch: PortfolioUpdate): Promise<Portfolio> {
    const { clauses, values } = buildSetClause(patch, UPDATE_COLUMNS);

    const result = await this.pool.query<PortfolioRow>(
      `
      UPDATE portfolio.portfolio
      SET ${[...clauses, 'updated_at = NOW()'].join(', ')}
      WHERE id = $1
      RETURNING ${PORTFOLIO_COLUMNS}
      `,
      [id, ...values]
    );

    if (result.rows.length === 0) {
      throw new Error(`Portfolio not found: ${id}`);
    }

    return this.mapRowToPortfolio(result.rows[0]);
  }

  private mapRowToPortfolio(row: PortfolioRow): Portfolio {
    return {
      id: row.id,
      balance: toNumber(row.balance),
      availableBalance: toNumber(row.available_balance),
      lockedBalance: toNumber(row.locked_balance),
      quoteAsset: row.quote_asset,
      totalExposure: toNumber(row.total_exposure),
      realizedPnl: toNumber(row.realized_pnl),
      unrealizedPnl: toNumber(row.unrealized_pnl),
      totalPnl: toNumber(row.total_pnl),
      dailyPnl: toNumber(row.daily_pnl),
      totalTrades: row.total_trades,
      winningTrades: row.winning_trades,
      losingTrades: row.losing_trades,
      winRate: toNumber(row.win_rate),
      averageWin: toNumber(row.average_win),
      averageLoss: toNumber(row.average_loss),
      profitFactor: toNumber(row.profit_factor),
      peakPnl: toNumber(row.peak_pnl),
      currentDrawdown: toNumber(row.current_drawdown),
      maxDrawdown: toNumber(row.max_drawdown),
      openPositions: row.open_positions,
      maxPositionSizePct: toNumber(row.max_position_size_pct),
      maxDailyLossPct: toNumber(row.max_daily_loss_pct),
      updatedAt: toDate(row.updated_at),
    };
  }
}
