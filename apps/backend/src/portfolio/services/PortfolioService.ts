/**
 * Portfolio Service
 * Recomputes portfolio metrics from the position ledger and refreshes the
 * account balance
 */

import type { Portfolio, PortfolioMetrics, Position } from '@bracket-trader/shared';
import type { ExchangeGateway } from '../../execution/exchange/ExchangeGateway';
import type { OrderStore } from '../../execution/repositories/OrderRepository';
import {
  openPositionsGauge,
  portfolioDrawdownGauge,
  portfolioPnlGauge,
} from '../../monitoring/metrics';
import { calculatePnl, isMarkable } from '../pnl';
import type { PortfolioDefaults, PortfolioStore } from '../repositories/PortfolioRepository';
import type { PositionStore } from '../repositories/PositionRepository';

export interface PortfolioServiceDeps {
  portfolios: PortfolioStore;
  positions: PositionStore;
  orders: OrderStore;
  exchange: ExchangeGateway;
}

function isClosedTrade(position: Position): boolean {
  return !position.isOpen && position.bracketState === 'CLOSED';
}

function isSameUtcDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Derives every metric from the full ledger; the same ledger always
 * yields the same metrics.
 */
export function computePortfolioMetrics(positions: Position[], now: Date): PortfolioMetrics {
  const trades = positions
    .filter(isClosedTrade)
    .sort((a, b) => {
      const byClose = (a.closedAt?.getTime() ?? 0) - (b.closedAt?.getTime() ?? 0);
      return byClose !== 0 ? byClose : a.id.localeCompare(b.id);
    });

  const wins = trades.filter((p) => p.realizedPnl > 0).map((p) => p.realizedPnl);
  const losses = trades.filter((p) => p.realizedPnl < 0).map((p) => p.realizedPnl);
  const grossWin = sum(wins);
  const grossLoss = sum(losses);

  const realizedPnl = sum(trades.map((p) => p.realizedPnl));

  const open = positions.filter(isMarkable);
  const priced = open.filter(
    (p): p is Position & { currentPrice: number } => p.currentPrice !== null
  );
  const unrealizedPnl = sum(
    priced.map((p) => calculatePnl(p.side, p.entryPrice, p.currentPrice, p.remainingAmount))
  );
  const totalExposure = sum(priced.map((p) => p.currentPrice * p.remainingAmount));
  const totalPnl = realizedPnl + unrealizedPnl;

  const dailyPnl = sum(
    trades
      .filter((p) => p.closedAt !== null && isSameUtcDay(p.closedAt, now))
      .map((p) => p.realizedPnl)
  );

  // Realized equity curve
  let equity = 0;
  let curvePeak = 0;
  let curveMaxDrawdown = 0;
  for (const trade of trades) {
    equity += trade.realizedPnl;
    curvePeak = Math.max(curvePeak, equity);
    curveMaxDrawdown = Math.max(curveMaxDrawdown, curvePeak - equity);
  }

  const peakPnl = Math.max(curvePeak, totalPnl);
  const currentDrawdown = peakPnl - totalPnl;

  return {
    realizedPnl,
    unrealizedPnl,
    totalPnl,
    dailyPnl,
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: trades.length > 0 ? (wins.length / trades.length) * 100 : 0,
    averageWin: wins.length > 0 ? grossWin / wins.length : 0,
    averageLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    profitFactor: grossLoss < 0 ? grossWin / Math.abs(grossLoss) : 0,
    peakPnl,
    currentDrawdown,
    maxDrawdown: Math.max(curveMaxDrawdown, currentDrawdown),
    openPositions: positions.filter((p) => p.isOpen).length,
    totalExposure,
  };
}

export class PortfolioService {
  private readonly portfolios: PortfolioStore;
  private readonly positions: PositionStore;
  private readonly orders: OrderStore;
  private readonly exchange: ExchangeGateway;

  constructor(deps: PortfolioServiceDeps, private readonly defaults: PortfolioDefaults) {
    this.portfolios = deps.portfolios;
    this.positions = deps.positions;
    this.orders = deps.orders;
    this.exchange = deps.exchange;
  }

  async getPortfolio(): Promise<Portfolio> {
    return this.portfolios.getOrCreate(this.defaults);
  }

  /**
   * Recompute metrics from the full ledger and write them in one update
   */
  async recompute(now: Date = new Date()): Promise<Portfolio> {
    const portfolio = await this.getPortfolio();
    const ledger = await this.positions.findAll();
    const metrics = computePortfolioMetrics(ledger, now);

    const updated = await this.portfolios.update(portfolio.id, metrics);

    portfolioPnlGauge.set({ kind: 'realized' }, metrics.realizedPnl);
    portfolioPnlGauge.set({ kind: 'unrealized' }, metrics.unrealizedPnl);
    portfolioPnlGauge.set({ kind: 'total' }, metrics.totalPnl);
    portfolioPnlGauge.set({ kind: 'daily' }, metrics.dailyPnl);
    portfolioDrawdownGauge.set(metrics.currentDrawdown);
    openPositionsGauge.set(metrics.openPositions);

    return updated;
  }

  /**
   * Pull the quote-asset balance from the exchange; unfilled entry
   * notional counts as locked
   */
  async refreshBalance(): Promise<Portfolio> {
    const portfolio = await this.getPortfolio();
    const balances = await this.exchange.getBalances();
    const balance = balances.get(portfolio.quoteAsset);

    if (balance === undefined) {
      // eslint-disable-next-line no-console
      console.warn(`[PortfolioService] No ${portfolio.quoteAsset} balance reported, assuming 0`);
    }

    const liveOrders = await this.orders.findByStatus(['PENDING', 'OPEN']);
    const lockedBalance = sum(
      liveOrders
        .filter((order) => order.role === 'ENTRY')
        .map((order) => Math.max(0, order.amount - order.filledAmount) * (order.price ?? 0))
    );

    const total = balance ?? 0;
    return this.portfolios.update(portfolio.id, {
      balance: total,
      lockedBalance,
      availableBalance: Math.max(0, total - lockedBalance),
    });
  }
}
