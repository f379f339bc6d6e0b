/**
 * Risk Service
 * Evaluates the portfolio against daily-loss, position-size and exposure limits
 */

import type {
  Portfolio,
  Position,
  RiskAlert,
  RiskReport,
  RiskSeverity,
} from '@bracket-trader/shared';
import { riskStatusGauge } from '../../monitoring/metrics';
import type { PositionStore } from '../../portfolio/repositories/PositionRepository';
import type { PortfolioService } from '../../portfolio/services/PortfolioService';

/**
 * Hard ceiling on aggregate open notional, as a percentage of balance
 */
export const MAX_TOTAL_EXPOSURE_PCT = 50;

const SEVERITY_LEVEL: Record<RiskSeverity, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

function markValue(position: Position): number {
  return position.currentPrice === null ? 0 : position.currentPrice * position.remainingAmount;
}

/**
 * Pure risk evaluation. With a non-positive balance the percentage checks
 * are skipped and any realized loss today breaches the daily limit.
 */
export function evaluateRisk(
  portfolio: Portfolio,
  openPositions: Position[],
  now: Date = new Date()
): RiskReport {
  const alerts: RiskAlert[] = [];
  const balance = portfolio.balance;

  const dailyLossLimit = (Math.max(0, balance) * portfolio.maxDailyLossPct) / 100;
  if (portfolio.dailyPnl < -dailyLossLimit) {
    alerts.push({
      type: 'DAILY_LOSS_LIMIT',
      severity: 'HIGH',
      message: `Daily loss limit exceeded: ${portfolio.dailyPnl.toFixed(2)} vs limit ${(-dailyLossLimit).toFixed(2)}`,
      positionId: null,
      value: portfolio.dailyPnl,
      limit: -dailyLossLimit,
    });
  }

  const totalExposure = openPositions.reduce((total, p) => total + markValue(p), 0);
  const exposurePct = balance > 0 ? (totalExposure * 100) / balance : 0;

  if (balance > 0) {
    for (const position of openPositions) {
      const positionPct = (markValue(position) * 100) / balance;
      if (positionPct > portfolio.maxPositionSizePct) {
        alerts.push({
          type: 'POSITION_SIZE',
          severity: 'MEDIUM',
          message: `Position size limit exceeded: ${positionPct.toFixed(1)}% vs limit ${portfolio.maxPositionSizePct}%`,
          positionId: position.id,
          value: positionPct,
          limit: portfolio.maxPositionSizePct,
        });
      }
    }

    if (exposurePct > MAX_TOTAL_EXPOSURE_PCT) {
      alerts.push({
        type: 'TOTAL_EXPOSURE',
        severity: 'HIGH',
        message: `Total exposure too high: ${exposurePct.toFixed(1)}%`,
        positionId: null,
        value: exposurePct,
        limit: MAX_TOTAL_EXPOSURE_PCT,
      });
    }
  }

  const status: RiskSeverity = alerts.some((a) => a.severity === 'HIGH')
    ? 'HIGH'
    : alerts.length > 0
      ? 'MEDIUM'
      : 'LOW';

  return {
    status,
    alerts,
    dailyPnl: portfolio.dailyPnl,
    totalExposure,
    exposurePct,
    evaluatedAt: now,
  };
}

export class RiskService {
  private lastReport: RiskReport | null = null;

  constructor(
    private readonly portfolio: PortfolioService,
    private readonly positions: PositionStore
  ) {}

  get latest(): RiskReport | null {
    return this.lastReport;
  }

  async evaluate(now: Date = new Date()): Promise<RiskReport> {
    const [portfolio, openPositions] = await Promise.all([
      this.portfolio.getPortfolio(),
      this.positions.findOpen(),
    ]);

    const report = evaluateRisk(portfolio, openPositions, now);
    riskStatusGauge.set(SEVERITY_LEVEL[report.status]);

    if (report.status !== 'LOW') {
      // eslint-disable-next-line no-console
      console.warn(
        `[RiskService] Risk ${report.status}: ${report.alerts.map((a) => a.message).join('; ')}`
      );
    }

    this.lastReport = report;
    return report;
  }
}
