/**
 * Bot Status Route
 */

import type { BotStatusResponse, CycleActivity, CycleResult } from '@bracket-trader/shared';
import type { Request, Response } from 'express';
import { Router } from 'express';
import type { BotStatus, CycleScheduler } from '../../scheduler/CycleScheduler';

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function toCycleResponse(cycle: CycleResult): NonNullable<BotStatusResponse['last_cycle']> {
  return {
    timestamp: cycle.timestamp.toISOString(),
    market_data_updated: cycle.marketDataUpdated,
    signals_generated: cycle.signalsGenerated,
    positions_created: cycle.positionsCreated,
    positions_monitored: cycle.positionsMonitored,
    portfolio_updated: cycle.portfolioUpdated,
    errors: cycle.errors,
  };
}

export function toBotStatusResponse(status: BotStatus): BotStatusResponse {
  const lastRuns: Record<CycleActivity, string | null> = {
    MARKET_DATA: toIso(status.lastRuns.MARKET_DATA),
    SIGNALS: toIso(status.lastRuns.SIGNALS),
    RECONCILIATION: toIso(status.lastRuns.RECONCILIATION),
    PORTFOLIO: toIso(status.lastRuns.PORTFOLIO),
  };

  return {
    running: status.running,
    last_runs: lastRuns,
    intervals_seconds: status.intervalsSeconds,
    last_cycle: status.lastCycle ? toCycleResponse(status.lastCycle) : null,
  };
}

export function createStatusRoutes(scheduler: Pick<CycleScheduler, 'getStatus'>): Router {
  const router = Router();

  /**
   * GET /status
   * Scheduler state, last run per activity and the last cycle result
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(toBotStatusResponse(scheduler.getStatus()));
  });

  return router;
}
