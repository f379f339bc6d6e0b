/**
 * Risk Route
 */

import type { RiskReport, RiskReportResponse } from '@bracket-trader/shared';
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { RiskService } from '../../risk/services/RiskService';

export function toRiskReportResponse(report: RiskReport): RiskReportResponse {
  return {
    status: report.status,
    daily_pnl: report.dailyPnl,
    total_exposure: report.totalExposure,
    exposure_pct: report.exposurePct,
    alerts: report.alerts.map((alert) => ({
      type: alert.type,
      severity: alert.severity,
      message: alert.message,
      position_id: alert.positionId,
    })),
    evaluated_at: report.evaluatedAt.toISOString(),
  };
}

export function createRiskRoutes(riskService: Pick<RiskService, 'evaluate'>): Router {
  const router = Router();

  /**
   * GET /risk
   * Evaluates the risk gate against the stored portfolio
   */
  router.get('/risk', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await riskService.evaluate();
      res.json(toRiskReportResponse(report));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
