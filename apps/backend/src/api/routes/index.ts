/**
 * API Routes
 * Mounts every operations endpoint on one router
 */

import { Router } from 'express';
import type { KillSwitchService } from '../../execution/services/KillSwitchService';
import type { HealthCheckService } from '../../monitoring/HealthCheckService';
import type { RiskService } from '../../risk/services/RiskService';
import type { CycleScheduler } from '../../scheduler/CycleScheduler';
import { createKillSwitchRoutes } from './killSwitch';
import { createMonitoringRoutes } from './monitoring';
import { type PortfolioRouteServices, createPortfolioRoutes } from './portfolio';
import { createRiskRoutes } from './risk';
import { createStatusRoutes } from './status';

export interface ApiServices extends PortfolioRouteServices {
  health: Pick<HealthCheckService, 'checkHealth' | 'checkDetailedHealth'>;
  scheduler: Pick<CycleScheduler, 'getStatus'>;
  risk: Pick<RiskService, 'evaluate'>;
  killSwitch: Pick<KillSwitchService, 'getState' | 'activate' | 'deactivate'>;
}

export function createRoutes(services: ApiServices): Router {
  const router = Router();

  router.use(createMonitoringRoutes(services.health));
  router.use(createStatusRoutes(services.scheduler));
  router.use(createPortfolioRoutes(services));
  router.use(createRiskRoutes(services.risk));
  router.use(createKillSwitchRoutes(services.killSwitch));

  return router;
}
