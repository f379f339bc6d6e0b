/**
 * Monitoring Routes
 * Health checks and Prometheus metrics
 */

import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { HealthCheckService, HealthStatus } from '../../monitoring/HealthCheckService';
import { register } from '../../monitoring/metrics';

/**
 * Degraded still answers 200 so a single dependency does not fail the probe
 */
function healthStatusCode(health: HealthStatus): number {
  return health.status === 'unhealthy' ? 503 : 200;
}

export function createMonitoringRoutes(
  healthCheckService: Pick<HealthCheckService, 'checkHealth' | 'checkDetailedHealth'>
): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const health = await healthCheckService.checkHealth();
      res.status(healthStatusCode(health)).json(health);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /health/detailed
   * Adds open position, order and signal counts
   */
  router.get('/health/detailed', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const health = await healthCheckService.checkDetailedHealth();
      res.status(healthStatusCode(health)).json(health);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /metrics
   * Prometheus exposition format
   */
  router.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', register.contentType);
      res.send(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
