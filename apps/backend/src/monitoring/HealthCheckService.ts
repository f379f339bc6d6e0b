/**
 * Health Check Service
 * Database, Redis and exchange circuit status for the operations API
 */

import type { Redis } from '@bracket-trader/shared';
import type { Pool } from 'pg';
import { errorMessage } from '../common/errors';
import type { ExchangeGateway } from '../execution/exchange/ExchangeGateway';
import { databaseConnectionGauge, exchangeCircuitGauge, redisConnectionGauge } from './metrics';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    redis: ServiceHealth;
    exchange: ServiceHealth;
  };
  metrics?: {
    openPositions?: number;
    openOrders?: number;
    activeSignals?: number;
  };
}

export interface ServiceHealth {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

const CIRCUIT_STATE_VALUES = { CLOSED: 0, HALF_OPEN: 1, OPEN: 2 } as const;

export class HealthCheckService {
  private readonly startTime: number;

  constructor(
    private readonly pool: Pool,
    private readonly redis: Redis,
    private readonly exchange: Pick<ExchangeGateway, 'getHealth'>
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthStatus> {
    const [dbHealth, redisHealth] = await Promise.all([this.checkDatabase(), this.checkRedis()]);
    const exchangeHealth = this.checkExchange();

    databaseConnectionGauge.set(dbHealth.status === 'up' ? 1 : 0);
    redisConnectionGauge.set(redisHealth.status === 'up' ? 1 : 0);

    return {
      status: this.determineOverallStatus([dbHealth, redisHealth, exchangeHealth]),
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      services: {
        database: dbHealth,
        redis: redisHealth,
        exchange: exchangeHealth,
      },
    };
  }

  /**
   * Basic health plus ledger counts
   */
  async checkDetailedHealth(): Promise<HealthStatus> {
    const basicHealth = await this.checkHealth();
    const metrics = await this.collectMetrics();

    return {
      ...basicHealth,
      metrics,
    };
  }

  private async checkDatabase(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      await this.pool.query('SELECT 1');
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error) {
      return { status: 'down', responseTime: Date.now() - start, error: errorMessage(error) };
    }
  }

  private async checkRedis(): Promise<ServiceHealth> {
    const start = Date.now();

    try {
      const result = await this.redis.ping();
      const responseTime = Date.now() - start;

      if (result === 'PONG') {
        return { status: 'up', responseTime };
      }

      return { status: 'down', responseTime, error: 'Unexpected ping response' };
    } catch (error) {
      return { status: 'down', responseTime: Date.now() - start, error: errorMessage(error) };
    }
  }

  /**
   * An open circuit means the exchange is considered unreachable
   */
  private checkExchange(): ServiceHealth {
    const { circuitState, rateLimitQueueDepth } = this.exchange.getHealth();
    exchangeCircuitGauge.set(CIRCUIT_STATE_VALUES[circuitState]);

    if (circuitState === 'OPEN') {
      return { status: 'down', error: `Circuit breaker open (queue depth ${rateLimitQueueDepth})` };
    }

    return { status: 'up' };
  }

  private async collectMetrics(): Promise<NonNullable<HealthStatus['metrics']>> {
    try {
      const [positionsResult, ordersResult, signalsResult] = await Promise.all([
        this.pool.query<{ count: string }>(
          'SELECT COUNT(*) AS count FROM portfolio.positions WHERE is_open'
        ),
        this.pool.query<{ count: string }>(
          "SELECT COUNT(*) AS count FROM execution.orders WHERE status IN ('PENDING', 'OPEN')"
        ),
        this.pool.query<{ count: string }>(
          'SELECT COUNT(*) AS count FROM strategy.trading_signals WHERE is_active AND expires_at > NOW()'
        ),
      ]);

      return {
        openPositions: parseInt(positionsResult.rows[0]?.count || '0', 10),
        openOrders: parseInt(ordersResult.rows[0]?.count || '0', 10),
        activeSignals: parseInt(signalsResult.rows[0]?.count || '0', 10),
      };
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn('[HealthCheck] Metrics collection failed:', errorMessage(error));
      return {};
    }
  }

  private determineOverallStatus(services: ServiceHealth[]): HealthStatus['status'] {
    const up = services.filter((service) => service.status === 'up').length;

    if (up === services.length) {
      return 'healthy';
    }

    if (up > 0) {
      return 'degraded';
    }

    return 'unhealthy';
  }
}
