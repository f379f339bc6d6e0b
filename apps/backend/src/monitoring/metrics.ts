/**
 * Prometheus Metrics
 * Collects and exposes trading pipeline metrics
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

// Create a Registry to register metrics
export const register = new Registry();

// Default labels for all metrics
register.setDefaultLabels({
  app: 'bracket-trader-backend',
});

// ============================================================================
// Cycle Metrics
// ============================================================================

export const cycleCounter = new Counter({
  name: 'scheduler_cycles_total',
  help: 'Total number of scheduler ticks that ran at least one activity',
  registers: [register],
});

export const activityCounter = new Counter({
  name: 'scheduler_activity_runs_total',
  help: 'Scheduler activity runs by outcome',
  labelNames: ['activity', 'status'],
  registers: [register],
});

export const activityDuration = new Histogram({
  name: 'scheduler_activity_duration_seconds',
  help: 'Scheduler activity duration in seconds',
  labelNames: ['activity'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

// ============================================================================
// Signal and Position Metrics
// ============================================================================

export const signalCounter = new Counter({
  name: 'signals_total',
  help: 'Total number of trading signals generated',
  labelNames: ['pair', 'direction'],
  registers: [register],
});

export const positionsOpenedCounter = new Counter({
  name: 'positions_opened_total',
  help: 'Total number of bracket entries placed',
  labelNames: ['pair', 'side'],
  registers: [register],
});

export const openPositionsGauge = new Gauge({
  name: 'positions_open',
  help: 'Number of open positions',
  registers: [register],
});

export const unprotectedPositionsGauge = new Gauge({
  name: 'positions_unprotected',
  help: 'Filled positions without a live stop-loss/take-profit pair after the last sweep',
  registers: [register],
});

// ============================================================================
// Reconciliation Metrics
// ============================================================================

export const reconciliationCounter = new Counter({
  name: 'reconciliation_runs_total',
  help: 'Total number of reconciliation runs',
  labelNames: ['status'],
  registers: [register],
});

export const reconciliationActionCounter = new Counter({
  name: 'reconciliation_actions_total',
  help: 'Order reports applied by reconciliation, by resulting action',
  labelNames: ['action'],
  registers: [register],
});

// ============================================================================
// Portfolio and Risk Metrics
// ============================================================================

export const portfolioPnlGauge = new Gauge({
  name: 'portfolio_pnl',
  help: 'Portfolio profit and loss in quote currency',
  labelNames: ['kind'],
  registers: [register],
});

export const portfolioDrawdownGauge = new Gauge({
  name: 'portfolio_drawdown',
  help: 'Current drawdown from peak realized P&L',
  registers: [register],
});

export const riskStatusGauge = new Gauge({
  name: 'risk_status',
  help: 'Risk gate status (0 = LOW, 1 = MEDIUM, 2 = HIGH)',
  registers: [register],
});

// ============================================================================
// System Metrics
// ============================================================================

export const exchangeCircuitGauge = new Gauge({
  name: 'exchange_circuit_state',
  help: 'Exchange circuit breaker state (0 = CLOSED, 1 = HALF_OPEN, 2 = OPEN)',
  registers: [register],
});

export const databaseConnectionGauge = new Gauge({
  name: 'database_connection_status',
  help: 'Database connection status (1 = up, 0 = down)',
  registers: [register],
});

export const redisConnectionGauge = new Gauge({
  name: 'redis_connection_status',
  help: 'Redis connection status (1 = up, 0 = down)',
  registers: [register],
});

export const killSwitchGauge = new Gauge({
  name: 'kill_switch_active',
  help: 'Kill switch status (1 = active, 0 = inactive)',
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

// ============================================================================
// Error Metrics
// ============================================================================

export const errorCounter = new Counter({
  name: 'errors_total',
  help: 'Total number of errors',
  labelNames: ['type', 'service'],
  registers: [register],
});

/**
 * Collect default Node.js metrics
 */
collectDefaultMetrics({ register });
