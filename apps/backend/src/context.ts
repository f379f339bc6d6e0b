/**
 * Trading Context
 * Creates and wires every repository and service of the pipeline
 */

import type { Redis } from '@bracket-trader/shared';
import type { Pool } from 'pg';
import { KeyedLock } from './common/KeyedLock';
import type { TradingConfig } from './config';
import { KrakenAdapter } from './execution/adapters/kraken/KrakenAdapter';
import { createKrakenRateLimiter } from './execution/adapters/kraken/RateLimiter';
import { BracketCorrelationRegistry } from './execution/bracket/BracketCorrelationRegistry';
import type { ExchangeGateway } from './execution/exchange/ExchangeGateway';
import { OrderRepository } from './execution/repositories/OrderRepository';
import { BracketOrderManager } from './execution/services/BracketOrderManager';
import { KillSwitchService } from './execution/services/KillSwitchService';
import { PositionMonitor } from './execution/services/PositionMonitor';
import { ReconciliationService } from './execution/services/ReconciliationService';
import { HealthCheckService } from './monitoring/HealthCheckService';
import { PortfolioRepository } from './portfolio/repositories/PortfolioRepository';
import { PositionRepository } from './portfolio/repositories/PositionRepository';
import { PortfolioService } from './portfolio/services/PortfolioService';
import { RiskService } from './risk/services/RiskService';
import { CycleScheduler } from './scheduler/CycleScheduler';
import { PairRepository } from './strategy/repositories/PairRepository';
import { PriceBarRepository } from './strategy/repositories/PriceBarRepository';
import { SignalRepository } from './strategy/repositories/SignalRepository';
import { MarketDataService } from './strategy/services/MarketDataService';
import { PairService } from './strategy/services/PairService';
import { SignalService } from './strategy/services/SignalService';
import { WeightedVoteSignalGenerator } from './strategy/signals/WeightedVoteSignalGenerator';

export interface TradingContext {
  config: TradingConfig;
  exchange: ExchangeGateway;
  positions: PositionRepository;
  pairService: PairService;
  manager: BracketOrderManager;
  portfolio: PortfolioService;
  risk: RiskService;
  killSwitch: KillSwitchService;
  health: HealthCheckService;
  scheduler: CycleScheduler;
}

export interface TradingContextResources {
  pool: Pool;
  redis: Redis;
  /** Defaults to the Kraken REST adapter */
  exchange?: ExchangeGateway;
}

export function createTradingContext(
  config: TradingConfig,
  resources: TradingContextResources
): TradingContext {
  const { pool, redis } = resources;

  const exchange =
    resources.exchange ||
    new KrakenAdapter({
      credentials: config.kraken.credentials,
      baseUrl: config.kraken.baseUrl,
      timeout: config.kraken.timeoutMs,
      rateLimiter: createKrakenRateLimiter(config.kraken.minRequestIntervalMs),
    });

  const pairs = new PairRepository(pool);
  const priceBars = new PriceBarRepository(pool);
  const signalStore = new SignalRepository(pool);
  const orders = new OrderRepository(pool);
  const positions = new PositionRepository(pool);
  const portfolios = new PortfolioRepository(pool);

  const manager = new BracketOrderManager(
    {
      orders,
      positions,
      signals: signalStore,
      pairs,
      exchange,
      correlations: new BracketCorrelationRegistry(),
      locks: new KeyedLock(),
    },
    { closeMode: config.closeMode, trailingStopPct: config.trailingStopPct }
  );

  const portfolio = new PortfolioService(
    { portfolios, positions, orders, exchange },
    {
      quoteAsset: config.quoteAsset,
      maxPositionSizePct: config.maxPositionSizePct,
      maxDailyLossPct: config.maxDailyLossPct,
    }
  );
  const risk = new RiskService(portfolio, positions);
  const killSwitch = new KillSwitchService(redis);

  const scheduler = new CycleScheduler(
    {
      marketData: new MarketDataService(pairs, priceBars, exchange, config.ohlcIntervalMinutes),
      signals: new SignalService(pairs, priceBars, signalStore, new WeightedVoteSignalGenerator()),
      manager,
      reconciliation: new ReconciliationService(orders, exchange, manager),
      monitor: new PositionMonitor(positions, exchange, manager),
      portfolio,
      risk,
      positions,
      killSwitch,
    },
    {
      intervalsSeconds: config.intervalsSeconds,
      tickMs: config.schedulerTickMs,
      maxSignalsPerCycle: config.maxSignalsPerCycle,
      minOrderUsd: config.minOrderUsd,
      flattenOnDailyLoss: config.flattenOnDailyLoss,
    }
  );

  return {
    config,
    exchange,
    positions,
    pairService: new PairService(pairs, exchange),
    manager,
    portfolio,
    risk,
    killSwitch,
    health: new HealthCheckService(pool, redis, exchange),
    scheduler,
  };
}
