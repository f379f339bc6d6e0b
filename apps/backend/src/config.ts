/**
 * Trading Configuration
 * Typed view of the process environment
 */

import type { CycleActivity } from '@bracket-trader/shared';
import type { KrakenCredentials } from './execution/adapters/kraken/types';
import type { CloseMode } from './execution/services/BracketOrderManager';
import { DEFAULT_INTERVALS_SECONDS } from './scheduler/CycleScheduler';

export const DEFAULT_TRADING_PAIRS = [
  'XBTUSD',
  'ETHUSD',
  'ADAUSD',
  'SOLUSD',
  'DOTUSD',
  'MATICUSD',
  'LINKUSD',
  'UNIUSD',
  'AAVEUSD',
  'ALGOUSD',
];

export interface TradingConfig {
  nodeEnv: string;
  port: number;
  databaseUrl: string;
  redisUrl: string;
  kraken: {
    credentials: KrakenCredentials | null;
    baseUrl: string;
    timeoutMs: number;
    minRequestIntervalMs: number;
  };
  tradingPairs: string[];
  ohlcIntervalMinutes: number;
  closeMode: CloseMode;
  /** Null disables trailing stops */
  trailingStopPct: number | null;
  quoteAsset: string;
  maxPositionSizePct: number;
  maxDailyLossPct: number;
  maxSignalsPerCycle: number;
  minOrderUsd: number;
  schedulerTickMs: number;
  intervalsSeconds: Record<CycleActivity, number>;
  flattenOnDailyLoss: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

export function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export function parseCloseMode(raw: string | undefined): CloseMode {
  const value = raw?.trim().toUpperCase() || 'CONFIRM';
  if (value === 'CONFIRM' || value === 'OPTIMISTIC') {
    return value;
  }
  throw new Error(`CLOSE_MODE must be CONFIRM or OPTIMISTIC, got "${raw}"`);
}

export function parsePairs(raw: string | undefined): string[] {
  if (!raw || raw.trim() === '') {
    return [...DEFAULT_TRADING_PAIRS];
  }
  const pairs = raw
    .split(',')
    .map((pair) => pair.trim().toUpperCase())
    .filter((pair) => pair.length > 0);
  return [...new Set(pairs)];
}

function readCredentials(env: Env): KrakenCredentials | null {
  const apiKey = env.KRAKEN_API_KEY?.trim();
  const privateKey = env.KRAKEN_PRIVATE_KEY?.trim();
  return apiKey && privateKey ? { apiKey, privateKey } : null;
}

export function loadConfig(env: Env = process.env): TradingConfig {
  const trailingStopPct = readNumber(env, 'TRAILING_STOP_PCT', 0);

  return {
    nodeEnv: readString(env, 'NODE_ENV', 'development'),
    port: readNumber(env, 'PORT', 3000),
    databaseUrl: readString(env, 'DATABASE_URL', ''),
    redisUrl: readString(env, 'REDIS_URL', 'redis://localhost:6379'),
    kraken: {
      credentials: readCredentials(env),
      baseUrl: readString(env, 'KRAKEN_BASE_URL', 'https://api.kraken.com'),
      timeoutMs: readNumber(env, 'EXCHANGE_TIMEOUT_MS', 10_000),
      minRequestIntervalMs: readNumber(env, 'EXCHANGE_MIN_REQUEST_INTERVAL_MS', 1000),
    },
    tradingPairs: parsePairs(env.TRADING_PAIRS),
    ohlcIntervalMinutes: readNumber(env, 'OHLC_INTERVAL_MINUTES', 1),
    closeMode: parseCloseMode(env.CLOSE_MODE),
    trailingStopPct: trailingStopPct > 0 ? trailingStopPct : null,
    quoteAsset: readString(env, 'QUOTE_BALANCE_ASSET', 'ZUSD'),
    maxPositionSizePct: readNumber(env, 'MAX_POSITION_SIZE_PCT', 5),
    maxDailyLossPct: readNumber(env, 'MAX_DAILY_LOSS_PCT', 2),
    maxSignalsPerCycle: readNumber(env, 'MAX_SIGNALS_PER_CYCLE', 3),
    minOrderUsd: readNumber(env, 'MIN_ORDER_USD', 50),
    schedulerTickMs: readNumber(env, 'SCHEDULER_TICK_MS', 5000),
    intervalsSeconds: { ...DEFAULT_INTERVALS_SECONDS },
    flattenOnDailyLoss: readBoolean(env, 'FLATTEN_ON_DAILY_LOSS', false),
  };
}
