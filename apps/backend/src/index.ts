/**
 * Backend Entry Point
 * Public surface of the trading pipeline; the HTTP server lives in api/server.ts
 */

export { createApp, API_PREFIX } from './api/app';
export { loadConfig } from './config';
export type { TradingConfig } from './config';
export { createTradingContext } from './context';
export type { TradingContext, TradingContextResources } from './context';
export { CycleScheduler } from './scheduler/CycleScheduler';
export type { BotStatus } from './scheduler/CycleScheduler';
export { KrakenAdapter } from './execution/adapters/kraken';
export * from './common/errors';
export * from './common/result';

export * as execution from './execution';
export * as monitoring from './monitoring';
export * as portfolio from './portfolio';
export * as risk from './risk';
export * as strategy from './strategy';
