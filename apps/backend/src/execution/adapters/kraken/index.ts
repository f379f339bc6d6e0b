/**
 * Kraken Adapter Exports
 */

export { CircuitBreaker, createKrakenCircuitBreaker } from './CircuitBreaker';
export { KrakenAdapter, formatDecimal } from './KrakenAdapter';
export { KrakenRestClient, classifyKrakenErrors } from './KrakenRestClient';
export { RateLimiter, createKrakenRateLimiter } from './RateLimiter';

export type { CircuitBreakerConfig } from './CircuitBreaker';
export type { KrakenAdapterConfig } from './KrakenAdapter';
export type { FetchLike, KrakenRestClientConfig } from './KrakenRestClient';
export type { RateLimiterConfig } from './RateLimiter';
export type { KrakenCredentials } from './types';
