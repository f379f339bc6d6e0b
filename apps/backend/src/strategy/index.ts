/**
 * Strategy Module
 * Market data, indicators and signal generation
 */

export * from './indicators/technical';
export * from './repositories/PairRepository';
export * from './repositories/PriceBarRepository';
export * from './repositories/SignalRepository';
export * from './services/MarketDataService';
export * from './services/PairService';
export * from './services/SignalService';
export * from './signals/SignalGenerator';
export * from './signals/WeightedVoteSignalGenerator';
