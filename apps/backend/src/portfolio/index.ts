/**
 * Portfolio Module
 * Exports portfolio services and repositories
 */

export * from './pnl';
export * from './repositories/PortfolioRepository';
export * from './repositories/PositionRepository';
export * from './services/PortfolioService';
