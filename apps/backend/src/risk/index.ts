/**
 * Risk Module
 * Exports the risk gate
 */

export * from './services/RiskService';
