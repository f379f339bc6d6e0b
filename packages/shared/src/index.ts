/**
 * @bracket-trader/shared
 * Shared types and infrastructure helpers for the bracket trading pipeline
 */

export * from './infrastructure';
export * from './types/api';
export * from './types/domain';
