/**
 * Execution Domain Exports
 * Bracket lifecycle, reconciliation and the exchange boundary
 */

export * from './bracket/transitions';
export { BracketCorrelationRegistry } from './bracket/BracketCorrelationRegistry';
export { OrderRepository } from './repositories/OrderRepository';
export { BracketOrderManager, isTighterStop } from './services/BracketOrderManager';
export { KillSwitchService, parseKillSwitchState } from './services/KillSwitchService';
export { PositionMonitor, trailingStopFor } from './services/PositionMonitor';
export { ReconciliationService } from './services/ReconciliationService';

export type { BracketCorrelation } from './bracket/BracketCorrelationRegistry';
export type { ExchangeGateway, PlaceOrderRequest } from './exchange/ExchangeGateway';
export type { CreateOrderParams, OrderStore, OrderUpdate } from './repositories/OrderRepository';
export type {
  ClosePositionOutcome,
  CloseMode,
  ManualCloseReason,
} from './services/BracketOrderManager';
export type { ReconciliationAction, ReconciliationResult } from './services/ReconciliationService';
