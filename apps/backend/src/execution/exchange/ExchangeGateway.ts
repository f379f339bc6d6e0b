/**
 * Exchange Gateway
 * Capability the trading pipeline consumes; implemented by the Kraken adapter
 * and by in-process fakes in tests
 */

import type { OrderKind, OrderSide, OrderStatus } from '@bracket-trader/shared';

export interface PlaceOrderRequest {
  pair: string;
  side: OrderSide;
  kind: OrderKind;
  amount: number;
  price?: number; // Limit price, or trigger price for STOP_LOSS
}

export interface PlacedOrder {
  exchangeOrderId: string;
}

export interface ExchangeOrderReport {
  status: OrderStatus;
  filledAmount: number;
  avgPrice: number | null;
  fee: number;
}

export interface Candle {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface AssetPairInfo {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
  minOrderSize: number;
  pricePrecision: number;
  volumePrecision: number;
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface ExchangeHealth {
  circuitState: CircuitState;
  rateLimitQueueDepth: number;
}

/**
 * Every call may reject with a TransportError or an ExchangeRejectionError
 */
export interface ExchangeGateway {
  placeOrder(request: PlaceOrderRequest): Promise<PlacedOrder>;
  cancelOrder(exchangeOrderId: string): Promise<void>;
  /** Ids the exchange does not report are absent from the map */
  queryOrders(exchangeOrderIds: string[]): Promise<Map<string, ExchangeOrderReport>>;
  getTicker(pairs: string[]): Promise<Map<string, number>>;
  /** Candles ordered oldest first */
  getOHLC(pair: string, intervalMinutes: number): Promise<Candle[]>;
  getBalances(): Promise<Map<string, number>>;
  getAssetPairs(pairs: string[]): Promise<AssetPairInfo[]>;
  getHealth(): ExchangeHealth;
}
