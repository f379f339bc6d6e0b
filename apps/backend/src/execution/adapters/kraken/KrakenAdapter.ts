/**
 * Kraken Spot Adapter
 * ExchangeGateway over the Kraken REST client with shared request spacing
 * and a circuit breaker
 */

import type { OrderStatus } from '@bracket-trader/shared';
import { OrderValidationError } from '../../../common/errors';
import type {
  AssetPairInfo,
  Candle,
  ExchangeGateway,
  ExchangeHealth,
  ExchangeOrderReport,
  PlaceOrderRequest,
  PlacedOrder,
} from '../../exchange/ExchangeGateway';
import { CircuitBreaker, createKrakenCircuitBreaker } from './CircuitBreaker';
import { KrakenRestClient } from './KrakenRestClient';
import { RateLimiter, createKrakenRateLimiter } from './RateLimiter';
import type { KrakenCredentials, KrakenOrderInfo, KrakenOrderType } from './types';

/**
 * QueryOrders accepts at most 50 transaction ids per call
 */
export const QUERY_ORDERS_BATCH_SIZE = 50;

export interface KrakenAdapterConfig {
  credentials: KrakenCredentials | null;
  baseUrl?: string;
  timeout?: number;
  restClient?: KrakenRestClient;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
}

const ORDER_TYPES: Record<PlaceOrderRequest['kind'], KrakenOrderType> = {
  MARKET: 'market',
  LIMIT: 'limit',
  STOP_LOSS: 'stop-loss',
};

const ORDER_STATUSES: Record<KrakenOrderInfo['status'], OrderStatus> = {
  pending: 'PENDING',
  open: 'OPEN',
  closed: 'CLOSED',
  canceled: 'CANCELED',
  expired: 'EXPIRED',
};

/**
 * Plain decimal notation (no exponent), trailing zeros dropped
 */
export function formatDecimal(value: number): string {
  return value
    .toFixed(10)
    .replace(/0+$/, '')
    .replace(/\.$/, '');
}

function toOrderReport(info: KrakenOrderInfo): ExchangeOrderReport {
  return {
    status: ORDER_STATUSES[info.status],
    filledAmount: info.volumeExecuted,
    avgPrice: info.volumeExecuted > 0 && info.avgPrice > 0 ? info.avgPrice : null,
    fee: info.fee,
  };
}

export class KrakenAdapter implements ExchangeGateway {
  private readonly restClient: KrakenRestClient;
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreaker: CircuitBreaker;

  // Kraken result keys (e.g. XXBTZUSD) → configured pair symbol (e.g. XBTUSD)
  private readonly pairAliases = new Map<string, string>();

  constructor(config: KrakenAdapterConfig) {
    this.restClient =
      config.restClient ||
      new KrakenRestClient(config.credentials, { baseUrl: config.baseUrl, timeout: config.timeout });
    this.rateLimiter = config.rateLimiter || createKrakenRateLimiter();
    this.circuitBreaker = config.circuitBreaker || createKrakenCircuitBreaker();
  }

  async placeOrder(request: PlaceOrderRequest): Promise<PlacedOrder> {
    if (!(request.amount > 0)) {
      throw new OrderValidationError(`Order amount must be positive: ${request.amount}`);
    }
    if (request.kind !== 'MARKET' && (request.price === undefined || !(request.price > 0))) {
      throw new OrderValidationError(`${request.kind} order requires a positive price`);
    }

    const txids = await this.executeWithProtection(() =>
      this.restClient.addOrder({
        pair: request.pair,
        type: request.side === 'BUY' ? 'buy' : 'sell',
        ordertype: ORDER_TYPES[request.kind],
        volume: formatDecimal(request.amount),
        price:
          request.kind === 'MARKET' || request.price === undefined
            ? undefined
            : formatDecimal(request.price),
      })
    );

    return { exchangeOrderId: txids[0] };
  }

  async cancelOrder(exchangeOrderId: string): Promise<void> {
    await this.executeWithProtection(() => this.restClient.cancelOrder(exchangeOrderId));
  }

  async queryOrders(exchangeOrderIds: string[]): Promise<Map<string, ExchangeOrderReport>> {
    const reports = new Map<string, ExchangeOrderReport>();

    for (let i = 0; i < exchangeOrderIds.length; i += QUERY_ORDERS_BATCH_SIZE) {
      const batch = exchangeOrderIds.slice(i, i + QUERY_ORDERS_BATCH_SIZE);
      const orders = await this.executeWithProtection(() => this.restClient.queryOrders(batch));

      for (const [txid, info] of orders) {
        reports.set(txid, toOrderReport(info));
      }
    }

    return reports;
  }

  async getTicker(pairs: string[]): Promise<Map<string, number>> {
    if (pairs.length === 0) {
      return new Map();
    }

    const raw = await this.executeWithProtection(() => this.restClient.getTicker(pairs));
    const prices = new Map<string, number>();

    for (const pair of pairs) {
      const price = this.resolveEntry(raw, pair, pairs.length === 1);
      if (price !== undefined) {
        prices.set(pair, price);
      }
    }

    return prices;
  }

  async getOHLC(pair: string, intervalMinutes: number): Promise<Candle[]> {
    const series = await this.executeWithProtection(() =>
      this.restClient.getOHLC(pair, intervalMinutes)
    );
    const rows = this.resolveEntry(series, pair, true) ?? [];

    return rows
      .map((row) => ({
        timestamp: new Date(row.time * 1000),
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: row.volume,
      }))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  async getBalances(): Promise<Map<string, number>> {
    return this.executeWithProtection(() => this.restClient.getBalance());
  }

  /**
   * Also learns the result keys Kraken uses for the requested pairs
   */
  async getAssetPairs(pairs: string[]): Promise<AssetPairInfo[]> {
    const assetPairs = await this.executeWithProtection(() => this.restClient.getAssetPairs(pairs));

    return assetPairs.map((info) => {
      const symbol =
        pairs.find((pair) => pair === info.altname || pair === info.key) ?? info.altname;
      this.pairAliases.set(info.key, symbol);
      this.pairAliases.set(info.altname, symbol);

      return {
        symbol,
        baseAsset: info.base,
        quoteAsset: info.quote,
        minOrderSize: info.ordermin,
        pricePrecision: info.pairDecimals,
        volumePrecision: info.lotDecimals,
      };
    });
  }

  getHealth(): ExchangeHealth {
    return {
      circuitState: this.circuitBreaker.getState(),
      rateLimitQueueDepth: this.rateLimiter.getQueueDepth(),
    };
  }

  shutdown(): void {
    this.rateLimiter.stop();
  }

  private async executeWithProtection<T>(fn: () => Promise<T>): Promise<T> {
    await this.rateLimiter.acquire();
    return this.circuitBreaker.execute(fn);
  }

  /**
   * Match a result entry to a requested pair: exact key, a learned alias,
   * or the only entry when a single pair was requested
   */
  private resolveEntry<T>(entries: Map<string, T>, pair: string, single: boolean): T | undefined {
    const exact = entries.get(pair);
    if (exact !== undefined) {
      return exact;
    }

    for (const [key, value] of entries) {
      if (this.pairAliases.get(key) === pair) {
        return value;
      }
    }

    if (single && entries.size === 1) {
      return entries.values().next().value;
    }

    return undefined;
  }
}
