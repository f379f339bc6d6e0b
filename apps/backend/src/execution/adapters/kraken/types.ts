/**
 * Kraken REST API Types
 * Payload shapes after validation by the parsers in this module
 */

import { TransportError } from '../../../common/errors';

export interface KrakenCredentials {
  apiKey: string;
  privateKey: string; // Base64-encoded API secret
}

export type KrakenOrderType = 'market' | 'limit' | 'stop-loss';

export type KrakenOrderStatus = 'pending' | 'open' | 'closed' | 'canceled' | 'expired';

export interface KrakenAddOrderRequest {
  pair: string;
  type: 'buy' | 'sell';
  ordertype: KrakenOrderType;
  volume: string;
  price?: string;
}

export interface KrakenOrderInfo {
  status: KrakenOrderStatus;
  volume: number;
  volumeExecuted: number;
  avgPrice: number;
  fee: number;
}

export interface KrakenOHLCRow {
  time: number; // Unix seconds
  open: number;
  high: number;
  low: number;
  close: number;
  vwap: number;
  volume: number;
  count: number;
}

export interface KrakenAssetPair {
  key: string; // Result key, e.g. XXBTZUSD
  altname: string; // e.g. XBTUSD
  base: string;
  quote: string;
  ordermin: number;
  pairDecimals: number;
  lotDecimals: number;
}

// ============================================================================
// Parsers
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string): TransportError {
  return new TransportError(`Kraken API returned malformed ${what}`);
}

export function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw malformed(what);
  }
  return value;
}

/**
 * Kraken encodes decimals as strings; integers appear as numbers
 */
export function parseDecimal(value: unknown, what: string): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseFloat(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw malformed(what);
  }
  return parsed;
}

function parseString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw malformed(what);
  }
  return value;
}

const ORDER_STATUSES: readonly KrakenOrderStatus[] = [
  'pending',
  'open',
  'closed',
  'canceled',
  'expired',
];

function parseOrderStatus(value: unknown): KrakenOrderStatus {
  const status = ORDER_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw malformed('order status');
  }
  return status;
}

export function parseAddOrderResult(result: unknown): string[] {
  const record = expectRecord(result, 'AddOrder result');
  const txid = record.txid;
  if (!Array.isArray(txid) || txid.length === 0) {
    throw malformed('AddOrder txid');
  }
  return txid.map((id) => parseString(id, 'AddOrder txid'));
}

export function parseQueryOrdersResult(result: unknown): Map<string, KrakenOrderInfo> {
  const record = expectRecord(result, 'QueryOrders result');
  const orders = new Map<string, KrakenOrderInfo>();

  for (const [txid, raw] of Object.entries(record)) {
    const info = expectRecord(raw, 'order info');
    orders.set(txid, {
      status: parseOrderStatus(info.status),
      volume: parseDecimal(info.vol, 'order vol'),
      volumeExecuted: parseDecimal(info.vol_exec, 'order vol_exec'),
      avgPrice: parseDecimal(info.price, 'order price'),
      fee: parseDecimal(info.fee, 'order fee'),
    });
  }

  return orders;
}

/**
 * Last trade price per result key ("c" = [price, lot volume])
 */
export function parseTickerResult(result: unknown): Map<string, number> {
  const record = expectRecord(result, 'Ticker result');
  const prices = new Map<string, number>();

  for (const [key, raw] of Object.entries(record)) {
    const ticker = expectRecord(raw, 'ticker');
    const lastTrade = ticker.c;
    if (!Array.isArray(lastTrade) || lastTrade.length === 0) {
      throw malformed('ticker last trade');
    }
    prices.set(key, parseDecimal(lastTrade[0], 'ticker price'));
  }

  return prices;
}

/**
 * OHLC rows per result key; the "last" cursor entry is skipped
 */
export function parseOHLCResult(result: unknown): Map<string, KrakenOHLCRow[]> {
  const record = expectRecord(result, 'OHLC result');
  const series = new Map<string, KrakenOHLCRow[]>();

  for (const [key, raw] of Object.entries(record)) {
    if (key === 'last') {
      continue;
    }
    if (!Array.isArray(raw)) {
      throw malformed('OHLC series');
    }
    series.set(
      key,
      raw.map((row: unknown) => {
        if (!Array.isArray(row) || row.length < 8) {
          throw malformed('OHLC row');
        }
        return {
          time: parseDecimal(row[0], 'OHLC time'),
          open: parseDecimal(row[1], 'OHLC open'),
          high: parseDecimal(row[2], 'OHLC high'),
          low: parseDecimal(row[3], 'OHLC low'),
          close: parseDecimal(row[4], 'OHLC close'),
          vwap: parseDecimal(row[5], 'OHLC vwap'),
          volume: parseDecimal(row[6], 'OHLC volume'),
          count: parseDecimal(row[7], 'OHLC count'),
        };
      })
    );
  }

  return series;
}

export function parseBalanceResult(result: unknown): Map<string, number> {
  const record = expectRecord(result, 'Balance result');
  const balances = new Map<string, number>();

  for (const [asset, amount] of Object.entries(record)) {
    balances.set(asset, parseDecimal(amount, `balance ${asset}`));
  }

  return balances;
}

export function parseAssetPairsResult(result: unknown): KrakenAssetPair[] {
  const record = expectRecord(result, 'AssetPairs result');

  return Object.entries(record).map(([key, raw]) => {
    const pair = expectRecord(raw, 'asset pair');
    return {
      key,
      altname: parseString(pair.altname, 'asset pair altname'),
      base: parseString(pair.base, 'asset pair base'),
      quote: parseString(pair.quote, 'asset pair quote'),
      ordermin: pair.ordermin === undefined ? 0 : parseDecimal(pair.ordermin, 'asset pair ordermin'),
      pairDecimals: parseDecimal(pair.pair_decimals, 'asset pair pair_decimals'),
      lotDecimals: parseDecimal(pair.lot_decimals, 'asset pair lot_decimals'),
    };
  });
}
