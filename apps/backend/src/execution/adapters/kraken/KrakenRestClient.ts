/**
 * Kraken REST API Client
 * Public market data and signed private endpoints (orders, balances)
 */

import crypto from 'node:crypto';
import {
  ExchangeRejectionError,
  type TradingError,
  TransportError,
  errorMessage,
} from '../../../common/errors';
import {
  expectRecord,
  parseAddOrderResult,
  parseAssetPairsResult,
  parseBalanceResult,
  parseDecimal,
  parseOHLCResult,
  parseQueryOrdersResult,
  parseTickerResult,
  type KrakenAddOrderRequest,
  type KrakenAssetPair,
  type KrakenCredentials,
  type KrakenOHLCRow,
  type KrakenOrderInfo,
} from './types';

const API_VERSION = '0';

/**
 * Error prefixes that mean "try again later" rather than "request refused"
 */
const TRANSIENT_ERROR_PREFIXES = ['EService:', 'EAPI:Rate limit', 'EGeneral:Internal error'];

export interface FetchInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface KrakenRestClientConfig {
  baseUrl?: string;
  timeout?: number;
  fetchFn?: FetchLike;
}

/**
 * Transient service errors are transport failures; anything else is a rejection
 */
export function classifyKrakenErrors(errors: string[]): TradingError {
  const message = `Kraken API error: ${errors.join(', ')}`;
  const transient = errors.every((error) =>
    TRANSIENT_ERROR_PREFIXES.some((prefix) => error.startsWith(prefix))
  );

  return transient
    ? new TransportError(message, { exchangeErrors: errors })
    : new ExchangeRejectionError(message, errors);
}

export class KrakenRestClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchLike;
  private lastNonce = 0;

  constructor(
    private readonly credentials: KrakenCredentials | null,
    config: KrakenRestClientConfig = {}
  ) {
    this.baseUrl = config.baseUrl || 'https://api.kraken.com';
    this.timeout = config.timeout || 10000;
    this.fetchFn = config.fetchFn || ((url, init) => fetch(url, init));
  }

  /**
   * API-Sign = base64(HMAC-SHA512(base64decode(secret), path + SHA256(nonce + postData)))
   */
  createSignature(urlPath: string, postData: string, nonce: string, privateKey: string): string {
    const digest = crypto
      .createHash('sha256')
      .update(nonce + postData)
      .digest();

    return crypto
      .createHmac('sha512', Buffer.from(privateKey, 'base64'))
      .update(Buffer.concat([Buffer.from(urlPath), digest]))
      .digest('base64');
  }

  async addOrder(request: KrakenAddOrderRequest): Promise<string[]> {
    const params: Record<string, string> = {
      pair: request.pair,
      type: request.type,
      ordertype: request.ordertype,
      volume: request.volume,
    };
    if (request.price !== undefined) {
      params.price = request.price;
    }

    return parseAddOrderResult(await this.privateRequest('AddOrder', params));
  }

  /**
   * Returns the number of orders canceled
   */
  async cancelOrder(txid: string): Promise<number> {
    const result = expectRecord(
      await this.privateRequest('CancelOrder', { txid }),
      'CancelOrder result'
    );
    return parseDecimal(result.count, 'CancelOrder count');
  }

  async queryOrders(txids: string[]): Promise<Map<string, KrakenOrderInfo>> {
    return parseQueryOrdersResult(
      await this.privateRequest('QueryOrders', { txid: txids.join(',') })
    );
  }

  async getBalance(): Promise<Map<string, number>> {
    return parseBalanceResult(await this.privateRequest('Balance', {}));
  }

  async getTicker(pairs: string[]): Promise<Map<string, number>> {
    return parseTickerResult(await this.publicRequest('Ticker', { pair: pairs.join(',') }));
  }

  async getOHLC(pair: string, intervalMinutes: number): Promise<Map<string, KrakenOHLCRow[]>> {
    return parseOHLCResult(
      await this.publicRequest('OHLC', { pair, interval: String(intervalMinutes) })
    );
  }

  async getAssetPairs(pairs: string[]): Promise<KrakenAssetPair[]> {
    const params: Record<string, string> = pairs.length > 0 ? { pair: pairs.join(',') } : {};
    return parseAssetPairsResult(await this.publicRequest('AssetPairs', params));
  }

  private async publicRequest(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}/${API_VERSION}/public/${endpoint}${query ? `?${query}` : ''}`;

    return this.send(url, { method: 'GET', headers: {} });
  }

  private async privateRequest(endpoint: string, params: Record<string, string>): Promise<unknown> {
    if (!this.credentials) {
      throw new ExchangeRejectionError('Kraken API credentials not configured');
    }

    const urlPath = `/${API_VERSION}/private/${endpoint}`;
    const nonce = this.nextNonce();
    const postData = new URLSearchParams({ nonce, ...params }).toString();

    return this.send(`${this.baseUrl}${urlPath}`, {
      method: 'POST',
      headers: {
        'API-Key': this.credentials.apiKey,
        'API-Sign': this.createSignature(urlPath, postData, nonce, this.credentials.privateKey),
        'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8',
      },
      body: postData,
    });
  }

  private async send(url: string, init: Omit<FetchInit, 'signal'>): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let status: number;
    let ok: boolean;
    let text: string;

    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError('Kraken API timeout', { url });
      }
      throw new TransportError(`Kraken API request failed: ${errorMessage(error)}`, { url });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!ok) {
      throw new TransportError(`Kraken API error: ${status} - ${text}`, { status });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new TransportError('Kraken API returned invalid JSON', { status });
    }

    const envelope = expectRecord(body, 'response envelope');
    const errors = Array.isArray(envelope.error)
      ? envelope.error.filter((entry): entry is string => typeof entry === 'string')
      : [];

    if (errors.length > 0) {
      throw classifyKrakenErrors(errors);
    }

    return envelope.result;
  }

  /**
   * Strictly increasing millisecond nonce
   */
  private nextNonce(): string {
    this.lastNonce = Math.max(Date.now(), this.lastNonce + 1);
    return String(this.lastNonce);
  }
}
