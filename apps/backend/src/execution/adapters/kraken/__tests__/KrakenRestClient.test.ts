/**
 * Kraken REST Client Tests
 * Request building, signing and error classification over a fake fetch
 */

import { ExchangeRejectionError, TransportError } from '../../../../common/errors';
import {
  type FetchInit,
  type FetchLike,
  KrakenRestClient,
  classifyKrakenErrors,
} from '../KrakenRestClient';

const CREDENTIALS = {
  apiKey: 'test-key',
  privateKey: Buffer.from('test-secret').toString('base64'),
};

interface RecordedCall {
  url: string;
  init: FetchInit;
}

function fakeFetch(
  body: string,
  status = 200
): { fetchFn: jest.Mock<ReturnType<FetchLike>, Parameters<FetchLike>>; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async (url, init) => {
    calls.push({ url, init });
    return { ok: status >= 200 && status < 300, status, text: async () => body };
  });
  return { fetchFn, calls };
}

describe('KrakenRestClient', () => {
  describe('public endpoints', () => {
    it('should request tickers and read the last trade price', async () => {
      const { fetchFn, calls } = fakeFetch(
        JSON.stringify({
          error: [],
          result: {
            XXBTZUSD: { c: ['42000.5', '0.01'] },
            XETHZUSD: { c: ['2500.25', '1'] },
          },
        })
      );
      const client = new KrakenRestClient(null, { fetchFn });

      const prices = await client.getTicker(['XBTUSD', 'ETHUSD']);

      expect(calls[0].url).toBe('https://api.kraken.com/0/public/Ticker?pair=XBTUSD%2CETHUSD');
      expect(calls[0].init.method).toBe('GET');
      expect(prices.get('XXBTZUSD')).toBe(42000.5);
      expect(prices.get('XETHZUSD')).toBe(2500.25);
    });

    it('should skip the cursor entry of an OHLC result', async () => {
      const { fetchFn, calls } = fakeFetch(
        JSON.stringify({
          error: [],
          result: {
            XXBTZUSD: [[1700000000, '100', '101', '99', '100.5', '100.2', '3.5', 12]],
            last: 1700000000,
          },
        })
      );
      const client = new KrakenRestClient(null, { baseUrl: 'http://kraken.test', fetchFn });

      const series = await client.getOHLC('XBTUSD', 1);

      expect(calls[0].url).toBe('http://kraken.test/0/public/OHLC?pair=XBTUSD&interval=1');
      expect([...series.keys()]).toEqual(['XXBTZUSD']);
      expect(series.get('XXBTZUSD')).toEqual([
        {
          time: 1700000000,
          open: 100,
          high: 101,
          low: 99,
          close: 100.5,
          vwap: 100.2,
          volume: 3.5,
          count: 12,
        },
      ]);
    });
  });

  describe('private endpoints', () => {
    it('should sign an AddOrder request', async () => {
      const { fetchFn, calls } = fakeFetch(
        JSON.stringify({ error: [], result: { txid: ['OTX-1'] } })
      );
      const client = new KrakenRestClient(CREDENTIALS, { fetchFn });

      const txids = await client.addOrder({
        pair: 'XBTUSD',
        type: 'buy',
        ordertype: 'limit',
        volume: '0.5',
        price: '100',
      });

      expect(txids).toEqual(['OTX-1']);

      const { url, init } = calls[0];
      expect(url).toBe('https://api.kraken.com/0/private/AddOrder');
      expect(init.method).toBe('POST');
      expect(init.headers['API-Key']).toBe('test-key');

      const body = new URLSearchParams(init.body);
      expect(body.get('pair')).toBe('XBTUSD');
      expect(body.get('ordertype')).toBe('limit');
      expect(body.get('volume')).toBe('0.5');
      expect(body.get('price')).toBe('100');

      const nonce = body.get('nonce') ?? '';
      expect(init.headers['API-Sign']).toBe(
        client.createSignature('/0/private/AddOrder', init.body ?? '', nonce, CREDENTIALS.privateKey)
      );
    });

    it('should use strictly increasing nonces', async () => {
      const { fetchFn, calls } = fakeFetch(JSON.stringify({ error: [], result: { ZUSD: '10' } }));
      const client = new KrakenRestClient(CREDENTIALS, { fetchFn });

      await client.getBalance();
      await client.getBalance();

      const nonces = calls.map((call) => Number(new URLSearchParams(call.init.body).get('nonce')));
      expect(nonces[1]).toBeGreaterThan(nonces[0]);
    });

    it('should parse balances', async () => {
      const { fetchFn } = fakeFetch(
        JSON.stringify({ error: [], result: { ZUSD: '1000.5000', XXBT: '0.25' } })
      );
      const client = new KrakenRestClient(CREDENTIALS, { fetchFn });

      const balances = await client.getBalance();

      expect(balances.get('ZUSD')).toBe(1000.5);
      expect(balances.get('XXBT')).toBe(0.25);
    });

    it('should refuse private calls without credentials', async () => {
      const { fetchFn } = fakeFetch('{}');
      const client = new KrakenRestClient(null, { fetchFn });

      await expect(client.getBalance()).rejects.toBeInstanceOf(ExchangeRejectionError);
      expect(fetchFn).not.toHaveBeenCalled();
    });
  });

  describe('errors', () => {
    it('should treat an HTTP failure as a transport error', async () => {
      const { fetchFn } = fakeFetch('Bad Gateway', 502);
      const client = new KrakenRestClient(null, { fetchFn });

      const failure = client.getTicker(['XBTUSD']);

      await expect(failure).rejects.toBeInstanceOf(TransportError);
      await expect(failure).rejects.toThrow('Kraken API error: 502 - Bad Gateway');
    });

    it('should treat a network failure as a transport error', async () => {
      const fetchFn: FetchLike = async () => {
        throw new Error('socket hang up');
      };
      const client = new KrakenRestClient(null, { fetchFn });

      await expect(client.getTicker(['XBTUSD'])).rejects.toThrow(
        'Kraken API request failed: socket hang up'
      );
    });

    it('should reject a body that is not JSON', async () => {
      const { fetchFn } = fakeFetch('<html>');
      const client = new KrakenRestClient(null, { fetchFn });

      await expect(client.getTicker(['XBTUSD'])).rejects.toThrow('Kraken API returned invalid JSON');
    });

    it('should surface an order rejection', async () => {
      const { fetchFn } = fakeFetch(
        JSON.stringify({ error: ['EOrder:Insufficient funds'], result: {} })
      );
      const client = new KrakenRestClient(CREDENTIALS, { fetchFn });

      const failure = client.addOrder({
        pair: 'XBTUSD',
        type: 'buy',
        ordertype: 'market',
        volume: '1',
      });

      await expect(failure).rejects.toBeInstanceOf(ExchangeRejectionError);
      await expect(failure).rejects.toThrow('Kraken API error: EOrder:Insufficient funds');
    });

    it('should reject a malformed ticker payload', async () => {
      const { fetchFn } = fakeFetch(JSON.stringify({ error: [], result: { XXBTZUSD: { c: [] } } }));
      const client = new KrakenRestClient(null, { fetchFn });

      await expect(client.getTicker(['XBTUSD'])).rejects.toThrow(
        'Kraken API returned malformed ticker last trade'
      );
    });
  });

  describe('classifyKrakenErrors', () => {
    it('should classify service errors as transient', () => {
      expect(classifyKrakenErrors(['EService:Unavailable'])).toBeInstanceOf(TransportError);
      expect(classifyKrakenErrors(['EAPI:Rate limit exceeded'])).toBeInstanceOf(TransportError);
    });

    it('should classify a mix of errors as a rejection', () => {
      const error = classifyKrakenErrors(['EService:Busy', 'EOrder:Invalid price']);

      expect(error).toBeInstanceOf(ExchangeRejectionError);
      expect(error.message).toBe('Kraken API error: EService:Busy, EOrder:Invalid price');
    });
  });
});
