/**
 * Configuration Tests
 */

import { DEFAULT_TRADING_PAIRS, loadConfig, parseCloseMode, parsePairs } from '../config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.kraken).toEqual({
      credentials: null,
      baseUrl: 'https://api.kraken.com',
      timeoutMs: 10_000,
      minRequestIntervalMs: 1000,
    });
    expect(config.tradingPairs).toEqual(DEFAULT_TRADING_PAIRS);
    expect(config.closeMode).toBe('CONFIRM');
    expect(config.trailingStopPct).toBeNull();
    expect(config.quoteAsset).toBe('ZUSD');
    expect(config.maxPositionSizePct).toBe(5);
    expect(config.maxDailyLossPct).toBe(2);
    expect(config.maxSignalsPerCycle).toBe(3);
    expect(config.minOrderUsd).toBe(50);
    expect(config.intervalsSeconds).toEqual({
      MARKET_DATA: 60,
      SIGNALS: 300,
      RECONCILIATION: 30,
      PORTFOLIO: 180,
    });
    expect(config.flattenOnDailyLoss).toBe(false);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      KRAKEN_API_KEY: 'test-key',
      KRAKEN_PRIVATE_KEY: 'test-secret',
      TRADING_PAIRS: 'xbtusd, ethusd',
      CLOSE_MODE: 'optimistic',
      TRAILING_STOP_PCT: '1.5',
      FLATTEN_ON_DAILY_LOSS: 'true',
    });

    expect(config.port).toBe(8080);
    expect(config.kraken.credentials).toEqual({ apiKey: 'test-key', privateKey: 'test-secret' });
    expect(config.tradingPairs).toEqual(['XBTUSD', 'ETHUSD']);
    expect(config.closeMode).toBe('OPTIMISTIC');
    expect(config.trailingStopPct).toBe(1.5);
    expect(config.flattenOnDailyLoss).toBe(true);
  });

  it('should reject a non-numeric value', () => {
    expect(() => loadConfig({ MIN_ORDER_USD: 'fifty' })).toThrow(
      'MIN_ORDER_USD must be a number, got "fifty"'
    );
  });
});

describe('parseCloseMode', () => {
  it('should reject unknown modes', () => {
    expect(() => parseCloseMode('LAZY')).toThrow('CLOSE_MODE must be CONFIRM or OPTIMISTIC');
  });
});

describe('parsePairs', () => {
  it('should drop blanks and duplicates', () => {
    expect(parsePairs('XBTUSD,,xbtusd, SOLUSD ')).toEqual(['XBTUSD', 'SOLUSD']);
  });
});
