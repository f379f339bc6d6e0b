/**
 * Pair Service Tests
 */

import { FakeExchange } from '../../../__tests__/support/fakeExchange';
import { buildPair } from '../../../__tests__/support/fixtures';
import { InMemoryPairStore } from '../../../__tests__/support/inMemoryStores';
import { PairService } from '../PairService';

describe('PairService', () => {
  let pairs: InMemoryPairStore;
  let exchange: FakeExchange;
  let service: PairService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    pairs = new InMemoryPairStore();
    exchange = new FakeExchange();
    exchange.assetPairs = [
      {
        symbol: 'XBTUSD',
        baseAsset: 'XXBT',
        quoteAsset: 'ZUSD',
        minOrderSize: 0.0001,
        pricePrecision: 1,
        volumePrecision: 8,
      },
    ];
    service = new PairService(pairs, exchange);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create rows from exchange metadata and report unknown symbols', async () => {
    const result = await service.initializePairs(['XBTUSD', 'NOPEUSD']);

    expect(result.missing).toEqual(['NOPEUSD']);
    expect(result.pairs.map((pair) => pair.symbol)).toEqual(['XBTUSD']);

    const stored = await pairs.findBySymbol('XBTUSD');
    expect(stored?.minOrderSize).toBe(0.0001);
    expect(stored?.pricePrecision).toBe(1);
    expect(stored?.isActive).toBe(true);
  });

  it('should leave an existing pair as it is', async () => {
    pairs = new InMemoryPairStore([buildPair({ minOrderSize: 0.5, isActive: false })]);
    service = new PairService(pairs, exchange);

    const result = await service.initializePairs(['XBTUSD']);

    expect(result.pairs[0].minOrderSize).toBe(0.5);
    expect(result.pairs[0].isActive).toBe(false);
  });
});
