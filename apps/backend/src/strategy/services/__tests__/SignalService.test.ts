/**
 * Signal Service Tests
 */

import type { PriceBar } from '@bracket-trader/shared';
import { TEST_NOW, buildPair, buildSignal } from '../../../__tests__/support/fixtures';
import {
  InMemoryPairStore,
  InMemoryPriceBarStore,
  InMemorySignalStore,
} from '../../../__tests__/support/inMemoryStores';
import type { SignalCandidate, SignalGenerator } from '../../signals/SignalGenerator';
import { SignalService } from '../SignalService';

const candidateFor = (pairSymbol: string): SignalCandidate => {
  const { id: _id, isActive: _isActive, consumedAt: _consumedAt, ...candidate } = buildSignal({
    pairSymbol,
  });
  return candidate;
};

describe('SignalService', () => {
  let signals: InMemorySignalStore;
  let generateSignal: jest.Mock<SignalCandidate | null, [string, PriceBar[], Date]>;
  let service: SignalService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    signals = new InMemorySignalStore();
    generateSignal = jest.fn<SignalCandidate | null, [string, PriceBar[], Date]>();
    const generator: SignalGenerator = { generateSignal };
    service = new SignalService(
      new InMemoryPairStore([buildPair(), buildPair({ symbol: 'ETHUSD' })]),
      new InMemoryPriceBarStore(),
      signals,
      generator
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should persist the candidates the generator returns', async () => {
    generateSignal.mockImplementation((pair) => (pair === 'XBTUSD' ? candidateFor(pair) : null));

    const result = await service.generateSignals(TEST_NOW);

    expect(result.signals).toHaveLength(1);
    expect(result.signals[0].id).toBe('signal-1');
    expect(result.signals[0].pairSymbol).toBe('XBTUSD');
    expect(result.signals[0].consumedAt).toBeNull();
    expect(generateSignal).toHaveBeenCalledTimes(2);
  });

  it('should deactivate expired signals first', async () => {
    signals.insert(
      buildSignal({ id: 'stale', expiresAt: new Date(TEST_NOW.getTime() - 1000) })
    );
    generateSignal.mockReturnValue(null);

    const result = await service.generateSignals(TEST_NOW);

    expect(result.expired).toBe(1);
    expect(signals.rows.get('stale')?.isActive).toBe(false);
  });

  it('should keep going when one pair fails', async () => {
    generateSignal.mockImplementation((pair) => {
      if (pair === 'ETHUSD') {
        throw new Error('bad bars');
      }
      return candidateFor(pair);
    });

    const result = await service.generateSignals(TEST_NOW);

    expect(result.signals.map((signal) => signal.pairSymbol)).toEqual(['XBTUSD']);
    expect(result.failures.map((failure) => failure.pairSymbol)).toEqual(['ETHUSD']);
    expect(result.failures[0].error.message).toBe('bad bars');
  });
});
