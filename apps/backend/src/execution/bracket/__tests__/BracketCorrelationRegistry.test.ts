/**
 * Bracket Correlation Registry Tests
 */

import { BracketCorrelationRegistry, type BracketCorrelation } from '../BracketCorrelationRegistry';

const correlation: BracketCorrelation = {
  entryOrderId: 'order-1',
  positionId: 'position-1',
  signalId: 'signal-1',
  side: 'LONG',
  amount: 1,
  stopLossPrice: 98,
  takeProfitPrice: 104,
};

describe('BracketCorrelationRegistry', () => {
  let registry: BracketCorrelationRegistry;

  beforeEach(() => {
    registry = new BracketCorrelationRegistry();
    registry.register(correlation);
  });

  it('should look up a registered correlation by entry order id', () => {
    expect(registry.get('order-1')).toEqual(correlation);
    expect(registry.has('order-1')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('should hand out a correlation to only the first taker', () => {
    expect(registry.take('order-1')).toEqual(correlation);
    expect(registry.take('order-1')).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('should drop everything on clear', () => {
    registry.clear();
    expect(registry.has('order-1')).toBe(false);
  });
});
