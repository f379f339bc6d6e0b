/**
 * Weighted Vote Signal Generator Tests
 * Validates vote tallying, trade levels and sizing
 */

import type { IndicatorSnapshot, PriceBar } from '@bracket-trader/shared';
import { computeIndicatorSnapshot } from '../../indicators/technical';
import {
  WeightedVoteSignalGenerator,
  calculatePositionSizePct,
  calculateTradeLevels,
  classifyScore,
  tallyVotes,
} from '../WeightedVoteSignalGenerator';

const emptySnapshot: IndicatorSnapshot = {
  rsi14: null,
  macd: null,
  macdSignal: null,
  macdHistogram: null,
  bollingerUpper: null,
  bollingerMiddle: null,
  bollingerLower: null,
  sma20: null,
  sma50: null,
  ema12: null,
  ema26: null,
};

const snapshot = (overrides: Partial<IndicatorSnapshot>): IndicatorSnapshot => ({
  ...emptySnapshot,
  ...overrides,
});

describe('WeightedVoteSignalGenerator', () => {
  describe('classifyScore', () => {
    it('should map scores onto the five directions', () => {
      expect(classifyScore(0.61)).toBe('STRONG_BUY');
      expect(classifyScore(0.31)).toBe('BUY');
      expect(classifyScore(0.3)).toBe('HOLD');
      expect(classifyScore(-0.31)).toBe('SELL');
      expect(classifyScore(-0.61)).toBe('STRONG_SELL');
    });
  });

  describe('tallyVotes', () => {
    it('should reach a unanimous STRONG_BUY when every indicator agrees', () => {
      const outcome = tallyVotes(
        snapshot({ rsi14: 25, macd: 1, macdSignal: 0.5, sma20: 105, sma50: 100 }),
        110,
        0.8,
        'HIGH'
      );

      expect(outcome?.score).toBeCloseTo(1, 10);
      expect(outcome?.direction).toBe('STRONG_BUY');
      expect(outcome?.confidence).toBeCloseTo(1, 10);
      expect(outcome?.votes.map((vote) => vote.source)).toEqual([
        'rsi',
        'macd',
        'sma',
        'trend',
        'volume',
      ]);
    });

    it('should count neutral weight against confidence', () => {
      const outcome = tallyVotes(
        snapshot({ rsi14: 75, macd: 0.5, macdSignal: 1, sma20: 105, sma50: 100 }),
        100,
        null,
        'MEDIUM'
      );

      expect(outcome?.score).toBeCloseTo(-0.55 / 0.65, 10);
      expect(outcome?.direction).toBe('STRONG_SELL');
      expect(outcome?.confidence).toBeCloseTo(0.55 / 0.65, 10);
    });

    it('should not let trend or volume vote without a lean', () => {
      const outcome = tallyVotes(snapshot({ rsi14: 50 }), 100, 0.9, 'HIGH');

      expect(outcome?.votes).toHaveLength(1);
      expect(outcome?.direction).toBe('HOLD');
      expect(outcome?.confidence).toBe(0);
    });

    it('should return null when no indicator is available', () => {
      expect(tallyVotes(emptySnapshot, 100, 0.9, 'HIGH')).toBeNull();
    });
  });

  describe('calculateTradeLevels', () => {
    it('should place a long target at twice and a stop at once the volatility factor', () => {
      const levels = calculateTradeLevels(100, 'BUY', 2, null);

      expect(levels.targetPrice).toBeCloseTo(104, 10);
      expect(levels.stopLossPrice).toBeCloseTo(98, 10);
    });

    it('should clamp the volatility factor to [0.5%, 5%]', () => {
      expect(calculateTradeLevels(100, 'BUY', null, null).stopLossPrice).toBeCloseTo(99.5, 10);
      expect(calculateTradeLevels(100, 'BUY', 10, null).stopLossPrice).toBeCloseTo(95, 10);
    });

    it('should keep the target inside resistance for longs and support for shorts', () => {
      const long = calculateTradeLevels(100, 'BUY', 2, { support: 90, resistance: 103 });
      const short = calculateTradeLevels(100, 'SELL', 2, { support: 97, resistance: 110 });

      expect(long.targetPrice).toBeCloseTo(101.97, 10);
      expect(short.targetPrice).toBeCloseTo(97.97, 10);
      expect(short.stopLossPrice).toBeCloseTo(102, 10);
    });
  });

  describe('calculatePositionSizePct', () => {
    it('should scale by confidence and damp high volatility', () => {
      expect(calculatePositionSizePct(0.75, 2)).toBeCloseTo(1.2, 10);
      expect(calculatePositionSizePct(0.75, 8)).toBeCloseTo(0.75, 10);
      expect(calculatePositionSizePct(1, null)).toBe(2);
    });
  });

  describe('generateSignal', () => {
    const generator = new WeightedVoteSignalGenerator();
    const now = new Date('2024-03-10T12:00:00.000Z');

    const createBars = (count: number, indicators: IndicatorSnapshot | null): PriceBar[] =>
      Array.from({ length: count }, (_, i) => ({
        id: `bar-${i}`,
        pairSymbol: 'XBTUSD',
        timestamp: new Date(now.getTime() - (count - i) * 60_000),
        open: 100,
        high: 110,
        low: 90,
        close: 100,
        volume: 100,
        indicators: i === count - 1 ? indicators : null,
      }));

    it('should emit a signal from the latest bar snapshot', () => {
      const bars = createBars(
        20,
        snapshot({ rsi14: 25, macd: 1, macdSignal: 0.5, sma20: 105, sma50: 100 })
      );

      const signal = generator.generateSignal('XBTUSD', bars, now);

      expect(signal).not.toBeNull();
      expect(signal?.direction).toBe('STRONG_BUY');
      expect(signal?.confidence).toBeCloseTo(0.55 / 0.65, 10);
      expect(signal?.entryPrice).toBe(100);
      expect(signal?.targetPrice).toBeCloseTo(101, 10);
      expect(signal?.stopLossPrice).toBeCloseTo(99.5, 10);
      expect(signal?.volumeRegime).toBe('MEDIUM');
      expect(signal?.supportLevel).toBe(90);
      expect(signal?.resistanceLevel).toBe(110);
      expect(signal?.strategyType).toBe('SCALP');
      expect(signal?.timeHorizonMinutes).toBe(60);
      expect(signal?.expiresAt).toEqual(new Date('2024-03-10T14:00:00.000Z'));
    });

    it('should not emit a signal below the confidence floor', () => {
      const bars = createBars(
        20,
        snapshot({ rsi14: 50, macd: 1, macdSignal: 0.5, sma20: 100, sma50: 100 })
      );

      expect(generator.generateSignal('XBTUSD', bars, now)).toBeNull();
    });

    it('should buy a steady uptrend computed from raw closes', () => {
      const bars: PriceBar[] = Array.from({ length: 60 }, (_, i) => {
        const close = 100 * 1.01 ** i;
        return {
          id: `bar-${i}`,
          pairSymbol: 'XBTUSD',
          timestamp: new Date(now.getTime() - (60 - i) * 60_000),
          open: close / 1.01,
          high: close * 1.002,
          low: close / 1.01,
          close,
          volume: 100,
          indicators: null,
        };
      });

      const computed = computeIndicatorSnapshot(bars.map((bar) => bar.close));
      expect(computed?.rsi14).toBe(100);
      expect(computed?.macdHistogram).toBeGreaterThan(0);
      expect(computed?.sma20).toBeGreaterThan(computed?.sma50 ?? Infinity);

      const signal = generator.generateSignal('XBTUSD', bars, now);

      // Overbought RSI votes against MACD, moving averages and trend
      expect(signal?.direction).toBe('BUY');
      expect(signal?.score).toBeCloseTo(0.3 / 0.9, 10);
      expect(signal?.confidence).toBeCloseTo(0.6 / 0.9, 10);
      expect(signal?.entryPrice).toBe(bars[59].close);
      expect(signal?.volumeRegime).toBe('MEDIUM');
      expect(signal?.trendStrength).toBe(1);
    });

    it('should need MIN_HISTORY_BARS when no snapshot is stored', () => {
      expect(generator.generateSignal('XBTUSD', createBars(30, null), now)).toBeNull();
      expect(generator.generateSignal('XBTUSD', [], now)).toBeNull();
    });
  });
});
