/**
 * Technical Indicators
 * Pure functions over chronologically ordered series (oldest first).
 * Below an indicator's minimum sample count the result is null (unavailable).
 */

import type { IndicatorSnapshot, VolumeRegime } from '@bracket-trader/shared';

/**
 * Bars of history required before an IndicatorSnapshot is computed
 */
export const MIN_HISTORY_BARS = 50;

/**
 * Hourly samples per year, for annualizing volatility
 */
const ANNUALIZATION_FACTOR = Math.sqrt(365 * 24);

const TREND_SCALE = 1000;

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
}

export interface SupportResistance {
  support: number;
  resistance: number;
}

function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

function mean(values: number[]): number {
  return sum(values) / values.length;
}

/**
 * Standard deviation; ddof 1 for the sample estimate, 0 for the population
 */
function standardDeviation(values: number[], ddof: 0 | 1): number {
  const avg = mean(values);
  const squared = values.reduce((acc, value) => acc + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - ddof));
}

/**
 * Span-adjusted exponential moving average for every point of the series.
 * alpha = 2 / (span + 1); each point is the weighted mean of all earlier
 * points with weights (1 - alpha)^age.
 */
export function emaSeries(values: number[], span: number): number[] {
  const decay = 1 - 2 / (span + 1);
  const result: number[] = [];
  let numerator = 0;
  let denominator = 0;

  for (const value of values) {
    numerator = value + decay * numerator;
    denominator = 1 + decay * denominator;
    result.push(numerator / denominator);
  }

  return result;
}

export function calculateSma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) {
    return null;
  }
  return mean(values.slice(-period));
}

export function calculateEma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) {
    return null;
  }
  const series = emaSeries(values, period);
  return series[series.length - 1] ?? null;
}

/**
 * RSI over the last `period` price changes
 */
export function calculateRsi(closes: number[], period = 14): number | null {
  if (period <= 0 || closes.length < period + 1) {
    return null;
  }

  const window = closes.slice(-(period + 1));
  let gains = 0;
  let losses = 0;

  for (let i = 1; i < window.length; i++) {
    const delta = window[i] - window[i - 1];
    if (delta > 0) {
      gains += delta;
    } else {
      losses -= delta;
    }
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;

  if (avgLoss === 0) {
    return 100;
  }

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function calculateMacd(
  closes: number[],
  fast = 12,
  slow = 26,
  signal = 9
): MacdResult | null {
  if (closes.length < slow + signal) {
    return null;
  }

  const fastSeries = emaSeries(closes, fast);
  const slowSeries = emaSeries(closes, slow);
  const macdSeries = fastSeries.map((value, i) => value - slowSeries[i]);
  const signalSeries = emaSeries(macdSeries, signal);

  const last = closes.length - 1;
  const macd = macdSeries[last];
  const signalValue = signalSeries[last];

  return {
    macd,
    signal: signalValue,
    histogram: macd - signalValue,
  };
}

export function calculateBollingerBands(
  closes: number[],
  period = 20,
  k = 2
): BollingerBands | null {
  if (period < 2 || closes.length < period) {
    return null;
  }

  const window = closes.slice(-period);
  const middle = mean(window);
  const deviation = standardDeviation(window, 1);

  return {
    upper: middle + k * deviation,
    middle,
    lower: middle - k * deviation,
  };
}

/**
 * Annualized volatility of log returns (hourly sampling assumed)
 */
export function calculateVolatility(closes: number[], period = 20): number | null {
  if (period <= 0 || closes.length < period + 1) {
    return null;
  }

  const window = closes.slice(-(period + 1));
  if (window.some((price) => price <= 0)) {
    return null;
  }

  const returns: number[] = [];
  for (let i = 1; i < window.length; i++) {
    returns.push(Math.log(window[i] / window[i - 1]));
  }

  return standardDeviation(returns, 0) * ANNUALIZATION_FACTOR;
}

/**
 * Least-squares slope over the window, relative to mean price, scaled into [0, 1]
 */
export function calculateTrendStrength(closes: number[], period = 20): number | null {
  if (period < 2 || closes.length < period) {
    return null;
  }

  const window = closes.slice(-period);
  const avgPrice = mean(window);
  if (avgPrice === 0) {
    return null;
  }

  const avgX = (period - 1) / 2;
  let covariance = 0;
  let varianceX = 0;
  window.forEach((price, x) => {
    covariance += (x - avgX) * (price - avgPrice);
    varianceX += (x - avgX) ** 2;
  });

  const slope = covariance / varianceX;
  return Math.min(Math.abs(slope / avgPrice) * TREND_SCALE, 1);
}

export function classifyVolumeRegime(volumes: number[], period = 20): VolumeRegime | null {
  if (period <= 0 || volumes.length < period) {
    return null;
  }

  const avgVolume = mean(volumes.slice(-period));
  if (avgVolume <= 0) {
    return 'LOW';
  }

  const ratio = volumes[volumes.length - 1] / avgVolume;
  if (ratio > 1.5) {
    return 'HIGH';
  }
  if (ratio > 0.8) {
    return 'MEDIUM';
  }
  return 'LOW';
}

export function findSupportResistance(
  highs: number[],
  lows: number[],
  lookback = 20
): SupportResistance | null {
  if (lookback <= 0 || highs.length < lookback || lows.length < lookback) {
    return null;
  }

  return {
    support: Math.min(...lows.slice(-lookback)),
    resistance: Math.max(...highs.slice(-lookback)),
  };
}

/**
 * Snapshot for the latest bar; null until MIN_HISTORY_BARS closes exist
 */
export function computeIndicatorSnapshot(closes: number[]): IndicatorSnapshot | null {
  if (closes.length < MIN_HISTORY_BARS) {
    return null;
  }

  const macd = calculateMacd(closes);
  const bands = calculateBollingerBands(closes);

  return {
    rsi14: calculateRsi(closes, 14),
    macd: macd?.macd ?? null,
    macdSignal: macd?.signal ?? null,
    macdHistogram: macd?.histogram ?? null,
    bollingerUpper: bands?.upper ?? null,
    bollingerMiddle: bands?.middle ?? null,
    bollingerLower: bands?.lower ?? null,
    sma20: calculateSma(closes, 20),
    sma50: calculateSma(closes, 50),
    ema12: calculateEma(closes, 12),
    ema26: calculateEma(closes, 26),
  };
}
