/**
 * Weighted Vote Signal Generator
 * Scalping signals from a weighted vote of RSI, MACD, moving averages,
 * trend strength and volume
 */

import type {
  IndicatorSnapshot,
  PriceBar,
  SignalDirection,
  VolumeRegime,
} from '@bracket-trader/shared';
import {
  calculateTrendStrength,
  calculateVolatility,
  classifyVolumeRegime,
  computeIndicatorSnapshot,
  findSupportResistance,
} from '../indicators/technical';
import type { SignalCandidate, SignalGenerator } from './SignalGenerator';

export const SIGNAL_WEIGHTS = {
  rsi: 0.3,
  rsiNeutral: 0.1,
  macd: 0.25,
  movingAverages: 0.2,
  movingAveragesNeutral: 0.1,
  trend: 0.15,
  volume: 0.1,
} as const;

export const SIGNAL_THRESHOLD = 0.3;
export const STRONG_SIGNAL_THRESHOLD = 0.6;
export const MIN_SIGNAL_CONFIDENCE = 0.6;

const RSI_OVERSOLD = 30;
const RSI_OVERBOUGHT = 70;
const TREND_CONFIRMATION = 0.7;

const BASE_POSITION_SIZE_PCT = 2;
const MAX_POSITION_SIZE_PCT = 5;
const SIGNAL_TTL_MS = 2 * 60 * 60 * 1000;
const TIME_HORIZON_MINUTES = 60;

type Vote = -1 | 0 | 1;

interface WeightedVote {
  source: string;
  vote: Vote;
  weight: number;
}

export interface VoteOutcome {
  score: number;
  confidence: number;
  direction: SignalDirection;
  votes: WeightedVote[];
}

export interface TradeLevels {
  targetPrice: number;
  stopLossPrice: number;
}

function sign(value: number): Vote {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function classifyScore(score: number): SignalDirection {
  if (score > STRONG_SIGNAL_THRESHOLD) return 'STRONG_BUY';
  if (score > SIGNAL_THRESHOLD) return 'BUY';
  if (score < -STRONG_SIGNAL_THRESHOLD) return 'STRONG_SELL';
  if (score < -SIGNAL_THRESHOLD) return 'SELL';
  return 'HOLD';
}

export function isBullish(direction: SignalDirection): boolean {
  return direction === 'BUY' || direction === 'STRONG_BUY';
}

/**
 * Tally votes from every available indicator.
 * Trend and volume only confirm a direction the other indicators already lean towards.
 */
export function tallyVotes(
  snapshot: IndicatorSnapshot,
  price: number,
  trendStrength: number | null,
  volumeRegime: VolumeRegime | null
): VoteOutcome | null {
  const votes: WeightedVote[] = [];

  if (snapshot.rsi14 !== null) {
    if (snapshot.rsi14 < RSI_OVERSOLD) {
      votes.push({ source: 'rsi', vote: 1, weight: SIGNAL_WEIGHTS.rsi });
    } else if (snapshot.rsi14 > RSI_OVERBOUGHT) {
      votes.push({ source: 'rsi', vote: -1, weight: SIGNAL_WEIGHTS.rsi });
    } else {
      votes.push({ source: 'rsi', vote: 0, weight: SIGNAL_WEIGHTS.rsiNeutral });
    }
  }

  if (snapshot.macd !== null && snapshot.macdSignal !== null) {
    votes.push({
      source: 'macd',
      vote: snapshot.macd > snapshot.macdSignal ? 1 : -1,
      weight: SIGNAL_WEIGHTS.macd,
    });
  }

  if (snapshot.sma20 !== null && snapshot.sma50 !== null) {
    if (snapshot.sma20 > snapshot.sma50 && price > snapshot.sma20) {
      votes.push({ source: 'sma', vote: 1, weight: SIGNAL_WEIGHTS.movingAverages });
    } else if (snapshot.sma20 < snapshot.sma50 && price < snapshot.sma20) {
      votes.push({ source: 'sma', vote: -1, weight: SIGNAL_WEIGHTS.movingAverages });
    } else {
      votes.push({ source: 'sma', vote: 0, weight: SIGNAL_WEIGHTS.movingAveragesNeutral });
    }
  }

  const lean = sign(votes.reduce((acc, v) => acc + v.vote * v.weight, 0));
  if (lean !== 0) {
    if (trendStrength !== null && trendStrength > TREND_CONFIRMATION) {
      votes.push({ source: 'trend', vote: lean, weight: SIGNAL_WEIGHTS.trend });
    }
    if (volumeRegime === 'HIGH') {
      votes.push({ source: 'volume', vote: lean, weight: SIGNAL_WEIGHTS.volume });
    }
  }

  const totalWeight = votes.reduce((acc, v) => acc + v.weight, 0);
  if (totalWeight === 0) {
    return null;
  }

  const score = votes.reduce((acc, v) => acc + v.vote * v.weight, 0) / totalWeight;
  const direction = classifyScore(score);
  const side = sign(score);
  const agreeingWeight = votes
    .filter((v) => side !== 0 && v.vote === side)
    .reduce((acc, v) => acc + v.weight, 0);

  return {
    score,
    confidence: clamp(agreeingWeight / totalWeight, 0, 1),
    direction,
    votes,
  };
}

/**
 * Target at 2x and stop at 1x a volatility factor clamped to [0.5%, 5%],
 * with the target kept 1% inside resistance (longs) or support (shorts)
 */
export function calculateTradeLevels(
  entryPrice: number,
  direction: SignalDirection,
  volatility: number | null,
  levels: { support: number; resistance: number } | null
): TradeLevels {
  const volFactor = clamp((volatility ?? 0) / 100, 0.005, 0.05);

  if (isBullish(direction)) {
    let targetPrice = entryPrice * (1 + 2 * volFactor);
    if (levels && levels.resistance > entryPrice) {
      targetPrice = Math.min(targetPrice, levels.resistance * 0.99);
    }
    return { targetPrice, stopLossPrice: entryPrice * (1 - volFactor) };
  }

  let targetPrice = entryPrice * (1 - 2 * volFactor);
  if (levels && levels.support < entryPrice) {
    targetPrice = Math.max(targetPrice, levels.support * 1.01);
  }
  return { targetPrice, stopLossPrice: entryPrice * (1 + volFactor) };
}

/**
 * Percentage of balance: 2% base scaled by confidence, damped at high volatility, capped at 5%
 */
export function calculatePositionSizePct(confidence: number, volatility: number | null): number {
  const volatilityFactor = Math.max(0.5, 1 - (volatility ?? 0) / 10);
  return Math.min(BASE_POSITION_SIZE_PCT * confidence * volatilityFactor, MAX_POSITION_SIZE_PCT);
}

export class WeightedVoteSignalGenerator implements SignalGenerator {
  generateSignal(pairSymbol: string, bars: PriceBar[], now: Date): SignalCandidate | null {
    const latest = bars[bars.length - 1];
    if (!latest) {
      return null;
    }

    const closes = bars.map((bar) => bar.close);
    const snapshot = latest.indicators ?? computeIndicatorSnapshot(closes);
    if (!snapshot) {
      return null;
    }

    const trendStrength = calculateTrendStrength(closes, 20);
    const volatility = calculateVolatility(closes, 20);
    const volumeRegime = classifyVolumeRegime(
      bars.map((bar) => bar.volume),
      20
    );
    const levels = findSupportResistance(
      bars.map((bar) => bar.high),
      bars.map((bar) => bar.low),
      20
    );

    const entryPrice = latest.close;
    const outcome = tallyVotes(snapshot, entryPrice, trendStrength, volumeRegime);

    if (
      !outcome ||
      outcome.direction === 'HOLD' ||
      outcome.confidence < MIN_SIGNAL_CONFIDENCE
    ) {
      return null;
    }

    const { targetPrice, stopLossPrice } = calculateTradeLevels(
      entryPrice,
      outcome.direction,
      volatility,
      levels
    );

    return {
      pairSymbol,
      direction: outcome.direction,
      score: outcome.score,
      confidence: outcome.confidence,
      entryPrice,
      targetPrice,
      stopLossPrice,
      trendStrength,
      volatility,
      volumeRegime,
      supportLevel: levels?.support ?? null,
      resistanceLevel: levels?.resistance ?? null,
      positionSizePct: calculatePositionSizePct(outcome.confidence, volatility),
      strategyType: 'SCALP',
      timeHorizonMinutes: TIME_HORIZON_MINUTES,
      createdAt: now,
      expiresAt: new Date(now.getTime() + SIGNAL_TTL_MS),
    };
  }
}
