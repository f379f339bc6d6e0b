/**
 * Builders for domain rows used across tests
 */

import type { Portfolio, Position, TradingPair, TradingSignal } from '@bracket-trader/shared';

export const TEST_NOW = new Date('2024-03-10T12:00:00.000Z');

export function buildPair(overrides: Partial<TradingPair> = {}): TradingPair {
  return {
    symbol: 'XBTUSD',
    baseAsset: 'XXBT',
    quoteAsset: 'ZUSD',
    minOrderSize: 0.0001,
    pricePrecision: 1,
    volumePrecision: 8,
    isActive: true,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function buildSignal(overrides: Partial<TradingSignal> = {}): TradingSignal {
  return {
    id: 'signal-1',
    pairSymbol: 'XBTUSD',
    direction: 'BUY',
    score: 0.5,
    confidence: 0.75,
    entryPrice: 100,
    targetPrice: 104,
    stopLossPrice: 98,
    trendStrength: 0.4,
    volatility: 1.5,
    volumeRegime: 'MEDIUM',
    supportLevel: 95,
    resistanceLevel: 110,
    positionSizePct: 1.5,
    strategyType: 'SCALP',
    timeHorizonMinutes: 60,
    isActive: true,
    consumedAt: null,
    createdAt: new Date(TEST_NOW.getTime() - 60_000),
    expiresAt: new Date(TEST_NOW.getTime() + 2 * 60 * 60 * 1000),
    ...overrides,
  };
}

export function buildPosition(overrides: Partial<Position> = {}): Position {
  return {
    id: 'position-seed',
    pairSymbol: 'XBTUSD',
    signalId: null,
    entryOrderId: 'order-seed',
    side: 'LONG',
    amount: 1,
    remainingAmount: 1,
    entryPrice: 100,
    currentPrice: 100,
    stopLossPrice: 98,
    takeProfitPrice: 104,
    realizedPnl: 0,
    unrealizedPnl: 0,
    fees: 0,
    maxFavorableExcursion: 0,
    maxAdverseExcursion: 0,
    trailingStopDistance: null,
    bracketState: 'PROTECTED',
    isOpen: true,
    closeReason: null,
    closeOrderId: null,
    openedAt: new Date('2024-03-10T08:00:00.000Z'),
    filledAt: new Date('2024-03-10T08:01:00.000Z'),
    closedAt: null,
    updatedAt: new Date('2024-03-10T08:01:00.000Z'),
    ...overrides,
  };
}

export function buildPortfolio(overrides: Partial<Portfolio> = {}): Portfolio {
  return {
    id: 'portfolio-1',
    balance: 10000,
    availableBalance: 10000,
    lockedBalance: 0,
    quoteAsset: 'ZUSD',
    maxPositionSizePct: 5,
    maxDailyLossPct: 2,
    realizedPnl: 0,
    unrealizedPnl: 0,
    totalPnl: 0,
    dailyPnl: 0,
    totalTrades: 0,
    winningTrades: 0,
    losingTrades: 0,
    winRate: 0,
    averageWin: 0,
    averageLoss: 0,
    profitFactor: 0,
    peakPnl: 0,
    currentDrawdown: 0,
    maxDrawdown: 0,
    openPositions: 0,
    totalExposure: 0,
    updatedAt: TEST_NOW,
    ...overrides,
  };
}
