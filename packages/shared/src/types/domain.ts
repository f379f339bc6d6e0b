/**
 * Domain Types
 * Source of truth for all trading entities shared across services.
 */

// ============================================================================
// Market Domain
// ============================================================================

export interface TradingPair {
  symbol: string; // Exchange pair name, e.g. XBTUSD
  baseAsset: string;
  quoteAsset: string;
  minOrderSize: number;
  pricePrecision: number; // Decimal places for prices
  volumePrecision: number; // Decimal places for amounts
  isActive: boolean;
  createdAt: Date;
}

/**
 * Technical indicators attached to the latest bar of a pair.
 * A null field means the indicator is unavailable, never zero.
 */
export interface IndicatorSnapshot {
  rsi14: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdHistogram: number | null;
  bollingerUpper: number | null;
  bollingerMiddle: number | null;
  bollingerLower: number | null;
  sma20: number | null;
  sma50: number | null;
  ema12: number | null;
  ema26: number | null;
}

export interface PriceBar {
  id: string;
  pairSymbol: string;
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  indicators: IndicatorSnapshot | null;
}

// ============================================================================
// Signal Domain
// ============================================================================

export type SignalDirection = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';

export type VolumeRegime = 'HIGH' | 'MEDIUM' | 'LOW';

export type StrategyType = 'SCALP';

export interface TradingSignal {
  id: string;
  pairSymbol: string;
  direction: SignalDirection;
  score: number; // Weighted vote in [-1, 1]
  confidence: number; // [0, 1]
  entryPrice: number;
  targetPrice: number;
  stopLossPrice: number;
  trendStrength: number | null;
  volatility: number | null;
  volumeRegime: VolumeRegime | null;
  supportLevel: number | null;
  resistanceLevel: number | null;
  positionSizePct: number;
  strategyType: StrategyType;
  timeHorizonMinutes: number;
  isActive: boolean;
  consumedAt: Date | null;
  createdAt: Date;
  expiresAt: Date;
}

// ============================================================================
// Order Domain
// ============================================================================

export type OrderSide = 'BUY' | 'SELL';

export type OrderKind = 'MARKET' | 'LIMIT' | 'STOP_LOSS';

/**
 * Position within a bracket: the entry, its two protective children,
 * or the market order that flattens the position.
 */
export type OrderRole = 'ENTRY' | 'STOP_LOSS' | 'TAKE_PROFIT' | 'CLOSE';

export type OrderStatus = 'PENDING' | 'OPEN' | 'CLOSED' | 'CANCELED' | 'EXPIRED';

export interface Order {
  id: string;
  pairSymbol: string;
  positionId: string | null;
  role: OrderRole;
  side: OrderSide;
  kind: OrderKind;
  amount: number;
  price: number | null;
  status: OrderStatus;
  exchangeOrderId: string | null; // Null until acknowledged by the exchange
  filledAmount: number;
  avgFillPrice: number | null;
  fee: number;
  parentOrderId: string | null; // Entry order, for protective and close orders
  stopLossOrderId: string | null; // Set on entry orders only
  takeProfitOrderId: string | null; // Set on entry orders only
  createdAt: Date;
  updatedAt: Date;
}

// ============================================================================
// Position Domain
// ============================================================================

export type PositionSide = 'LONG' | 'SHORT';

/**
 * Bracket lifecycle
 * SIGNALED → ENTRY_PLACED → ENTRY_FILLED → PROTECTED → (CLOSING →) CLOSED
 *                          ↓ CANCELED
 */
export type BracketState =
  | 'SIGNALED'
  | 'ENTRY_PLACED'
  | 'ENTRY_FILLED'
  | 'PROTECTED'
  | 'CLOSING'
  | 'CLOSED'
  | 'CANCELED';

export type CloseReason = 'STOP_LOSS' | 'TAKE_PROFIT' | 'MANUAL' | 'RISK' | 'ENTRY_CANCELED';

export interface Position {
  id: string;
  pairSymbol: string;
  signalId: string | null;
  entryOrderId: string;
  side: PositionSide;
  amount: number; // Requested, then filled amount once the entry resolves
  remainingAmount: number;
  entryPrice: number;
  currentPrice: number | null;
  stopLossPrice: number;
  takeProfitPrice: number;
  realizedPnl: number;
  unrealizedPnl: number;
  fees: number;
  maxFavorableExcursion: number;
  maxAdverseExcursion: number;
  trailingStopDistance: number | null;
  bracketState: BracketState;
  isOpen: boolean;
  closeReason: CloseReason | null;
  closeOrderId: string | null;
  openedAt: Date;
  filledAt: Date | null;
  closedAt: Date | null;
  updatedAt: Date;
}

// ============================================================================
// Portfolio Domain
// ============================================================================

export interface PortfolioLimits {
  maxPositionSizePct: number;
  maxDailyLossPct: number;
}

export interface PortfolioMetrics {
  realizedPnl: number;
  unrealizedPnl: number;
  totalPnl: number;
  dailyPnl: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number; // Percentage
  averageWin: number;
  averageLoss: number;
  profitFactor: number;
  peakPnl: number;
  currentDrawdown: number;
  maxDrawdown: number;
  openPositions: number;
  totalExposure: number;
}

export interface Portfolio extends PortfolioMetrics, PortfolioLimits {
  id: string;
  balance: number;
  availableBalance: number;
  lockedBalance: number;
  quoteAsset: string;
  updatedAt: Date;
}

// ============================================================================
// Risk Domain
// ============================================================================

export type RiskSeverity = 'LOW' | 'MEDIUM' | 'HIGH';

export type RiskAlertType = 'DAILY_LOSS_LIMIT' | 'POSITION_SIZE' | 'TOTAL_EXPOSURE';

export interface RiskAlert {
  type: RiskAlertType;
  severity: Exclude<RiskSeverity, 'LOW'>;
  message: string;
  positionId: string | null;
  value: number;
  limit: number;
}

export interface RiskReport {
  status: RiskSeverity;
  alerts: RiskAlert[];
  dailyPnl: number;
  totalExposure: number;
  exposurePct: number;
  evaluatedAt: Date;
}

// ============================================================================
// Scheduler Domain
// ============================================================================

export type CycleActivity = 'MARKET_DATA' | 'SIGNALS' | 'RECONCILIATION' | 'PORTFOLIO';

export interface CycleResult {
  timestamp: Date;
  marketDataUpdated: boolean;
  signalsGenerated: number;
  positionsCreated: number;
  positionsMonitored: number;
  portfolioUpdated: boolean;
  errors: string[];
}

// ============================================================================
// Kill Switch
// ============================================================================

export type KillSwitchReason = 'MANUAL' | 'DAILY_LOSS_LIMIT' | 'INVARIANT_VIOLATION';

export interface KillSwitchState {
  active: boolean;
  reason: KillSwitchReason | null;
  activatedAt: Date | null;
  activatedBy: string | null;
}
