/**
 * API Types
 * Request/Response types for the operations REST API.
 */

import type {
  BracketState,
  CloseReason,
  CycleActivity,
  KillSwitchReason,
  PositionSide,
  RiskAlertType,
  RiskSeverity,
} from './domain';

// ============================================================================
// Common API Structures
// ============================================================================

export interface PaginationMeta {
  limit: number;
  offset: number;
  total: number;
}

export interface PaginatedResponse<T> {
  items: T[];
  meta: PaginationMeta;
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Portfolio API
// ============================================================================

export interface PortfolioResponse {
  balance: number;
  available_balance: number;
  locked_balance: number;
  quote_asset: string;
  total_exposure: number;
  realized_pnl: number;
  unrealized_pnl: number;
  total_pnl: number;
  daily_pnl: number;
  total_trades: number;
  win_rate: number;
  profit_factor: number;
  current_drawdown: number;
  max_drawdown: number;
  open_positions: number;
  data_as_of_timestamp: string;
}

export interface PositionResponse {
  id: string;
  pair: string;
  side: PositionSide;
  amount: number;
  remaining_amount: number;
  entry_price: number;
  current_price: number | null;
  stop_loss_price: number;
  take_profit_price: number;
  realized_pnl: number;
  unrealized_pnl: number;
  bracket_state: BracketState;
  is_open: boolean;
  close_reason: CloseReason | null;
  opened_at: string;
  closed_at: string | null;
}

export interface ClosePositionRequest {
  reason?: 'MANUAL' | 'RISK';
  mark_price?: number;
}

export interface ClosePositionResponse {
  position: PositionResponse;
  close_order_id: string | null;
}

// ============================================================================
// Risk API
// ============================================================================

export interface RiskReportResponse {
  status: RiskSeverity;
  daily_pnl: number;
  total_exposure: number;
  exposure_pct: number;
  alerts: Array<{
    type: RiskAlertType;
    severity: RiskSeverity;
    message: string;
    position_id: string | null;
  }>;
  evaluated_at: string;
}

// ============================================================================
// Bot Status API
// ============================================================================

export interface BotStatusResponse {
  running: boolean;
  last_runs: Record<CycleActivity, string | null>;
  intervals_seconds: Record<CycleActivity, number>;
  last_cycle: {
    timestamp: string;
    market_data_updated: boolean;
    signals_generated: number;
    positions_created: number;
    positions_monitored: number;
    portfolio_updated: boolean;
    errors: string[];
  } | null;
}

// ============================================================================
// Kill Switch API
// ============================================================================

export interface ActivateKillSwitchRequest {
  reason?: KillSwitchReason;
  activated_by?: string;
}

export interface KillSwitchResponse {
  active: boolean;
  reason: KillSwitchReason | null;
  activated_at: string | null;
  activated_by: string | null;
}
