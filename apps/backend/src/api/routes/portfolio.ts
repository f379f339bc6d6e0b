/**
 * Portfolio Routes
 * Portfolio metrics, the position ledger and manual closes
 */

import type {
  ClosePositionResponse,
  PaginatedResponse,
  Portfolio,
  PortfolioResponse,
  Position,
  PositionResponse,
} from '@bracket-trader/shared';
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type {
  BracketOrderManager,
  ManualCloseReason,
} from '../../execution/services/BracketOrderManager';
import type { PositionStore } from '../../portfolio/repositories/PositionRepository';
import type { PortfolioService } from '../../portfolio/services/PortfolioService';
import { RequestValidationError } from '../middleware/errorHandler';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;
const CLOSE_REASONS: readonly ManualCloseReason[] = ['MANUAL', 'RISK'];

export interface PortfolioRouteServices {
  portfolio: Pick<PortfolioService, 'getPortfolio'>;
  positions: Pick<PositionStore, 'findOpen' | 'findRecent' | 'countAll'>;
  manager: Pick<BracketOrderManager, 'closePosition'>;
}

export function toPortfolioResponse(portfolio: Portfolio): PortfolioResponse {
  return {
    balance: portfolio.balance,
    available_balance: portfolio.availableBalance,
    locked_balance: portfolio.lockedBalance,
    quote_asset: portfolio.quoteAsset,
    total_exposure: portfolio.totalExposure,
    realized_pnl: portfolio.realizedPnl,
    unrealized_pnl: portfolio.unrealizedPnl,
    total_pnl: portfolio.totalPnl,
    daily_pnl: portfolio.dailyPnl,
    total_trades: portfolio.totalTrades,
    win_rate: portfolio.winRate,
    profit_factor: portfolio.profitFactor,
    current_drawdown: portfolio.currentDrawdown,
    max_drawdown: portfolio.maxDrawdown,
    open_positions: portfolio.openPositions,
    data_as_of_timestamp: portfolio.updatedAt.toISOString(),
  };
}

export function toPositionResponse(position: Position): PositionResponse {
  return {
    id: position.id,
    pair: position.pairSymbol,
    side: position.side,
    amount: position.amount,
    remaining_amount: position.remainingAmount,
    entry_price: position.entryPrice,
    current_price: position.currentPrice,
    stop_loss_price: position.stopLossPrice,
    take_profit_price: position.takeProfitPrice,
    realized_pnl: position.realizedPnl,
    unrealized_pnl: position.unrealizedPnl,
    bracket_state: position.bracketState,
    is_open: position.isOpen,
    close_reason: position.closeReason,
    opened_at: position.openedAt.toISOString(),
    closed_at: position.closedAt ? position.closedAt.toISOString() : null,
  };
}

function readPageParam(value: unknown, name: string, fallback: number, max: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) {
    throw new RequestValidationError(`${name} must be an integer between 0 and ${max}`);
  }
  return parsed;
}

interface CloseRequest {
  reason: ManualCloseReason;
  markPrice: number | undefined;
}

export function parseCloseRequest(body: unknown): CloseRequest {
  const record: Record<string, unknown> =
    typeof body === 'object' && body !== null ? { ...body } : {};

  const reason = CLOSE_REASONS.find((candidate) => candidate === (record.reason ?? 'MANUAL'));
  if (!reason) {
    throw new RequestValidationError('reason must be MANUAL or RISK');
  }

  const rawMarkPrice = record.mark_price;
  let markPrice: number | undefined;
  if (rawMarkPrice !== undefined) {
    if (typeof rawMarkPrice !== 'number' || !(rawMarkPrice > 0)) {
      throw new RequestValidationError('mark_price must be a positive number');
    }
    markPrice = rawMarkPrice;
  }

  return { reason, markPrice };
}

export function createPortfolioRoutes(services: PortfolioRouteServices): Router {
  const router = Router();

  /**
   * GET /portfolio
   */
  router.get('/portfolio', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const portfolio = await services.portfolio.getPortfolio();
      res.json(toPortfolioResponse(portfolio));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /positions?status=open|all&limit=&offset=
   * Open positions by default; `all` pages through the ledger, newest first
   */
  router.get('/positions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = req.query.status ?? 'open';
      if (status !== 'open' && status !== 'all') {
        throw new RequestValidationError('status must be open or all');
      }

      const limit = readPageParam(req.query.limit, 'limit', DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
      const offset = readPageParam(req.query.offset, 'offset', 0, Number.MAX_SAFE_INTEGER);

      let positions: Position[];
      let total: number;
      if (status === 'open') {
        const open = await services.positions.findOpen();
        positions = open.slice(offset, offset + limit);
        total = open.length;
      } else {
        [positions, total] = await Promise.all([
          services.positions.findRecent(limit, offset),
          services.positions.countAll(),
        ]);
      }

      const body: PaginatedResponse<PositionResponse> = {
        items: positions.map(toPositionResponse),
        meta: { limit, offset, total },
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /positions/:id/close
   * Body: { reason?: 'MANUAL' | 'RISK', mark_price?: number }
   */
  router.post('/positions/:id/close', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reason, markPrice } = parseCloseRequest(req.body);
      const result = await services.manager.closePosition(req.params.id, reason, markPrice);

      if (!result.ok) {
        next(result.error);
        return;
      }

      const body: ClosePositionResponse = {
        position: toPositionResponse(result.value.position),
        close_order_id: result.value.closeOrderId,
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
