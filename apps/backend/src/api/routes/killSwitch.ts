/**
 * Kill Switch Routes
 * Halts and resumes the opening of new positions
 */

import type { KillSwitchReason, KillSwitchResponse, KillSwitchState } from '@bracket-trader/shared';
import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import type { KillSwitchService } from '../../execution/services/KillSwitchService';
import { RequestValidationError } from '../middleware/errorHandler';

const REASONS: readonly KillSwitchReason[] = ['MANUAL', 'DAILY_LOSS_LIMIT', 'INVARIANT_VIOLATION'];

export function toKillSwitchResponse(state: KillSwitchState): KillSwitchResponse {
  return {
    active: state.active,
    reason: state.reason,
    activated_at: state.activatedAt ? state.activatedAt.toISOString() : null,
    activated_by: state.activatedBy,
  };
}

function parseActivation(body: unknown): { reason: KillSwitchReason; activatedBy: string } {
  const record: Record<string, unknown> =
    typeof body === 'object' && body !== null ? { ...body } : {};

  const reason = REASONS.find((candidate) => candidate === (record.reason ?? 'MANUAL'));
  if (!reason) {
    throw new RequestValidationError(`reason must be one of ${REASONS.join(', ')}`);
  }

  const activatedBy = record.activated_by ?? 'operator';
  if (typeof activatedBy !== 'string' || activatedBy.trim() === '') {
    throw new RequestValidationError('activated_by must be a non-empty string');
  }

  return { reason, activatedBy };
}

export function createKillSwitchRoutes(
  killSwitch: Pick<KillSwitchService, 'getState' | 'activate' | 'deactivate'>
): Router {
  const router = Router();

  router.get('/kill-switch', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toKillSwitchResponse(await killSwitch.getState()));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /kill-switch
   * Body: { reason?: KillSwitchReason, activated_by?: string }
   */
  router.post('/kill-switch', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { reason, activatedBy } = parseActivation(req.body);
      const state = await killSwitch.activate(reason, activatedBy);
      res.status(201).json(toKillSwitchResponse(state));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/kill-switch', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await killSwitch.deactivate();
      res.json(toKillSwitchResponse(await killSwitch.getState()));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
