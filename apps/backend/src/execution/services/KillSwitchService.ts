/**
 * Kill Switch Service
 * Global emergency stop for opening new positions.
 * Stored in Redis so every process sees the same flag.
 */

import type { KillSwitchReason, KillSwitchState, Redis } from '@bracket-trader/shared';
import { killSwitchGauge } from '../../monitoring/metrics';

const KILL_SWITCH_KEY = 'kill_switch:global';

const KILL_SWITCH_REASONS: readonly KillSwitchReason[] = [
  'MANUAL',
  'DAILY_LOSS_LIMIT',
  'INVARIANT_VIOLATION',
];

const INACTIVE_STATE: KillSwitchState = {
  active: false,
  reason: null,
  activatedAt: null,
  activatedBy: null,
};

function isKillSwitchReason(value: unknown): value is KillSwitchReason {
  return KILL_SWITCH_REASONS.some((reason) => reason === value);
}

/**
 * Decode the stored JSON; anything unreadable counts as active so trading stays halted
 */
export function parseKillSwitchState(data: string): KillSwitchState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('[KillSwitch] Stored state is not valid JSON:', error);
    return { active: true, reason: null, activatedAt: null, activatedBy: null };
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return { active: true, reason: null, activatedAt: null, activatedBy: null };
  }

  const record: Record<string, unknown> = { ...parsed };
  const activatedAt =
    typeof record.activatedAt === 'string' ? new Date(record.activatedAt) : null;

  return {
    active: record.active !== false,
    reason: isKillSwitchReason(record.reason) ? record.reason : null,
    activatedAt: activatedAt && !Number.isNaN(activatedAt.getTime()) ? activatedAt : null,
    activatedBy: typeof record.activatedBy === 'string' ? record.activatedBy : null,
  };
}

export class KillSwitchService {
  constructor(private readonly redis: Redis) {}

  /**
   * Checked by the scheduler before any position is opened
   */
  async isActive(): Promise<boolean> {
    const state = await this.getState();
    killSwitchGauge.set(state.active ? 1 : 0);
    return state.active;
  }

  async getState(): Promise<KillSwitchState> {
    const data = await this.redis.get(KILL_SWITCH_KEY);

    if (!data) {
      return { ...INACTIVE_STATE };
    }

    return parseKillSwitchState(data);
  }

  /**
   * @param activatedBy - operator name or 'system' for automatic triggers
   */
  async activate(reason: KillSwitchReason, activatedBy: string): Promise<KillSwitchState> {
    const state: KillSwitchState = {
      active: true,
      reason,
      activatedAt: new Date(),
      activatedBy,
    };

    await this.redis.set(KILL_SWITCH_KEY, JSON.stringify(state));
    killSwitchGauge.set(1);

    // eslint-disable-next-line no-console
    console.warn(`[KillSwitch] Activated by ${activatedBy} (${reason})`);

    return state;
  }

  async deactivate(): Promise<void> {
    await this.redis.del(KILL_SWITCH_KEY);
    killSwitchGauge.set(0);

    // eslint-disable-next-line no-console
    console.log('[KillSwitch] Deactivated');
  }
}
