/**
 * Cycle Scheduler
 * Drives the pipeline: market data → signals → risk gate → execution →
 * reconciliation and monitoring → portfolio metrics.
 *
 * Each activity has its own interval; its last-run time only advances when
 * it succeeds, so a failed activity is retried on the next tick. Ticks never
 * overlap.
 */

import type { CycleActivity, CycleResult, RiskReport } from '@bracket-trader/shared';
import { TransportError, describeError } from '../common/errors';
import type { BracketOrderManager } from '../execution/services/BracketOrderManager';
import type { KillSwitchService } from '../execution/services/KillSwitchService';
import type { PositionMonitor } from '../execution/services/PositionMonitor';
import type { ReconciliationService } from '../execution/services/ReconciliationService';
import {
  activityCounter,
  activityDuration,
  cycleCounter,
  positionsOpenedCounter,
} from '../monitoring/metrics';
import type { PositionStore } from '../portfolio/repositories/PositionRepository';
import type { PortfolioService } from '../portfolio/services/PortfolioService';
import type { RiskService } from '../risk/services/RiskService';
import type { MarketDataService } from '../strategy/services/MarketDataService';
import type { SignalService } from '../strategy/services/SignalService';

export const CYCLE_ACTIVITIES: readonly CycleActivity[] = [
  'MARKET_DATA',
  'SIGNALS',
  'RECONCILIATION',
  'PORTFOLIO',
];

export const DEFAULT_INTERVALS_SECONDS: Record<CycleActivity, number> = {
  MARKET_DATA: 60,
  SIGNALS: 300,
  RECONCILIATION: 30,
  PORTFOLIO: 180,
};

export interface CycleSchedulerDeps {
  marketData: Pick<MarketDataService, 'refreshAll'>;
  signals: Pick<SignalService, 'generateSignals' | 'getActiveSignals'>;
  manager: Pick<BracketOrderManager, 'openBracket' | 'closePosition'>;
  reconciliation: Pick<ReconciliationService, 'reconcile'>;
  monitor: Pick<PositionMonitor, 'monitor'>;
  portfolio: Pick<PortfolioService, 'recompute' | 'refreshBalance'>;
  risk: Pick<RiskService, 'evaluate'>;
  positions: Pick<PositionStore, 'findOpen'>;
  killSwitch: Pick<KillSwitchService, 'isActive' | 'activate'>;
}

export interface CycleSchedulerOptions {
  intervalsSeconds: Record<CycleActivity, number>;
  tickMs: number;
  maxSignalsPerCycle: number;
  minOrderUsd: number;
  /** Close every open position and engage the kill switch on a daily-loss breach */
  flattenOnDailyLoss: boolean;
  now?: () => Date;
}

export interface BotStatus {
  running: boolean;
  lastRuns: Record<CycleActivity, Date | null>;
  intervalsSeconds: Record<CycleActivity, number>;
  lastCycle: CycleResult | null;
}

interface ExecutionOutcome {
  positionsCreated: number;
}

export class CycleScheduler {
  private intervalId: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleResult> | null = null;
  private lastCycle: CycleResult | null = null;
  private readonly lastRuns: Record<CycleActivity, Date | null> = {
    MARKET_DATA: null,
    SIGNALS: null,
    RECONCILIATION: null,
    PORTFOLIO: null,
  };
  private readonly now: () => Date;

  constructor(
    private readonly deps: CycleSchedulerDeps,
    private readonly options: CycleSchedulerOptions
  ) {
    this.now = options.now || (() => new Date());
  }

  start(): void {
    if (this.intervalId) {
      // eslint-disable-next-line no-console
      console.warn('[Scheduler] Already started');
      return;
    }

    // eslint-disable-next-line no-console
    console.log(`[Scheduler] Starting (tick every ${this.options.tickMs}ms)`);
    this.intervalId = setInterval(() => this.runTick(), this.options.tickMs);
    this.runTick();
  }

  /**
   * Stop ticking and wait for the in-flight cycle to finish
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    // eslint-disable-next-line no-console
    console.log('[Scheduler] Stopped');
  }

  /**
   * Run every due activity once. Returns null when a cycle is already running.
   */
  async tick(): Promise<CycleResult | null> {
    if (this.inFlight) {
      // eslint-disable-next-line no-console
      console.warn('[Scheduler] Previous cycle still running, skipping tick');
      return null;
    }

    this.inFlight = this.runCycle();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  getStatus(): BotStatus {
    return {
      running: this.intervalId !== null,
      lastRuns: { ...this.lastRuns },
      intervalsSeconds: { ...this.options.intervalsSeconds },
      lastCycle: this.lastCycle,
    };
  }

  private runTick(): void {
    this.tick().catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error('[Scheduler] Cycle failed:', error);
    });
  }

  private isDue(activity: CycleActivity, now: Date): boolean {
    const lastRun = this.lastRuns[activity];
    if (!lastRun) {
      return true;
    }
    return now.getTime() - lastRun.getTime() >= this.options.intervalsSeconds[activity] * 1000;
  }

  private async runCycle(): Promise<CycleResult> {
    const now = this.now();
    const result: CycleResult = {
      timestamp: now,
      marketDataUpdated: false,
      signalsGenerated: 0,
      positionsCreated: 0,
      positionsMonitored: 0,
      portfolioUpdated: false,
      errors: [],
    };

    const due = CYCLE_ACTIVITIES.filter((activity) => this.isDue(activity, now));
    if (due.length === 0) {
      return result;
    }
    cycleCounter.inc();

    if (due.includes('MARKET_DATA')) {
      await this.runActivity('MARKET_DATA', now, result, async () => {
        const refresh = await this.deps.marketData.refreshAll();
        for (const failure of refresh.failures) {
          result.errors.push(describeError(`MARKET_DATA ${failure.pairSymbol}`, failure.error));
        }
        if (refresh.pairsRefreshed === 0 && refresh.failures.length > 0) {
          throw new TransportError(`All ${refresh.failures.length} pairs failed to refresh`);
        }
        result.marketDataUpdated = refresh.pairsRefreshed > 0;
      });
    }

    if (due.includes('SIGNALS')) {
      await this.runActivity('SIGNALS', now, result, async () => {
        const generation = await this.deps.signals.generateSignals(now);
        result.signalsGenerated = generation.signals.length;
        for (const failure of generation.failures) {
          result.errors.push(describeError(`SIGNALS ${failure.pairSymbol}`, failure.error));
        }

        const execution = await this.executeSignals(now, result);
        result.positionsCreated = execution.positionsCreated;
      });
    }

    if (due.includes('RECONCILIATION')) {
      await this.runActivity('RECONCILIATION', now, result, async () => {
        const reconciliation = await this.deps.reconciliation.reconcile();
        for (const error of reconciliation.errors) {
          result.errors.push(describeError('RECONCILIATION', error));
        }

        const monitoring = await this.deps.monitor.monitor();
        result.positionsMonitored = monitoring.positionsMonitored;
        for (const error of monitoring.errors) {
          result.errors.push(describeError('MONITOR', error));
        }
      });
    }

    if (due.includes('PORTFOLIO')) {
      await this.runActivity('PORTFOLIO', now, result, async () => {
        await this.deps.portfolio.recompute(now);
        await this.deps.portfolio.refreshBalance();
        result.portfolioUpdated = true;
      });
    }

    this.lastCycle = result;

    // eslint-disable-next-line no-console
    console.log(
      `[Scheduler] Cycle ran ${due.join(', ')}: ${result.signalsGenerated} signals, ` +
        `${result.positionsCreated} positions opened, ${result.errors.length} errors`
    );

    return result;
  }

  private async runActivity(
    activity: CycleActivity,
    now: Date,
    result: CycleResult,
    work: () => Promise<void>
  ): Promise<void> {
    const endTimer = activityDuration.startTimer({ activity });
    try {
      await work();
      this.lastRuns[activity] = now;
      activityCounter.inc({ activity, status: 'success' });
    } catch (error) {
      activityCounter.inc({ activity, status: 'failed' });
      const description = describeError(activity, error);
      result.errors.push(description);
      // eslint-disable-next-line no-console
      console.error(`[Scheduler] ${description}`);
    } finally {
      endTimer();
    }
  }

  /**
   * Gate on risk and the kill switch, then open brackets for the most
   * confident active signals
   */
  private async executeSignals(now: Date, result: CycleResult): Promise<ExecutionOutcome> {
    const portfolio = await this.deps.portfolio.refreshBalance();
    const report = await this.deps.risk.evaluate(now);

    if (report.status === 'HIGH') {
      await this.handleHighRisk(report, result);
      return { positionsCreated: 0 };
    }

    if (await this.deps.killSwitch.isActive()) {
      // eslint-disable-next-line no-console
      console.warn('[Scheduler] Kill switch active, not opening positions');
      return { positionsCreated: 0 };
    }

    const candidates = (await this.deps.signals.getActiveSignals(now)).slice(
      0,
      this.options.maxSignalsPerCycle
    );

    let available = portfolio.availableBalance;
    let positionsCreated = 0;

    for (const signal of candidates) {
      const notional = (available * signal.positionSizePct) / 100;
      if (notional < this.options.minOrderUsd) {
        // eslint-disable-next-line no-console
        console.log(
          `[Scheduler] Skipping ${signal.pairSymbol} signal ${signal.id}: ` +
            `notional ${notional.toFixed(2)} below ${this.options.minOrderUsd}`
        );
        continue;
      }

      const opened = await this.deps.manager.openBracket(signal, notional);
      if (!opened.ok) {
        result.errors.push(describeError(`EXECUTION ${signal.pairSymbol}`, opened.error));
        continue;
      }

      positionsCreated++;
      available -= notional;
      positionsOpenedCounter.inc({ pair: opened.value.pairSymbol, side: opened.value.side });
    }

    return { positionsCreated };
  }

  private async handleHighRisk(report: RiskReport, result: CycleResult): Promise<void> {
    // eslint-disable-next-line no-console
    console.warn('[Scheduler] Risk HIGH, not opening positions');

    const dailyLossBreached = report.alerts.some((alert) => alert.type === 'DAILY_LOSS_LIMIT');
    if (!this.options.flattenOnDailyLoss || !dailyLossBreached) {
      return;
    }

    await this.deps.killSwitch.activate('DAILY_LOSS_LIMIT', 'system');

    const open = await this.deps.positions.findOpen();
    for (const position of open) {
      const closed = await this.deps.manager.closePosition(
        position.id,
        'RISK',
        position.currentPrice ?? undefined
      );
      if (!closed.ok) {
        result.errors.push(describeError(`FLATTEN ${position.id}`, closed.error));
      }
    }

    // eslint-disable-next-line no-console
    console.warn(`[Scheduler] Daily loss limit breached, flattened ${open.length} positions`);
  }
}
