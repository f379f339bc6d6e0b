/**
 * Bracket Order Manager
 * Owns the order/position state machine: entry placement, fill detection,
 * protective children, trailing-stop tightening and closes.
 *
 * Every mutation of a position and its orders runs under that position's lock.
 * The exchange is authoritative: local order records only move on its reports.
 */

import type {
  BracketState,
  CloseReason,
  Order,
  OrderRole,
  Position,
  TradingSignal,
} from '@bracket-trader/shared';
import { KeyedLock } from '../../common/KeyedLock';
import {
  BracketStateError,
  ExchangeRejectionError,
  InvariantViolationError,
  NotFoundError,
  OrderValidationError,
  TradingError,
  UnprotectedPositionError,
  errorMessage,
  toTradingError,
} from '../../common/errors';
import { type Result, err, ok } from '../../common/result';
import {
  AMOUNT_EPSILON,
  calculatePnl,
  entrySide,
  exitSide,
  isMarkable,
  markToPrice,
  positionSideFor,
  roundTo,
} from '../../portfolio/pnl';
import type { PositionStore, PositionUpdate } from '../../portfolio/repositories/PositionRepository';
import type { PairStore } from '../../strategy/repositories/PairRepository';
import type { SignalStore } from '../../strategy/repositories/SignalRepository';
import { BracketCorrelationRegistry } from '../bracket/BracketCorrelationRegistry';
import {
  assertBracketTransition,
  isFinalBracketState,
  isLiveOrderStatus,
  isValidOrderTransition,
} from '../bracket/transitions';
import type { ExchangeGateway, ExchangeOrderReport } from '../exchange/ExchangeGateway';
import type { OrderStore } from '../repositories/OrderRepository';

/**
 * CONFIRM: a closing position waits in CLOSING until the market order fills.
 * OPTIMISTIC: the position is booked CLOSED at the mark price once the order is placed.
 */
export type CloseMode = 'CONFIRM' | 'OPTIMISTIC';

export type ManualCloseReason = Extract<CloseReason, 'MANUAL' | 'RISK'>;

export type BracketAction =
  | 'NO_CHANGE'
  | 'ORDER_UPDATED'
  | 'ENTRY_FILLED'
  | 'ENTRY_CANCELED'
  | 'PROTECTION_REPLACED'
  | 'POSITION_CLOSED'
  | 'CLOSE_CONFIRMED'
  | 'CLOSE_FAILED';

export interface OrderReportOutcome {
  orderId: string;
  positionId: string | null;
  role: OrderRole;
  action: BracketAction;
  errors: TradingError[];
}

export interface ClosePositionOutcome {
  position: Position;
  closeOrderId: string | null;
}

export interface ProtectionSweepResult {
  checked: number;
  protectedCount: number;
  errors: TradingError[];
}

export interface BracketOrderManagerDeps {
  orders: OrderStore;
  positions: PositionStore;
  signals: SignalStore;
  pairs: PairStore;
  exchange: ExchangeGateway;
  correlations?: BracketCorrelationRegistry;
  locks?: KeyedLock;
}

export interface BracketOrderManagerOptions {
  closeMode: CloseMode;
  /** Trailing distance as a percentage of entry price; null disables trailing */
  trailingStopPct: number | null;
  now?: () => Date;
}

interface BookedReport {
  position: Position;
  order: Order;
  filledDelta: number;
}

interface Withdrawal {
  position: Position;
  /** Roles of withdrawn orders that turned out to have (further) fills */
  filledRoles: OrderRole[];
}

function closeReasonFor(role: OrderRole): CloseReason | null {
  if (role === 'STOP_LOSS') return 'STOP_LOSS';
  if (role === 'TAKE_PROFIT') return 'TAKE_PROFIT';
  return null;
}

/**
 * Average price of the part of a report not yet recorded on the order
 */
function deltaFillPrice(order: Order, report: ExchangeOrderReport): number | null {
  if (report.avgPrice === null) {
    return order.avgFillPrice ?? order.price;
  }
  if (order.avgFillPrice === null || order.filledAmount <= AMOUNT_EPSILON) {
    return report.avgPrice;
  }
  const delta = report.filledAmount - order.filledAmount;
  if (delta <= AMOUNT_EPSILON) {
    return report.avgPrice;
  }
  return (report.avgPrice * report.filledAmount - order.avgFillPrice * order.filledAmount) / delta;
}

/**
 * A stop only ever moves toward the market: up for longs, down for shorts
 */
export function isTighterStop(
  side: Position['side'],
  currentStop: number,
  newStop: number
): boolean {
  return side === 'LONG' ? newStop > currentStop : newStop < currentStop;
}

export class BracketOrderManager {
  private readonly orders: OrderStore;
  private readonly positions: PositionStore;
  private readonly signals: SignalStore;
  private readonly pairs: PairStore;
  private readonly exchange: ExchangeGateway;
  private readonly correlations: BracketCorrelationRegistry;
  private readonly locks: KeyedLock;
  private readonly now: () => Date;

  constructor(
    deps: BracketOrderManagerDeps,
    private readonly options: BracketOrderManagerOptions
  ) {
    this.orders = deps.orders;
    this.positions = deps.positions;
    this.signals = deps.signals;
    this.pairs = deps.pairs;
    this.exchange = deps.exchange;
    this.correlations = deps.correlations || new BracketCorrelationRegistry();
    this.locks = deps.locks || new KeyedLock();
    this.now = options.now || (() => new Date());
  }

  get closeMode(): CloseMode {
    return this.options.closeMode;
  }

  get correlationCount(): number {
    return this.correlations.size;
  }

  // ==========================================================================
  // Open
  // ==========================================================================

  /**
   * Claim the signal and place a limit entry for notionalUsd worth of the pair.
   * No Position exists unless the exchange acknowledged the entry.
   */
  async openBracket(signal: TradingSignal, notionalUsd: number): Promise<Result<Position>> {
    try {
      return await this.openBracketUnlocked(signal, notionalUsd);
    } catch (error) {
      return err(toTradingError(error));
    }
  }

  private async openBracketUnlocked(
    signal: TradingSignal,
    notionalUsd: number
  ): Promise<Result<Position>> {
    const side = positionSideFor(signal.direction);
    if (!side) {
      return err(new OrderValidationError(`Signal ${signal.id} is ${signal.direction}`));
    }

    const pair = await this.pairs.findBySymbol(signal.pairSymbol);
    if (!pair || !pair.isActive) {
      return err(new OrderValidationError(`Pair ${signal.pairSymbol} is unknown or inactive`));
    }

    if (!(notionalUsd > 0) || !(signal.entryPrice > 0)) {
      return err(
        new OrderValidationError('Notional and entry price must be positive', {
          notionalUsd,
          entryPrice: signal.entryPrice,
        })
      );
    }

    const amount = roundTo(notionalUsd / signal.entryPrice, pair.volumePrecision);
    if (amount < pair.minOrderSize) {
      return err(
        new OrderValidationError(
          `Order size ${amount} below minimum ${pair.minOrderSize} for ${pair.symbol}`,
          { amount, minOrderSize: pair.minOrderSize }
        )
      );
    }

    const claimed = await this.signals.claim(signal.id, this.now());
    if (!claimed) {
      return err(new OrderValidationError(`Signal ${signal.id} is expired or already consumed`));
    }

    assertBracketTransition(claimed.id, 'SIGNALED', 'ENTRY_PLACED');

    const entryPrice = roundTo(claimed.entryPrice, pair.pricePrecision);
    const stopLossPrice = roundTo(claimed.stopLossPrice, pair.pricePrecision);
    const takeProfitPrice = roundTo(claimed.targetPrice, pair.pricePrecision);

    const entry = await this.orders.create({
      pairSymbol: pair.symbol,
      positionId: null,
      role: 'ENTRY',
      side: entrySide(side),
      kind: 'LIMIT',
      amount,
      price: entryPrice,
      parentOrderId: null,
    });

    // Reconciliation of this entry waits until its position exists
    return this.locks.run(entry.id, async () => {
      const placed = await this.submit(entry);
      if (!placed.ok) {
        // eslint-disable-next-line no-console
        console.error(
          `[BracketOrderManager] Entry for signal ${claimed.id} rejected:`,
          placed.error.message
        );
        return err(placed.error);
      }

      const position = await this.positions.create({
        pairSymbol: pair.symbol,
        signalId: claimed.id,
        entryOrderId: entry.id,
        side,
        amount,
        entryPrice,
        stopLossPrice,
        takeProfitPrice,
        trailingStopDistance:
          this.options.trailingStopPct !== null
            ? (entryPrice * this.options.trailingStopPct) / 100
            : null,
      });

      await this.orders.update(entry.id, { positionId: position.id });

      this.correlations.register({
        entryOrderId: entry.id,
        positionId: position.id,
        signalId: claimed.id,
        side,
        amount,
        stopLossPrice,
        takeProfitPrice,
      });

      // eslint-disable-next-line no-console
      console.log(
        `[BracketOrderManager] Opened ${side} ${amount} ${pair.symbol} @ ${entryPrice} ` +
          `(stop ${stopLossPrice}, target ${takeProfitPrice}, position ${position.id})`
      );

      return ok(position);
    });
  }

  // ==========================================================================
  // Exchange reports
  // ==========================================================================

  /**
   * Apply one exchange report to a locally open order, dispatching by role
   */
  async applyOrderReport(order: Order, report: ExchangeOrderReport): Promise<OrderReportOutcome> {
    return this.locks.run(order.positionId ?? order.id, async () => {
      let current = order;
      try {
        current = (await this.orders.findById(order.id)) ?? order;

        if (!isLiveOrderStatus(current.status)) {
          return this.outcome(current, 'NO_CHANGE');
        }

        switch (current.role) {
          case 'ENTRY':
            return await this.resolveEntry(current, report, true);
          case 'STOP_LOSS':
          case 'TAKE_PROFIT':
            return await this.resolveProtective(current, report);
          case 'CLOSE':
            return await this.resolveClose(current, report);
        }
      } catch (error) {
        return this.outcome(current, 'NO_CHANGE', [toTradingError(error)]);
      }
    });
  }

  private async resolveEntry(
    order: Order,
    report: ExchangeOrderReport,
    protectAfterFill: boolean
  ): Promise<OrderReportOutcome> {
    const position = await this.findPositionForOrder(order);
    if (!position) {
      return this.abandonOrphanEntry(order);
    }

    const updated = await this.recordReport(order, report);

    if (isLiveOrderStatus(updated.status)) {
      const changed = updated.filledAmount !== order.filledAmount || updated.status !== order.status;
      return this.outcome(updated, changed ? 'ORDER_UPDATED' : 'NO_CHANGE');
    }

    if (position.bracketState !== 'ENTRY_PLACED') {
      return this.outcome(updated, 'ORDER_UPDATED');
    }

    const correlation = this.correlations.take(order.id);
    if (!correlation) {
      // eslint-disable-next-line no-console
      console.warn(
        `[BracketOrderManager] No correlation for entry ${order.id}; using position ${position.id}`
      );
    }

    if (updated.filledAmount <= AMOUNT_EPSILON) {
      await this.transition(position, 'CANCELED', {
        isOpen: false,
        remainingAmount: 0,
        closeReason: 'ENTRY_CANCELED',
        closedAt: this.now(),
      });

      // eslint-disable-next-line no-console
      console.log(`[BracketOrderManager] Entry ${order.id} ${updated.status}; bracket canceled`);
      return this.outcome(updated, 'ENTRY_CANCELED');
    }

    const fillPrice = updated.avgFillPrice ?? order.price ?? position.entryPrice;
    const filled = await this.transition(position, 'ENTRY_FILLED', {
      amount: updated.filledAmount,
      remainingAmount: updated.filledAmount,
      entryPrice: fillPrice,
      currentPrice: fillPrice,
      stopLossPrice: correlation?.stopLossPrice ?? position.stopLossPrice,
      fees: position.fees + updated.fee,
      filledAt: this.now(),
    });

    // eslint-disable-next-line no-console
    console.log(
      `[BracketOrderManager] Entry ${order.id} filled ${updated.filledAmount} @ ${fillPrice}`
    );

    if (!protectAfterFill) {
      return this.outcome(updated, 'ENTRY_FILLED');
    }

    const protection = await this.protect(filled);
    return this.outcome(updated, 'ENTRY_FILLED', protection.ok ? [] : [protection.error]);
  }

  private async resolveProtective(
    order: Order,
    report: ExchangeOrderReport
  ): Promise<OrderReportOutcome> {
    const position = await this.findPositionForOrder(order);
    if (!position) {
      const updated = await this.recordReport(order, report);
      return this.outcome(updated, 'ORDER_UPDATED', [
        new InvariantViolationError(`Protective order ${order.id} has no position`),
      ]);
    }

    const booked = await this.bookReport(position, order, report);

    if (isLiveOrderStatus(booked.order.status)) {
      return this.outcome(booked.order, booked.filledDelta > 0 ? 'ORDER_UPDATED' : 'NO_CHANGE');
    }

    if (!position.isOpen) {
      const errors =
        booked.filledDelta > AMOUNT_EPSILON
          ? [
              new InvariantViolationError(
                `${order.role} order ${order.id} filled ${booked.filledDelta} ` +
                  `after position ${position.id} closed`
              ),
            ]
          : [];
      return this.outcome(booked.order, 'ORDER_UPDATED', errors);
    }

    if (booked.position.remainingAmount <= AMOUNT_EPSILON) {
      const settled = await this.settleFlatPosition(booked.position, order.role);
      return this.outcome(booked.order, 'POSITION_CLOSED', settled.errors);
    }

    if (position.bracketState === 'CLOSING') {
      return this.outcome(booked.order, 'ORDER_UPDATED');
    }

    // Protection lost or reduced: replace both children at the remaining amount
    // eslint-disable-next-line no-console
    console.warn(
      `[BracketOrderManager] ${order.role} order ${order.id} ended ${booked.order.status}; ` +
        `re-protecting ${booked.position.remainingAmount} of position ${position.id}`
    );

    const reprotected = await this.reprotect(booked.position);
    return this.outcome(
      booked.order,
      'PROTECTION_REPLACED',
      reprotected.ok ? [] : [reprotected.error]
    );
  }

  private async resolveClose(
    order: Order,
    report: ExchangeOrderReport
  ): Promise<OrderReportOutcome> {
    const position = await this.findPositionForOrder(order);
    if (!position) {
      const updated = await this.recordReport(order, report);
      return this.outcome(updated, 'ORDER_UPDATED', [
        new InvariantViolationError(`Close order ${order.id} has no position`),
      ]);
    }

    const booked = await this.bookReport(position, order, report);

    if (isLiveOrderStatus(booked.order.status)) {
      return this.outcome(booked.order, booked.filledDelta > 0 ? 'ORDER_UPDATED' : 'NO_CHANGE');
    }

    // Optimistically closed: the ledger is already booked, only verify the fill
    if (!position.isOpen) {
      if (booked.order.filledAmount < booked.order.amount - AMOUNT_EPSILON) {
        const violation = new InvariantViolationError(
          `Close order ${order.id} ended ${booked.order.status} with ` +
            `${booked.order.filledAmount}/${booked.order.amount} filled; ` +
            `position ${position.id} was booked closed and may still be open on the exchange`,
          { positionId: position.id, orderId: order.id }
        );
        // eslint-disable-next-line no-console
        console.error(`[BracketOrderManager] ${violation.message}`);
        return this.outcome(booked.order, 'CLOSE_FAILED', [violation]);
      }
      return this.outcome(booked.order, 'CLOSE_CONFIRMED');
    }

    if (booked.position.remainingAmount <= AMOUNT_EPSILON) {
      await this.finalizeClose(booked.position, 'MANUAL');
      return this.outcome(booked.order, 'POSITION_CLOSED');
    }

    if (booked.position.bracketState !== 'CLOSING') {
      return this.outcome(booked.order, 'ORDER_UPDATED');
    }

    // Close did not complete: back to a filled position and protect what is left
    const reopened = await this.transition(booked.position, 'ENTRY_FILLED', {
      closeReason: null,
      closeOrderId: null,
    });
    const failure = new ExchangeRejectionError(
      `Close order ${order.id} ended ${booked.order.status}; ` +
        `${reopened.remainingAmount} of position ${position.id} remains open`
    );
    const protection = await this.protect(reopened);

    return this.outcome(
      booked.order,
      'CLOSE_FAILED',
      protection.ok ? [failure] : [failure, protection.error]
    );
  }

  /**
   * Entry acknowledged by the exchange but no position recorded for it
   */
  private async abandonOrphanEntry(order: Order): Promise<OrderReportOutcome> {
    const errors: TradingError[] = [
      new InvariantViolationError(`Entry order ${order.id} has no position; canceling it`, {
        orderId: order.id,
      }),
    ];

    if (order.exchangeOrderId) {
      try {
        await this.exchange.cancelOrder(order.exchangeOrderId);
        await this.orders.update(order.id, { status: 'CANCELED' });
      } catch (error) {
        errors.push(toTradingError(error));
      }
    }

    return this.outcome(order, 'ORDER_UPDATED', errors);
  }

  // ==========================================================================
  // Protection
  // ==========================================================================

  /**
   * Retry protection for every filled position still missing a child
   */
  async ensureProtection(): Promise<ProtectionSweepResult> {
    const open = await this.positions.findOpen();
    const unprotected = open.filter((position) => position.bracketState === 'ENTRY_FILLED');
    const errors: TradingError[] = [];
    let protectedCount = 0;

    for (const candidate of unprotected) {
      const result = await this.locks.run(candidate.id, async () => {
        try {
          const position = await this.positions.findById(candidate.id);
          if (!position || position.bracketState !== 'ENTRY_FILLED') {
            return ok(position);
          }
          return await this.protect(position);
        } catch (error) {
          return err(toTradingError(error));
        }
      });

      if (result.ok) {
        protectedCount++;
      } else {
        errors.push(result.error);
      }
    }

    return { checked: unprotected.length, protectedCount, errors };
  }

  /**
   * Place whichever protective children are not live; PROTECTED only when both are
   */
  private async protect(position: Position): Promise<Result<Position>> {
    const entry = await this.orders.findById(position.entryOrderId);
    if (!entry) {
      return err(new InvariantViolationError(`Entry order ${position.entryOrderId} missing`));
    }

    const failures: string[] = [];
    let stopLossOrderId = entry.stopLossOrderId;
    let takeProfitOrderId = entry.takeProfitOrderId;

    if (!(await this.isLiveOrder(stopLossOrderId))) {
      const placed = await this.placeProtective(position, entry, 'STOP_LOSS');
      if (placed.ok) {
        stopLossOrderId = placed.value.id;
      } else {
        failures.push(`STOP_LOSS: ${placed.error.message}`);
      }
    }

    if (!(await this.isLiveOrder(takeProfitOrderId))) {
      const placed = await this.placeProtective(position, entry, 'TAKE_PROFIT');
      if (placed.ok) {
        takeProfitOrderId = placed.value.id;
      } else {
        failures.push(`TAKE_PROFIT: ${placed.error.message}`);
      }
    }

    if (
      stopLossOrderId !== entry.stopLossOrderId ||
      takeProfitOrderId !== entry.takeProfitOrderId
    ) {
      await this.orders.update(entry.id, { stopLossOrderId, takeProfitOrderId });
    }

    if (failures.length > 0) {
      const error = new UnprotectedPositionError(position.id, failures);
      // eslint-disable-next-line no-console
      console.error(`[BracketOrderManager] ${error.message}`);
      return err(error);
    }

    if (position.bracketState === 'PROTECTED') {
      return ok(position);
    }

    return ok(await this.transition(position, 'PROTECTED'));
  }

  private async placeProtective(
    position: Position,
    entry: Order,
    role: 'STOP_LOSS' | 'TAKE_PROFIT'
  ): Promise<Result<Order>> {
    const isStop = role === 'STOP_LOSS';
    const order = await this.orders.create({
      pairSymbol: position.pairSymbol,
      positionId: position.id,
      role,
      side: exitSide(position.side),
      kind: isStop ? 'STOP_LOSS' : 'LIMIT',
      amount: position.remainingAmount,
      price: isStop ? position.stopLossPrice : position.takeProfitPrice,
      parentOrderId: entry.id,
    });

    return this.submit(order);
  }

  /**
   * Withdraw any surviving children and protect the remaining amount afresh
   */
  private async reprotect(position: Position): Promise<Result<Position>> {
    const children = await this.liveChildren(position);
    const withdrawn = await this.withdrawOrders(position, children);
    if (!withdrawn.ok) {
      return err(withdrawn.error);
    }

    let current = withdrawn.value.position;
    if (current.remainingAmount <= AMOUNT_EPSILON) {
      const settled = await this.settleFlatPosition(
        current,
        withdrawn.value.filledRoles[0] ?? 'STOP_LOSS'
      );
      return settled.errors.length > 0 ? err(settled.errors[0]) : ok(settled.position);
    }

    if (current.bracketState === 'PROTECTED') {
      current = await this.transition(current, 'ENTRY_FILLED');
    }

    return this.protect(current);
  }

  // ==========================================================================
  // Mark to market
  // ==========================================================================

  /**
   * Books the unrealized PnL and excursions of an open position at `price`.
   * Returns null when the position is gone, closed or not yet filled.
   */
  async markPosition(positionId: string, price: number): Promise<Position | null> {
    return this.locks.run(positionId, async () => {
      const current = await this.positions.findById(positionId);
      if (!current || isFinalBracketState(current.bracketState) || !isMarkable(current)) {
        return null;
      }
      return this.positions.update(current.id, markToPrice(current, price));
    });
  }

  // ==========================================================================
  // Adjust stop
  // ==========================================================================

  /**
   * Move the stop toward the market. The old stop is canceled at the exchange
   * before the new one is placed, and records change only after both succeed.
   */
  async adjustStop(positionId: string, newStopPrice: number): Promise<Result<Position>> {
    return this.locks.run(positionId, async () => {
      try {
        return await this.adjustStopLocked(positionId, newStopPrice);
      } catch (error) {
        return err(toTradingError(error));
      }
    });
  }

  private async adjustStopLocked(
    positionId: string,
    requestedStop: number
  ): Promise<Result<Position>> {
    const position = await this.positions.findById(positionId);
    if (!position) {
      return err(new NotFoundError(`Position ${positionId} not found`));
    }

    if (!position.isOpen || position.bracketState !== 'PROTECTED') {
      return err(
        new BracketStateError(
          `Cannot adjust stop of position ${positionId} in ${position.bracketState}`
        )
      );
    }

    const pair = await this.pairs.findBySymbol(position.pairSymbol);
    const newStop = pair ? roundTo(requestedStop, pair.pricePrecision) : requestedStop;

    if (!isTighterStop(position.side, position.stopLossPrice, newStop)) {
      return err(
        new OrderValidationError(
          `Stop ${newStop} does not tighten ${position.side} stop ${position.stopLossPrice}`,
          { positionId, currentStop: position.stopLossPrice, newStop }
        )
      );
    }

    const entry = await this.orders.findById(position.entryOrderId);
    const stopOrder = entry?.stopLossOrderId
      ? await this.orders.findById(entry.stopLossOrderId)
      : null;
    if (!entry || !stopOrder || !isLiveOrderStatus(stopOrder.status)) {
      return err(new BracketStateError(`Position ${positionId} has no live stop order`));
    }

    const withdrawn = await this.withdrawOrders(position, [stopOrder]);
    if (!withdrawn.ok) {
      return err(withdrawn.error);
    }

    const afterCancel = withdrawn.value.position;
    if (withdrawn.value.filledRoles.length > 0) {
      // The stop traded before it could be moved
      if (afterCancel.remainingAmount <= AMOUNT_EPSILON) {
        await this.settleFlatPosition(afterCancel, 'STOP_LOSS');
      } else {
        await this.reprotect(afterCancel);
      }
      return err(new BracketStateError(`Stop of position ${positionId} filled while adjusting`));
    }

    const replacement = await this.orders.create({
      pairSymbol: position.pairSymbol,
      positionId,
      role: 'STOP_LOSS',
      side: exitSide(position.side),
      kind: 'STOP_LOSS',
      amount: afterCancel.remainingAmount,
      price: newStop,
      parentOrderId: entry.id,
    });
    const placed = await this.submit(replacement);

    if (!placed.ok) {
      await this.orders.update(entry.id, { stopLossOrderId: null });
      await this.transition(afterCancel, 'ENTRY_FILLED');
      const error = new UnprotectedPositionError(positionId, [`STOP_LOSS: ${placed.error.message}`]);
      // eslint-disable-next-line no-console
      console.error(`[BracketOrderManager] ${error.message}`);
      return err(error);
    }

    await this.orders.update(entry.id, { stopLossOrderId: placed.value.id });
    const updated = await this.positions.update(positionId, { stopLossPrice: newStop });

    // eslint-disable-next-line no-console
    console.log(
      `[BracketOrderManager] Stop of position ${positionId} moved ${position.stopLossPrice} → ${newStop}`
    );

    return ok(updated);
  }

  // ==========================================================================
  // Close
  // ==========================================================================

  /**
   * Cancel protection (or the unfilled entry) and exit the remaining amount at market
   */
  async closePosition(
    positionId: string,
    reason: ManualCloseReason,
    markPrice?: number
  ): Promise<Result<ClosePositionOutcome>> {
    return this.locks.run(positionId, async () => {
      try {
        return await this.closeLocked(positionId, reason, markPrice);
      } catch (error) {
        return err(toTradingError(error));
      }
    });
  }

  private async closeLocked(
    positionId: string,
    reason: ManualCloseReason,
    markPrice: number | undefined
  ): Promise<Result<ClosePositionOutcome>> {
    let position = await this.positions.findById(positionId);
    if (!position) {
      return err(new NotFoundError(`Position ${positionId} not found`));
    }
    if (!position.isOpen || isFinalBracketState(position.bracketState)) {
      return err(new BracketStateError(`Position ${positionId} is already ${position.bracketState}`));
    }
    if (position.bracketState === 'CLOSING') {
      return err(new BracketStateError(`Position ${positionId} is already closing`));
    }

    if (position.bracketState === 'ENTRY_PLACED') {
      const withdrawn = await this.withdrawEntry(position);
      if (!withdrawn.ok) {
        return err(withdrawn.error);
      }
      position = withdrawn.value;
      if (!position.isOpen) {
        return ok({ position, closeOrderId: null });
      }
    }

    const children = await this.liveChildren(position);
    const withdrawn = await this.withdrawOrders(position, children);
    if (!withdrawn.ok) {
      if (position.bracketState === 'PROTECTED') {
        await this.transition(position, 'ENTRY_FILLED');
      }
      return err(withdrawn.error);
    }
    position = withdrawn.value.position;

    if (position.remainingAmount <= AMOUNT_EPSILON) {
      const settled = await this.settleFlatPosition(
        position,
        withdrawn.value.filledRoles[0] ?? 'STOP_LOSS'
      );
      return ok({ position: settled.position, closeOrderId: null });
    }

    const closeOrder = await this.orders.create({
      pairSymbol: position.pairSymbol,
      positionId,
      role: 'CLOSE',
      side: exitSide(position.side),
      kind: 'MARKET',
      amount: position.remainingAmount,
      price: null,
      parentOrderId: position.entryOrderId,
    });
    const placed = await this.submit(closeOrder);

    if (!placed.ok) {
      if (position.bracketState === 'PROTECTED') {
        await this.transition(position, 'ENTRY_FILLED');
      }
      // eslint-disable-next-line no-console
      console.error(
        `[BracketOrderManager] Close of position ${positionId} failed:`,
        placed.error.message
      );
      return err(placed.error);
    }

    if (this.options.closeMode === 'OPTIMISTIC') {
      const exitPrice = markPrice ?? position.currentPrice ?? position.entryPrice;
      const closed = await this.transition(position, 'CLOSED', {
        isOpen: false,
        remainingAmount: 0,
        realizedPnl:
          position.realizedPnl +
          calculatePnl(position.side, position.entryPrice, exitPrice, position.remainingAmount),
        unrealizedPnl: 0,
        currentPrice: exitPrice,
        closeReason: reason,
        closeOrderId: placed.value.id,
        closedAt: this.now(),
      });

      // eslint-disable-next-line no-console
      console.log(`[BracketOrderManager] Position ${positionId} closed (${reason}) @ ${exitPrice}`);
      return ok({ position: closed, closeOrderId: placed.value.id });
    }

    const closing = await this.transition(position, 'CLOSING', {
      closeReason: reason,
      closeOrderId: placed.value.id,
    });

    // eslint-disable-next-line no-console
    console.log(`[BracketOrderManager] Position ${positionId} closing (${reason})`);
    return ok({ position: closing, closeOrderId: placed.value.id });
  }

  /**
   * Cancel an unfilled entry; a partial fill found afterwards becomes a filled position
   */
  private async withdrawEntry(position: Position): Promise<Result<Position>> {
    const entry = await this.orders.findById(position.entryOrderId);
    if (!entry) {
      return err(new InvariantViolationError(`Entry order ${position.entryOrderId} missing`));
    }

    let report: ExchangeOrderReport = {
      status: 'CANCELED',
      filledAmount: entry.filledAmount,
      avgPrice: entry.avgFillPrice,
      fee: entry.fee,
    };

    if (entry.exchangeOrderId && isLiveOrderStatus(entry.status)) {
      try {
        await this.exchange.cancelOrder(entry.exchangeOrderId);
        const reports = await this.exchange.queryOrders([entry.exchangeOrderId]);
        const latest = reports.get(entry.exchangeOrderId);
        if (latest) {
          report = isLiveOrderStatus(latest.status) ? { ...latest, status: 'CANCELED' } : latest;
        }
      } catch (error) {
        return err(toTradingError(error));
      }
    }

    if (isLiveOrderStatus(entry.status)) {
      await this.resolveEntry(entry, report, false);
    }

    const current = await this.positions.findById(position.id);
    return current ? ok(current) : err(new NotFoundError(`Position ${position.id} not found`));
  }

  // ==========================================================================
  // Restart
  // ==========================================================================

  /**
   * Rebuild correlations from open entry orders that have no children yet
   */
  async restoreCorrelations(): Promise<number> {
    const entries = await this.orders.findOpenEntriesWithoutChildren();
    let restored = 0;

    for (const entry of entries) {
      const position = await this.findPositionForOrder(entry);
      if (!position || position.bracketState !== 'ENTRY_PLACED') {
        continue;
      }

      this.correlations.register({
        entryOrderId: entry.id,
        positionId: position.id,
        signalId: position.signalId,
        side: position.side,
        amount: position.amount,
        stopLossPrice: position.stopLossPrice,
        takeProfitPrice: position.takeProfitPrice,
      });
      restored++;
    }

    // eslint-disable-next-line no-console
    console.log(`[BracketOrderManager] Restored ${restored} bracket correlations`);
    return restored;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Insert-then-place: the PENDING row exists before the exchange sees the order
   */
  private async submit(order: Order): Promise<Result<Order>> {
    try {
      const placed = await this.exchange.placeOrder({
        pair: order.pairSymbol,
        side: order.side,
        kind: order.kind,
        amount: order.amount,
        price: order.price ?? undefined,
      });
      return ok(
        await this.orders.update(order.id, {
          status: 'OPEN',
          exchangeOrderId: placed.exchangeOrderId,
        })
      );
    } catch (error) {
      await this.orders.update(order.id, { status: 'CANCELED' });
      return err(toTradingError(error));
    }
  }

  /**
   * Cancel live orders at the exchange, then record their final reports.
   * A failed cancel leaves every local record untouched.
   */
  private async withdrawOrders(position: Position, orders: Order[]): Promise<Result<Withdrawal>> {
    const live = orders.filter((order) => isLiveOrderStatus(order.status));
    const acknowledged: Order[] = [];

    for (const order of live) {
      if (!order.exchangeOrderId) {
        continue;
      }
      try {
        await this.exchange.cancelOrder(order.exchangeOrderId);
      } catch (error) {
        return err(toTradingError(error));
      }
      acknowledged.push(order);
    }

    for (const order of live) {
      if (!order.exchangeOrderId) {
        await this.orders.update(order.id, { status: 'CANCELED' });
      }
    }

    if (acknowledged.length === 0) {
      return ok({ position, filledRoles: [] });
    }

    let reports: Map<string, ExchangeOrderReport>;
    try {
      reports = await this.exchange.queryOrders(
        acknowledged.flatMap((order) => (order.exchangeOrderId ? [order.exchangeOrderId] : []))
      );
    } catch (error) {
      return err(toTradingError(error));
    }

    let current = position;
    const filledRoles: OrderRole[] = [];

    for (const order of acknowledged) {
      const latest = order.exchangeOrderId ? reports.get(order.exchangeOrderId) : undefined;
      let report: ExchangeOrderReport = {
        status: 'CANCELED',
        filledAmount: order.filledAmount,
        avgPrice: order.avgFillPrice,
        fee: order.fee,
      };
      if (latest) {
        // The cancel was acknowledged even if the query still shows the order open
        report = isLiveOrderStatus(latest.status) ? { ...latest, status: 'CANCELED' } : latest;
      }

      const booked = await this.bookReport(current, order, report);
      current = booked.position;
      if (booked.filledDelta > AMOUNT_EPSILON) {
        filledRoles.push(order.role);
      }
    }

    return ok({ position: current, filledRoles });
  }

  /**
   * Record a report on the order and book any new fill against the position
   */
  private async bookReport(
    position: Position,
    order: Order,
    report: ExchangeOrderReport
  ): Promise<BookedReport> {
    const filledDelta = Math.max(0, report.filledAmount - order.filledAmount);
    const feeDelta = Math.max(0, report.fee - order.fee);
    const fillPrice = deltaFillPrice(order, report);
    const updatedOrder = await this.recordReport(order, report);

    if (!position.isOpen || (filledDelta <= AMOUNT_EPSILON && feeDelta === 0)) {
      return { position, order: updatedOrder, filledDelta };
    }

    const exitPrice = fillPrice ?? position.currentPrice ?? position.entryPrice;
    const booked = Math.min(filledDelta, position.remainingAmount);

    const updatedPosition = await this.positions.update(position.id, {
      remainingAmount: Math.max(0, position.remainingAmount - booked),
      realizedPnl:
        position.realizedPnl + calculatePnl(position.side, position.entryPrice, exitPrice, booked),
      fees: position.fees + feeDelta,
      currentPrice: booked > 0 ? exitPrice : position.currentPrice,
    });

    return { position: updatedPosition, order: updatedOrder, filledDelta };
  }

  /**
   * Exchange status wins unless it would move the order backwards
   */
  private async recordReport(order: Order, report: ExchangeOrderReport): Promise<Order> {
    const status = isValidOrderTransition(order.status, report.status) ? report.status : order.status;

    if (
      status === order.status &&
      report.filledAmount === order.filledAmount &&
      report.fee === order.fee &&
      report.avgPrice === order.avgFillPrice
    ) {
      return order;
    }

    return this.orders.update(order.id, {
      status,
      filledAmount: report.filledAmount,
      avgFillPrice: report.avgPrice,
      fee: report.fee,
    });
  }

  /**
   * Remaining amount reached zero: withdraw the sibling (OCO) and close the position
   */
  private async settleFlatPosition(
    position: Position,
    filledRole: OrderRole
  ): Promise<{ position: Position; errors: TradingError[] }> {
    const errors: TradingError[] = [];
    const siblings = await this.liveChildren(position);

    if (siblings.length > 0) {
      const withdrawn = await this.withdrawOrders(position, siblings);
      if (!withdrawn.ok) {
        errors.push(
          new InvariantViolationError(
            `Sibling of position ${position.id} could not be canceled: ${withdrawn.error.message}`
          )
        );
      }
    }

    const closed = await this.finalizeClose(position, closeReasonFor(filledRole) ?? 'MANUAL');
    return { position: closed, errors };
  }

  private async finalizeClose(position: Position, fallbackReason: CloseReason): Promise<Position> {
    const closed = await this.transition(position, 'CLOSED', {
      isOpen: false,
      remainingAmount: 0,
      unrealizedPnl: 0,
      closeReason: position.closeReason ?? fallbackReason,
      closedAt: this.now(),
    });

    // eslint-disable-next-line no-console
    console.log(
      `[BracketOrderManager] Position ${position.id} closed (${closed.closeReason ?? fallbackReason}), ` +
        `realized ${closed.realizedPnl.toFixed(2)}`
    );

    return closed;
  }

  private async transition(
    position: Position,
    to: BracketState,
    patch: PositionUpdate = {}
  ): Promise<Position> {
    assertBracketTransition(position.id, position.bracketState, to);
    return this.positions.update(position.id, { ...patch, bracketState: to });
  }

  private async liveChildren(position: Position): Promise<Order[]> {
    const orders = await this.orders.findByPosition(position.id);
    return orders.filter(
      (order) =>
        (order.role === 'STOP_LOSS' || order.role === 'TAKE_PROFIT') &&
        isLiveOrderStatus(order.status)
    );
  }

  private async isLiveOrder(orderId: string | null): Promise<boolean> {
    if (!orderId) {
      return false;
    }
    const order = await this.orders.findById(orderId);
    return order !== null && isLiveOrderStatus(order.status);
  }

  private async findPositionForOrder(order: Order): Promise<Position | null> {
    if (order.positionId) {
      return this.positions.findById(order.positionId);
    }
    return this.positions.findByEntryOrderId(order.id);
  }

  private outcome(
    order: Order,
    action: BracketAction,
    errors: TradingError[] = []
  ): OrderReportOutcome {
    for (const error of errors) {
      // eslint-disable-next-line no-console
      console.error(`[BracketOrderManager] ${order.role} ${order.id}: ${errorMessage(error)}`);
    }
    return { orderId: order.id, positionId: order.positionId, role: order.role, action, errors };
  }
}
