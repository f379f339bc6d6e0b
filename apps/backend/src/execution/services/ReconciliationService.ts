/**
 * Reconciliation Service
 * Pulls authoritative order status from the exchange and hands every change
 * to the Bracket Order Manager, then retries protection of unprotected fills.
 */

import type { OrderStatus } from '@bracket-trader/shared';
import { type TradingError, describeError, toTradingError } from '../../common/errors';
import {
  reconciliationActionCounter,
  reconciliationCounter,
  unprotectedPositionsGauge,
} from '../../monitoring/metrics';
import type { ExchangeGateway, ExchangeOrderReport } from '../exchange/ExchangeGateway';
import type { OrderStore } from '../repositories/OrderRepository';
import type {
  BracketAction,
  BracketOrderManager,
  OrderReportOutcome,
  ProtectionSweepResult,
} from './BracketOrderManager';

/**
 * Exchange limit on transaction ids per status query
 */
export const RECONCILIATION_BATCH_SIZE = 50;

export interface ReconciliationAction {
  orderId: string;
  exchangeOrderId: string;
  positionId: string | null;
  action: BracketAction;
  localStatus: OrderStatus;
  exchangeStatus: OrderStatus;
  exchangeFilledAmount: number;
}

export interface ReconciliationResult {
  ordersChecked: number;
  actions: ReconciliationAction[];
  errors: TradingError[];
  protection: ProtectionSweepResult;
  durationMs: number;
}

export class ReconciliationService {
  private isReconciling = false;

  constructor(
    private readonly orderRepository: OrderStore,
    private readonly exchange: ExchangeGateway,
    private readonly bracketManager: BracketOrderManager
  ) {}

  /**
   * One full pass: query open orders in batches, apply changes, sweep protection
   */
  async reconcile(): Promise<ReconciliationResult> {
    if (this.isReconciling) {
      throw new Error('Reconciliation already in progress');
    }

    this.isReconciling = true;
    const startTime = Date.now();
    const actions: ReconciliationAction[] = [];
    const errors: TradingError[] = [];

    try {
      // Orders never acknowledged by the exchange are not queried
      const orders = await this.orderRepository.findOpenWithExchangeId();

      for (let i = 0; i < orders.length; i += RECONCILIATION_BATCH_SIZE) {
        const batch = orders.slice(i, i + RECONCILIATION_BATCH_SIZE);
        const ids = batch.flatMap((order) => (order.exchangeOrderId ? [order.exchangeOrderId] : []));

        let reports: Map<string, ExchangeOrderReport>;
        try {
          reports = await this.exchange.queryOrders(ids);
        } catch (error) {
          // The next scheduled pass retries this batch
          errors.push(toTradingError(error));
          continue;
        }

        for (const order of batch) {
          const report = order.exchangeOrderId ? reports.get(order.exchangeOrderId) : undefined;
          if (!order.exchangeOrderId || !report) {
            continue;
          }

          let outcome: OrderReportOutcome;
          try {
            outcome = await this.bracketManager.applyOrderReport(order, report);
          } catch (error) {
            // The next scheduled pass retries this order
            errors.push(toTradingError(error));
            continue;
          }
          errors.push(...outcome.errors);

          if (outcome.action !== 'NO_CHANGE') {
            reconciliationActionCounter.inc({ action: outcome.action });
            actions.push({
              orderId: order.id,
              exchangeOrderId: order.exchangeOrderId,
              positionId: outcome.positionId,
              action: outcome.action,
              localStatus: order.status,
              exchangeStatus: report.status,
              exchangeFilledAmount: report.filledAmount,
            });
          }
        }
      }

      const protection = await this.bracketManager.ensureProtection();
      errors.push(...protection.errors);
      unprotectedPositionsGauge.set(protection.checked - protection.protectedCount);

      const durationMs = Date.now() - startTime;
      reconciliationCounter.inc({ status: errors.length === 0 ? 'success' : 'partial' });

      // eslint-disable-next-line no-console
      console.log(
        `[Reconciliation] Complete (${durationMs}ms, ${orders.length} orders, ` +
          `${actions.length} actions, ${errors.length} errors)`
      );

      for (const error of errors) {
        // eslint-disable-next-line no-console
        console.error(`[Reconciliation] ${describeError('reconcile', error)}`);
      }

      return { ordersChecked: orders.length, actions, errors, protection, durationMs };
    } catch (error) {
      reconciliationCounter.inc({ status: 'failed' });
      throw error;
    } finally {
      this.isReconciling = false;
    }
  }
}
