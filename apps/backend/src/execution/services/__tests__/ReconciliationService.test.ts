/**
 * Reconciliation Service Tests
 * Tests batching, failure isolation and the overlap guard
 */

import { InvariantViolationError, TransportError } from '../../../common/errors';
import { FakeExchange } from '../../../__tests__/support/fakeExchange';
import { TEST_NOW, buildPair, buildSignal } from '../../../__tests__/support/fixtures';
import {
  InMemoryOrderStore,
  InMemoryPairStore,
  InMemoryPositionStore,
  InMemorySignalStore,
} from '../../../__tests__/support/inMemoryStores';
import { BracketOrderManager } from '../BracketOrderManager';
import { RECONCILIATION_BATCH_SIZE, ReconciliationService } from '../ReconciliationService';

describe('ReconciliationService', () => {
  let orders: InMemoryOrderStore;
  let exchange: FakeExchange;
  let signals: InMemorySignalStore;
  let manager: BracketOrderManager;
  let service: ReconciliationService;

  async function seedOpenOrder(exchangeOrderId: string): Promise<string> {
    const order = await orders.create({
      pairSymbol: 'XBTUSD',
      positionId: null,
      role: 'ENTRY',
      side: 'BUY',
      kind: 'LIMIT',
      amount: 1,
      price: 100,
      parentOrderId: null,
    });
    await orders.update(order.id, { status: 'OPEN', exchangeOrderId });
    return order.id;
  }

  async function openFilledEntries(): Promise<void> {
    await manager.openBracket(buildSignal(), 100);
    await manager.openBracket(buildSignal({ id: 'signal-2' }), 100);
    exchange.fill('TX-1', 1, 100);
    exchange.fill('TX-2', 1, 100);
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    orders = new InMemoryOrderStore();
    exchange = new FakeExchange();
    signals = new InMemorySignalStore();
    signals.insert(buildSignal());
    signals.insert(buildSignal({ id: 'signal-2' }));
    manager = new BracketOrderManager(
      {
        orders,
        positions: new InMemoryPositionStore(),
        signals,
        pairs: new InMemoryPairStore([buildPair()]),
        exchange,
      },
      { closeMode: 'CONFIRM', trailingStopPct: null, now: () => TEST_NOW }
    );
    service = new ReconciliationService(orders, exchange, manager);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should query open orders in batches of 50', async () => {
    for (let i = 1; i <= 120; i++) {
      await seedOpenOrder(`UNKNOWN-${i}`);
    }

    const result = await service.reconcile();

    expect(RECONCILIATION_BATCH_SIZE).toBe(50);
    expect(exchange.queried.map((batch) => batch.length)).toEqual([50, 50, 20]);
    expect(result.ordersChecked).toBe(120);
    expect(result.actions).toEqual([]);
    expect(result.errors).toEqual([]);
  });

  it('should skip orders that were never acknowledged by the exchange', async () => {
    await orders.create({
      pairSymbol: 'XBTUSD',
      positionId: null,
      role: 'ENTRY',
      side: 'BUY',
      kind: 'LIMIT',
      amount: 1,
      price: 100,
      parentOrderId: null,
    });

    const result = await service.reconcile();

    expect(result.ordersChecked).toBe(0);
    expect(exchange.queried).toEqual([]);
  });

  it('should record a failed batch and leave its orders untouched', async () => {
    const orderId = await seedOpenOrder('TX-9');
    exchange.queryFailure = new TransportError('Kraken API timeout');

    const result = await service.reconcile();

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(TransportError);
    expect(result.actions).toEqual([]);
    expect((await orders.findById(orderId))?.status).toBe('OPEN');
  });

  it('should protect the other fills when one order fails to load', async () => {
    await openFilledEntries();
    jest.spyOn(orders, 'findById').mockRejectedValueOnce(new Error('connection reset'));
    const sweep = jest.spyOn(manager, 'ensureProtection');

    const result = await service.reconcile();

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(TransportError);
    expect(result.errors[0].message).toBe('connection reset');
    expect(result.actions.map((action) => action.exchangeOrderId)).toEqual(['TX-2']);
    const placed = exchange.placed.map((p) => `${p.side} ${p.kind} ${p.exchangeOrderId}`);
    expect(placed).toEqual([
      'BUY LIMIT TX-1',
      'BUY LIMIT TX-2',
      'SELL STOP_LOSS TX-3',
      'SELL LIMIT TX-4',
    ]);
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it('should finish the pass when applying a report throws', async () => {
    await openFilledEntries();
    jest.spyOn(manager, 'applyOrderReport').mockRejectedValueOnce(new Error('lock lost'));

    const result = await service.reconcile();

    expect(result.errors.map((error) => error.message)).toEqual(['lock lost']);
    expect(result.ordersChecked).toBe(2);
    expect(result.actions).toHaveLength(1);
    expect(result.actions[0].exchangeOrderId).toBe('TX-2');
  });

  it('should cancel an acknowledged entry that has no position', async () => {
    const orderId = await seedOpenOrder('TX-9');
    exchange.setReport('TX-9', { status: 'OPEN', filledAmount: 0, avgPrice: null, fee: 0 });

    const result = await service.reconcile();

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(InvariantViolationError);
    expect(result.actions).toEqual([
      {
        orderId,
        exchangeOrderId: 'TX-9',
        positionId: null,
        action: 'ORDER_UPDATED',
        localStatus: 'OPEN',
        exchangeStatus: 'OPEN',
        exchangeFilledAmount: 0,
      },
    ]);
    expect(exchange.canceled).toEqual(['TX-9']);
    expect((await orders.findById(orderId))?.status).toBe('CANCELED');
  });

  it('should refuse to start while a pass is running', async () => {
    await seedOpenOrder('TX-9');

    const first = service.reconcile();
    await expect(service.reconcile()).rejects.toThrow('Reconciliation already in progress');
    await first;

    await expect(service.reconcile()).resolves.toMatchObject({ ordersChecked: 1 });
  });
});
