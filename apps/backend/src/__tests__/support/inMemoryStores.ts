/**
 * In-memory stand-ins for the pg repositories, used by service tests
 */

import type {
  IndicatorSnapshot,
  Order,
  OrderStatus,
  Portfolio,
  Position,
  PriceBar,
  TradingPair,
  TradingSignal,
} from '@bracket-trader/shared';
import type {
  CreateOrderParams,
  OrderStore,
  OrderUpdate,
} from '../../execution/repositories/OrderRepository';
import type {
  PortfolioDefaults,
  PortfolioStore,
  PortfolioUpdate,
} from '../../portfolio/repositories/PortfolioRepository';
import type {
  CreatePositionParams,
  PositionStore,
  PositionUpdate,
} from '../../portfolio/repositories/PositionRepository';
import type { NewTradingPair, PairStore } from '../../strategy/repositories/PairRepository';
import type { NewPriceBar, PriceBarStore } from '../../strategy/repositories/PriceBarRepository';
import type { SignalStore } from '../../strategy/repositories/SignalRepository';
import type { SignalCandidate } from '../../strategy/signals/SignalGenerator';

function definedOnly<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch) as Array<keyof T>) {
    if (patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

export class InMemoryOrderStore implements OrderStore {
  readonly rows = new Map<string, Order>();
  private sequence = 0;

  async create(params: CreateOrderParams): Promise<Order> {
    this.sequence++;
    const now = new Date(Date.UTC(2024, 0, 1, 0, 0, this.sequence));
    const order: Order = {
      id: `order-${this.sequence}`,
      ...params,
      status: 'PENDING',
      exchangeOrderId: null,
      filledAmount: 0,
      avgFillPrice: null,
      fee: 0,
      stopLossOrderId: null,
      takeProfitOrderId: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(order.id, order);
    return { ...order };
  }

  async findById(id: string): Promise<Order | null> {
    const order = this.rows.get(id);
    return order ? { ...order } : null;
  }

  async findByStatus(statuses: OrderStatus[]): Promise<Order[]> {
    return this.all().filter((order) => statuses.includes(order.status));
  }

  async findByPosition(positionId: string): Promise<Order[]> {
    return this.all().filter((order) => order.positionId === positionId);
  }

  async findOpenWithExchangeId(): Promise<Order[]> {
    return this.all().filter((order) => order.status === 'OPEN' && order.exchangeOrderId !== null);
  }

  async findOpenEntriesWithoutChildren(): Promise<Order[]> {
    return this.all().filter(
      (order) =>
        order.role === 'ENTRY' &&
        order.status === 'OPEN' &&
        order.stopLossOrderId === null &&
        order.takeProfitOrderId === null
    );
  }

  async update(id: string, patch: OrderUpdate): Promise<Order> {
    const order = this.rows.get(id);
    if (!order) {
      throw new Error(`Order not found: ${id}`);
    }
    const updated: Order = { ...order, ...definedOnly(patch), updatedAt: new Date() };
    this.rows.set(id, updated);
    return { ...updated };
  }

  byRole(role: Order['role']): Order[] {
    return this.all().filter((order) => order.role === role);
  }

  all(): Order[] {
    return [...this.rows.values()].map((order) => ({ ...order }));
  }
}

export class InMemoryPositionStore implements PositionStore {
  readonly rows = new Map<string, Position>();
  private sequence = 0;

  async create(params: CreatePositionParams): Promise<Position> {
    this.sequence++;
    const now = new Date(Date.UTC(2024, 0, 1, 0, 0, this.sequence));
    const position: Position = {
      id: `position-${this.sequence}`,
      ...params,
      remainingAmount: params.amount,
      currentPrice: null,
      realizedPnl: 0,
      unrealizedPnl: 0,
      fees: 0,
      maxFavorableExcursion: 0,
      maxAdverseExcursion: 0,
      bracketState: 'ENTRY_PLACED',
      isOpen: true,
      closeReason: null,
      closeOrderId: null,
      openedAt: now,
      filledAt: null,
      closedAt: null,
      updatedAt: now,
    };
    this.rows.set(position.id, position);
    return { ...position };
  }

  async findById(id: string): Promise<Position | null> {
    const position = this.rows.get(id);
    return position ? { ...position } : null;
  }

  async findByEntryOrderId(entryOrderId: string): Promise<Position | null> {
    return this.all().find((position) => position.entryOrderId === entryOrderId) ?? null;
  }

  async findOpen(): Promise<Position[]> {
    return this.all().filter((position) => position.isOpen);
  }

  async findAll(): Promise<Position[]> {
    return this.all();
  }

  async findRecent(limit: number, offset: number): Promise<Position[]> {
    return this.all().reverse().slice(offset, offset + limit);
  }

  async countAll(): Promise<number> {
    return this.rows.size;
  }

  async update(id: string, patch: PositionUpdate): Promise<Position> {
    const position = this.rows.get(id);
    if (!position) {
      throw new Error(`Position not found: ${id}`);
    }
    const updated: Position = { ...position, ...definedOnly(patch), updatedAt: new Date() };
    this.rows.set(id, updated);
    return { ...updated };
  }

  /**
   * Seed a row directly, for ledger-driven tests
   */
  insert(position: Position): void {
    this.rows.set(position.id, { ...position });
  }

  all(): Position[] {
    return [...this.rows.values()].map((position) => ({ ...position }));
  }
}

export class InMemoryPortfolioStore implements PortfolioStore {
  row: Portfolio | null = null;
  updateCalls = 0;

  async getOrCreate(defaults: PortfolioDefaults): Promise<Portfolio> {
    if (!this.row) {
      this.row = {
        id: 'portfolio-1',
        balance: 0,
        availableBalance: 0,
        lockedBalance: 0,
        quoteAsset: defaults.quoteAsset,
        maxPositionSizePct: defaults.maxPositionSizePct,
        maxDailyLossPct: defaults.maxDailyLossPct,
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
        updatedAt: new Date(),
      };
    }
    return { ...this.row };
  }

  async update(id: string, patch: PortfolioUpdate): Promise<Portfolio> {
    if (!this.row || this.row.id !== id) {
      throw new Error(`Portfolio not found: ${id}`);
    }
    this.updateCalls++;
    this.row = { ...this.row, ...definedOnly(patch), updatedAt: new Date() };
    return { ...this.row };
  }
}

export class InMemorySignalStore implements SignalStore {
  readonly rows = new Map<string, TradingSignal>();
  private sequence = 0;

  async create(candidate: SignalCandidate): Promise<TradingSignal> {
    this.sequence++;
    const signal: TradingSignal = {
      id: `signal-${this.sequence}`,
      ...candidate,
      isActive: true,
      consumedAt: null,
    };
    this.rows.set(signal.id, signal);
    return { ...signal };
  }

  async findById(id: string): Promise<TradingSignal | null> {
    const signal = this.rows.get(id);
    return signal ? { ...signal } : null;
  }

  async findActive(now: Date): Promise<TradingSignal[]> {
    return [...this.rows.values()]
      .filter((s) => s.isActive && s.consumedAt === null && s.expiresAt.getTime() > now.getTime())
      .sort((a, b) => b.confidence - a.confidence)
      .map((signal) => ({ ...signal }));
  }

  async claim(id: string, now: Date): Promise<TradingSignal | null> {
    const signal = this.rows.get(id);
    if (
      !signal ||
      !signal.isActive ||
      signal.consumedAt !== null ||
      signal.expiresAt.getTime() <= now.getTime()
    ) {
      return null;
    }
    const claimed: TradingSignal = { ...signal, isActive: false, consumedAt: now };
    this.rows.set(id, claimed);
    return { ...claimed };
  }

  async deactivateExpired(now: Date): Promise<number> {
    let count = 0;
    for (const [id, signal] of this.rows) {
      if (signal.isActive && signal.expiresAt.getTime() <= now.getTime()) {
        this.rows.set(id, { ...signal, isActive: false });
        count++;
      }
    }
    return count;
  }

  /**
   * Seed a row directly
   */
  insert(signal: TradingSignal): void {
    this.rows.set(signal.id, { ...signal });
  }
}

export class InMemoryPairStore implements PairStore {
  readonly rows = new Map<string, TradingPair>();

  constructor(pairs: TradingPair[] = []) {
    for (const pair of pairs) {
      this.rows.set(pair.symbol, { ...pair });
    }
  }

  async findAll(activeOnly = true): Promise<TradingPair[]> {
    return [...this.rows.values()]
      .filter((pair) => !activeOnly || pair.isActive)
      .map((pair) => ({ ...pair }));
  }

  async findBySymbol(symbol: string): Promise<TradingPair | null> {
    const pair = this.rows.get(symbol);
    return pair ? { ...pair } : null;
  }

  async createIfAbsent(pair: NewTradingPair): Promise<TradingPair> {
    const existing = this.rows.get(pair.symbol);
    if (existing) {
      return { ...existing };
    }
    const created: TradingPair = { ...pair, isActive: true, createdAt: new Date() };
    this.rows.set(pair.symbol, created);
    return { ...created };
  }

  async setActive(symbol: string, isActive: boolean): Promise<void> {
    const pair = this.rows.get(symbol);
    if (pair) {
      this.rows.set(symbol, { ...pair, isActive });
    }
  }
}

export class InMemoryPriceBarStore implements PriceBarStore {
  readonly rows: PriceBar[] = [];
  private sequence = 0;

  async insertIfAbsent(bar: NewPriceBar): Promise<boolean> {
    const exists = this.rows.some(
      (row) =>
        row.pairSymbol === bar.pairSymbol && row.timestamp.getTime() === bar.timestamp.getTime()
    );
    if (exists) {
      return false;
    }
    this.sequence++;
    this.rows.push({ id: `bar-${this.sequence}`, ...bar, indicators: null });
    return true;
  }

  async findRecent(pairSymbol: string, limit: number): Promise<PriceBar[]> {
    return this.rows
      .filter((row) => row.pairSymbol === pairSymbol)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .slice(-limit)
      .map((row) => ({ ...row }));
  }

  async updateIndicators(id: string, snapshot: IndicatorSnapshot): Promise<void> {
    const index = this.rows.findIndex((row) => row.id === id);
    if (index >= 0) {
      this.rows[index] = { ...this.rows[index], indicators: snapshot };
    }
  }
}
