/**
 * Order Repository
 * Data access layer for execution.orders table
 */

import type {
  Order,
  OrderKind,
  OrderRole,
  OrderSide,
  OrderStatus,
} from '@bracket-trader/shared';
import type { Pool, PoolClient } from 'pg';
import { buildSetClause, toDate, toNullableNumber, toNumber } from '../../common/sql';

type OrderRow = {
  id: string;
  pair_symbol: string;
  position_id: string | null;
  role: OrderRole;
  side: OrderSide;
  kind: OrderKind;
  amount: string;
  price: string | null;
  status: OrderStatus;
  exchange_order_id: string | null;
  filled_amount: string;
  avg_fill_price: string | null;
  fee: string;
  parent_order_id: string | null;
  stop_loss_order_id: string | null;
  take_profit_order_id: string | null;
  created_at: string | Date;
  updated_at: string | Date;
};

export interface CreateOrderParams {
  pairSymbol: string;
  positionId: string | null;
  role: OrderRole;
  side: OrderSide;
  kind: OrderKind;
  amount: number;
  price: number | null;
  parentOrderId: string | null;
}

export interface OrderUpdate {
  status?: OrderStatus;
  positionId?: string;
  exchangeOrderId?: string;
  filledAmount?: number;
  avgFillPrice?: number | null;
  fee?: number;
  stopLossOrderId?: string | null;
  takeProfitOrderId?: string | null;
}

/**
 * Persistence capability consumed by the execution services
 */
export interface OrderStore {
  create(params: CreateOrderParams): Promise<Order>;
  findById(id: string): Promise<Order | null>;
  findByStatus(statuses: OrderStatus[], limit?: number): Promise<Order[]>;
  findByPosition(positionId: string): Promise<Order[]>;
  /** Open orders the exchange has acknowledged */
  findOpenWithExchangeId(): Promise<Order[]>;
  /** Open entry orders whose protective children were never placed */
  findOpenEntriesWithoutChildren(): Promise<Order[]>;
  update(id: string, patch: OrderUpdate): Promise<Order>;
}

const ORDER_COLUMNS = `
  id, pair_symbol, position_id, role, side, kind, amount, price, status,
  exchange_order_id, filled_amount, avg_fill_price, fee, parent_order_id,
  stop_loss_order_id, take_profit_order_id, created_at, updated_at
`;

const UPDATE_COLUMNS = [
  ['status', 'status'],
  ['positionId', 'position_id'],
  ['exchangeOrderId', 'exchange_order_id'],
  ['filledAmount', 'filled_amount'],
  ['avgFillPrice', 'avg_fill_price'],
  ['fee', 'fee'],
  ['stopLossOrderId', 'stop_loss_order_id'],
  ['takeProfitOrderId', 'take_profit_order_id'],
] as const;

export class OrderRepository implements OrderStore {
  constructor(private readonly pool: Pool) {}

  /**
   * Create order in PENDING status
   * Returns order with generated UUID
   */
  async create(params: CreateOrderParams, client?: PoolClient): Promise<Order> {
    const db = client || this.pool;

    const query = `
      INSERT INTO execution.orders (
        pair_symbol, position_id, role, side, kind, amount, price, status,
        filled_amount, fee, parent_order_id
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, 'PENDING', 0, 0, $8)
      RETURNING ${ORDER_COLUMNS}
    `;

    const result = await db.query<OrderRow>(query, [
      params.pairSymbol,
      params.positionId,
      params.role,
      params.side,
      params.kind,
      params.amount,
      params.price,
      params.parentOrderId,
    ]);

    return this.mapRowToOrder(result.rows[0]);
  }

  async findById(id: string, client?: PoolClient): Promise<Order | null> {
    const db = client || this.pool;

    const result = await db.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM execution.orders WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return this.mapRowToOrder(result.rows[0]);
  }

  async findByStatus(statuses: OrderStatus[], limit = 1000): Promise<Order[]> {
    const query = `
      SELECT ${ORDER_COLUMNS}
      FROM execution.orders
      WHERE status = ANY($1)
      ORDER BY created_at ASC
      LIMIT $2
    `;

    const result = await this.pool.query<OrderRow>(query, [statuses, limit]);

    return result.rows.map((row) => this.mapRowToOrder(row));
  }

  async findByPosition(positionId: string): Promise<Order[]> {
    const query = `
      SELECT ${ORDER_COLUMNS}
      FROM execution.orders
      WHERE position_id = $1
      ORDER BY created_at ASC
    `;

    const result = await this.pool.query<OrderRow>(query, [positionId]);

    return result.rows.map((row) => this.mapRowToOrder(row));
  }

  /**
   * Orders without an exchange id were never acknowledged and are excluded
   */
  async findOpenWithExchangeId(): Promise<Order[]> {
    const query = `
      SELECT ${ORDER_COLUMNS}
      FROM execution.orders
      WHERE status = 'OPEN'
        AND exchange_order_id IS NOT NULL
      ORDER BY created_at ASC
    `;

    const result = await this.pool.query<OrderRow>(query);

    return result.rows.map((row) => this.mapRowToOrder(row));
  }

  /**
   * Used at startup to rebuild the in-memory bracket correlations
   */
  async findOpenEntriesWithoutChildren(): Promise<Order[]> {
    const query = `
      SELECT ${ORDER_COLUMNS}
      FROM execution.orders
      WHERE role = 'ENTRY'
        AND status = 'OPEN'
        AND stop_loss_order_id IS NULL
        AND take_profit_order_id IS NULL
      ORDER BY created_at ASC
    `;

    const result = await this.pool.query<OrderRow>(query);

    return result.rows.map((row) => this.mapRowToOrder(row));
  }

  async update(id: string, patch: OrderUpdate, client?: PoolClient): Promise<Order> {
    const db = client || this.pool;
    const { clauses, values } = buildSetClause(patch, UPDATE_COLUMNS);

    const query = `
      UPDATE execution.orders
      SET ${[...clauses, 'updated_at = NOW()'].join(', ')}
      WHERE id = $1
      RETURNING ${ORDER_COLUMNS}
    `;

    const result = await db.query<OrderRow>(query, [id, ...values]);

    if (result.rows.length === 0) {
      throw new Error(`Order not found: ${id}`);
    }

    return this.mapRowToOrder(result.rows[0]);
  }

  private mapRowToOrder(row: OrderRow): Order {
    return {
      id: row.id,
      pairSymbol: row.pair_symbol,
      positionId: row.position_id,
      role: row.role,
      side: row.side,
      kind: row.kind,
      amount: toNumber(row.amount),
      price: toNullableNumber(row.price),
      status: row.status,
      exchangeOrderId: row.exchange_order_id,
      filledAmount: toNumber(row.filled_amount),
      avgFillPrice: toNullableNumber(row.avg_fill_price),
      fee: toNumber(row.fee),
      parentOrderId: row.parent_order_id,
      stopLossOrderId: row.stop_loss_order_id,
      takeProfitOrderId: row.take_profit_order_id,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
    };
  }
}
