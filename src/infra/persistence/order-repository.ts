/**
 * Order persistence. Every state change is written together with its
 * transition row in one transaction.
 */

import {
  DataIntegrityError,
  DuplicateIdempotencyKeyError,
  InvalidTransitionError,
  OrderNotFoundError,
} from "../../errors/app.errors";
import {
  ORDER_STATES,
  type Order,
  type OrderState,
  type OrderTransition,
} from "../../models/order";
import { assertTransition } from "../../core/order-state-machine";
import type { AuditTrail, OrderFillRecord } from "../../core/audit-trail";
import { isUniqueViolation, oneOf, type SqliteDatabase } from "./database";
import type { OrderRow } from "./types";

/**
 * Mutable execution fields an update may change
 */
export type OrderPatch = Partial<
  Pick<
    Order,
    | "exchangeOrderId"
    | "filledSize"
    | "avgFillPrice"
    | "submittedAt"
    | "filledAt"
    | "confirmedAt"
    | "retryCount"
    | "errorMessage"
  >
>;

export interface TransitionRequest {
  to: OrderState;
  reason: string;
  metadata?: Record<string, unknown>;
  patch?: OrderPatch;
  timestamp: number;
  /** Fill report that caused the transition, logged in the same transaction */
  fill?: OrderFillRecord;
}

export interface OrderStateCount {
  state: OrderState;
  count: number;
}

function rowToOrder(row: OrderRow): Order {
  return {
    orderId: row.order_id,
    idempotencyKey: row.idempotency_key,
    exchangeOrderId: row.exchange_order_id,
    tokenId: row.token_id,
    marketId: row.market_id,
    side: oneOf(row.side, ["BUY", "SELL"] as const, "side"),
    size: row.size,
    price: row.price,
    orderType: oneOf(row.order_type, ["LIMIT", "MARKET", "FOK", "GTC"] as const, "order_type"),
    state: oneOf(row.state, ORDER_STATES, "state"),
    filledSize: row.filled_size,
    remainingSize: row.remaining_size,
    avgFillPrice: row.avg_fill_price,
    createdAt: row.created_at,
    submittedAt: row.submitted_at,
    filledAt: row.filled_at,
    confirmedAt: row.confirmed_at,
    updatedAt: row.updated_at,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    errorMessage: row.error_message,
    purpose: oneOf(row.purpose, ["OPEN", "CLOSE"] as const, "purpose"),
    whaleAddress: row.whale_address,
    positionId: row.position_id,
    parentOrderId: row.parent_order_id,
  };
}

export class OrderRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly audit: AuditTrail,
  ) {}

  /**
   * Insert a new PENDING order and its creation record.
   * Throws DuplicateIdempotencyKeyError if the key already exists.
   */
  create(order: Order, reason: string, metadata: Record<string, unknown> = {}): Order {
    if (order.state !== "PENDING") {
      throw new DataIntegrityError(`New orders must start PENDING, got ${order.state}`);
    }

    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO orders (
             order_id, idempotency_key, exchange_order_id, token_id, market_id, side, size, price,
             order_type, state, filled_size, remaining_size, avg_fill_price,
             created_at, submitted_at, filled_at, confirmed_at, updated_at,
             retry_count, max_retries, error_message, purpose, whale_address, position_id, parent_order_id
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          order.orderId,
          order.idempotencyKey,
          order.exchangeOrderId,
          order.tokenId,
          order.marketId,
          order.side,
          order.size,
          order.price,
          order.orderType,
          order.state,
          order.filledSize,
          order.size - order.filledSize,
          order.avgFillPrice,
          order.createdAt,
          order.submittedAt,
          order.filledAt,
          order.confirmedAt,
          order.updatedAt,
          order.retryCount,
          order.maxRetries,
          order.errorMessage,
          order.purpose,
          order.whaleAddress,
          order.positionId,
          order.parentOrderId,
        );
      this.audit.appendOrderTransition({
        orderId: order.orderId,
        fromState: null,
        toState: "PENDING",
        timestamp: order.createdAt,
        reason,
        metadata: { idempotencyKey: order.idempotencyKey, ...metadata },
      });
    });

    try {
      insert();
    } catch (err) {
      if (isUniqueViolation(err, "idempotency_key")) {
        throw new DuplicateIdempotencyKeyError(
          order.idempotencyKey,
          err instanceof Error ? err : undefined,
        );
      }
      throw err;
    }
    return { ...order, remainingSize: order.size - order.filledSize };
  }

  /**
   * Move an order to a new state. Fails if the stored state is not `from`
   * (a concurrent writer got there first) or the transition is not allowed.
   */
  transition(orderId: string, from: OrderState, request: TransitionRequest): Order {
    assertTransition(orderId, from, request.to);

    const apply = this.db.transaction((): Order => {
      const current = this.findById(orderId);
      if (!current) throw new OrderNotFoundError(orderId);
      if (current.state !== from) {
        throw new InvalidTransitionError(orderId, current.state, request.to);
      }

      const next = this.applyPatch(current, request.patch ?? {}, request.timestamp);
      next.state = request.to;
      this.writeRow(next, from);

      this.audit.appendOrderTransition({
        orderId,
        fromState: from,
        toState: request.to,
        timestamp: request.timestamp,
        reason: request.reason,
        metadata: request.metadata ?? {},
      });
      if (request.fill) this.audit.appendFill(request.fill);
      return next;
    });

    return apply();
  }

  /**
   * Update execution fields without a state change (retry bookkeeping,
   * fill progress). Fill progress is recorded through the fill log.
   */
  update(orderId: string, expectedState: OrderState, patch: OrderPatch, timestamp: number, fill?: OrderFillRecord): Order {
    const apply = this.db.transaction((): Order => {
      const current = this.findById(orderId);
      if (!current) throw new OrderNotFoundError(orderId);
      if (current.state !== expectedState) {
        throw new DataIntegrityError(
          `Order ${orderId} is ${current.state}, expected ${expectedState}`,
        );
      }
      const next = this.applyPatch(current, patch, timestamp);
      this.writeRow(next, expectedState);
      if (fill) this.audit.appendFill(fill);
      return next;
    });
    return apply();
  }

  findById(orderId: string): Order | undefined {
    const row = this.db
      .prepare<[string], OrderRow>("SELECT * FROM orders WHERE order_id = ?")
      .get(orderId);
    return row ? rowToOrder(row) : undefined;
  }

  findByIdempotencyKey(key: string): Order | undefined {
    const row = this.db
      .prepare<[string], OrderRow>("SELECT * FROM orders WHERE idempotency_key = ?")
      .get(key);
    return row ? rowToOrder(row) : undefined;
  }

  findByExchangeOrderId(exchangeOrderId: string): Order | undefined {
    const row = this.db
      .prepare<[string], OrderRow>("SELECT * FROM orders WHERE exchange_order_id = ?")
      .get(exchangeOrderId);
    return row ? rowToOrder(row) : undefined;
  }

  listByState(states: readonly OrderState[]): Order[] {
    if (states.length === 0) return [];
    const placeholders = states.map(() => "?").join(", ");
    return this.db
      .prepare<string[], OrderRow>(
        `SELECT * FROM orders WHERE state IN (${placeholders}) ORDER BY created_at ASC`,
      )
      .all(...states)
      .map(rowToOrder);
  }

  listChildren(parentOrderId: string): Order[] {
    return this.db
      .prepare<[string], OrderRow>(
        "SELECT * FROM orders WHERE parent_order_id = ? ORDER BY created_at ASC",
      )
      .all(parentOrderId)
      .map(rowToOrder);
  }

  countByState(): OrderStateCount[] {
    return this.db
      .prepare<[], { state: string; count: number }>("SELECT state, COUNT(*) AS count FROM orders GROUP BY state")
      .all()
      .map((row) => ({ state: oneOf(row.state, ORDER_STATES, "state"), count: row.count }));
  }

  /**
   * Mean milliseconds from submission to full fill, over orders that filled
   */
  averageTimeToFill(): number | null {
    const row = this.db
      .prepare<[], { avg_ms: number | null }>(
        `SELECT AVG(filled_at - submitted_at) AS avg_ms FROM orders
          WHERE filled_at IS NOT NULL AND submitted_at IS NOT NULL`,
      )
      .get();
    return row?.avg_ms ?? null;
  }

  getTransitions(orderId: string): OrderTransition[] {
    return this.audit.getOrderTransitions(orderId);
  }

  /**
   * Force the stored state to match the audit log during recovery
   */
  repairState(orderId: string, state: OrderState, timestamp: number): void {
    this.db
      .prepare<[string, number, string]>("UPDATE orders SET state = ?, updated_at = ? WHERE order_id = ?")
      .run(state, timestamp, orderId);
  }

  private applyPatch(current: Order, patch: OrderPatch, timestamp: number): Order {
    const next: Order = { ...current, ...patch, updatedAt: timestamp };
    if (next.filledSize > next.size + 1e-9) {
      throw new DataIntegrityError(
        `Order ${current.orderId} filled ${next.filledSize} exceeds size ${next.size}`,
      );
    }
    next.filledSize = Math.min(next.filledSize, next.size);
    next.remainingSize = next.size - next.filledSize;
    return next;
  }

  private writeRow(order: Order, expectedState: OrderState): void {
    const result = this.db
      .prepare(
        `UPDATE orders SET
           state = ?, exchange_order_id = ?, filled_size = ?, remaining_size = ?, avg_fill_price = ?,
           submitted_at = ?, filled_at = ?, confirmed_at = ?, updated_at = ?,
           retry_count = ?, error_message = ?
         WHERE order_id = ? AND state = ?`,
      )
      .run(
        order.state,
        order.exchangeOrderId,
        order.filledSize,
        order.remainingSize,
        order.avgFillPrice,
        order.submittedAt,
        order.filledAt,
        order.confirmedAt,
        order.updatedAt,
        order.retryCount,
        order.errorMessage,
        order.orderId,
        expectedState,
      );
    if (result.changes !== 1) {
      throw new InvalidTransitionError(order.orderId, expectedState, order.state);
    }
  }
}
