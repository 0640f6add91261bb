/**
 * Audit Trail
 *
 * Append-only log of order transitions, order fills and position updates.
 * Repositories append inside the same SQLite transaction as the state change
 * they describe, so a committed state always has its audit row.
 *
 * The log is also the recovery source: an order's state can be re-derived
 * from its latest transition.
 */

import { ORDER_STATES, type OrderState, type OrderTransition } from "../models/order";
import type { PositionUpdate, PositionUpdateType } from "../models/position";
import { oneOf, parseMetadata, type SqliteDatabase } from "../infra/persistence/database";
import type { OrderTransitionRow, PositionUpdateRow } from "../infra/persistence/types";

const UPDATE_TYPES: readonly PositionUpdateType[] = [
  "PRICE_UPDATE",
  "SIZE_INCREASE",
  "SIZE_DECREASE",
  "PARTIAL_CLOSE",
  "FULL_CLOSE",
  "STOP_LOSS_HIT",
  "TAKE_PROFIT_HIT",
  "MANUAL_ADJUSTMENT",
];

export type NewOrderTransition = Omit<OrderTransition, "id">;
export type NewPositionUpdate = Omit<PositionUpdate, "id">;

export type FillSource = "WEBSOCKET" | "POLL" | "SUBMIT";

export interface OrderFillRecord {
  orderId: string;
  fillSequence: string;
  cumulativeSize: number;
  price: number;
  source: FillSource;
  timestamp: number;
}

/**
 * An order whose stored state disagrees with its latest transition
 */
export interface AuditInconsistency {
  orderId: string;
  storedState: OrderState;
  derivedState: OrderState | null;
}

function toTransition(row: OrderTransitionRow): OrderTransition {
  return {
    id: row.id,
    orderId: row.order_id,
    fromState: row.from_state === null ? null : oneOf(row.from_state, ORDER_STATES, "from_state"),
    toState: oneOf(row.to_state, ORDER_STATES, "to_state"),
    timestamp: row.timestamp,
    reason: row.reason,
    metadata: parseMetadata(row.metadata),
  };
}

function toUpdate(row: PositionUpdateRow): PositionUpdate {
  return {
    id: row.id,
    positionId: row.position_id,
    updateType: oneOf(row.update_type, UPDATE_TYPES, "update_type"),
    oldSize: row.old_size,
    newSize: row.new_size,
    oldPrice: row.old_price,
    newPrice: row.new_price,
    oldMarketValue: row.old_market_value,
    newMarketValue: row.new_market_value,
    oldUnrealizedPnl: row.old_unrealized_pnl,
    newUnrealizedPnl: row.new_unrealized_pnl,
    timestamp: row.timestamp,
    reason: row.reason,
    metadata: parseMetadata(row.metadata),
  };
}

export class AuditTrail {
  constructor(private readonly db: SqliteDatabase) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // APPEND
  // ═══════════════════════════════════════════════════════════════════════════

  appendOrderTransition(t: NewOrderTransition): number {
    const result = this.db
      .prepare<[string, string | null, string, number, string, string]>(
        `INSERT INTO order_transitions (order_id, from_state, to_state, timestamp, reason, metadata)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(t.orderId, t.fromState, t.toState, t.timestamp, t.reason, JSON.stringify(t.metadata));
    return Number(result.lastInsertRowid);
  }

  /**
   * Record a fill report. Returns false when (orderId, fillSequence) was
   * already recorded.
   */
  appendFill(fill: OrderFillRecord): boolean {
    const result = this.db
      .prepare<[string, string, number, number, string, number]>(
        `INSERT OR IGNORE INTO order_fills (order_id, fill_sequence, cumulative_size, price, source, timestamp)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(fill.orderId, fill.fillSequence, fill.cumulativeSize, fill.price, fill.source, fill.timestamp);
    return result.changes > 0;
  }

  appendPositionUpdate(u: NewPositionUpdate): number {
    const result = this.db
      .prepare<[string, string, number, number, number, number, number, number, number, number, number, string, string]>(
        `INSERT INTO position_updates (
           position_id, update_type, old_size, new_size, old_price, new_price,
           old_market_value, new_market_value, old_unrealized_pnl, new_unrealized_pnl,
           timestamp, reason, metadata
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        u.positionId,
        u.updateType,
        u.oldSize,
        u.newSize,
        u.oldPrice,
        u.newPrice,
        u.oldMarketValue,
        u.newMarketValue,
        u.oldUnrealizedPnl,
        u.newUnrealizedPnl,
        u.timestamp,
        u.reason,
        JSON.stringify(u.metadata),
      );
    return Number(result.lastInsertRowid);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERY
  // ═══════════════════════════════════════════════════════════════════════════

  getOrderTransitions(orderId: string): OrderTransition[] {
    return this.db
      .prepare<[string], OrderTransitionRow>(
        "SELECT * FROM order_transitions WHERE order_id = ? ORDER BY id ASC",
      )
      .all(orderId)
      .map(toTransition);
  }

  getLatestTransition(orderId: string): OrderTransition | undefined {
    const row = this.db
      .prepare<[string], OrderTransitionRow>(
        "SELECT * FROM order_transitions WHERE order_id = ? ORDER BY id DESC LIMIT 1",
      )
      .get(orderId);
    return row ? toTransition(row) : undefined;
  }

  getFills(orderId: string): OrderFillRecord[] {
    return this.db
      .prepare<[string], { order_id: string; fill_sequence: string; cumulative_size: number; price: number; source: string; timestamp: number }>(
        "SELECT * FROM order_fills WHERE order_id = ? ORDER BY cumulative_size ASC, timestamp ASC",
      )
      .all(orderId)
      .map((row) => ({
        orderId: row.order_id,
        fillSequence: row.fill_sequence,
        cumulativeSize: row.cumulative_size,
        price: row.price,
        source: oneOf(row.source, ["WEBSOCKET", "POLL", "SUBMIT"] as const, "source"),
        timestamp: row.timestamp,
      }));
  }

  getPositionUpdates(positionId: string): PositionUpdate[] {
    return this.db
      .prepare<[string], PositionUpdateRow>(
        "SELECT * FROM position_updates WHERE position_id = ? ORDER BY id ASC",
      )
      .all(positionId)
      .map(toUpdate);
  }

  /**
   * Recent transitions into a state, newest first (e.g. the dead-letter view)
   */
  getTransitionsInto(state: OrderState, limit = 100): OrderTransition[] {
    return this.db
      .prepare<[string, number], OrderTransitionRow>(
        "SELECT * FROM order_transitions WHERE to_state = ? ORDER BY id DESC LIMIT ?",
      )
      .all(state, limit)
      .map(toTransition);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // REPLAY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Re-derive an order's state from its latest transition
   */
  deriveOrderState(orderId: string): OrderState | null {
    return this.getLatestTransition(orderId)?.toState ?? null;
  }

  /**
   * Orders whose stored state differs from the state their log implies
   */
  findInconsistencies(): AuditInconsistency[] {
    const rows = this.db
      .prepare<[], { order_id: string; state: string; derived: string | null }>(
        `SELECT o.order_id, o.state,
                (SELECT t.to_state FROM order_transitions t
                  WHERE t.order_id = o.order_id ORDER BY t.id DESC LIMIT 1) AS derived
           FROM orders o`,
      )
      .all();

    return rows
      .filter((row) => row.derived !== row.state)
      .map((row) => ({
        orderId: row.order_id,
        storedState: oneOf(row.state, ORDER_STATES, "state"),
        derivedState: row.derived === null ? null : oneOf(row.derived, ORDER_STATES, "to_state"),
      }));
  }
}
