/**
 * Position persistence. total_pnl and pnl_percentage are generated columns;
 * they are never written.
 */

import { DataIntegrityError, PositionNotFoundError } from "../../errors/app.errors";
import {
  MAX_PRICE,
  MIN_PRICE,
  withDerivedPnl,
  type Position,
  type PositionRecord,
  type PositionStatus,
} from "../../models/position";
import type { AuditTrail, NewPositionUpdate } from "../../core/audit-trail";
import { oneOf, type SqliteDatabase } from "./database";
import type { PositionRow } from "./types";

const STATUSES: readonly PositionStatus[] = ["OPEN", "CLOSING", "CLOSED", "ARCHIVED"];
const CLOSE_REASONS = ["STOP_LOSS", "TAKE_PROFIT", "MANUAL", "WHALE_EXIT", "PRE_RESOLUTION"] as const;

function rowToPosition(row: PositionRow): Position {
  return withDerivedPnl({
    positionId: row.position_id,
    whaleAddress: row.whale_address,
    tokenId: row.token_id,
    marketId: row.market_id,
    side: oneOf(row.side, ["YES", "NO"] as const, "side"),
    category: row.category,
    resolvesAt: row.resolves_at,
    entrySize: row.entry_size,
    entryPrice: row.entry_price,
    entryAmount: row.entry_amount,
    currentSize: row.current_size,
    currentPrice: row.current_price,
    marketValue: row.market_value,
    unrealizedPnl: row.unrealized_pnl,
    realizedPnl: row.realized_pnl,
    maxDrawdown: row.max_drawdown,
    maxProfit: row.max_profit,
    stopLossPrice: row.stop_loss_price,
    takeProfitPrice: row.take_profit_price,
    kellyFraction: row.kelly_fraction,
    edge: row.edge,
    winRate: row.win_rate,
    status: oneOf(row.status, STATUSES, "status"),
    whaleExited: row.whale_exited === 1,
    openedAt: row.opened_at,
    lastUpdatedAt: row.last_updated_at,
    closedAt: row.closed_at,
    closeReason: row.close_reason === null ? null : oneOf(row.close_reason, CLOSE_REASONS, "close_reason"),
  });
}

function inPriceBounds(price: number): boolean {
  return price >= MIN_PRICE && price <= MAX_PRICE;
}

/**
 * Application-level checks mirrored by the table's CHECK constraints
 */
export function validatePosition(p: PositionRecord): void {
  if (!(p.entrySize > 0)) {
    throw new DataIntegrityError(`Position ${p.positionId}: entry size must be positive`);
  }
  if (p.currentSize < 0) {
    throw new DataIntegrityError(`Position ${p.positionId}: current size must be >= 0`);
  }
  if (!inPriceBounds(p.entryPrice) || !inPriceBounds(p.currentPrice)) {
    throw new DataIntegrityError(`Position ${p.positionId}: prices must be within [${MIN_PRICE}, ${MAX_PRICE}]`);
  }
  for (const level of [p.stopLossPrice, p.takeProfitPrice]) {
    if (level !== null && !inPriceBounds(level)) {
      throw new DataIntegrityError(`Position ${p.positionId}: exit price ${level} out of bounds`);
    }
  }
  if (!(p.kellyFraction > 0 && p.kellyFraction <= 1)) {
    throw new DataIntegrityError(`Position ${p.positionId}: kelly fraction must be in (0, 1]`);
  }
}

export class PositionRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly audit: AuditTrail,
  ) {}

  create(record: PositionRecord, update?: NewPositionUpdate): Position {
    validatePosition(record);
    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO positions (
             position_id, whale_address, token_id, market_id, side, category, resolves_at,
             entry_size, entry_price, entry_amount, current_size, current_price, market_value,
             unrealized_pnl, realized_pnl, max_drawdown, max_profit, stop_loss_price, take_profit_price,
             kelly_fraction, edge, win_rate, status, whale_exited, opened_at, last_updated_at,
             closed_at, close_reason
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          record.positionId,
          record.whaleAddress,
          record.tokenId,
          record.marketId,
          record.side,
          record.category,
          record.resolvesAt,
          record.entrySize,
          record.entryPrice,
          record.entryAmount,
          record.currentSize,
          record.currentPrice,
          record.marketValue,
          record.unrealizedPnl,
          record.realizedPnl,
          record.maxDrawdown,
          record.maxProfit,
          record.stopLossPrice,
          record.takeProfitPrice,
          record.kellyFraction,
          record.edge,
          record.winRate,
          record.status,
          record.whaleExited ? 1 : 0,
          record.openedAt,
          record.lastUpdatedAt,
          record.closedAt,
          record.closeReason,
        );
      if (update) this.audit.appendPositionUpdate(update);
    });
    insert();
    return withDerivedPnl(record);
  }

  /**
   * Write all mutable fields and the matching update row atomically
   */
  save(record: PositionRecord, update?: NewPositionUpdate): Position {
    validatePosition(record);
    const write = this.db.transaction(() => {
      const result = this.db
        .prepare(
          `UPDATE positions SET
             entry_size = ?, entry_price = ?, entry_amount = ?,
             current_size = ?, current_price = ?, market_value = ?,
             unrealized_pnl = ?, realized_pnl = ?, max_drawdown = ?, max_profit = ?,
             stop_loss_price = ?, take_profit_price = ?, status = ?, whale_exited = ?,
             last_updated_at = ?, closed_at = ?, close_reason = ?
           WHERE position_id = ?`,
        )
        .run(
          record.entrySize,
          record.entryPrice,
          record.entryAmount,
          record.currentSize,
          record.currentPrice,
          record.marketValue,
          record.unrealizedPnl,
          record.realizedPnl,
          record.maxDrawdown,
          record.maxProfit,
          record.stopLossPrice,
          record.takeProfitPrice,
          record.status,
          record.whaleExited ? 1 : 0,
          record.lastUpdatedAt,
          record.closedAt,
          record.closeReason,
          record.positionId,
        );
      if (result.changes !== 1) throw new PositionNotFoundError(record.positionId);
      if (update) this.audit.appendPositionUpdate(update);
    });
    write();
    return withDerivedPnl(record);
  }

  findById(positionId: string): Position | undefined {
    const row = this.db
      .prepare<[string], PositionRow>("SELECT * FROM positions WHERE position_id = ?")
      .get(positionId);
    return row ? rowToPosition(row) : undefined;
  }

  listByStatus(statuses: readonly PositionStatus[]): Position[] {
    if (statuses.length === 0) return [];
    const placeholders = statuses.map(() => "?").join(", ");
    return this.db
      .prepare<string[], PositionRow>(
        `SELECT * FROM positions WHERE status IN (${placeholders}) ORDER BY opened_at ASC`,
      )
      .all(...statuses)
      .map(rowToPosition);
  }

  listByToken(tokenId: string, statuses: readonly PositionStatus[] = ["OPEN", "CLOSING"]): Position[] {
    return this.listByStatus(statuses).filter((p) => p.tokenId === tokenId);
  }

  /**
   * All positions for a whale, newest first
   */
  listByWhale(whaleAddress: string): Position[] {
    return this.db
      .prepare<[string], PositionRow>(
        "SELECT * FROM positions WHERE whale_address = ? ORDER BY opened_at DESC",
      )
      .all(whaleAddress)
      .map(rowToPosition);
  }

  listOpenedSince(since: number): Position[] {
    return this.db
      .prepare<[number], PositionRow>("SELECT * FROM positions WHERE opened_at >= ? ORDER BY opened_at ASC")
      .all(since)
      .map(rowToPosition);
  }

  /**
   * Mark CLOSED positions closed before `cutoff` as ARCHIVED. Returns the count.
   */
  archiveClosedBefore(cutoff: number, now: number): number {
    return this.db
      .prepare<[number, number]>(
        `UPDATE positions SET status = 'ARCHIVED', last_updated_at = ?
          WHERE status = 'CLOSED' AND closed_at IS NOT NULL AND closed_at < ?`,
      )
      .run(now, cutoff).changes;
  }

  totalExposure(): number {
    const row = this.db
      .prepare<[], { total: number | null }>(
        "SELECT SUM(market_value) AS total FROM positions WHERE status = 'OPEN'",
      )
      .get();
    return row?.total ?? 0;
  }

  countsByStatus(): Array<{ status: PositionStatus; count: number; totalValue: number }> {
    return this.db
      .prepare<[], { status: string; count: number; total_value: number | null }>(
        "SELECT status, COUNT(*) AS count, SUM(market_value) AS total_value FROM positions GROUP BY status",
      )
      .all()
      .map((row) => ({
        status: oneOf(row.status, STATUSES, "status"),
        count: row.count,
        totalValue: row.total_value ?? 0,
      }));
  }
}
