/**
 * Position Ledger
 *
 * Book of copied positions. Marks positions to market on every price
 * update, tracks high-water marks and evaluates exit triggers in the
 * configured priority order. Every mutation writes a PositionUpdate in the
 * same transaction as the position row.
 *
 * Ledger methods are synchronous; callers serialize work per position.
 */

import { randomUUID } from "crypto";
import type { ExitTrigger, LedgerConfig } from "../config/schema";
import { DataIntegrityError, PositionNotFoundError } from "../errors/app.errors";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import {
  clampPrice,
  computeUnrealizedPnl,
  type CloseReason,
  type Position,
  type PositionRecord,
  type PositionSide,
  type PositionUpdateType,
} from "../models/position";
import type { PortfolioView } from "../models/signal";
import type { NewPositionUpdate } from "./audit-trail";
import type { PositionRepository } from "../infra/persistence/position-repository";
import type { ExposureSource } from "./risk-manager";
import type { Logger } from "../utils/logger.util";

const EPSILON = 1e-9;
const UNCATEGORIZED = "uncategorized";

export interface OpenPositionParams {
  positionId: string;
  whaleAddress: string;
  tokenId: string;
  marketId: string;
  side: PositionSide;
  category: string | null;
  resolvesAt: number | null;
  size: number;
  price: number;
  kellyFraction: number;
  edge: number;
  winRate: number;
  stopLossPrice?: number;
  takeProfitPrice?: number;
}

export interface ExitSignal {
  trigger: ExitTrigger;
  reason: CloseReason;
  detail: string;
}

export interface PriceUpdateResult {
  position: Position;
  exit: ExitSignal | null;
}

export interface PositionLedgerOptions {
  clock?: Clock;
  newPositionId?: () => string;
}

/**
 * Default stop-loss and take-profit levels around an entry price. NO
 * positions profit when the price falls, so their levels are mirrored.
 */
export function defaultExitLevels(
  side: PositionSide,
  entryPrice: number,
  config: Pick<LedgerConfig, "stopLossPct" | "takeProfitPct">,
): { stopLossPrice: number; takeProfitPrice: number } {
  if (side === "YES") {
    return {
      stopLossPrice: clampPrice(entryPrice * (1 - config.stopLossPct)),
      takeProfitPrice: clampPrice(entryPrice * (1 + config.takeProfitPct)),
    };
  }
  return {
    stopLossPrice: clampPrice(entryPrice * (1 + config.stopLossPct)),
    takeProfitPrice: clampPrice(entryPrice * (1 - config.takeProfitPct)),
  };
}

/**
 * First exit trigger met, in priority order. CLOSING and closed positions
 * never trigger.
 */
export function evaluateExitTriggers(
  position: Position,
  priority: readonly ExitTrigger[],
  preResolutionWindowMs: number,
  now: number,
): ExitSignal | null {
  if (position.status !== "OPEN") return null;
  const price = position.currentPrice;
  const isYes = position.side === "YES";

  for (const trigger of priority) {
    switch (trigger) {
      case "STOP_LOSS": {
        const stop = position.stopLossPrice;
        if (stop !== null && (isYes ? price <= stop : price >= stop)) {
          return { trigger, reason: "STOP_LOSS", detail: `price ${price.toFixed(4)} crossed stop ${stop.toFixed(4)}` };
        }
        break;
      }
      case "TAKE_PROFIT": {
        const target = position.takeProfitPrice;
        if (target !== null && (isYes ? price >= target : price <= target)) {
          return {
            trigger,
            reason: "TAKE_PROFIT",
            detail: `price ${price.toFixed(4)} crossed target ${target.toFixed(4)}`,
          };
        }
        break;
      }
      case "PRE_RESOLUTION": {
        if (position.resolvesAt !== null && position.resolvesAt - now <= preResolutionWindowMs) {
          const hours = (position.resolvesAt - now) / (60 * 60 * 1000);
          return {
            trigger,
            reason: "PRE_RESOLUTION",
            detail: `${hours.toFixed(1)}h to resolution`,
          };
        }
        break;
      }
      case "WHALE_EXIT": {
        if (position.whaleExited) {
          return { trigger, reason: "WHALE_EXIT", detail: `whale ${position.whaleAddress.slice(0, 10)} exited` };
        }
        break;
      }
    }
  }
  return null;
}

function snapshotUpdate(
  before: PositionRecord,
  after: PositionRecord,
  updateType: PositionUpdateType,
  reason: string,
  timestamp: number,
  metadata: Record<string, unknown> = {},
): NewPositionUpdate {
  return {
    positionId: after.positionId,
    updateType,
    oldSize: before.currentSize,
    newSize: after.currentSize,
    oldPrice: before.currentPrice,
    newPrice: after.currentPrice,
    oldMarketValue: before.marketValue,
    newMarketValue: after.marketValue,
    oldUnrealizedPnl: before.unrealizedPnl,
    newUnrealizedPnl: after.unrealizedPnl,
    timestamp,
    reason,
    metadata,
  };
}

/**
 * Recompute value, unrealized P&L and high-water marks at a price
 */
function markAt(position: PositionRecord, price: number, now: number): PositionRecord {
  const currentPrice = clampPrice(price);
  const unrealizedPnl = computeUnrealizedPnl(position.side, position.entryPrice, currentPrice, position.currentSize);
  return {
    ...position,
    currentPrice,
    marketValue: position.currentSize * currentPrice,
    unrealizedPnl,
    maxProfit: Math.max(position.maxProfit, unrealizedPnl),
    maxDrawdown: Math.max(position.maxDrawdown, -unrealizedPnl),
    lastUpdatedAt: now,
  };
}

function toRecord(position: Position): PositionRecord {
  const { totalPnl: _total, pnlPercentage: _pct, ...record } = position;
  return record;
}

export class PositionLedger {
  private readonly clock: Clock;
  readonly newPositionId: () => string;

  constructor(
    private readonly repo: PositionRepository,
    private readonly config: LedgerConfig,
    private readonly logger: Logger,
    options: PositionLedgerOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.newPositionId = options.newPositionId ?? (() => `pos_${randomUUID()}`);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // OPEN / INCREASE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Book an opening fill. The first fill creates the position; later fills
   * for the same position id add to it at a weighted-average entry.
   */
  applyOpenFill(params: OpenPositionParams): Position {
    if (!(params.size > 0)) {
      throw new DataIntegrityError(`Opening fill for ${params.positionId} must have positive size`);
    }
    if (this.repo.findById(params.positionId)) {
      return this.applyAdditionalFill(params.positionId, params.size, params.price);
    }

    const now = this.clock();
    const entryPrice = clampPrice(params.price);
    const levels = defaultExitLevels(params.side, entryPrice, this.config);
    const record: PositionRecord = {
      positionId: params.positionId,
      whaleAddress: params.whaleAddress,
      tokenId: params.tokenId,
      marketId: params.marketId,
      side: params.side,
      category: params.category,
      resolvesAt: params.resolvesAt,
      entrySize: params.size,
      entryPrice,
      entryAmount: params.size * entryPrice,
      currentSize: params.size,
      currentPrice: entryPrice,
      marketValue: params.size * entryPrice,
      unrealizedPnl: 0,
      realizedPnl: 0,
      maxDrawdown: 0,
      maxProfit: 0,
      stopLossPrice: params.stopLossPrice ?? levels.stopLossPrice,
      takeProfitPrice: params.takeProfitPrice ?? levels.takeProfitPrice,
      kellyFraction: params.kellyFraction,
      edge: params.edge,
      winRate: params.winRate,
      status: "OPEN",
      whaleExited: false,
      openedAt: now,
      lastUpdatedAt: now,
      closedAt: null,
      closeReason: null,
    };

    const position = this.repo.create(record, {
      positionId: record.positionId,
      updateType: "SIZE_INCREASE",
      oldSize: 0,
      newSize: record.currentSize,
      oldPrice: entryPrice,
      newPrice: entryPrice,
      oldMarketValue: 0,
      newMarketValue: record.marketValue,
      oldUnrealizedPnl: 0,
      newUnrealizedPnl: 0,
      timestamp: now,
      reason: "Position opened",
      metadata: { whaleAddress: record.whaleAddress, kellyFraction: record.kellyFraction },
    });
    this.logger.info(
      `[Ledger] Opened ${position.positionId} ${position.side} ${position.currentSize.toFixed(2)} ${position.tokenId.slice(0, 12)} ` +
        `@ ${entryPrice.toFixed(4)} (SL ${position.stopLossPrice?.toFixed(4) ?? "-"}, TP ${position.takeProfitPrice?.toFixed(4) ?? "-"})`,
    );
    return position;
  }

  /**
   * Add shares to an existing position at a weighted-average entry
   */
  applyAdditionalFill(positionId: string, size: number, price: number): Position {
    const position = this.require(positionId);
    if (position.status === "CLOSED" || position.status === "ARCHIVED") {
      throw new DataIntegrityError(`Cannot add to ${position.status} position ${position.positionId}`);
    }
    const now = this.clock();
    const before = toRecord(position);
    const fillPrice = clampPrice(price);
    const newSize = before.currentSize + size;
    const entryPrice = clampPrice((before.entryPrice * before.currentSize + fillPrice * size) / newSize);
    const levels = defaultExitLevels(before.side, entryPrice, this.config);

    const after = markAt(
      {
        ...before,
        entrySize: before.entrySize + size,
        entryPrice,
        entryAmount: before.entryAmount + size * fillPrice,
        currentSize: newSize,
        stopLossPrice: levels.stopLossPrice,
        takeProfitPrice: levels.takeProfitPrice,
      },
      fillPrice,
      now,
    );
    const saved = this.repo.save(
      after,
      snapshotUpdate(before, after, "SIZE_INCREASE", `Added ${size.toFixed(2)} @ ${fillPrice.toFixed(4)}`, now, {
        newEntryPrice: entryPrice,
      }),
    );
    this.logger.info(
      `[Ledger] ${saved.positionId} size ${before.currentSize.toFixed(2)} -> ${newSize.toFixed(2)}, entry ${entryPrice.toFixed(4)}`,
    );
    return saved;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // MARK TO MARKET / EXITS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Mark one position and evaluate its exit triggers
   */
  updatePrice(positionId: string, price: number): PriceUpdateResult {
    const position = this.require(positionId);
    if (position.status === "CLOSED" || position.status === "ARCHIVED") {
      return { position, exit: null };
    }

    const now = this.clock();
    const before = toRecord(position);
    const after = markAt(before, price, now);
    const saved = this.repo.save(after, snapshotUpdate(before, after, "PRICE_UPDATE", "Price update", now));

    const exit = evaluateExitTriggers(saved, this.config.exitPriority, this.config.preResolutionWindowMs, now);
    return { position: saved, exit };
  }

  /**
   * Mark every live position on a token
   */
  updateTokenPrice(tokenId: string, price: number): PriceUpdateResult[] {
    return this.repo.listByToken(tokenId).map((p) => this.updatePrice(p.positionId, price));
  }

  /**
   * Exit evaluation without a price change (time and whale-exit triggers)
   */
  evaluateExit(positionId: string): ExitSignal | null {
    return evaluateExitTriggers(
      this.require(positionId),
      this.config.exitPriority,
      this.config.preResolutionWindowMs,
      this.clock(),
    );
  }

  /**
   * Move OPEN to CLOSING. Returns null if the position is not OPEN, so a
   * trigger fires at most once per position.
   */
  markClosing(positionId: string, signal: ExitSignal): Position | null {
    const position = this.require(positionId);
    if (position.status !== "OPEN") return null;

    const now = this.clock();
    const before = toRecord(position);
    const after: PositionRecord = { ...before, status: "CLOSING", closeReason: signal.reason, lastUpdatedAt: now };
    const updateType: PositionUpdateType =
      signal.reason === "STOP_LOSS" ? "STOP_LOSS_HIT" : signal.reason === "TAKE_PROFIT" ? "TAKE_PROFIT_HIT" : "MANUAL_ADJUSTMENT";
    const saved = this.repo.save(
      after,
      snapshotUpdate(before, after, updateType, `Exit triggered: ${signal.reason} (${signal.detail})`, now, {
        trigger: signal.trigger,
      }),
    );
    this.logger.warn(`[Ledger] ${positionId} CLOSING: ${signal.reason} - ${signal.detail}`);
    return saved;
  }

  /**
   * Return a CLOSING position to OPEN after its closing order failed
   */
  revertClosing(positionId: string, reason: string): Position {
    const position = this.require(positionId);
    if (position.status !== "CLOSING") return position;
    const now = this.clock();
    const before = toRecord(position);
    const after: PositionRecord = { ...before, status: "OPEN", closeReason: null, lastUpdatedAt: now };
    const saved = this.repo.save(after, snapshotUpdate(before, after, "MANUAL_ADJUSTMENT", reason, now));
    this.logger.warn(`[Ledger] ${positionId} back to OPEN: ${reason}`);
    return saved;
  }

  /**
   * Flag positions copied from a whale on a token once the whale exits
   */
  markWhaleExited(whaleAddress: string, tokenId: string): Position[] {
    const now = this.clock();
    return this.repo
      .listByToken(tokenId)
      .filter((p) => p.whaleAddress === whaleAddress && !p.whaleExited)
      .map((p) => {
        const before = toRecord(p);
        const after: PositionRecord = { ...before, whaleExited: true, lastUpdatedAt: now };
        return this.repo.save(
          after,
          snapshotUpdate(before, after, "MANUAL_ADJUSTMENT", "Source whale exited", now, { whaleAddress }),
        );
      });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CLOSE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Book a closing fill. Realized P&L is booked for the closed shares; the
   * position closes fully once no shares remain.
   */
  applyCloseFill(positionId: string, size: number, price: number, reason?: CloseReason): Position {
    const position = this.require(positionId);
    if (position.status === "CLOSED" || position.status === "ARCHIVED") {
      throw new DataIntegrityError(`Position ${positionId} is already ${position.status}`);
    }
    const closed = Math.min(size, position.currentSize);
    if (position.currentSize - closed <= EPSILON) {
      return this.closePosition(positionId, price, reason ?? position.closeReason ?? "MANUAL");
    }

    const now = this.clock();
    const before = toRecord(position);
    const exitPrice = clampPrice(price);
    const realized = computeUnrealizedPnl(before.side, before.entryPrice, exitPrice, closed);
    const after = markAt(
      { ...before, currentSize: before.currentSize - closed, realizedPnl: before.realizedPnl + realized },
      exitPrice,
      now,
    );
    const saved = this.repo.save(
      after,
      snapshotUpdate(before, after, "PARTIAL_CLOSE", `Closed ${closed.toFixed(2)} @ ${exitPrice.toFixed(4)}`, now, {
        realizedPnl: realized,
      }),
    );
    this.logger.info(
      `[Ledger] ${positionId} partial close ${closed.toFixed(2)} @ ${exitPrice.toFixed(4)}, realized ${realized >= 0 ? "+" : ""}$${realized.toFixed(2)}`,
    );
    return saved;
  }

  /**
   * Close all remaining shares at a price
   */
  closePosition(positionId: string, exitPrice: number, reason: CloseReason): Position {
    const position = this.require(positionId);
    if (position.status === "CLOSED" || position.status === "ARCHIVED") {
      throw new DataIntegrityError(`Position ${positionId} is already ${position.status}`);
    }

    const now = this.clock();
    const before = toRecord(position);
    const price = clampPrice(exitPrice);
    const realized = computeUnrealizedPnl(before.side, before.entryPrice, price, before.currentSize);
    const after: PositionRecord = {
      ...before,
      currentSize: 0,
      currentPrice: price,
      marketValue: 0,
      unrealizedPnl: 0,
      realizedPnl: before.realizedPnl + realized,
      status: "CLOSED",
      closedAt: now,
      closeReason: reason,
      lastUpdatedAt: now,
    };
    const saved = this.repo.save(
      after,
      snapshotUpdate(before, after, "FULL_CLOSE", `Closed: ${reason}`, now, {
        realizedPnl: after.realizedPnl,
        closeReason: reason,
      }),
    );
    this.logger.info(
      `[Ledger] Closed ${positionId} (${reason}) @ ${price.toFixed(4)}: total P&L ${saved.totalPnl >= 0 ? "+" : ""}$${saved.totalPnl.toFixed(2)} ` +
        `(${saved.pnlPercentage.toFixed(2)}%)`,
    );
    return saved;
  }

  /**
   * Archive CLOSED positions older than the retention window
   */
  archiveClosed(): number {
    const now = this.clock();
    const archived = this.repo.archiveClosedBefore(now - this.config.archiveAfterMs, now);
    if (archived > 0) this.logger.info(`[Ledger] Archived ${archived} closed position(s)`);
    return archived;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  getPosition(positionId: string): Position | undefined {
    return this.repo.findById(positionId);
  }

  /** OPEN and CLOSING positions */
  getLivePositions(): Position[] {
    return this.repo.listByStatus(["OPEN", "CLOSING"]);
  }

  getPositionsByWhale(whaleAddress: string): Position[] {
    return this.repo.listByWhale(whaleAddress);
  }

  getPortfolioView(navUsd: number): PortfolioView {
    const live = this.getLivePositions();
    const exposureByCategory = new Map<string, number>();
    let openExposureUsd = 0;
    for (const p of live) {
      openExposureUsd += p.marketValue;
      const key = p.category ?? UNCATEGORIZED;
      exposureByCategory.set(key, (exposureByCategory.get(key) ?? 0) + p.marketValue);
    }
    return {
      navUsd,
      openExposureUsd,
      exposureByCategory,
      openPositions: live.map((p) => ({ category: p.category, resolvesAt: p.resolvesAt })),
    };
  }

  exposureSources(): ExposureSource[] {
    return this.getLivePositions().map((p) => ({
      whaleAddress: p.whaleAddress,
      marketId: p.marketId,
      category: p.category,
      marketValue: p.marketValue,
      unrealizedPnl: p.unrealizedPnl,
    }));
  }

  private require(positionId: string): Position {
    const position = this.repo.findById(positionId);
    if (!position) throw new PositionNotFoundError(positionId);
    return position;
  }
}
