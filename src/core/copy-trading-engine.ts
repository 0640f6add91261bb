/**
 * Copy Trading Engine
 *
 * Wires the pipeline end to end:
 *
 *   whale trade -> SignalFilterPipeline -> PositionSizer -> RiskManager
 *     -> OrderExecutor -> (fill) PositionLedger
 *   price tick -> PositionLedger exit triggers -> OrderExecutor (close)
 *     -> PositionLedger -> RiskManager trade result
 *
 * Work on one position is serialized through a keyed mutex. Risk exposure is
 * resynced from the ledger after every ledger mutation.
 */

import { randomUUID } from "crypto";
import { DataIntegrityError } from "../errors/app.errors";
import { safeErrorToString } from "../lib/error-handling";
import type { Order, OrderSide } from "../models/order";
import type { Position, PositionSide } from "../models/position";
import type { WhaleDirectory, WhaleTradeEvent } from "../models/whale";
import type { FilterRejection, SignalContext, TradeIntent } from "../models/signal";
import type { OrderBookSnapshot } from "../models/market";
import type { ExchangeClient, MarketCatalog } from "../services/interfaces";
import { KeyedMutex } from "../utils/keyed-mutex.util";
import type { Logger } from "../utils/logger.util";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { ExecutionListener, FillDelta, OrderExecutor } from "./order-executor";
import type { ExitSignal, OpenPositionParams, PositionLedger } from "./position-ledger";
import type { PositionSizer, SizingDecision } from "./position-sizer";
import type { PortfolioReporter } from "./reporting";
import type { QuarantineResult, RiskManager } from "./risk-manager";
import type { SignalFilterPipeline } from "./signal-filter";
import { isLive } from "./order-state-machine";

export type TradeOutcomeStatus = "REJECTED" | "VETOED" | "SKIPPED" | "EXECUTED" | "FAILED" | "DUPLICATE";

export interface TradeOutcome {
  status: TradeOutcomeStatus;
  reason: string;
  rejection?: FilterRejection;
  intent?: TradeIntent;
  sizing?: SizingDecision;
  order?: Order;
  position?: Position;
}

export interface ExitOutcome {
  positionId: string;
  signal: ExitSignal;
  order?: Order;
  error?: string;
}

export type CopyTradingEngineDeps = {
  filter: SignalFilterPipeline;
  sizer: PositionSizer;
  risk: RiskManager;
  executor: OrderExecutor;
  ledger: PositionLedger;
  reporter: PortfolioReporter;
  exchange: ExchangeClient;
  catalog: MarketCatalog;
  whales: WhaleDirectory;
  logger: Logger;
  clock?: Clock;
  /** Interval for time-based exits and archival (default: 60000) */
  maintenanceIntervalMs?: number;
};

type OpenContext = Omit<OpenPositionParams, "size" | "price">;

const DEFAULT_MAINTENANCE_MS = 60_000;

/**
 * Idempotency key for copying a whale trade. Replays of the same source
 * trade map to the same key.
 */
export function copyOrderKey(event: WhaleTradeEvent): string {
  const source = event.sourceId ?? `${event.tokenId}:${event.side}:${event.timestamp}`;
  return `copy:${event.whaleAddress.toLowerCase()}:${source}`;
}

export function positionSideFor(side: OrderSide): PositionSide {
  return side === "BUY" ? "YES" : "NO";
}

export function closingSideFor(side: PositionSide): OrderSide {
  return side === "YES" ? "SELL" : "BUY";
}

export class CopyTradingEngine implements ExecutionListener {
  private readonly deps: CopyTradingEngineDeps;
  private readonly clock: Clock;
  private readonly positionLocks = new KeyedMutex();
  /** Opening context for positions whose first fill has not arrived */
  private readonly pendingOpens = new Map<string, OpenContext>();
  private maintenanceTimer?: NodeJS.Timeout;

  constructor(deps: CopyTradingEngineDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    deps.executor.setListener(this);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SIGNALS
  // ═══════════════════════════════════════════════════════════════════════════

  async onWhaleTrade(event: WhaleTradeEvent): Promise<TradeOutcome> {
    const { filter, sizer, risk, executor, ledger, reporter, logger } = this.deps;
    const key = copyOrderKey(event);

    const existing = executor.getOrderByKey(key);
    if (existing) {
      return { status: "DUPLICATE", reason: `Already copied as ${existing.orderId}`, order: existing };
    }

    let context: SignalContext;
    try {
      context = await this.buildContext(event);
    } catch (err) {
      const reason = `Market data unavailable: ${safeErrorToString(err)}`;
      logger.warn(`[Engine] ${reason}`);
      return { status: "FAILED", reason };
    }

    const snapshot = risk.getSnapshot();
    const result = filter.evaluate(context, ledger.getPortfolioView(snapshot.navUsd));
    if (!result.passed) {
      return { status: "REJECTED", reason: result.rejection.reason, rejection: result.rejection };
    }
    const intent = result.intent;

    const sizing = sizer.size(intent, snapshot);
    if (sizing.size <= 0) {
      return { status: "SKIPPED", reason: sizing.skipReason ?? "Zero size", intent, sizing };
    }

    const limits = reporter.checkPositionLimits(sizing.notionalUsd);
    if (!limits.allowed) {
      logger.warn(`[Engine] Book limit veto: ${limits.reasons.join("; ")}`);
      return { status: "VETOED", reason: `BOOK_LIMIT: ${limits.reasons.join("; ")}`, intent, sizing };
    }

    const decision = risk.evaluate({
      whaleAddress: event.whaleAddress,
      tokenId: event.tokenId,
      marketId: event.marketId,
      category: intent.market.category,
      price: intent.price,
      size: sizing.size,
    });
    if (!decision.approved || decision.adjustedSize === undefined) {
      logger.warn(`[Engine] Risk veto for ${event.whaleAddress.slice(0, 10)} on ${event.tokenId.slice(0, 12)}: ${decision.reason}`);
      return { status: "VETOED", reason: decision.reason, intent, sizing };
    }

    const positionId = ledger.newPositionId();
    this.pendingOpens.set(positionId, {
      positionId,
      whaleAddress: event.whaleAddress,
      tokenId: event.tokenId,
      marketId: event.marketId,
      side: positionSideFor(intent.side),
      category: intent.market.category,
      resolvesAt: intent.market.resolvesAt,
      kellyFraction: sizing.fraction,
      edge: intent.edge,
      winRate: intent.winRate,
    });

    try {
      const order = await executor.submit({
        idempotencyKey: key,
        tokenId: event.tokenId,
        marketId: event.marketId,
        side: intent.side,
        size: decision.adjustedSize,
        price: intent.price,
        orderType: "LIMIT",
        purpose: "OPEN",
        whaleAddress: event.whaleAddress,
        positionId,
      });
      if (order.positionId !== positionId) this.pendingOpens.delete(positionId);

      const position = order.positionId ? ledger.getPosition(order.positionId) : undefined;
      if (order.state === "FAILED" || order.state === "DEAD_LETTER" || order.state === "CANCELLED") {
        return {
          status: "FAILED",
          reason: order.errorMessage ?? `Order ${order.state}`,
          intent,
          sizing,
          order,
          position,
        };
      }
      return { status: "EXECUTED", reason: `Order ${order.orderId} ${order.state}`, intent, sizing, order, position };
    } catch (err) {
      this.pendingOpens.delete(positionId);
      const reason = safeErrorToString(err);
      logger.error(`[Engine] Copy of ${key} failed: ${reason}`, err instanceof Error ? err : undefined);
      return { status: "FAILED", reason, intent, sizing };
    }
  }

  /**
   * Route a raw whale trade: a SELL against a YES position we copied from
   * the same whale is that whale exiting; anything else is a new signal.
   */
  async onWhaleActivity(event: WhaleTradeEvent): Promise<void> {
    const { ledger, logger } = this.deps;
    const copied = ledger
      .getPositionsByWhale(event.whaleAddress)
      .some((p) => p.tokenId === event.tokenId && p.side === "YES" && p.status === "OPEN");

    if (event.side === "SELL" && copied) {
      await this.onWhaleExit(event.whaleAddress, event.tokenId);
      return;
    }

    const outcome = await this.onWhaleTrade(event);
    const line = `[Engine] ${event.whaleAddress.slice(0, 10)} ${event.side} ${event.tokenId.slice(0, 12)}: ${outcome.status} (${outcome.reason})`;
    if (outcome.status === "EXECUTED") logger.info(line);
    else if (outcome.status === "FAILED") logger.warn(line);
    else logger.debug(line);
  }

  private async buildContext(event: WhaleTradeEvent): Promise<SignalContext> {
    const { catalog, exchange, whales, logger } = this.deps;
    const market = await catalog.getMarketInfo(event.marketId, event.tokenId);
    let book: OrderBookSnapshot | undefined;
    try {
      book = await exchange.fetchOrderBook(event.tokenId);
    } catch (err) {
      logger.warn(`[Engine] Order book for ${event.tokenId.slice(0, 12)} unavailable: ${safeErrorToString(err)}`);
      book = undefined;
    }
    return { event, whale: whales.getMetrics(event.whaleAddress), market, book, now: this.clock() };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRICES / EXITS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Mark positions on a token and close any whose exit trigger fired
   */
  async onPriceTick(tokenId: string, price: number): Promise<ExitOutcome[]> {
    const { ledger, sizer } = this.deps;
    sizer.recordPrice(tokenId, price);

    const exits: Array<{ positionId: string; signal: ExitSignal }> = [];
    for (const position of ledger.getLivePositions()) {
      if (position.tokenId !== tokenId) continue;
      await this.positionLocks.runExclusive(position.positionId, () => {
        const { exit } = ledger.updatePrice(position.positionId, price);
        if (exit) exits.push({ positionId: position.positionId, signal: exit });
      });
    }
    this.syncRisk();

    const outcomes: ExitOutcome[] = [];
    for (const { positionId, signal } of exits) {
      outcomes.push(await this.exitPosition(positionId, signal));
    }
    return outcomes;
  }

  /**
   * The source whale closed its side of a market
   */
  async onWhaleExit(whaleAddress: string, tokenId: string): Promise<ExitOutcome[]> {
    const flagged = this.deps.ledger.markWhaleExited(whaleAddress, tokenId);
    if (flagged.length > 0) {
      this.deps.logger.info(`[Engine] Whale ${whaleAddress.slice(0, 10)} exited ${tokenId.slice(0, 12)}: ${flagged.length} position(s) flagged`);
    }
    return this.checkExits(flagged.map((p) => p.positionId));
  }

  /**
   * Evaluate exits without a price change, for time-based triggers
   */
  async checkExits(positionIds?: string[]): Promise<ExitOutcome[]> {
    const { ledger } = this.deps;
    const ids = positionIds ?? ledger.getLivePositions().map((p) => p.positionId);
    const outcomes: ExitOutcome[] = [];
    for (const positionId of ids) {
      const signal = ledger.evaluateExit(positionId);
      if (signal) outcomes.push(await this.exitPosition(positionId, signal));
    }
    return outcomes;
  }

  /**
   * Mark a position CLOSING and submit its closing order. A position already
   * CLOSING is left alone. The position lock covers the status change only;
   * fills arriving during submission take it themselves.
   */
  async exitPosition(positionId: string, signal: ExitSignal): Promise<ExitOutcome> {
    const { ledger, executor, logger } = this.deps;
    const closing = await this.positionLocks.runExclusive(positionId, () => ledger.markClosing(positionId, signal));
    if (!closing) return { positionId, signal, error: "Position not OPEN" };

    try {
      const order = await executor.submit({
        idempotencyKey: `close:${positionId}:${randomUUID()}`,
        tokenId: closing.tokenId,
        marketId: closing.marketId,
        side: closingSideFor(closing.side),
        size: closing.currentSize,
        price: closing.currentPrice,
        orderType: "LIMIT",
        purpose: "CLOSE",
        whaleAddress: closing.whaleAddress,
        positionId,
      });
      return { positionId, signal, order };
    } catch (err) {
      const error = safeErrorToString(err);
      logger.error(`[Engine] Closing order for ${positionId} failed: ${error}`, err instanceof Error ? err : undefined);
      await this.positionLocks.runExclusive(positionId, () =>
        ledger.revertClosing(positionId, `Closing order rejected: ${error}`),
      );
      return { positionId, signal, error };
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WHALE QUARANTINE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Re-evaluate a whale's quarantine status. Under the LIQUIDATE policy a
   * newly quarantined whale's open positions are closed.
   */
  async reviewWhale(whaleAddress: string): Promise<QuarantineResult> {
    const { risk, whales, ledger } = this.deps;
    const metrics = whales.getMetrics(whaleAddress);
    if (!metrics) return { action: "NONE" };

    const result = risk.evaluateWhale(metrics);
    if (result.action === "QUARANTINED" && risk.quarantinePolicy === "LIQUIDATE") {
      const open = ledger.getPositionsByWhale(whaleAddress).filter((p) => p.status === "OPEN");
      for (const position of open) {
        await this.exitPosition(position.positionId, {
          trigger: "WHALE_EXIT",
          reason: "MANUAL",
          detail: `whale quarantined: ${result.reason ?? "policy"}`,
        });
      }
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // EXECUTION LISTENER
  // ═══════════════════════════════════════════════════════════════════════════

  async onFill(order: Order, fill: FillDelta): Promise<void> {
    const { ledger, risk } = this.deps;
    const positionId = order.positionId;
    if (positionId === null) {
      throw new DataIntegrityError(`Order ${order.orderId} has no position id`);
    }

    await this.positionLocks.runExclusive(positionId, () => {
      if (order.purpose === "OPEN") {
        if (ledger.getPosition(positionId)) {
          ledger.applyAdditionalFill(positionId, fill.size, fill.price);
          return;
        }
        const context = this.pendingOpens.get(positionId);
        if (!context) {
          throw new DataIntegrityError(`No opening context for position ${positionId} (order ${order.orderId})`);
        }
        ledger.applyOpenFill({ ...context, size: fill.size, price: fill.price });
        this.pendingOpens.delete(positionId);
        return;
      }

      const after = ledger.applyCloseFill(positionId, fill.size, fill.price);
      if (after.status === "CLOSED") {
        risk.recordTradeResult(after.whaleAddress, after.realizedPnl, ledger.exposureSources());
      }
    });
    this.syncRisk();
  }

  async onSettled(order: Order): Promise<void> {
    const { ledger, executor } = this.deps;
    const positionId = order.positionId;
    if (positionId === null) return;

    if (order.purpose === "OPEN") {
      if (order.filledSize <= 0 && order.parentOrderId === null) this.pendingOpens.delete(positionId);
      return;
    }

    const pendingChild = executor.listChildren(order.orderId).some((c) => c.state === "PENDING" || isLive(c.state));
    if (pendingChild) return;

    await this.positionLocks.runExclusive(positionId, () => {
      const position = ledger.getPosition(positionId);
      if (position?.status === "CLOSING") {
        ledger.revertClosing(positionId, `Closing order ${order.orderId} settled ${order.state} with shares remaining`);
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Reconcile persisted orders and resync risk from the book
   */
  async recover(): Promise<void> {
    this.syncRisk();
    const result = await this.deps.executor.recover();
    this.deps.logger.info(
      `[Engine] Recovery: ${result.repaired} repaired, ${result.deadLettered} dead-lettered, ${result.polled} polled`,
    );
  }

  start(): void {
    if (this.maintenanceTimer) return;
    this.deps.executor.start();
    this.maintenanceTimer = setInterval(
      () => void this.runMaintenance().catch((err) => this.deps.logger.error("[Engine] Maintenance failed", err instanceof Error ? err : undefined)),
      this.deps.maintenanceIntervalMs ?? DEFAULT_MAINTENANCE_MS,
    );
  }

  stop(): void {
    this.deps.executor.stop();
    if (this.maintenanceTimer) clearInterval(this.maintenanceTimer);
    this.maintenanceTimer = undefined;
  }

  async runMaintenance(): Promise<void> {
    for (const whale of this.deps.whales.list()) {
      await this.reviewWhale(whale.address);
    }
    await this.checkExits();
    this.deps.ledger.archiveClosed();
    this.syncRisk();
  }

  private syncRisk(): void {
    this.deps.risk.syncPortfolio(this.deps.ledger.exposureSources());
  }
}
