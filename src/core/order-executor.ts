/**
 * Order Executor
 *
 * Drives every order through the execution state machine:
 *
 * 1. IDEMPOTENCY: one order per idempotency key. Concurrent submits of the
 *    same key share one in-flight submission; a later submit returns the
 *    stored order. The UNIQUE constraint backs this across restarts.
 *
 * 2. RETRIES: transient exchange errors (connection, timeout, rate limit,
 *    unavailable) are retried with exponential backoff while the order stays
 *    PENDING. Terminal errors fail the order at once; exhausted retries move
 *    it on to DEAD_LETTER.
 *
 * 3. DEADLINES: each exchange call runs under the submit deadline. A submit
 *    that misses it is never resent: it gets a reconcile window, then the
 *    order is dead-lettered and any late acknowledgement is cancelled.
 *    PENDING orders with nothing in flight past the deadline are
 *    dead-lettered; live orders unfilled past the fill deadline are cancelled.
 *
 * 4. PARTIAL FILLS: at or above the acceptance ratio the remainder is
 *    cancelled and the order confirmed. Below it, the order is confirmed for
 *    what filled and the remainder is re-queued as a child order.
 *
 * All work on one order is serialized through a keyed mutex.
 */

import { randomUUID } from "crypto";
import type { ExecutionConfig } from "../config/schema";
import { DataIntegrityError, DeadlineExceededError, DuplicateIdempotencyKeyError } from "../errors/app.errors";
import { classifyError, toExchangeError, type ClassifiedError } from "../lib/error-handling";
import { ORDER_STATES, type Order, type OrderIntent, type OrderState } from "../models/order";
import { MAX_PRICE, MIN_PRICE } from "../models/position";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { OrderRepository } from "../infra/persistence/order-repository";
import type { ExchangeClient, FillStatus, SubmitOrderRequest, SubmitOrderResult } from "../services/interfaces";
import { KeyedMutex } from "../utils/keyed-mutex.util";
import { SingleFlight } from "../utils/single-flight.util";
import { sleep, withDeadline, type Sleeper } from "../utils/async.util";
import type { Logger } from "../utils/logger.util";
import type { AuditTrail, FillSource, OrderFillRecord } from "./audit-trail";
import type { FillEvent, FillEventBus } from "./fill-events";
import { isLive } from "./order-state-machine";
import { createRetryPolicy, type RetryPolicy } from "./retry-policy";

const EPSILON = 1e-9;

/**
 * Newly filled shares on one order
 */
export interface FillDelta {
  size: number;
  price: number;
  cumulativeSize: number;
}

/**
 * Receives fills and settlements. Errors thrown here are logged and leave
 * a filled order in FILLED instead of CONFIRMED.
 */
export interface ExecutionListener {
  onFill?(order: Order, fill: FillDelta): Promise<void> | void;
  onSettled?(order: Order): Promise<void> | void;
}

export interface OrderExecutorOptions {
  clock?: Clock;
  sleep?: Sleeper;
  retryPolicy?: RetryPolicy;
  newOrderId?: () => string;
}

export interface ExecutorStats {
  byState: Record<OrderState, number>;
  total: number;
  /** Filled orders over settled orders */
  fillRate: number;
  averageTimeToFillMs: number | null;
  inFlight: number;
}

export interface DeadLetterEntry {
  order: Order;
  reason: string;
  lastError: string | null;
  deadLetteredAt: number;
}

export interface SweepResult {
  expiredPending: number;
  resolvedLive: number;
  childOrders: number;
}

export interface RecoveryResult {
  repaired: number;
  deadLettered: number;
  polled: number;
  /** FILLED orders whose booking was never confirmed */
  unconfirmed: string[];
}

interface FillInput {
  cumulativeSize: number;
  price: number;
  fillSequence: string;
  source: FillSource;
  timestamp: number;
}

interface Resolution {
  order: Order;
  child?: Order;
}

function emptyStateCounts(): Record<OrderState, number> {
  return {
    PENDING: 0,
    SUBMITTED: 0,
    PARTIALLY_FILLED: 0,
    FILLED: 0,
    CONFIRMED: 0,
    CANCELLED: 0,
    FAILED: 0,
    DEAD_LETTER: 0,
  };
}

function toRequest(order: Order): SubmitOrderRequest {
  return {
    clientOrderId: order.idempotencyKey,
    tokenId: order.tokenId,
    side: order.side,
    size: order.size,
    price: order.price,
    orderType: order.orderType,
  };
}

/**
 * Price of the newly filled shares given cumulative averages before and after
 */
export function incrementalFillPrice(
  previousSize: number,
  previousAvg: number | null,
  cumulativeSize: number,
  cumulativeAvg: number,
): number {
  const delta = cumulativeSize - previousSize;
  if (previousAvg === null || previousSize <= EPSILON || delta <= EPSILON) return cumulativeAvg;
  const price = (cumulativeAvg * cumulativeSize - previousAvg * previousSize) / delta;
  return Number.isFinite(price) && price > 0 && price < 1 ? price : cumulativeAvg;
}

export function validateIntent(intent: OrderIntent): void {
  if (intent.idempotencyKey.trim() === "") {
    throw new DataIntegrityError("Order intent requires an idempotency key");
  }
  if (!(Number.isFinite(intent.size) && intent.size > 0)) {
    throw new DataIntegrityError(`Order size must be positive, got ${intent.size}`);
  }
  if (intent.price !== undefined && !(intent.price >= MIN_PRICE && intent.price <= MAX_PRICE)) {
    throw new DataIntegrityError(`Order price ${intent.price} outside [${MIN_PRICE}, ${MAX_PRICE}]`);
  }
}

export class OrderExecutor {
  private readonly submissions: SingleFlight<Order>;
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly policy: RetryPolicy;
  private readonly newOrderId: () => string;
  private listener: ExecutionListener = {};
  private sweepTimer: NodeJS.Timeout | undefined;
  private pollTimer: NodeJS.Timeout | undefined;

  constructor(
    private readonly repo: OrderRepository,
    private readonly audit: AuditTrail,
    private readonly exchange: ExchangeClient,
    private readonly fills: FillEventBus,
    private readonly config: ExecutionConfig,
    private readonly logger: Logger,
    options: OrderExecutorOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? sleep;
    this.policy = options.retryPolicy ?? createRetryPolicy(config);
    this.newOrderId = options.newOrderId ?? (() => `ord_${randomUUID()}`);
    this.submissions = new SingleFlight<Order>("OrderExecutor", logger);
    this.fills.subscribe((event) => this.handleFillEvent(event));
  }

  setListener(listener: ExecutionListener): void {
    this.listener = listener;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SUBMISSION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Create and submit an order, or return the order already stored for the
   * intent's idempotency key.
   */
  async submit(intent: OrderIntent): Promise<Order> {
    validateIntent(intent);
    const order = await this.submissions.run(intent.idempotencyKey, () => this.createAndSubmit(intent));
    await this.replayParkedFill(order);
    await this.submitChildrenOf(order);
    return this.repo.findById(order.orderId) ?? order;
  }

  private async createAndSubmit(intent: OrderIntent): Promise<Order> {
    const existing = this.repo.findByIdempotencyKey(intent.idempotencyKey);
    if (existing) {
      this.logger.info(
        `[OrderExecutor] Duplicate submit for ${intent.idempotencyKey}, returning ${existing.orderId} (${existing.state})`,
      );
      return existing;
    }

    let order: Order;
    try {
      order = this.repo.create(this.newOrder(intent), "Order created", {
        purpose: intent.purpose,
        parentOrderId: intent.parentOrderId ?? null,
      });
    } catch (err) {
      if (err instanceof DuplicateIdempotencyKeyError) {
        const winner = this.repo.findByIdempotencyKey(intent.idempotencyKey);
        if (winner) return winner;
      }
      throw err;
    }

    this.logger.info(
      `[OrderExecutor] ${order.orderId} created: ${order.side} ${order.size.toFixed(2)} ${order.tokenId.slice(0, 12)} ` +
        `@ ${order.price === null ? "MKT" : order.price.toFixed(4)} (${order.purpose})`,
    );
    return this.mutex.runExclusive(order.orderId, () => this.submitWithRetries(order));
  }

  private async submitWithRetries(initial: Order): Promise<Order> {
    let order = initial;
    const maxAttempts = order.maxRetries + 1;

    for (let attempt = order.retryCount + 1; ; attempt++) {
      const call = this.exchange.submitOrder(toRequest(order));
      let result: SubmitOrderResult;
      try {
        result = await this.awaitAck(order, call);
      } catch (err) {
        if (err instanceof DeadlineExceededError) {
          return this.parkUnacknowledged(order, call, err);
        }
        const info = classifyError(err);
        if (!this.policy.isRetryable(err)) {
          return this.fail(order, `TERMINAL_${info.code}: ${info.message}`, info);
        }
        if (attempt >= maxAttempts) {
          return this.fail(order, `RETRIES_EXHAUSTED after ${attempt} attempts: ${info.message}`, info, {
            reason: "Retries exhausted; manual review required",
            metadata: { exhausted: true, lastError: info.message },
          });
        }
        order = this.repo.update(
          order.orderId,
          "PENDING",
          { retryCount: attempt, errorMessage: info.message },
          this.clock(),
        );
        const delay = this.policy.backoffMs(attempt, err);
        this.logger.warn(
          `[OrderExecutor] ${order.orderId} attempt ${attempt}/${maxAttempts} failed (${info.code}), retrying in ${delay}ms`,
        );
        await this.sleep(delay);
        continue;
      }
      return this.acceptSubmission(order, result);
    }
  }

  /**
   * Wait for a submit acknowledgement. A call past the submit deadline may
   * still reach the exchange, so the same call gets the reconcile window
   * before its outcome is treated as unknown. Rejections from the exchange
   * itself propagate as usual.
   */
  private async awaitAck(order: Order, call: Promise<SubmitOrderResult>): Promise<SubmitOrderResult> {
    try {
      return await withDeadline(call, this.config.submitDeadlineMs, `submit ${order.orderId}`);
    } catch (err) {
      if (!(err instanceof DeadlineExceededError)) throw err;
      this.logger.warn(
        `[OrderExecutor] ${order.orderId} submit unacknowledged after ${err.deadlineMs}ms; ` +
          `waiting ${this.config.submitReconcileMs}ms before parking`,
      );
      return withDeadline(call, this.config.submitReconcileMs, `reconcile submit ${order.orderId}`);
    }
  }

  /**
   * A submit whose outcome is unknown is never sent again. The order is
   * dead-lettered, and a late acknowledgement is recorded and cancelled.
   */
  private async parkUnacknowledged(
    order: Order,
    call: Promise<SubmitOrderResult>,
    err: DeadlineExceededError,
  ): Promise<Order> {
    const waited = this.config.submitDeadlineMs + this.config.submitReconcileMs;
    const parked = await this.fail(
      order,
      `SUBMIT_UNACKNOWLEDGED: no exchange response within ${waited}ms`,
      { code: "TIMEOUT", message: err.message, transient: false },
      {
        reason: "Submit outcome unknown; late acknowledgement will be cancelled",
        metadata: { exhausted: false, unacknowledged: true },
      },
    );
    void call
      .then((late) => this.adoptLateAck(order.orderId, late))
      .catch((lateErr) =>
        this.logger.warn(
          `[OrderExecutor] ${order.orderId} unacknowledged submit settled: ${classifyError(lateErr).message}`,
        ),
      );
    return parked;
  }

  /**
   * Record the exchange id of an order parked before its acknowledgement
   * arrived, then pull it from the book.
   */
  private async adoptLateAck(orderId: string, result: SubmitOrderResult): Promise<void> {
    await this.mutex.runExclusive(orderId, async () => {
      const order = this.repo.findById(orderId);
      if (!order || order.exchangeOrderId !== null) return;
      this.repo.update(
        orderId,
        order.state,
        { exchangeOrderId: result.exchangeOrderId, errorMessage: `Late acknowledgement as ${result.exchangeOrderId}` },
        this.clock(),
      );
      this.logger.error(
        `[OrderExecutor] ${orderId} acknowledged late as ${result.exchangeOrderId} (${result.status}, ` +
          `${result.filledSize.toFixed(2)} filled) after being parked in ${order.state}`,
      );
      if (result.status === "OPEN" || result.status === "PARTIAL") {
        await this.withRetries(`cancel late ${orderId}`, () => this.exchange.cancelOrder(result.exchangeOrderId));
        this.logger.warn(`[OrderExecutor] Cancelled late order ${result.exchangeOrderId}`);
      }
      if (result.filledSize > 0) {
        this.logger.error(`[OrderExecutor] ${orderId} late order filled ${result.filledSize.toFixed(2)}; manual review required`);
      }
    });
  }

  private async acceptSubmission(order: Order, result: SubmitOrderResult): Promise<Order> {
    const now = this.clock();
    let current = this.repo.transition(order.orderId, "PENDING", {
      to: "SUBMITTED",
      reason: `Accepted by exchange as ${result.exchangeOrderId}`,
      metadata: { exchangeOrderId: result.exchangeOrderId, attempts: order.retryCount + 1 },
      patch: { exchangeOrderId: result.exchangeOrderId, submittedAt: now, errorMessage: null },
      timestamp: now,
    });

    if (result.filledSize > 0) {
      const price = result.avgFillPrice ?? order.price;
      if (price === null) {
        this.logger.warn(`[OrderExecutor] ${order.orderId} filled at submit without a price; waiting for fill report`);
      } else {
        current = await this.applyFill(current, {
          cumulativeSize: result.filledSize,
          price,
          fillSequence: "submit",
          source: "SUBMIT",
          timestamp: now,
        });
      }
    }

    if (result.status === "CANCELLED" && isLive(current.state)) {
      current = (await this.resolveUnfilled(current, "Exchange cancelled order at submission", false)).order;
    }
    return current;
  }

  private async fail(
    order: Order,
    reason: string,
    info: ClassifiedError,
    deadLetter?: { reason: string; metadata: Record<string, unknown> },
  ): Promise<Order> {
    const now = this.clock();
    const failed = this.repo.transition(order.orderId, "PENDING", {
      to: "FAILED",
      reason,
      metadata: { code: info.code, transient: info.transient, attempts: order.retryCount + 1 },
      patch: { errorMessage: info.message },
      timestamp: now,
    });

    if (!deadLetter) {
      this.logger.error(`[OrderExecutor] ${order.orderId} FAILED: ${reason}`);
      await this.notifySettled(failed);
      return failed;
    }

    const dead = this.repo.transition(order.orderId, "FAILED", {
      to: "DEAD_LETTER",
      reason: deadLetter.reason,
      metadata: deadLetter.metadata,
      timestamp: now,
    });
    this.logger.error(`[OrderExecutor] ${order.orderId} DEAD_LETTER: ${reason}`);
    await this.notifySettled(dead);
    return dead;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // FILLS
  // ═══════════════════════════════════════════════════════════════════════════

  private async handleFillEvent(event: FillEvent): Promise<boolean> {
    const known = this.repo.findByExchangeOrderId(event.exchangeOrderId);
    if (!known) {
      this.logger.debug(`[OrderExecutor] Fill for unknown exchange order ${event.exchangeOrderId}`);
      return false;
    }

    await this.mutex.runExclusive(known.orderId, async () => {
      const order = this.repo.findById(known.orderId) ?? known;
      await this.applyFill(order, {
        cumulativeSize: event.cumulativeSize,
        price: event.price,
        fillSequence: event.fillSequence,
        source: event.source,
        timestamp: event.timestamp,
      });
    });
    return true;
  }

  /**
   * Apply a fill that arrived before the order's exchange id was stored.
   * Runs outside the order's lock.
   */
  private async replayParkedFill(order: Order): Promise<void> {
    if (order.exchangeOrderId === null) return;
    if (await this.fills.replay(order.exchangeOrderId)) {
      this.logger.info(`[OrderExecutor] ${order.orderId} applied fill reported before acknowledgement`);
    }
  }

  /**
   * Apply a cumulative fill report. Reports that do not advance the filled
   * size are logged and otherwise ignored. Caller holds the order's lock.
   */
  private async applyFill(order: Order, fill: FillInput): Promise<Order> {
    if (!isLive(order.state)) {
      this.logger.debug(`[OrderExecutor] Ignoring fill for ${order.orderId} in ${order.state}`);
      return order;
    }

    const cumulative = Math.min(fill.cumulativeSize, order.size);
    const record: OrderFillRecord = {
      orderId: order.orderId,
      fillSequence: fill.fillSequence,
      cumulativeSize: cumulative,
      price: fill.price,
      source: fill.source,
      timestamp: fill.timestamp,
    };

    if (cumulative <= order.filledSize + EPSILON) {
      this.audit.appendFill(record);
      return order;
    }

    const delta = cumulative - order.filledSize;
    const deltaPrice = incrementalFillPrice(order.filledSize, order.avgFillPrice, cumulative, fill.price);
    const complete = order.size - cumulative <= EPSILON;
    const patch = {
      filledSize: cumulative,
      avgFillPrice: fill.price,
      filledAt: complete ? fill.timestamp : order.filledAt,
    };
    const metadata = { source: fill.source, fillSequence: fill.fillSequence, cumulativeSize: cumulative };

    let next: Order;
    if (complete) {
      next = this.repo.transition(order.orderId, order.state, {
        to: "FILLED",
        reason: "Order fully filled",
        metadata,
        patch,
        timestamp: fill.timestamp,
        fill: record,
      });
    } else if (order.state === "SUBMITTED") {
      next = this.repo.transition(order.orderId, "SUBMITTED", {
        to: "PARTIALLY_FILLED",
        reason: `Partial fill ${cumulative.toFixed(2)}/${order.size.toFixed(2)}`,
        metadata,
        patch,
        timestamp: fill.timestamp,
        fill: record,
      });
    } else {
      next = this.repo.update(order.orderId, "PARTIALLY_FILLED", patch, fill.timestamp, record);
    }

    const booked = await this.notifyFill(next, { size: delta, price: deltaPrice, cumulativeSize: cumulative });
    if (complete && booked) {
      next = await this.confirm(next, "Fill booked", { filledSize: cumulative });
    }
    return next;
  }

  private async confirm(order: Order, reason: string, metadata: Record<string, unknown>): Promise<Order> {
    const now = this.clock();
    const confirmed = this.repo.transition(order.orderId, order.state, {
      to: "CONFIRMED",
      reason,
      metadata,
      patch: { confirmedAt: now },
      timestamp: now,
    });
    if (confirmed.exchangeOrderId) this.fills.release(confirmed.exchangeOrderId);
    this.logger.info(
      `[OrderExecutor] ${order.orderId} CONFIRMED ${confirmed.filledSize.toFixed(2)}/${confirmed.size.toFixed(2)}: ${reason}`,
    );
    await this.notifySettled(confirmed);
    return confirmed;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CANCEL / PARTIAL RESOLUTION
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Settle a live order that will not fill further. Caller holds the lock.
   * Returns the order unchanged if the exchange cancel could not be confirmed.
   */
  private async resolveUnfilled(order: Order, reason: string, cancelOnExchange: boolean): Promise<Resolution> {
    let cancelled = !cancelOnExchange;
    const exchangeOrderId = order.exchangeOrderId;
    if (cancelOnExchange && exchangeOrderId !== null) {
      try {
        await this.withRetries(`cancel ${order.orderId}`, () => this.exchange.cancelOrder(exchangeOrderId));
        cancelled = true;
      } catch (err) {
        this.logger.warn(`[OrderExecutor] Cancel of ${order.orderId} failed: ${classifyError(err).message}`);
      }
    }

    // Fills can land between the last report and the cancel
    let current = order;
    const final = await this.tryPoll(current);
    if (final) {
      const price = final.avgFillPrice ?? current.avgFillPrice ?? current.price;
      if (price !== null) {
        current = await this.applyFill(current, {
          cumulativeSize: final.filledSize,
          price,
          fillSequence: `final:${final.filledSize}`,
          source: "POLL",
          timestamp: this.clock(),
        });
      }
      if (!isLive(current.state)) return { order: current };
      if (final.status === "CANCELLED") cancelled = true;
    }
    if (!cancelled) return { order: current };

    const now = this.clock();
    if (current.filledSize <= EPSILON) {
      const done = this.repo.transition(current.orderId, current.state, {
        to: "CANCELLED",
        reason,
        metadata: { filledSize: 0 },
        timestamp: now,
      });
      if (done.exchangeOrderId) this.fills.release(done.exchangeOrderId);
      this.logger.warn(`[OrderExecutor] ${current.orderId} CANCELLED unfilled: ${reason}`);
      await this.notifySettled(done);
      return { order: done };
    }

    const ratio = current.filledSize / current.size;
    const metadata = {
      fillRatio: Number(ratio.toFixed(4)),
      remainderCancelled: current.remainingSize,
      cause: reason,
    };
    if (ratio >= this.config.partialFillAcceptRatio) {
      const done = await this.confirm(
        current,
        `Partial fill ${(ratio * 100).toFixed(1)}% accepted; remainder cancelled`,
        metadata,
      );
      return { order: done };
    }

    // One generation of child orders; a child's own shortfall is accepted as is
    const child = current.parentOrderId === null ? this.createChild(current) : undefined;
    const done = await this.confirm(
      current,
      `Partial fill ${(ratio * 100).toFixed(1)}% below ${(this.config.partialFillAcceptRatio * 100).toFixed(0)}%` +
        (child ? `; remainder re-queued as ${child.orderId}` : ""),
      { ...metadata, childOrderId: child?.orderId ?? null },
    );
    return { order: done, child };
  }

  private createChild(parent: Order): Order | undefined {
    const n = this.repo.listChildren(parent.orderId).length + 1;
    const intent: OrderIntent = {
      idempotencyKey: `${parent.idempotencyKey}:child:${n}`,
      tokenId: parent.tokenId,
      marketId: parent.marketId,
      side: parent.side,
      size: parent.remainingSize,
      price: parent.price ?? undefined,
      orderType: parent.orderType,
      maxRetries: parent.maxRetries,
      purpose: parent.purpose,
      whaleAddress: parent.whaleAddress ?? undefined,
      positionId: parent.positionId ?? undefined,
      parentOrderId: parent.orderId,
    };
    try {
      return this.repo.create(this.newOrder(intent), `Child of ${parent.orderId} for unfilled remainder`, {
        parentOrderId: parent.orderId,
        parentFilled: parent.filledSize,
      });
    } catch (err) {
      if (err instanceof DuplicateIdempotencyKeyError) return this.repo.findByIdempotencyKey(intent.idempotencyKey);
      throw err;
    }
  }

  private async submitChildrenOf(order: Order): Promise<void> {
    for (const child of this.repo.listChildren(order.orderId)) {
      if (child.state !== "PENDING" || child.exchangeOrderId !== null) continue;
      if (this.submissions.has(child.idempotencyKey) || this.mutex.isLocked(child.orderId)) continue;
      const submitted = await this.submissions.run(child.idempotencyKey, () =>
        this.mutex.runExclusive(child.orderId, () => {
          const fresh = this.repo.findById(child.orderId);
          return fresh && fresh.state === "PENDING" ? this.submitWithRetries(fresh) : Promise.resolve(fresh ?? child);
        }),
      );
      await this.replayParkedFill(submitted);
    }
  }

  /**
   * Operator cancel of a live order, applying the partial-fill rule
   */
  async cancel(orderId: string, reason = "Cancelled by operator"): Promise<Order | undefined> {
    const resolution = await this.mutex.runExclusive(orderId, async (): Promise<Resolution | undefined> => {
      const order = this.repo.findById(orderId);
      if (!order) return undefined;
      if (!isLive(order.state)) return { order };
      return this.resolveUnfilled(order, reason, true);
    });
    if (resolution?.child) await this.submitChildrenOf(resolution.order);
    return resolution?.order;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // POLLING / SWEEPING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * REST fallback for fills the websocket missed
   */
  async pollLiveOrders(): Promise<number> {
    let polled = 0;
    for (const order of this.repo.listByState(["SUBMITTED", "PARTIALLY_FILLED"])) {
      const status = await this.tryPoll(order);
      if (!status) continue;
      polled++;
      await this.publishStatus(order, status);

      if (status.status === "CANCELLED") {
        const resolution = await this.mutex.runExclusive(order.orderId, async (): Promise<Resolution | undefined> => {
          const fresh = this.repo.findById(order.orderId);
          return fresh && isLive(fresh.state)
            ? this.resolveUnfilled(fresh, "Cancelled on exchange", false)
            : undefined;
        });
        if (resolution?.child) await this.submitChildrenOf(resolution.order);
      }
    }
    return polled;
  }

  /**
   * Expire stale PENDING orders and cancel live orders past the fill deadline
   */
  async sweep(): Promise<SweepResult> {
    const now = this.clock();
    const result: SweepResult = { expiredPending: 0, resolvedLive: 0, childOrders: 0 };

    for (const order of this.repo.listByState(["PENDING"])) {
      if (now - order.createdAt < this.config.submitDeadlineMs) continue;
      if (this.submissions.has(order.idempotencyKey) || this.mutex.isLocked(order.orderId)) continue;
      const expired = await this.mutex.runExclusive(order.orderId, async () => {
        const fresh = this.repo.findById(order.orderId);
        if (!fresh || fresh.state !== "PENDING") return false;
        await this.fail(
          fresh,
          `PENDING_TIMEOUT: not submitted within ${this.config.submitDeadlineMs}ms`,
          { code: "TIMEOUT", message: "Pending order expired with no submission in flight", transient: false },
          { reason: "Pending order expired; manual review required", metadata: { exhausted: false, pendingTimeout: true } },
        );
        return true;
      });
      if (expired) result.expiredPending++;
    }

    for (const order of this.repo.listByState(["SUBMITTED", "PARTIALLY_FILLED"])) {
      const since = order.submittedAt ?? order.createdAt;
      if (now - since < this.config.fillDeadlineMs) continue;
      const resolution = await this.mutex.runExclusive(order.orderId, async (): Promise<Resolution | undefined> => {
        const fresh = this.repo.findById(order.orderId);
        if (!fresh || !isLive(fresh.state)) return undefined;
        return this.resolveUnfilled(fresh, `Fill deadline of ${this.config.fillDeadlineMs}ms elapsed`, true);
      });
      if (!resolution || isLive(resolution.order.state)) continue;
      result.resolvedLive++;
      if (resolution.child) {
        result.childOrders++;
        await this.submitChildrenOf(resolution.order);
      }
    }

    return result;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(
      () =>
        void this.sweep().catch((err) =>
          this.logger.error("[OrderExecutor] Sweep failed", err instanceof Error ? err : undefined),
        ),
      this.config.sweepIntervalMs,
    );
    this.pollTimer = setInterval(
      () =>
        void this.pollLiveOrders().catch((err) =>
          this.logger.error("[OrderExecutor] Fill poll failed", err instanceof Error ? err : undefined),
        ),
      this.config.pollIntervalMs,
    );
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    if (this.pollTimer) clearInterval(this.pollTimer);
    this.sweepTimer = undefined;
    this.pollTimer = undefined;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // RECOVERY
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Startup reconciliation: align stored states with the audit log,
   * dead-letter PENDING orders whose outcome is unknown, re-poll live orders.
   */
  async recover(): Promise<RecoveryResult> {
    const result: RecoveryResult = { repaired: 0, deadLettered: 0, polled: 0, unconfirmed: [] };
    const now = this.clock();

    for (const issue of this.audit.findInconsistencies()) {
      if (issue.derivedState === null) {
        this.logger.error(`[OrderExecutor] Order ${issue.orderId} has no audit history; left as ${issue.storedState}`);
        continue;
      }
      this.repo.repairState(issue.orderId, issue.derivedState, now);
      result.repaired++;
      this.logger.warn(
        `[OrderExecutor] Recovered ${issue.orderId}: stored ${issue.storedState} -> logged ${issue.derivedState}`,
      );
    }

    for (const order of this.repo.listByState(["PENDING"])) {
      await this.mutex.runExclusive(order.orderId, () =>
        this.fail(
          order,
          "RECOVERY: submission outcome unknown after restart",
          { code: "UNKNOWN", message: "Process stopped during submission", transient: false },
          { reason: "Outcome unknown after restart; manual review required", metadata: { exhausted: false, recovered: true } },
        ),
      );
      result.deadLettered++;
    }

    result.polled = await this.pollLiveOrders();
    result.unconfirmed = this.repo.listByState(["FILLED"]).map((o) => o.orderId);
    if (result.unconfirmed.length > 0) {
      this.logger.warn(`[OrderExecutor] ${result.unconfirmed.length} filled order(s) await booking review`);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  getOrder(orderId: string): Order | undefined {
    return this.repo.findById(orderId);
  }

  getOrderByKey(idempotencyKey: string): Order | undefined {
    return this.repo.findByIdempotencyKey(idempotencyKey);
  }

  listChildren(orderId: string): Order[] {
    return this.repo.listChildren(orderId);
  }

  getStats(): ExecutorStats {
    const byState = emptyStateCounts();
    for (const row of this.repo.countByState()) byState[row.state] = row.count;
    const total = ORDER_STATES.reduce((sum, state) => sum + byState[state], 0);
    const settled = byState.CONFIRMED + byState.FILLED + byState.CANCELLED + byState.FAILED + byState.DEAD_LETTER;
    return {
      byState,
      total,
      fillRate: settled === 0 ? 0 : (byState.CONFIRMED + byState.FILLED) / settled,
      averageTimeToFillMs: this.repo.averageTimeToFill(),
      inFlight: this.mutex.size,
    };
  }

  /**
   * Dead-lettered orders, newest first, with the reason they were parked
   */
  getDeadLetters(limit = 50): DeadLetterEntry[] {
    return this.audit.getTransitionsInto("DEAD_LETTER", limit).flatMap((transition) => {
      const order = this.repo.findById(transition.orderId);
      if (!order) return [];
      const failed = this.audit.getOrderTransitions(order.orderId).find((t) => t.toState === "FAILED");
      return [
        {
          order,
          reason: failed?.reason ?? transition.reason,
          lastError: order.errorMessage,
          deadLetteredAt: transition.timestamp,
        },
      ];
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private newOrder(intent: OrderIntent): Order {
    const now = this.clock();
    return {
      orderId: this.newOrderId(),
      idempotencyKey: intent.idempotencyKey,
      exchangeOrderId: null,
      tokenId: intent.tokenId,
      marketId: intent.marketId,
      side: intent.side,
      size: intent.size,
      price: intent.price ?? null,
      orderType: intent.orderType,
      state: "PENDING",
      filledSize: 0,
      remainingSize: intent.size,
      avgFillPrice: null,
      createdAt: now,
      submittedAt: null,
      filledAt: null,
      confirmedAt: null,
      updatedAt: now,
      retryCount: 0,
      maxRetries: intent.maxRetries ?? this.config.maxRetries,
      errorMessage: null,
      purpose: intent.purpose,
      whaleAddress: intent.whaleAddress ?? null,
      positionId: intent.positionId ?? null,
      parentOrderId: intent.parentOrderId ?? null,
    };
  }

  private async publishStatus(order: Order, status: FillStatus): Promise<void> {
    const price = status.avgFillPrice ?? order.avgFillPrice ?? order.price;
    if (status.filledSize <= 0 || price === null || order.exchangeOrderId === null) return;
    await this.fills.publish({
      exchangeOrderId: order.exchangeOrderId,
      fillSequence: `poll:${status.filledSize}`,
      cumulativeSize: status.filledSize,
      price,
      source: "POLL",
      timestamp: this.clock(),
    });
  }

  private async tryPoll(order: Order): Promise<FillStatus | null> {
    if (!order.exchangeOrderId) return null;
    const exchangeOrderId = order.exchangeOrderId;
    try {
      return await this.withRetries(`poll ${order.orderId}`, () => this.exchange.pollFill(exchangeOrderId));
    } catch (err) {
      this.logger.warn(`[OrderExecutor] Poll of ${order.orderId} failed: ${classifyError(err).message}`);
      return null;
    }
  }

  private async withRetries<T>(label: string, call: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await withDeadline(call(), this.config.submitDeadlineMs, label);
      } catch (err) {
        if (!this.policy.isRetryable(err) || attempt >= this.policy.maxAttempts) throw toExchangeError(err);
        await this.sleep(this.policy.backoffMs(attempt, err));
      }
    }
  }

  private async notifyFill(order: Order, fill: FillDelta): Promise<boolean> {
    if (!this.listener.onFill) return true;
    try {
      await this.listener.onFill(order, fill);
      return true;
    } catch (err) {
      this.logger.error(
        `[OrderExecutor] Booking fill for ${order.orderId} failed; order left ${order.state}`,
        err instanceof Error ? err : undefined,
      );
      return false;
    }
  }

  private async notifySettled(order: Order): Promise<void> {
    if (!this.listener.onSettled) return;
    try {
      await this.listener.onSettled(order);
    } catch (err) {
      this.logger.error(
        `[OrderExecutor] Settlement handler failed for ${order.orderId}`,
        err instanceof Error ? err : undefined,
      );
    }
  }
}
