/**
 * Order Executor Tests
 *
 * Tests for:
 * - Idempotent submission
 * - Retry with backoff, terminal failures, dead-lettering
 * - Fill handling from the websocket bus and polling
 * - Partial fill acceptance and child orders
 * - Deadline sweeps and startup recovery
 */

import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { DEFAULT_EXECUTION_CONFIG, type ExecutionConfig } from "../../src/config";
import { AuditTrail } from "../../src/core/audit-trail";
import { FillEventBus } from "../../src/core/fill-events";
import { OrderExecutor, incrementalFillPrice, type FillDelta } from "../../src/core/order-executor";
import { DataIntegrityError, ExchangeError } from "../../src/errors/app.errors";
import { IN_MEMORY, OrderRepository, openDatabase } from "../../src/infra/persistence";
import type { Order, OrderIntent } from "../../src/models/order";
import { FakeExchangeClient } from "../helpers/fake-exchange";

const START = Date.UTC(2026, 0, 15, 12);

const mockLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

// ============================================================================
// Test Helpers
// ============================================================================

function createMockIntent(overrides: Partial<OrderIntent> = {}): OrderIntent {
  return {
    idempotencyKey: "copy:0xa:tx-1",
    tokenId: "token-m1-yes",
    marketId: "M1",
    side: "BUY",
    size: 100,
    price: 0.55,
    orderType: "LIMIT",
    purpose: "OPEN",
    whaleAddress: "0xa",
    ...overrides,
  };
}

interface Harness {
  executor: OrderExecutor;
  exchange: FakeExchangeClient;
  orders: OrderRepository;
  bus: FillEventBus;
  sleeps: number[];
  fills: FillDelta[];
  settled: Order[];
  advance: (ms: number) => void;
}

function createHarness(config: Partial<ExecutionConfig> = {}): Harness {
  let now = START;
  let nextId = 0;
  const db = openDatabase(IN_MEMORY);
  const audit = new AuditTrail(db);
  const orders = new OrderRepository(db, audit);
  const exchange = new FakeExchangeClient();
  const bus = new FillEventBus(mockLogger);
  const sleeps: number[] = [];
  const fills: FillDelta[] = [];
  const settled: Order[] = [];

  const executionConfig = { ...DEFAULT_EXECUTION_CONFIG, ...config };
  const executor = new OrderExecutor(orders, audit, exchange, bus, executionConfig, mockLogger, {
    clock: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    newOrderId: () => `ord-${++nextId}`,
  });
  executor.setListener({
    onFill: (_order, fill) => {
      fills.push(fill);
    },
    onSettled: (order) => {
      settled.push(order);
    },
  });

  return {
    executor,
    exchange,
    orders,
    bus,
    sleeps,
    fills,
    settled,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function statesOf(orders: OrderRepository, orderId: string): string[] {
  return orders.getTransitions(orderId).map((t) => t.toState);
}

// ============================================================================
// Submission
// ============================================================================

describe("OrderExecutor submission", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("should confirm an order filled on submit", async () => {
    const order = await h.executor.submit(createMockIntent());

    assert.strictEqual(order.state, "CONFIRMED");
    assert.strictEqual(order.filledSize, 100);
    assert.strictEqual(order.exchangeOrderId, "ex-1");
    assert.deepStrictEqual(statesOf(h.orders, order.orderId), ["PENDING", "SUBMITTED", "FILLED", "CONFIRMED"]);
    assert.deepStrictEqual(h.fills, [{ size: 100, price: 0.55, cumulativeSize: 100 }]);
    assert.deepStrictEqual(
      h.settled.map((o) => o.state),
      ["CONFIRMED"],
    );
  });

  it("should return the stored order for a repeated idempotency key", async () => {
    const first = await h.executor.submit(createMockIntent());
    const second = await h.executor.submit(createMockIntent());

    assert.strictEqual(second.orderId, first.orderId);
    assert.strictEqual(h.exchange.submitted.length, 1);
  });

  it("should share one submission between concurrent calls", async () => {
    const [a, b] = await Promise.all([
      h.executor.submit(createMockIntent()),
      h.executor.submit(createMockIntent()),
    ]);

    assert.strictEqual(a.orderId, b.orderId);
    assert.strictEqual(h.exchange.submitted.length, 1);
  });

  it("should reject invalid intents before touching the exchange", async () => {
    await assert.rejects(h.executor.submit(createMockIntent({ size: 0 })), DataIntegrityError);
    await assert.rejects(h.executor.submit(createMockIntent({ price: 1.2 })), DataIntegrityError);
    assert.strictEqual(h.exchange.submitted.length, 0);
  });

  it("should retry transient errors with exponential backoff", async () => {
    h.exchange.failNextSubmits(
      new ExchangeError("socket hang up", "CONNECTION"),
      new ExchangeError("socket hang up", "CONNECTION"),
    );
    const order = await h.executor.submit(createMockIntent());

    assert.strictEqual(order.state, "CONFIRMED");
    assert.strictEqual(order.retryCount, 2);
    assert.deepStrictEqual(h.sleeps, [1000, 2000]);
    assert.strictEqual(h.exchange.submitted.length, 3);
  });

  it("should dead-letter an order once retries are exhausted", async () => {
    h.exchange.failNextSubmits(...[1, 2, 3, 4].map(() => new ExchangeError("bad gateway", "UNAVAILABLE")));
    const order = await h.executor.submit(createMockIntent());

    assert.strictEqual(order.state, "DEAD_LETTER");
    assert.deepStrictEqual(h.sleeps, [1000, 2000, 4000]);
    assert.deepStrictEqual(statesOf(h.orders, order.orderId), ["PENDING", "FAILED", "DEAD_LETTER"]);

    const [entry] = h.executor.getDeadLetters();
    assert.strictEqual(entry.order.orderId, order.orderId);
    assert.strictEqual(entry.reason, "RETRIES_EXHAUSTED after 4 attempts: bad gateway");
    assert.strictEqual(entry.lastError, "bad gateway");
  });

  it("should fail at once on a terminal error", async () => {
    h.exchange.failNextSubmits(new ExchangeError("not enough balance", "INSUFFICIENT_BALANCE"));
    const order = await h.executor.submit(createMockIntent());

    assert.strictEqual(order.state, "FAILED");
    assert.deepStrictEqual(h.sleeps, []);
    assert.strictEqual(h.exchange.submitted.length, 1);
    assert.deepStrictEqual(
      h.settled.map((o) => o.state),
      ["FAILED"],
    );
  });

  it("should cancel an order the exchange killed at submission", async () => {
    h.exchange.mode = "REJECT";
    const order = await h.executor.submit(createMockIntent({ orderType: "FOK" }));

    assert.strictEqual(order.state, "CANCELLED");
    assert.deepStrictEqual(statesOf(h.orders, order.orderId), ["PENDING", "SUBMITTED", "CANCELLED"]);
  });
});

// ============================================================================
// Fills
// ============================================================================

describe("OrderExecutor fills", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.exchange.mode = "REST";
  });

  it("should apply websocket fills to a resting order", async () => {
    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(order.state, "SUBMITTED");

    await h.bus.publish({
      exchangeOrderId: "ex-1",
      fillSequence: "trade-1",
      cumulativeSize: 40,
      price: 0.54,
      source: "WEBSOCKET",
      timestamp: START + 1000,
    });
    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "PARTIALLY_FILLED");

    await h.bus.publish({
      exchangeOrderId: "ex-1",
      fillSequence: "trade-2",
      cumulativeSize: 100,
      price: 0.55,
      source: "WEBSOCKET",
      timestamp: START + 2000,
    });

    const final = h.executor.getOrder(order.orderId);
    assert.strictEqual(final?.state, "CONFIRMED");
    assert.strictEqual(final?.avgFillPrice, 0.55);
    assert.deepStrictEqual(
      h.fills.map((f) => f.size),
      [40, 60],
    );
  });

  it("should ignore a polled copy of a fill already booked", async () => {
    await h.executor.submit(createMockIntent());
    await h.bus.publish({
      exchangeOrderId: "ex-1",
      fillSequence: "trade-1",
      cumulativeSize: 100,
      price: 0.55,
      source: "WEBSOCKET",
      timestamp: START + 1000,
    });
    h.exchange.setFill("ex-1", 100, 0.55, "FILLED");

    await h.executor.pollLiveOrders();
    assert.strictEqual(h.fills.length, 1);
  });

  it("should apply a fill reported before the submit acknowledgement", async () => {
    assert.strictEqual(
      await h.bus.publish({
        exchangeOrderId: "ex-1",
        fillSequence: "trade-1",
        cumulativeSize: 100,
        price: 0.55,
        source: "WEBSOCKET",
        timestamp: START + 500,
      }),
      false,
    );

    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(order.state, "CONFIRMED");
    assert.deepStrictEqual(h.fills, [{ size: 100, price: 0.55, cumulativeSize: 100 }]);
  });

  it("should let a later poll complete an order first seen by an early partial fill", async () => {
    await h.bus.publish({
      exchangeOrderId: "ex-1",
      fillSequence: "trade-1",
      cumulativeSize: 40,
      price: 0.55,
      source: "WEBSOCKET",
      timestamp: START + 500,
    });
    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(order.state, "PARTIALLY_FILLED");

    h.exchange.setFill("ex-1", 100, 0.55, "FILLED");
    assert.strictEqual(await h.executor.pollLiveOrders(), 1);
    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "CONFIRMED");
    assert.deepStrictEqual(
      h.fills.map((f) => f.size),
      [40, 60],
    );
  });

  it("should pick up fills by polling when the websocket is silent", async () => {
    const order = await h.executor.submit(createMockIntent());
    h.exchange.setFill("ex-1", 100, 0.55, "FILLED");

    assert.strictEqual(await h.executor.pollLiveOrders(), 1);
    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "CONFIRMED");
  });

  it("should leave the order FILLED when booking the fill fails", async () => {
    h.executor.setListener({
      onFill: () => {
        throw new Error("ledger unavailable");
      },
    });
    const order = await h.executor.submit(createMockIntent());
    h.exchange.setFill("ex-1", 100, 0.55, "FILLED");
    await h.executor.pollLiveOrders();

    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "FILLED");
    const recovery = await h.executor.recover();
    assert.deepStrictEqual(recovery.unconfirmed, [order.orderId]);
  });
});

// ============================================================================
// Deadlines and partial fills
// ============================================================================

describe("OrderExecutor submit deadline", () => {
  it("should accept an acknowledgement that lands inside the reconcile window", async () => {
    const h = createHarness({ submitDeadlineMs: 20, submitReconcileMs: 200 });
    h.exchange.ackDelayMs = 50;

    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(h.exchange.submitted.length, 1);
    assert.strictEqual(order.state, "CONFIRMED");
    assert.strictEqual(order.exchangeOrderId, "ex-1");
    assert.deepStrictEqual(h.sleeps, []);
  });

  it("should park an unacknowledged submit without resending it", async () => {
    const h = createHarness({ submitDeadlineMs: 20, submitReconcileMs: 20 });
    h.exchange.mode = "REST";
    h.exchange.ackDelayMs = 80;

    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(order.state, "DEAD_LETTER");
    assert.strictEqual(order.exchangeOrderId, null);
    assert.deepStrictEqual(statesOf(h.orders, order.orderId), ["PENDING", "FAILED", "DEAD_LETTER"]);

    await delay(120);
    assert.strictEqual(h.exchange.submitted.length, 1);
    assert.strictEqual(h.executor.getOrder(order.orderId)?.exchangeOrderId, "ex-1");
    assert.deepStrictEqual(h.exchange.cancelled, ["ex-1"]);
  });

  it("should still retry a submit the exchange rejected", async () => {
    const h = createHarness();
    h.exchange.failNextSubmits(new ExchangeError("socket hang up", "CONNECTION"));

    const order = await h.executor.submit(createMockIntent());
    assert.strictEqual(order.state, "CONFIRMED");
    assert.strictEqual(h.exchange.submitted.length, 2);
  });
});

describe("OrderExecutor sweep", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.exchange.mode = "REST";
  });

  it("should accept a partial fill above the acceptance ratio", async () => {
    const order = await h.executor.submit(createMockIntent());
    h.exchange.setFill("ex-1", 85, 0.55);
    h.advance(DEFAULT_EXECUTION_CONFIG.fillDeadlineMs);

    const result = await h.executor.sweep();
    assert.deepStrictEqual(result, { expiredPending: 0, resolvedLive: 1, childOrders: 0 });
    assert.deepStrictEqual(h.exchange.cancelled, ["ex-1"]);

    const final = h.executor.getOrder(order.orderId);
    assert.strictEqual(final?.state, "CONFIRMED");
    assert.strictEqual(final?.filledSize, 85);
    assert.strictEqual(
      h.orders.getTransitions(order.orderId).at(-1)?.reason,
      "Partial fill 85.0% accepted; remainder cancelled",
    );
  });

  it("should re-queue the remainder of a small partial fill as a child order", async () => {
    const order = await h.executor.submit(createMockIntent());
    h.exchange.setFill("ex-1", 50, 0.55);
    h.advance(DEFAULT_EXECUTION_CONFIG.fillDeadlineMs);
    h.exchange.mode = "FILL";

    const result = await h.executor.sweep();
    assert.strictEqual(result.childOrders, 1);

    const [child] = h.executor.listChildren(order.orderId);
    assert.strictEqual(child.idempotencyKey, "copy:0xa:tx-1:child:1");
    assert.strictEqual(child.size, 50);
    assert.strictEqual(child.state, "CONFIRMED");
    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "CONFIRMED");
  });

  it("should cancel an unfilled order past the fill deadline", async () => {
    const order = await h.executor.submit(createMockIntent());
    h.advance(DEFAULT_EXECUTION_CONFIG.fillDeadlineMs - 1);
    assert.strictEqual((await h.executor.sweep()).resolvedLive, 0);

    h.advance(1);
    await h.executor.sweep();
    assert.strictEqual(h.executor.getOrder(order.orderId)?.state, "CANCELLED");
  });

  it("should dead-letter PENDING orders with nothing in flight", async () => {
    h.orders.create(
      {
        orderId: "stale-1",
        idempotencyKey: "copy:0xa:stale",
        exchangeOrderId: null,
        tokenId: "token-m1-yes",
        marketId: "M1",
        side: "BUY",
        size: 100,
        price: 0.55,
        orderType: "LIMIT",
        state: "PENDING",
        filledSize: 0,
        remainingSize: 100,
        avgFillPrice: null,
        createdAt: START,
        submittedAt: null,
        filledAt: null,
        confirmedAt: null,
        updatedAt: START,
        retryCount: 0,
        maxRetries: 3,
        errorMessage: null,
        purpose: "OPEN",
        whaleAddress: "0xa",
        positionId: null,
        parentOrderId: null,
      },
      "Order created",
    );
    h.advance(DEFAULT_EXECUTION_CONFIG.submitDeadlineMs);

    const result = await h.executor.sweep();
    assert.strictEqual(result.expiredPending, 1);
    assert.strictEqual(h.executor.getOrder("stale-1")?.state, "DEAD_LETTER");
  });

  it("should apply the partial-fill rule to operator cancels", async () => {
    const order = await h.executor.submit(createMockIntent());
    const cancelled = await h.executor.cancel(order.orderId);
    assert.strictEqual(cancelled?.state, "CANCELLED");
    assert.strictEqual(await h.executor.cancel("missing"), undefined);
  });
});

// ============================================================================
// Stats
// ============================================================================

describe("OrderExecutor stats", () => {
  it("should count orders by state and report the fill rate", async () => {
    const h = createHarness();
    await h.executor.submit(createMockIntent());
    h.exchange.failNextSubmits(new ExchangeError("market closed", "INVALID_MARKET"));
    await h.executor.submit(createMockIntent({ idempotencyKey: "copy:0xa:tx-2" }));

    const stats = h.executor.getStats();
    assert.strictEqual(stats.total, 2);
    assert.strictEqual(stats.byState.CONFIRMED, 1);
    assert.strictEqual(stats.byState.FAILED, 1);
    assert.strictEqual(stats.fillRate, 0.5);
  });
});

describe("incrementalFillPrice", () => {
  it("should price only the newly filled shares", () => {
    assert.ok(Math.abs(incrementalFillPrice(40, 0.5, 100, 0.56) - 0.6) < 1e-9);
  });

  it("should use the cumulative average for the first fill", () => {
    assert.strictEqual(incrementalFillPrice(0, null, 100, 0.55), 0.55);
  });
});
