/**
 * Copy Trading Engine Tests
 *
 * End-to-end runs of the pipeline on an in-memory database and an
 * in-process exchange: whale trade to confirmed position, rejections and
 * vetoes, exit triggers to closed positions.
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  DEFAULT_EXECUTION_CONFIG,
  DEFAULT_FILTER_CONFIG,
  DEFAULT_LEDGER_CONFIG,
  DEFAULT_RISK_CONFIG,
  DEFAULT_SIZING_CONFIG,
} from "../../src/config";
import type { LedgerConfig, RiskConfig } from "../../src/config/schema";
import { AuditTrail } from "../../src/core/audit-trail";
import { CopyTradingEngine, copyOrderKey } from "../../src/core/copy-trading-engine";
import { FillEventBus } from "../../src/core/fill-events";
import { OrderExecutor } from "../../src/core/order-executor";
import { PositionLedger, type OpenPositionParams } from "../../src/core/position-ledger";
import { PositionSizer } from "../../src/core/position-sizer";
import { PortfolioReporter } from "../../src/core/reporting";
import { RiskManager } from "../../src/core/risk-manager";
import { SignalFilterPipeline } from "../../src/core/signal-filter";
import { ExchangeError } from "../../src/errors/app.errors";
import { IN_MEMORY, OrderRepository, PositionRepository, openDatabase } from "../../src/infra/persistence";
import type { MarketInfo } from "../../src/models/market";
import type { WhaleMetrics, WhaleTradeEvent } from "../../src/models/whale";
import type { MarketCatalog } from "../../src/services/interfaces";
import { StaticWhaleDirectory } from "../../src/services/whale-directory";
import { FakeExchangeClient } from "../helpers/fake-exchange";

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2026, 0, 15, 12);
const TOKEN = "token-m1-yes";

const mockLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

// ============================================================================
// Test Helpers
// ============================================================================

function createMockWhale(overrides: Partial<WhaleMetrics> = {}): WhaleMetrics {
  return {
    address: "0xa",
    qualityScore: 90,
    sharpe30d: 2.0,
    sharpe90d: 1.5,
    drawdown: 0.05,
    winRate: 0.65,
    ...overrides,
  };
}

function createMockEvent(overrides: Partial<WhaleTradeEvent> = {}): WhaleTradeEvent {
  return {
    whaleAddress: "0xa",
    marketId: "M1",
    tokenId: TOKEN,
    side: "BUY",
    size: 10000,
    price: 0.55,
    timestamp: START,
    sourceId: "tx-1",
    ...overrides,
  };
}

function createMockOpen(overrides: Partial<OpenPositionParams> = {}): OpenPositionParams {
  return {
    positionId: "pos-1",
    whaleAddress: "0xa",
    tokenId: TOKEN,
    marketId: "M1",
    side: "YES",
    category: "politics",
    resolvesAt: START + 30 * DAY_MS,
    size: 1000,
    price: 0.5,
    kellyFraction: 0.05,
    edge: 0.1,
    winRate: 0.65,
    stopLossPrice: 0.4,
    takeProfitPrice: 0.7,
    ...overrides,
  };
}

class StubCatalog implements MarketCatalog {
  failWith: Error | null = null;

  async getMarketInfo(marketId: string): Promise<MarketInfo> {
    if (this.failWith) throw this.failWith;
    return { marketId, category: "politics", resolvesAt: START + 30 * DAY_MS };
  }
}

interface EngineHarness {
  engine: CopyTradingEngine;
  exchange: FakeExchangeClient;
  catalog: StubCatalog;
  whales: StaticWhaleDirectory;
  ledger: PositionLedger;
  risk: RiskManager;
  executor: OrderExecutor;
}

function createHarness(
  options: { ledger?: Partial<LedgerConfig>; risk?: Partial<RiskConfig> } = {},
): EngineHarness {
  const clock = (): number => START;
  const db = openDatabase(IN_MEMORY);
  const audit = new AuditTrail(db);
  const orders = new OrderRepository(db, audit);
  const positions = new PositionRepository(db, audit);
  const ledgerConfig = { ...DEFAULT_LEDGER_CONFIG, ...options.ledger };

  const exchange = new FakeExchangeClient();
  exchange.books.set(TOKEN, {
    tokenId: TOKEN,
    bids: [{ price: 0.54, size: 20000 }],
    asks: [{ price: 0.55, size: 20000 }],
    fetchedAt: START,
  });
  const catalog = new StubCatalog();
  const whales = new StaticWhaleDirectory([
    createMockWhale(),
    createMockWhale({ address: "0xb", drawdown: 0.3 }),
  ]);

  const executor = new OrderExecutor(
    orders,
    audit,
    exchange,
    new FillEventBus(mockLogger),
    DEFAULT_EXECUTION_CONFIG,
    mockLogger,
    { clock, sleep: async () => {} },
  );
  const ledger = new PositionLedger(positions, ledgerConfig, mockLogger, { clock });
  const risk = new RiskManager({ ...DEFAULT_RISK_CONFIG, ...options.risk }, 10000, mockLogger, {
    clock,
    fileExists: () => false,
  });

  const engine = new CopyTradingEngine({
    filter: new SignalFilterPipeline(DEFAULT_FILTER_CONFIG, mockLogger),
    sizer: new PositionSizer(DEFAULT_SIZING_CONFIG, mockLogger),
    risk,
    executor,
    ledger,
    reporter: new PortfolioReporter(positions, ledgerConfig, clock),
    exchange,
    catalog,
    whales,
    logger: mockLogger,
    clock,
  });

  return { engine, exchange, catalog, whales, ledger, risk, executor };
}

// ============================================================================
// Opening copies
// ============================================================================

describe("CopyTradingEngine signals", () => {
  it("should copy a qualified whale trade into a confirmed OPEN position", async () => {
    const h = createHarness();
    const outcome = await h.engine.onWhaleTrade(createMockEvent());

    assert.strictEqual(outcome.status, "EXECUTED");
    assert.strictEqual(outcome.order?.state, "CONFIRMED");
    assert.strictEqual(outcome.order?.idempotencyKey, "copy:0xa:tx-1");
    assert.strictEqual(outcome.order?.price, 0.55);

    const position = outcome.position;
    assert.strictEqual(position?.status, "OPEN");
    assert.strictEqual(position?.side, "YES");
    assert.strictEqual(position?.entryPrice, 0.55);
    assert.strictEqual(position?.currentSize, outcome.order?.filledSize);
    assert.strictEqual(position?.kellyFraction, outcome.sizing?.fraction);
    assert.strictEqual(h.ledger.getLivePositions().length, 1);
    assert.ok(Math.abs(h.risk.getSnapshot().openExposureUsd - (outcome.sizing?.notionalUsd ?? 0)) < 1e-6);
  });

  it("should reject a whale in drawdown without placing orders", async () => {
    const h = createHarness();
    const outcome = await h.engine.onWhaleTrade(createMockEvent({ whaleAddress: "0xb" }));

    assert.strictEqual(outcome.status, "REJECTED");
    assert.strictEqual(outcome.rejection?.code, "WHALE_IN_DRAWDOWN");
    assert.ok(outcome.reason.startsWith("Whale in trouble"));
    assert.strictEqual(h.exchange.submitted.length, 0);
    assert.strictEqual(h.executor.getStats().total, 0);
    assert.strictEqual(h.ledger.getLivePositions().length, 0);
  });

  it("should report a replayed whale trade as a duplicate", async () => {
    const h = createHarness();
    await h.engine.onWhaleTrade(createMockEvent());
    const replay = await h.engine.onWhaleTrade(createMockEvent());

    assert.strictEqual(replay.status, "DUPLICATE");
    assert.strictEqual(h.exchange.submitted.length, 1);
    assert.strictEqual(h.ledger.getLivePositions().length, 1);
  });

  it("should reject when the order book cannot be fetched", async () => {
    const h = createHarness();
    h.exchange.books.clear();
    const outcome = await h.engine.onWhaleTrade(createMockEvent());
    assert.strictEqual(outcome.rejection?.code, "ORDERBOOK_EMPTY");
  });

  it("should fail when market metadata is unavailable", async () => {
    const h = createHarness();
    h.catalog.failWith = new Error("gamma down");
    const outcome = await h.engine.onWhaleTrade(createMockEvent());
    assert.deepStrictEqual(
      { status: outcome.status, reason: outcome.reason },
      { status: "FAILED", reason: "Market data unavailable: gamma down" },
    );
  });

  it("should veto copies from quarantined whales", async () => {
    const h = createHarness();
    h.risk.quarantine("0xa", "manual");
    const outcome = await h.engine.onWhaleTrade(createMockEvent());

    assert.strictEqual(outcome.status, "VETOED");
    assert.strictEqual(outcome.reason, "WHALE_QUARANTINED: 0xa");
    assert.strictEqual(h.exchange.submitted.length, 0);
  });

  it("should veto copies past the book exposure limit", async () => {
    const h = createHarness({ ledger: { maxTotalExposureUsd: 100 } });
    const outcome = await h.engine.onWhaleTrade(createMockEvent());

    assert.strictEqual(outcome.status, "VETOED");
    assert.ok(outcome.reason.startsWith("BOOK_LIMIT: Exposure $"));
  });

  it("should report a failed order without opening a position", async () => {
    const h = createHarness();
    h.exchange.failNextSubmits(new ExchangeError("not enough balance", "INSUFFICIENT_BALANCE"));
    const outcome = await h.engine.onWhaleTrade(createMockEvent());

    assert.strictEqual(outcome.status, "FAILED");
    assert.strictEqual(outcome.order?.state, "FAILED");
    assert.strictEqual(outcome.reason, "not enough balance");
    assert.strictEqual(h.ledger.getLivePositions().length, 0);
  });
});

// ============================================================================
// Exits
// ============================================================================

describe("CopyTradingEngine exits", () => {
  it("should close on stop loss at 0.39 against a 0.40 stop", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());

    const [exit] = await h.engine.onPriceTick(TOKEN, 0.39);
    assert.strictEqual(exit.signal.reason, "STOP_LOSS");
    assert.strictEqual(exit.order?.state, "CONFIRMED");
    assert.strictEqual(exit.order?.side, "SELL");
    assert.strictEqual(exit.order?.size, 1000);

    const closed = h.ledger.getPosition("pos-1");
    assert.strictEqual(closed?.status, "CLOSED");
    assert.strictEqual(closed?.closeReason, "STOP_LOSS");
    assert.ok(Math.abs((closed?.realizedPnl ?? 0) + 110) < 1e-9);

    const snapshot = h.risk.getSnapshot();
    assert.strictEqual(snapshot.consecutiveLosses, 1);
    assert.strictEqual(snapshot.openExposureUsd, 0);
  });

  it("should count a stopped-out loss once against the daily limit", async () => {
    const h = createHarness({ risk: { dailyLossLimitUsd: 200, dailyLossLimitPct: 0, perWhaleDailyLossUsd: 1000 } });
    h.ledger.applyOpenFill(createMockOpen());

    const [exit] = await h.engine.onPriceTick(TOKEN, 0.39);
    assert.strictEqual(exit.order?.state, "CONFIRMED");

    const snapshot = h.risk.getSnapshot();
    assert.ok(Math.abs(snapshot.dailyPnl + 110) < 1e-9);
    assert.strictEqual(snapshot.breaker, "NORMAL");
    assert.strictEqual(snapshot.breakerReason, null);
  });

  it("should close on take profit at 0.71 against a 0.70 target", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());

    const [exit] = await h.engine.onPriceTick(TOKEN, 0.71);
    assert.strictEqual(exit.signal.reason, "TAKE_PROFIT");

    const closed = h.ledger.getPosition("pos-1");
    assert.strictEqual(closed?.closeReason, "TAKE_PROFIT");
    assert.ok(Math.abs((closed?.realizedPnl ?? 0) - 210) < 1e-9);
  });

  it("should not exit between the levels", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());
    assert.deepStrictEqual(await h.engine.onPriceTick(TOKEN, 0.55), []);
    assert.strictEqual(h.exchange.submitted.length, 0);
  });

  it("should reopen the position when its closing order fails", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());
    h.exchange.failNextSubmits(new ExchangeError("market closed", "INVALID_MARKET"));

    const [exit] = await h.engine.onPriceTick(TOKEN, 0.39);
    assert.strictEqual(exit.order?.state, "FAILED");
    assert.strictEqual(h.ledger.getPosition("pos-1")?.status, "OPEN");
  });

  it("should treat a whale SELL on a copied position as the whale exiting", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());

    await h.engine.onWhaleActivity(createMockEvent({ side: "SELL", sourceId: "tx-2" }));

    const closed = h.ledger.getPosition("pos-1");
    assert.strictEqual(closed?.status, "CLOSED");
    assert.strictEqual(closed?.closeReason, "WHALE_EXIT");
    assert.deepStrictEqual(
      h.exchange.submitted.map((r) => r.side),
      ["SELL"],
    );
  });

  it("should liquidate a newly quarantined whale under the LIQUIDATE policy", async () => {
    const h = createHarness({ risk: { quarantinePolicy: "LIQUIDATE" } });
    h.ledger.applyOpenFill(createMockOpen());
    h.whales.upsert(createMockWhale({ qualityScore: 40 }));

    const result = await h.engine.reviewWhale("0xa");
    assert.strictEqual(result.action, "QUARANTINED");
    assert.strictEqual(h.ledger.getPosition("pos-1")?.closeReason, "MANUAL");
  });

  it("should hold positions of a quarantined whale under the HOLD policy", async () => {
    const h = createHarness();
    h.ledger.applyOpenFill(createMockOpen());
    h.whales.upsert(createMockWhale({ qualityScore: 40 }));

    await h.engine.reviewWhale("0xa");
    assert.strictEqual(h.ledger.getPosition("pos-1")?.status, "OPEN");
  });
});

describe("CopyTradingEngine maintenance", () => {
  it("should quarantine degraded whales from the directory", async () => {
    const h = createHarness();
    h.whales.upsert(createMockWhale({ qualityScore: 40 }));

    await h.engine.runMaintenance();
    assert.strictEqual(h.risk.isWhaleQuarantined("0xa"), true);
    assert.strictEqual(h.risk.isWhaleQuarantined("0xb"), true);
  });
});

describe("copyOrderKey", () => {
  it("should fall back to token, side and time without a source id", () => {
    assert.strictEqual(
      copyOrderKey(createMockEvent({ whaleAddress: "0xAB", sourceId: undefined })),
      `copy:0xab:${TOKEN}:BUY:${START}`,
    );
  });
});
