import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { DEFAULT_LEDGER_CONFIG } from "../../src/config";
import type { LedgerConfig } from "../../src/config/schema";
import { AuditTrail } from "../../src/core/audit-trail";
import {
  PositionLedger,
  defaultExitLevels,
  evaluateExitTriggers,
  type OpenPositionParams,
} from "../../src/core/position-ledger";
import { DataIntegrityError, PositionNotFoundError } from "../../src/errors/app.errors";
import { IN_MEMORY, PositionRepository, openDatabase } from "../../src/infra/persistence";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const START = Date.UTC(2026, 0, 15, 12);

const mockLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

function close(actual: number | null | undefined, expected: number): void {
  assert.ok(actual !== null && actual !== undefined && Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

function createMockOpen(overrides: Partial<OpenPositionParams> = {}): OpenPositionParams {
  return {
    positionId: "pos-1",
    whaleAddress: "0xa",
    tokenId: "token-m1-yes",
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

function createLedger(config: Partial<LedgerConfig> = {}): {
  ledger: PositionLedger;
  audit: AuditTrail;
  advance: (ms: number) => void;
} {
  let now = START;
  const db = openDatabase(IN_MEMORY);
  const audit = new AuditTrail(db);
  const ledger = new PositionLedger(new PositionRepository(db, audit), { ...DEFAULT_LEDGER_CONFIG, ...config }, mockLogger, {
    clock: () => now,
  });
  return {
    ledger,
    audit,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

// ============================================================================
// Opening
// ============================================================================

describe("PositionLedger opening", () => {
  let ledger: PositionLedger;

  beforeEach(() => {
    ledger = createLedger().ledger;
  });

  it("should open a position at the fill price", () => {
    const position = ledger.applyOpenFill(createMockOpen());
    assert.strictEqual(position.status, "OPEN");
    assert.strictEqual(position.marketValue, 500);
    assert.strictEqual(position.entryAmount, 500);
    assert.strictEqual(position.stopLossPrice, 0.4);
    assert.strictEqual(position.takeProfitPrice, 0.7);
  });

  it("should default exit levels from the entry price", () => {
    const position = ledger.applyOpenFill(createMockOpen({ stopLossPrice: undefined, takeProfitPrice: undefined }));
    close(position.stopLossPrice, 0.425);
    close(position.takeProfitPrice, 0.65);
  });

  it("should average in later fills for the same position", () => {
    ledger.applyOpenFill(createMockOpen());
    const position = ledger.applyOpenFill(createMockOpen({ price: 0.6 }));

    assert.strictEqual(position.currentSize, 2000);
    close(position.entryPrice, 0.55);
    close(position.entryAmount, 1100);
    close(position.stopLossPrice, 0.55 * 0.85);
  });

  it("should reject an opening fill without size", () => {
    assert.throws(() => ledger.applyOpenFill(createMockOpen({ size: 0 })), DataIntegrityError);
  });

  it("should write an update row for the opening", () => {
    const { ledger: l, audit } = createLedger();
    l.applyOpenFill(createMockOpen());
    const [update] = audit.getPositionUpdates("pos-1");
    assert.strictEqual(update.updateType, "SIZE_INCREASE");
    assert.strictEqual(update.reason, "Position opened");
  });
});

// ============================================================================
// Exit triggers
// ============================================================================

describe("PositionLedger exits", () => {
  it("should trigger the stop loss at 0.39 against a 0.40 stop", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());

    const { position, exit } = ledger.updatePrice("pos-1", 0.39);
    close(position.unrealizedPnl, -110);
    close(position.maxDrawdown, 110);
    assert.strictEqual(exit?.reason, "STOP_LOSS");
    assert.strictEqual(exit?.detail, "price 0.3900 crossed stop 0.4000");
  });

  it("should trigger take profit at 0.71 against a 0.70 target", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());

    const { position, exit } = ledger.updatePrice("pos-1", 0.71);
    close(position.maxProfit, 210);
    assert.strictEqual(exit?.reason, "TAKE_PROFIT");
  });

  it("should not trigger between the levels", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    assert.strictEqual(ledger.updatePrice("pos-1", 0.55).exit, null);
  });

  it("should trigger inside the pre-resolution window", () => {
    const { ledger, advance } = createLedger();
    ledger.applyOpenFill(createMockOpen({ resolvesAt: START + 36 * HOUR_MS }));
    assert.strictEqual(ledger.evaluateExit("pos-1"), null);

    advance(24 * HOUR_MS);
    assert.deepStrictEqual(ledger.evaluateExit("pos-1"), {
      trigger: "PRE_RESOLUTION",
      reason: "PRE_RESOLUTION",
      detail: "12.0h to resolution",
    });
  });

  it("should follow the configured trigger priority", () => {
    const { ledger } = createLedger({ exitPriority: ["WHALE_EXIT", "STOP_LOSS"] });
    ledger.applyOpenFill(createMockOpen());
    ledger.markWhaleExited("0xa", "token-m1-yes");

    assert.strictEqual(ledger.updatePrice("pos-1", 0.39).exit?.reason, "WHALE_EXIT");
  });

  it("should leave out triggers missing from the priority list", () => {
    const { ledger } = createLedger({ exitPriority: ["TAKE_PROFIT"] });
    ledger.applyOpenFill(createMockOpen());
    assert.strictEqual(ledger.updatePrice("pos-1", 0.39).exit, null);
  });

  it("should fire a trigger once by moving the position to CLOSING", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    const { exit } = ledger.updatePrice("pos-1", 0.39);
    assert.ok(exit);

    assert.strictEqual(ledger.markClosing("pos-1", exit)?.status, "CLOSING");
    assert.strictEqual(ledger.markClosing("pos-1", exit), null);
    assert.strictEqual(ledger.updatePrice("pos-1", 0.38).exit, null);

    assert.strictEqual(ledger.revertClosing("pos-1", "close order failed").status, "OPEN");
  });

  it("should only flag the exiting whale's positions", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    ledger.applyOpenFill(createMockOpen({ positionId: "pos-2", whaleAddress: "0xb" }));

    const flagged = ledger.markWhaleExited("0xa", "token-m1-yes");
    assert.deepStrictEqual(
      flagged.map((p) => p.positionId),
      ["pos-1"],
    );
    assert.strictEqual(ledger.getPosition("pos-2")?.whaleExited, false);
  });
});

describe("defaultExitLevels", () => {
  it("should mirror levels for NO positions", () => {
    const levels = defaultExitLevels("NO", 0.5, { stopLossPct: 0.15, takeProfitPct: 0.3 });
    close(levels.stopLossPrice, 0.575);
    close(levels.takeProfitPrice, 0.35);
  });
});

describe("evaluateExitTriggers", () => {
  it("should use inverted comparisons for NO positions", () => {
    const { ledger } = createLedger();
    const position = ledger.applyOpenFill(
      createMockOpen({ side: "NO", price: 0.5, stopLossPrice: 0.6, takeProfitPrice: 0.35 }),
    );
    const marked = ledger.updatePrice(position.positionId, 0.61).position;
    assert.strictEqual(
      evaluateExitTriggers(marked, ["STOP_LOSS", "TAKE_PROFIT"], 0, START)?.reason,
      "STOP_LOSS",
    );
    close(marked.unrealizedPnl, -110);
  });
});

// ============================================================================
// Closing
// ============================================================================

describe("PositionLedger closing", () => {
  it("should book realized P&L on partial and full closes", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());

    const partial = ledger.applyCloseFill("pos-1", 400, 0.6);
    assert.strictEqual(partial.currentSize, 600);
    close(partial.realizedPnl, 40);
    assert.strictEqual(partial.status, "OPEN");

    const closed = ledger.applyCloseFill("pos-1", 600, 0.45, "STOP_LOSS");
    assert.strictEqual(closed.status, "CLOSED");
    assert.strictEqual(closed.closeReason, "STOP_LOSS");
    assert.strictEqual(closed.marketValue, 0);
    close(closed.realizedPnl, 10);
    close(closed.totalPnl, 10);
  });

  it("should refuse to close a closed position", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    ledger.closePosition("pos-1", 0.6, "MANUAL");
    assert.throws(() => ledger.closePosition("pos-1", 0.6, "MANUAL"), DataIntegrityError);
  });

  it("should throw for unknown positions", () => {
    const { ledger } = createLedger();
    assert.throws(() => ledger.updatePrice("missing", 0.5), PositionNotFoundError);
  });

  it("should archive closed positions past retention", () => {
    const { ledger, advance } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    ledger.closePosition("pos-1", 0.6, "TAKE_PROFIT");

    assert.strictEqual(ledger.archiveClosed(), 0);
    advance(31 * DAY_MS);
    assert.strictEqual(ledger.archiveClosed(), 1);
    assert.strictEqual(ledger.getPosition("pos-1")?.status, "ARCHIVED");
  });
});

// ============================================================================
// Portfolio views
// ============================================================================

describe("PositionLedger portfolio", () => {
  it("should sum live exposure by category", () => {
    const { ledger } = createLedger();
    ledger.applyOpenFill(createMockOpen());
    ledger.applyOpenFill(createMockOpen({ positionId: "pos-2", tokenId: "t2", category: null, size: 100 }));
    ledger.applyOpenFill(createMockOpen({ positionId: "pos-3", tokenId: "t3" }));
    ledger.closePosition("pos-3", 0.5, "MANUAL");

    const view = ledger.getPortfolioView(10000);
    assert.strictEqual(view.openExposureUsd, 550);
    assert.strictEqual(view.exposureByCategory.get("politics"), 500);
    assert.strictEqual(view.exposureByCategory.get("uncategorized"), 50);
    assert.strictEqual(view.openPositions.length, 2);
    assert.strictEqual(ledger.exposureSources().length, 2);
  });
});
