import assert from "node:assert";
import { describe, it } from "node:test";
import { getMidPrice, normalizeRestOrderbook, walkBook } from "../../src/lib/orderbook-utils";

const book = normalizeRestOrderbook(
  "token-1",
  {
    bids: [
      { price: "0.40", size: "10" },
      { price: "0.45", size: "5" },
      { price: "bad", size: "1" },
    ],
    asks: [
      { price: "0.60", size: "10" },
      { price: "0.55", size: "0" },
      { price: "0.50", size: "20" },
    ],
  },
  123,
);

describe("normalizeRestOrderbook", () => {
  it("should sort bids descending and asks ascending", () => {
    assert.deepStrictEqual(book.bids, [
      { price: 0.45, size: 5 },
      { price: 0.4, size: 10 },
    ]);
    assert.deepStrictEqual(book.asks, [
      { price: 0.5, size: 20 },
      { price: 0.6, size: 10 },
    ]);
    assert.strictEqual(book.fetchedAt, 123);
  });

  it("should treat missing sides as empty", () => {
    const empty = normalizeRestOrderbook("token-2", {}, 1);
    assert.deepStrictEqual(empty.bids, []);
    assert.deepStrictEqual(empty.asks, []);
    assert.strictEqual(getMidPrice(empty), undefined);
  });
});

describe("walkBook", () => {
  it("should average a BUY across ask levels", () => {
    const walk = walkBook(book, "BUY", 25);
    assert.strictEqual(walk.ok, true);
    if (!walk.ok) return;
    assert.ok(Math.abs(walk.vwap - 0.52) < 1e-9);
    assert.ok(Math.abs(walk.mid - 0.475) < 1e-9);
    assert.ok(Math.abs(walk.slippage - 0.045 / 0.475) < 1e-9);
    assert.strictEqual(walk.levelsUsed, 2);
  });

  it("should report missing depth with the size available", () => {
    const walk = walkBook(book, "SELL", 20);
    assert.deepStrictEqual(walk, { ok: false, reason: "INSUFFICIENT_DEPTH", availableSize: 15 });
  });

  it("should report an empty book", () => {
    const walk = walkBook(normalizeRestOrderbook("token-3", { asks: [{ price: "0.5", size: "1" }] }, 1), "BUY", 1);
    assert.deepStrictEqual(walk, { ok: false, reason: "EMPTY_BOOK", availableSize: 0 });
  });
});
