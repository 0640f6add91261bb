import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import { OrderType, Side } from "@polymarket/clob-client";
import type { UserMarketOrder, UserOrder } from "@polymarket/clob-client";
import { ExchangeError } from "../../src/errors/app.errors";
import type { SubmitOrderRequest } from "../../src/services/interfaces";
import {
  ClobExchangeClient,
  normalizeOrderStatus,
  parsePostOrderResponse,
  type ClobOrderApi,
} from "../../src/services/clob-exchange-client";

const mockLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

// ============================================================================
// Test Helpers
// ============================================================================

type Book = Awaited<ReturnType<ClobOrderApi<string>["getOrderBook"]>>;
type ClobOrder = Awaited<ReturnType<ClobOrderApi<string>["getOrder"]>>;

/** Signed orders are plain strings here */
class FakeClobApi implements ClobOrderApi<string> {
  book: Book = { bids: [], asks: [] };
  postResponse: unknown = { success: true, orderID: "0xorder1", status: "live", makingAmount: "0", takingAmount: "0" };
  postError: Error | null = null;
  cancelResponse: unknown = {};
  order: ClobOrder = { id: "0xorder1", status: "LIVE", original_size: "100", size_matched: "0", price: "0.55" };
  readonly limitOrders: UserOrder[] = [];
  readonly marketOrders: UserMarketOrder[] = [];
  readonly posted: Array<{ signed: string; orderType?: OrderType }> = [];

  async getOrderBook(): Promise<Book> {
    return this.book;
  }

  async createOrder(args: UserOrder): Promise<string> {
    this.limitOrders.push(args);
    return "signed-limit";
  }

  async createMarketOrder(args: UserMarketOrder): Promise<string> {
    this.marketOrders.push(args);
    return "signed-market";
  }

  async postOrder(signed: string, orderType?: OrderType): Promise<unknown> {
    this.posted.push({ signed, orderType });
    if (this.postError) throw this.postError;
    return this.postResponse;
  }

  async cancelOrder(): Promise<unknown> {
    return this.cancelResponse;
  }

  async getOrder(): Promise<ClobOrder> {
    return this.order;
  }
}

function createMockRequest(overrides: Partial<SubmitOrderRequest> = {}): SubmitOrderRequest {
  return {
    clientOrderId: "copy:0xa:tx-1",
    tokenId: "token-m1-yes",
    side: "BUY",
    size: 100,
    price: 0.55,
    orderType: "LIMIT",
    ...overrides,
  };
}

async function rejectsWith(promise: Promise<unknown>, code: string, transient: boolean): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(err instanceof ExchangeError);
    assert.strictEqual(err.exchangeCode, code);
    assert.strictEqual(err.transient, transient);
    return true;
  });
}

// ============================================================================
// ClobExchangeClient
// ============================================================================

describe("ClobExchangeClient", () => {
  let api: FakeClobApi;
  let client: ClobExchangeClient<string>;

  beforeEach(() => {
    api = new FakeClobApi();
    client = new ClobExchangeClient(api, mockLogger, () => 1000);
  });

  it("should return a sorted numeric order book", async () => {
    api.book = {
      bids: [
        { price: "0.50", size: "100" },
        { price: "0.52", size: "50" },
      ],
      asks: [
        { price: "0.58", size: "10" },
        { price: "0.55", size: "20" },
      ],
    };
    const book = await client.fetchOrderBook("token-m1-yes");
    assert.deepStrictEqual(book, {
      tokenId: "token-m1-yes",
      bids: [
        { price: 0.52, size: 50 },
        { price: 0.5, size: 100 },
      ],
      asks: [
        { price: 0.55, size: 20 },
        { price: 0.58, size: 10 },
      ],
      fetchedAt: 1000,
    });
  });

  it("should post limit orders as GTC and read a matched fill", async () => {
    api.postResponse = { success: true, orderID: "0xorder1", status: "matched", makingAmount: "55", takingAmount: "100" };
    const result = await client.submitOrder(createMockRequest());

    assert.deepStrictEqual(api.limitOrders, [{ side: Side.BUY, tokenID: "token-m1-yes", price: 0.55, size: 100 }]);
    assert.deepStrictEqual(api.posted, [{ signed: "signed-limit", orderType: OrderType.GTC }]);
    assert.deepStrictEqual(result, { exchangeOrderId: "0xorder1", status: "FILLED", filledSize: 100, avgFillPrice: 0.55 });
  });

  it("should report a resting limit order as OPEN", async () => {
    const result = await client.submitOrder(createMockRequest());
    assert.deepStrictEqual(result, { exchangeOrderId: "0xorder1", status: "OPEN", filledSize: 0, avgFillPrice: null });
  });

  it("should refuse a limit order without a price", async () => {
    await rejectsWith(client.submitOrder(createMockRequest({ price: null })), "INVALID_ORDER", false);
    assert.strictEqual(api.posted.length, 0);
  });

  it("should price market SELLs from the best bid and post them fill-or-kill", async () => {
    api.book = { bids: [{ price: "0.48", size: "500" }], asks: [] };
    api.postResponse = { success: true, orderID: "0xorder2", status: "unmatched" };

    const result = await client.submitOrder(createMockRequest({ side: "SELL", price: null, orderType: "MARKET" }));

    assert.deepStrictEqual(api.marketOrders, [{ side: Side.SELL, tokenID: "token-m1-yes", amount: 100, price: 0.48 }]);
    assert.strictEqual(api.posted[0]?.orderType, OrderType.FOK);
    assert.strictEqual(result.status, "CANCELLED");
  });

  it("should fail a market order against an empty side", async () => {
    await rejectsWith(
      client.submitOrder(createMockRequest({ price: null, orderType: "FOK" })),
      "INVALID_MARKET",
      false,
    );
  });

  it("should classify error responses as terminal", async () => {
    api.postResponse = { error: "not enough balance / allowance", status: 400 };
    await rejectsWith(client.submitOrder(createMockRequest()), "INSUFFICIENT_BALANCE", false);
  });

  it("should classify thrown network errors as transient", async () => {
    api.postError = new Error("socket hang up");
    await rejectsWith(client.submitOrder(createMockRequest()), "CONNECTION", true);
  });

  it("should surface cancel errors", async () => {
    api.cancelResponse = { error: "order not found", status: 404 };
    await rejectsWith(client.cancelOrder("0xorder1"), "INVALID_ORDER", false);
  });

  it("should poll a partial fill", async () => {
    api.order = { id: "0xorder1", status: "LIVE", original_size: "100", size_matched: "40", price: "0.55" };
    assert.deepStrictEqual(await client.pollFill("0xorder1"), {
      exchangeOrderId: "0xorder1",
      status: "PARTIAL",
      filledSize: 40,
      avgFillPrice: 0.55,
    });
  });
});

// ============================================================================
// Response parsing
// ============================================================================

describe("parsePostOrderResponse", () => {
  it("should lowercase the status and parse amounts", () => {
    assert.deepStrictEqual(
      parsePostOrderResponse({ orderID: "0xo", status: "MATCHED", makingAmount: "5.5", takingAmount: 10 }),
      { orderId: "0xo", status: "matched", makingAmount: 5.5, takingAmount: 10 },
    );
  });

  it("should reject a response without an order id", () => {
    assert.throws(
      () => parsePostOrderResponse({ success: false }),
      (err: unknown) => err instanceof ExchangeError && err.message === "Order rejected without a message",
    );
  });

  it("should reject an empty response", () => {
    assert.throws(() => parsePostOrderResponse(undefined), ExchangeError);
  });
});

describe("normalizeOrderStatus", () => {
  it("should map exchange statuses", () => {
    assert.strictEqual(normalizeOrderStatus("live", 100, 100), "FILLED");
    assert.strictEqual(normalizeOrderStatus("MATCHED", 0, 0), "FILLED");
    assert.strictEqual(normalizeOrderStatus("CANCELED", 10, 100), "CANCELLED");
    assert.strictEqual(normalizeOrderStatus("UNMATCHED", 0, 100), "CANCELLED");
    assert.strictEqual(normalizeOrderStatus("LIVE", 10, 100), "PARTIAL");
    assert.strictEqual(normalizeOrderStatus("LIVE", 0, 100), "OPEN");
  });
});
