/**
 * In-process exchange used by executor, ledger and engine tests
 */

import { setTimeout as delay } from "node:timers/promises";
import { ExchangeError } from "../../src/errors/app.errors";
import type { OrderBookSnapshot } from "../../src/models/market";
import type {
  ExchangeClient,
  ExchangeOrderStatus,
  FillStatus,
  SubmitOrderRequest,
  SubmitOrderResult,
} from "../../src/services/interfaces";

/**
 * FILL fills every order at its limit price on submit, REST leaves it open,
 * REJECT acknowledges and cancels it unfilled (a killed FOK).
 */
export type FakeSubmitMode = "FILL" | "REST" | "REJECT";

export class FakeExchangeClient implements ExchangeClient {
  mode: FakeSubmitMode = "FILL";
  /** Real delay before a submit is acknowledged */
  ackDelayMs = 0;
  readonly submitted: SubmitOrderRequest[] = [];
  readonly cancelled: string[] = [];
  readonly books = new Map<string, OrderBookSnapshot>();
  private readonly statuses = new Map<string, FillStatus>();
  private readonly failures: Error[] = [];
  private seq = 0;

  /** Errors thrown by the next submit calls, in order */
  failNextSubmits(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  /** Set the cumulative fill an order reports on the next poll */
  setFill(exchangeOrderId: string, filledSize: number, avgFillPrice: number, status: ExchangeOrderStatus = "PARTIAL"): void {
    this.statuses.set(exchangeOrderId, { exchangeOrderId, status, filledSize, avgFillPrice });
  }

  async submitOrder(request: SubmitOrderRequest): Promise<SubmitOrderResult> {
    this.submitted.push(request);
    if (this.ackDelayMs > 0) await delay(this.ackDelayMs);
    const failure = this.failures.shift();
    if (failure) throw failure;

    const exchangeOrderId = `ex-${++this.seq}`;
    const status: FillStatus =
      this.mode === "FILL"
        ? { exchangeOrderId, status: "FILLED", filledSize: request.size, avgFillPrice: request.price ?? 0.5 }
        : { exchangeOrderId, status: this.mode === "REST" ? "OPEN" : "CANCELLED", filledSize: 0, avgFillPrice: null };
    this.statuses.set(exchangeOrderId, status);
    return { ...status };
  }

  async cancelOrder(exchangeOrderId: string): Promise<void> {
    this.cancelled.push(exchangeOrderId);
    const status = this.statuses.get(exchangeOrderId);
    if (status && status.status !== "FILLED") status.status = "CANCELLED";
  }

  async fetchOrderBook(tokenId: string): Promise<OrderBookSnapshot> {
    const book = this.books.get(tokenId);
    if (!book) throw new ExchangeError(`No book for ${tokenId}`, "INVALID_MARKET");
    return book;
  }

  async pollFill(exchangeOrderId: string): Promise<FillStatus> {
    const status = this.statuses.get(exchangeOrderId);
    if (!status) throw new ExchangeError(`Unknown order ${exchangeOrderId}`, "INVALID_ORDER");
    return { ...status };
  }
}
