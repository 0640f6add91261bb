/**
 * Simulated Exchange Client
 *
 * Dry-run ExchangeClient. Orders are matched against live order books
 * but never sent anywhere. A limit order fills when walking the book for
 * its full size averages at or better than the limit; otherwise it rests
 * and is re-checked on each poll. Fill-or-kill orders that cannot fill
 * are cancelled.
 */

import { randomUUID } from "crypto";
import { ExchangeError } from "../errors/app.errors";
import { walkBook } from "../lib/orderbook-utils";
import type { OrderBookSnapshot } from "../models/market";
import type { Logger } from "../utils/logger.util";
import type {
  ExchangeClient,
  ExchangeOrderStatus,
  FillStatus,
  SubmitOrderRequest,
  SubmitOrderResult,
} from "./interfaces";

export type BookSource = (tokenId: string) => Promise<OrderBookSnapshot>;

interface SimulatedOrder {
  request: SubmitOrderRequest;
  status: ExchangeOrderStatus;
  filledSize: number;
  avgFillPrice: number | null;
}

export class SimulatedExchangeClient implements ExchangeClient {
  private readonly orders = new Map<string, SimulatedOrder>();

  constructor(
    private readonly books: BookSource,
    private readonly logger: Logger,
  ) {}

  fetchOrderBook(tokenId: string): Promise<OrderBookSnapshot> {
    return this.books(tokenId);
  }

  async submitOrder(request: SubmitOrderRequest): Promise<SubmitOrderResult> {
    if (request.size <= 0) {
      throw new ExchangeError(`Order ${request.clientOrderId} has size ${request.size}`, "INVALID_ORDER");
    }
    const fillOrKill = request.orderType === "MARKET" || request.orderType === "FOK";
    if (!fillOrKill && request.price === null) {
      throw new ExchangeError(`Limit order ${request.clientOrderId} has no price`, "INVALID_ORDER");
    }

    const exchangeOrderId = `sim_${randomUUID()}`;
    const order: SimulatedOrder = { request, status: "OPEN", filledSize: 0, avgFillPrice: null };
    await this.tryMatch(order);
    if (fillOrKill && order.status !== "FILLED") order.status = "CANCELLED";
    this.orders.set(exchangeOrderId, order);

    this.logger.info(
      `[SimExchange] ${request.side} ${request.size.toFixed(2)} ${request.tokenId.slice(0, 12)} @ ${
        request.price?.toFixed(4) ?? "market"
      } -> ${order.status}`,
    );
    return { exchangeOrderId, ...this.snapshot(order) };
  }

  async cancelOrder(exchangeOrderId: string): Promise<void> {
    const order = this.getOrder(exchangeOrderId);
    if (order.status === "OPEN" || order.status === "PARTIAL") order.status = "CANCELLED";
  }

  async pollFill(exchangeOrderId: string): Promise<FillStatus> {
    const order = this.getOrder(exchangeOrderId);
    if (order.status === "OPEN") await this.tryMatch(order);
    return { exchangeOrderId, ...this.snapshot(order) };
  }

  private async tryMatch(order: SimulatedOrder): Promise<void> {
    const { request } = order;
    const book = await this.books(request.tokenId);
    const walk = walkBook(book, request.side, request.size);
    if (!walk.ok) return;

    const limit = request.price;
    const crosses = limit === null || (request.side === "BUY" ? walk.vwap <= limit : walk.vwap >= limit);
    if (!crosses) return;

    order.status = "FILLED";
    order.filledSize = request.size;
    order.avgFillPrice = walk.vwap;
  }

  private getOrder(exchangeOrderId: string): SimulatedOrder {
    const order = this.orders.get(exchangeOrderId);
    if (!order) throw new ExchangeError(`Unknown order ${exchangeOrderId}`, "INVALID_ORDER");
    return order;
  }

  private snapshot(order: SimulatedOrder): Omit<FillStatus, "exchangeOrderId"> {
    return { status: order.status, filledSize: order.filledSize, avgFillPrice: order.avgFillPrice };
  }
}
