/**
 * CLOB Exchange Client
 *
 * ExchangeClient over @polymarket/clob-client. Limit and GTC orders go
 * through createOrder; MARKET and FOK orders through createMarketOrder and
 * are posted fill-or-kill. SDK failures are rethrown as ExchangeError with
 * a transient or terminal code.
 */

import { OrderType, Side } from "@polymarket/clob-client";
import type { ClobClient, UserMarketOrder, UserOrder } from "@polymarket/clob-client";
import { ExchangeError } from "../errors/app.errors";
import { toExchangeError } from "../lib/error-handling";
import { normalizeRestOrderbook } from "../lib/orderbook-utils";
import type { OrderBookSnapshot } from "../models/market";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { Logger } from "../utils/logger.util";
import type {
  ExchangeClient,
  ExchangeOrderStatus,
  FillStatus,
  SubmitOrderRequest,
  SubmitOrderResult,
} from "./interfaces";

type SignedClobOrder = Awaited<ReturnType<ClobClient["createOrder"]>>;

/**
 * The subset of ClobClient this adapter calls
 */
export interface ClobOrderApi<TSigned = SignedClobOrder> {
  getOrderBook(tokenID: string): Promise<{
    bids?: Array<{ price: string; size: string }>;
    asks?: Array<{ price: string; size: string }>;
  }>;
  createOrder(args: UserOrder): Promise<TSigned>;
  createMarketOrder(args: UserMarketOrder): Promise<TSigned>;
  postOrder(order: TSigned, orderType?: OrderType): Promise<unknown>;
  cancelOrder(payload: { orderID: string }): Promise<unknown>;
  getOrder(orderID: string): Promise<{
    id: string;
    status: string;
    original_size: string;
    size_matched: string;
    price: string;
  }>;
}

interface PostOrderResponse {
  orderId: string;
  status: string;
  makingAmount: number;
  takingAmount: number;
}

function field(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

function toNumber(value: unknown): number {
  const n = typeof value === "string" ? parseFloat(value) : typeof value === "number" ? value : NaN;
  return Number.isFinite(n) ? n : 0;
}

/**
 * The SDK resolves HTTP failures as `{ error, status }` instead of throwing
 */
export function parsePostOrderResponse(raw: unknown): PostOrderResponse {
  if (typeof raw !== "object" || raw === null) {
    throw new ExchangeError("Empty response from postOrder", "UNKNOWN");
  }
  const error = field(raw, "error") ?? field(raw, "errorMsg");
  const orderId = field(raw, "orderID") ?? field(raw, "orderId");
  const success = field(raw, "success");

  if ((typeof error === "string" && error !== "") || success === false || typeof orderId !== "string" || orderId === "") {
    const status = field(raw, "status");
    const message = typeof error === "string" && error !== "" ? error : "Order rejected without a message";
    throw toExchangeError(Object.assign(new Error(message), { status: typeof status === "number" ? status : undefined }));
  }

  const status = field(raw, "status");
  return {
    orderId,
    status: typeof status === "string" ? status.toLowerCase() : "live",
    makingAmount: toNumber(field(raw, "makingAmount")),
    takingAmount: toNumber(field(raw, "takingAmount")),
  };
}

/**
 * Normalize an order status string and fill counts
 */
export function normalizeOrderStatus(status: string, filled: number, original: number): ExchangeOrderStatus {
  if (original > 0 && filled >= original) return "FILLED";
  const upper = status.toUpperCase();
  if (upper.includes("CANCEL") || upper === "UNMATCHED") return "CANCELLED";
  if (upper === "MATCHED") return "FILLED";
  return filled > 0 ? "PARTIAL" : "OPEN";
}

export class ClobExchangeClient<TSigned = SignedClobOrder> implements ExchangeClient {
  private readonly clock: Clock;

  constructor(
    private readonly api: ClobOrderApi<TSigned>,
    private readonly logger: Logger,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  async fetchOrderBook(tokenId: string): Promise<OrderBookSnapshot> {
    try {
      return normalizeRestOrderbook(tokenId, await this.api.getOrderBook(tokenId), this.clock());
    } catch (err) {
      throw toExchangeError(err);
    }
  }

  async submitOrder(request: SubmitOrderRequest): Promise<SubmitOrderResult> {
    const side = request.side === "BUY" ? Side.BUY : Side.SELL;
    const fillOrKill = request.orderType === "MARKET" || request.orderType === "FOK";

    let raw: unknown;
    try {
      if (fillOrKill) {
        const price = request.price ?? (await this.bestPrice(request));
        // Market BUY amounts are USDC; SELL amounts are shares
        const amount = request.side === "BUY" ? request.size * price : request.size;
        const signed = await this.api.createMarketOrder({ side, tokenID: request.tokenId, amount, price });
        raw = await this.api.postOrder(signed, OrderType.FOK);
      } else {
        if (request.price === null) {
          throw new ExchangeError(`Limit order ${request.clientOrderId} has no price`, "INVALID_ORDER");
        }
        const signed = await this.api.createOrder({
          side,
          tokenID: request.tokenId,
          price: request.price,
          size: request.size,
        });
        raw = await this.api.postOrder(signed, OrderType.GTC);
      }
    } catch (err) {
      throw toExchangeError(err);
    }

    const response = parsePostOrderResponse(raw);
    // BUY: making = USDC, taking = shares. SELL: the reverse.
    const shares = request.side === "BUY" ? response.takingAmount : response.makingAmount;
    const usdc = request.side === "BUY" ? response.makingAmount : response.takingAmount;
    const matched = response.status === "matched";
    const filledSize = matched ? Math.min(shares > 0 ? shares : request.size, request.size) : 0;
    const avgFillPrice = filledSize > 0 ? (shares > 0 && usdc > 0 ? usdc / shares : request.price) : null;

    let status: ExchangeOrderStatus;
    if (matched) status = filledSize >= request.size ? "FILLED" : "PARTIAL";
    else if (response.status === "delayed") status = "OPEN";
    else if (response.status === "unmatched" || fillOrKill) status = "CANCELLED";
    else status = "OPEN";

    this.logger.debug(
      `[ClobExchange] ${request.clientOrderId} -> ${response.orderId} ${response.status} (${filledSize.toFixed(2)}/${request.size.toFixed(2)})`,
    );
    return { exchangeOrderId: response.orderId, status, filledSize, avgFillPrice };
  }

  async cancelOrder(exchangeOrderId: string): Promise<void> {
    let raw: unknown;
    try {
      raw = await this.api.cancelOrder({ orderID: exchangeOrderId });
    } catch (err) {
      throw toExchangeError(err);
    }
    if (typeof raw === "object" && raw !== null) {
      const error = field(raw, "error");
      if (typeof error === "string" && error !== "") {
        const status = field(raw, "status");
        throw toExchangeError(Object.assign(new Error(error), { status: typeof status === "number" ? status : undefined }));
      }
    }
  }

  async pollFill(exchangeOrderId: string): Promise<FillStatus> {
    try {
      const order = await this.api.getOrder(exchangeOrderId);
      const filled = toNumber(order.size_matched);
      const original = toNumber(order.original_size);
      return {
        exchangeOrderId,
        status: normalizeOrderStatus(order.status, filled, original),
        filledSize: filled,
        avgFillPrice: filled > 0 ? toNumber(order.price) : null,
      };
    } catch (err) {
      throw toExchangeError(err);
    }
  }

  private async bestPrice(request: SubmitOrderRequest): Promise<number> {
    const book = await this.fetchOrderBook(request.tokenId);
    const level = request.side === "BUY" ? book.asks[0] : book.bids[0];
    if (!level) throw new ExchangeError(`No ${request.side === "BUY" ? "asks" : "bids"} for ${request.tokenId}`, "INVALID_MARKET");
    return level.price;
  }
}
