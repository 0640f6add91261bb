/**
 * Service Interfaces
 *
 * Capabilities the core pipeline depends on. The core never talks to the
 * exchange or the data APIs directly; it goes through these so the live
 * adapters, the dry-run simulator and test fakes are interchangeable.
 *
 * - ExchangeClient: order book snapshots, submit/cancel, fill polling
 * - MarketCatalog: market metadata (category, resolution time)
 * - HttpGetter: the slice of axios the REST feeds use
 */

import type { OrderSide, OrderType } from "../models/order";
import type { MarketInfo, OrderBookSnapshot } from "../models/market";

// ═══════════════════════════════════════════════════════════════════════════
// Exchange
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Exchange-side order status, normalized across adapters
 */
export type ExchangeOrderStatus = "OPEN" | "PARTIAL" | "FILLED" | "CANCELLED";

export interface SubmitOrderRequest {
  /** Our idempotency key, passed through for exchange-side dedupe where supported */
  clientOrderId: string;
  tokenId: string;
  side: OrderSide;
  /** Shares */
  size: number;
  /** Limit price; null lets the adapter take the book */
  price: number | null;
  orderType: OrderType;
}

export interface SubmitOrderResult {
  exchangeOrderId: string;
  status: ExchangeOrderStatus;
  /** Cumulative shares filled at acknowledgement */
  filledSize: number;
  avgFillPrice: number | null;
}

/**
 * Cumulative fill state of one exchange order
 */
export interface FillStatus {
  exchangeOrderId: string;
  status: ExchangeOrderStatus;
  filledSize: number;
  avgFillPrice: number | null;
}

/**
 * Failures are thrown as ExchangeError with a transient or terminal code.
 */
export interface ExchangeClient {
  submitOrder(request: SubmitOrderRequest): Promise<SubmitOrderResult>;
  cancelOrder(exchangeOrderId: string): Promise<void>;
  fetchOrderBook(tokenId: string): Promise<OrderBookSnapshot>;
  pollFill(exchangeOrderId: string): Promise<FillStatus>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Market metadata
// ═══════════════════════════════════════════════════════════════════════════

export interface MarketCatalog {
  getMarketInfo(marketId: string, tokenId: string): Promise<MarketInfo>;
}

// ═══════════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Satisfied by an axios instance. Response bodies are validated by the caller.
 */
export interface HttpGetter {
  get(url: string, config?: { params?: Record<string, string | number>; timeout?: number }): Promise<{ data: unknown }>;
}
