/**
 * Orderbook Normalization Utilities
 *
 * Polymarket REST /book returns bids ascending and asks descending (worst
 * first). Everything here works on the normalized form:
 * - Bids: sorted DESCENDING (best/highest price first at index 0)
 * - Asks: sorted ASCENDING (best/lowest price first at index 0)
 */

import type { OrderBookLevel, OrderBookSnapshot } from "../models/market";
import type { OrderSide } from "../models/order";

export function sortBidsDescending(bids: OrderBookLevel[]): OrderBookLevel[] {
  return [...bids].sort((a, b) => b.price - a.price);
}

export function sortAsksAscending(asks: OrderBookLevel[]): OrderBookLevel[] {
  return [...asks].sort((a, b) => a.price - b.price);
}

/**
 * Parse raw orderbook levels from API response.
 * Handles string prices/sizes and filters invalid entries.
 */
export function parseRawLevels(
  rawLevels: Array<{ price: string; size: string }> | undefined,
): OrderBookLevel[] {
  if (!rawLevels || !Array.isArray(rawLevels)) {
    return [];
  }

  return rawLevels
    .map((l) => ({
      price: parseFloat(l.price),
      size: parseFloat(l.size),
    }))
    .filter((l) => !isNaN(l.price) && !isNaN(l.size) && l.size > 0);
}

export function normalizeRestOrderbook(
  tokenId: string,
  orderbook: {
    bids?: Array<{ price: string; size: string }>;
    asks?: Array<{ price: string; size: string }>;
  },
  fetchedAt: number = Date.now(),
): OrderBookSnapshot {
  return {
    tokenId,
    bids: sortBidsDescending(parseRawLevels(orderbook.bids)),
    asks: sortAsksAscending(parseRawLevels(orderbook.asks)),
    fetchedAt,
  };
}

/**
 * Mid price, or undefined when either side is empty
 */
export function getMidPrice(book: OrderBookSnapshot): number | undefined {
  const bestBid = book.bids[0];
  const bestAsk = book.asks[0];
  if (!bestBid || !bestAsk) return undefined;
  return (bestBid.price + bestAsk.price) / 2;
}

export type BookWalkResult =
  | { ok: true; vwap: number; mid: number; slippage: number; levelsUsed: number }
  | { ok: false; reason: "EMPTY_BOOK" | "INSUFFICIENT_DEPTH"; availableSize: number };

/**
 * Walk the side of the book a taker order would consume until `size` shares
 * are filled. BUY consumes asks, SELL consumes bids. Slippage is
 * |vwap - mid| / mid.
 */
export function walkBook(book: OrderBookSnapshot, side: OrderSide, size: number): BookWalkResult {
  const mid = getMidPrice(book);
  const levels = side === "BUY" ? book.asks : book.bids;
  if (mid === undefined || levels.length === 0 || mid <= 0) {
    return { ok: false, reason: "EMPTY_BOOK", availableSize: 0 };
  }

  let remaining = size;
  let cost = 0;
  let levelsUsed = 0;
  for (const level of levels) {
    if (remaining <= 0) break;
    const take = Math.min(remaining, level.size);
    cost += take * level.price;
    remaining -= take;
    levelsUsed++;
  }

  if (remaining > 1e-9) {
    return { ok: false, reason: "INSUFFICIENT_DEPTH", availableSize: size - remaining };
  }

  const vwap = cost / size;
  return { ok: true, vwap, mid, slippage: Math.abs(vwap - mid) / mid, levelsUsed };
}
