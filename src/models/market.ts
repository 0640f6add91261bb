/**
 * Market Model - Order book snapshots and market metadata
 */

export interface OrderBookLevel {
  price: number;
  size: number;
}

/**
 * Bids sorted best (highest) first, asks best (lowest) first
 */
export interface OrderBookSnapshot {
  tokenId: string;
  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
  fetchedAt: number;
}

/**
 * Market metadata needed by the trade and portfolio gates
 */
export interface MarketInfo {
  marketId: string;
  category: string | null;
  /** Resolution time (epoch ms) */
  resolvesAt: number | null;
}
