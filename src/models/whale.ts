/**
 * Whale Model - Tracked traders and the trade events they emit
 */

import type { OrderSide } from "./order";

/**
 * A trade made by a tracked whale, as delivered by the signal feed
 */
export interface WhaleTradeEvent {
  whaleAddress: string;
  marketId: string;
  tokenId: string;
  side: OrderSide;
  /** Shares traded */
  size: number;
  price: number;
  timestamp: number;
  /** Dedupe key from the source (transaction hash) */
  sourceId?: string;
}

/**
 * Quality metrics for a whale. Any field may be missing upstream.
 */
export interface WhaleMetrics {
  address: string;
  /** Whale quality score, 0-100 */
  qualityScore?: number;
  sharpe30d?: number;
  sharpe90d?: number;
  /** Current drawdown as a fraction (0.05 = 5%) */
  drawdown?: number;
  /** Historical win rate, 0-1 */
  winRate?: number;
  /** Recent trade returns, oldest first, for per-whale volatility */
  recentReturns?: number[];
}

/**
 * Lookup for whale metrics
 */
export interface WhaleDirectory {
  getMetrics(address: string): WhaleMetrics | undefined;
  list(): WhaleMetrics[];
}
