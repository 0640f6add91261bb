/**
 * Signal Model - Filter pipeline inputs and outcomes
 */

import type { OrderSide } from "./order";
import type { WhaleMetrics, WhaleTradeEvent } from "./whale";
import type { MarketInfo, OrderBookSnapshot } from "./market";

export type FilterStage = "WHALE" | "TRADE" | "PORTFOLIO";

export type RejectionCode =
  | "WHALE_DATA_MISSING"
  | "WHALE_LOW_QUALITY"
  | "WHALE_NEGATIVE_MOMENTUM"
  | "WHALE_IN_DRAWDOWN"
  | "TRADE_TOO_SMALL"
  | "ORDERBOOK_EMPTY"
  | "INSUFFICIENT_DEPTH"
  | "SLIPPAGE_TOO_HIGH"
  | "RESOLUTION_UNKNOWN"
  | "RESOLUTION_TOO_FAR"
  | "MARKET_RESOLVED"
  | "EDGE_TOO_LOW"
  | "CORRELATION_TOO_HIGH"
  | "EXPOSURE_LIMIT"
  | "SECTOR_LIMIT";

export interface FilterRejection {
  stage: FilterStage;
  code: RejectionCode;
  reason: string;
}

/**
 * Everything the pipeline needs to evaluate one whale trade
 */
export interface SignalContext {
  event: WhaleTradeEvent;
  whale: WhaleMetrics | undefined;
  market: MarketInfo;
  book: OrderBookSnapshot | undefined;
  now: number;
}

/**
 * Portfolio state the fit gate checks against
 */
export interface PortfolioView {
  navUsd: number;
  openExposureUsd: number;
  exposureByCategory: ReadonlyMap<string, number>;
  openPositions: ReadonlyArray<{ category: string | null; resolvesAt: number | null }>;
}

/**
 * A whale trade that passed all three gates
 */
export interface TradeIntent {
  event: WhaleTradeEvent;
  whale: WhaleMetrics;
  market: MarketInfo;
  side: OrderSide;
  /** Price the copy would trade at (book VWAP) */
  price: number;
  midPrice: number;
  notionalUsd: number;
  slippage: number;
  edge: number;
  /** Blended whale win rate used for sizing */
  winRate: number;
  qualityScore: number;
  /** Highest correlation with an open position */
  portfolioCorrelation: number;
}

export type FilterResult =
  | { passed: true; intent: TradeIntent }
  | { passed: false; rejection: FilterRejection };
