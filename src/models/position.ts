/**
 * Position Model - Copied market exposure and its update history
 *
 * Prices are probabilities of the token's outcome. A YES position is long the
 * token; a NO position is short it, so its P&L moves against the price.
 */

export type PositionSide = "YES" | "NO";

export type PositionStatus = "OPEN" | "CLOSING" | "CLOSED" | "ARCHIVED";

export type CloseReason =
  | "STOP_LOSS"
  | "TAKE_PROFIT"
  | "MANUAL"
  | "WHALE_EXIT"
  | "PRE_RESOLUTION";

export type PositionUpdateType =
  | "PRICE_UPDATE"
  | "SIZE_INCREASE"
  | "SIZE_DECREASE"
  | "PARTIAL_CLOSE"
  | "FULL_CLOSE"
  | "STOP_LOSS_HIT"
  | "TAKE_PROFIT_HIT"
  | "MANUAL_ADJUSTMENT";

export const MIN_PRICE = 0.01;
export const MAX_PRICE = 0.99;

export interface Position {
  positionId: string;
  whaleAddress: string;
  tokenId: string;
  marketId: string;
  side: PositionSide;

  /** Category used for sector exposure and correlation */
  category: string | null;
  /** Market resolution time (epoch ms), when known */
  resolvesAt: number | null;

  entrySize: number;
  entryPrice: number;
  /** USD paid on entry */
  entryAmount: number;

  currentSize: number;
  currentPrice: number;
  /** currentSize * currentPrice */
  marketValue: number;

  unrealizedPnl: number;
  realizedPnl: number;
  /** Derived: unrealizedPnl + realizedPnl */
  readonly totalPnl: number;
  /** Derived: totalPnl / entryAmount * 100, or 0 */
  readonly pnlPercentage: number;

  /** Deepest unrealized loss seen, as a positive USD amount */
  maxDrawdown: number;
  /** Highest unrealized profit seen */
  maxProfit: number;

  stopLossPrice: number | null;
  takeProfitPrice: number | null;
  kellyFraction: number;
  edge: number;
  winRate: number;

  status: PositionStatus;
  /** Source whale has exited this market */
  whaleExited: boolean;

  openedAt: number;
  lastUpdatedAt: number;
  closedAt: number | null;
  closeReason: CloseReason | null;
}

/**
 * Position fields that are stored; the derived P&L fields are excluded
 */
export type PositionRecord = Omit<Position, "totalPnl" | "pnlPercentage">;

/**
 * Immutable snapshot written on every position mutation
 */
export interface PositionUpdate {
  id: number;
  positionId: string;
  updateType: PositionUpdateType;
  oldSize: number;
  newSize: number;
  oldPrice: number;
  newPrice: number;
  oldMarketValue: number;
  newMarketValue: number;
  oldUnrealizedPnl: number;
  newUnrealizedPnl: number;
  timestamp: number;
  reason: string;
  metadata: Record<string, unknown>;
}

export function computeTotalPnl(p: Pick<PositionRecord, "unrealizedPnl" | "realizedPnl">): number {
  return p.unrealizedPnl + p.realizedPnl;
}

export function computePnlPercentage(
  p: Pick<PositionRecord, "unrealizedPnl" | "realizedPnl" | "entryAmount">,
): number {
  if (p.entryAmount <= 0) return 0;
  return (computeTotalPnl(p) / p.entryAmount) * 100;
}

/**
 * Attach the derived P&L fields to a stored record
 */
export function withDerivedPnl(record: PositionRecord): Position {
  return {
    ...record,
    totalPnl: computeTotalPnl(record),
    pnlPercentage: computePnlPercentage(record),
  };
}

/**
 * Unrealized P&L, sign-flipped for NO exposure
 */
export function computeUnrealizedPnl(
  side: PositionSide,
  entryPrice: number,
  currentPrice: number,
  size: number,
): number {
  const direction = side === "YES" ? 1 : -1;
  return (currentPrice - entryPrice) * size * direction;
}

export function clampPrice(price: number): number {
  return Math.min(MAX_PRICE, Math.max(MIN_PRICE, price));
}
