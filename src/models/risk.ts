/**
 * Risk Model - Portfolio risk state and decisions
 */

export type CircuitBreakerLevel = "NORMAL" | "REDUCE" | "PAUSE" | "HALT";

export interface QuarantineEntry {
  whaleAddress: string;
  reason: string;
  quarantinedAt: number;
}

/**
 * Process-wide risk state. Only RiskManager mutates it.
 */
export interface RiskState {
  /** Trading day (UTC, YYYY-MM-DD) the daily counters belong to */
  tradingDay: string;
  /** Realized P&L booked today */
  dailyRealizedPnl: number;
  /** Current unrealized P&L across open positions */
  unrealizedPnl: number;
  /** Realized P&L per whale today */
  dailyPnlByWhale: Map<string, number>;
  navUsd: number;
  peakValueUsd: number;
  openExposureUsd: number;
  exposureByWhale: Map<string, number>;
  exposureByMarket: Map<string, number>;
  exposureByCategory: Map<string, number>;
  breaker: CircuitBreakerLevel;
  breakerReason: string | null;
  breakerTriggeredAt: number | null;
  /** PAUSE lifts at this time */
  pausedUntil: number | null;
  consecutiveLosses: number;
  quarantined: Map<string, QuarantineEntry>;
}

/**
 * Frozen read-only copy of RiskState handed to filters and sizers
 */
export interface RiskSnapshot {
  readonly tradingDay: string;
  readonly dailyPnl: number;
  readonly navUsd: number;
  readonly portfolioValueUsd: number;
  readonly peakValueUsd: number;
  /** Fraction below peak (0.1 = 10%) */
  readonly drawdown: number;
  readonly openExposureUsd: number;
  readonly exposureByWhale: ReadonlyMap<string, number>;
  readonly exposureByMarket: ReadonlyMap<string, number>;
  readonly exposureByCategory: ReadonlyMap<string, number>;
  readonly breaker: CircuitBreakerLevel;
  readonly breakerReason: string | null;
  readonly pausedUntil: number | null;
  readonly consecutiveLosses: number;
  readonly quarantinedWhales: ReadonlySet<string>;
  /** 0.5 under REDUCE, else 1 */
  readonly sizeMultiplier: number;
  readonly takenAt: number;
}

export interface RiskDecision {
  approved: boolean;
  reason: string;
  /** Size after breaker scaling and limit capping, in shares */
  adjustedSize?: number;
  warnings?: string[];
}

/**
 * Order the risk manager is asked to approve
 */
export interface RiskCheckRequest {
  whaleAddress: string;
  tokenId: string;
  marketId: string;
  category: string | null;
  price: number;
  size: number;
}

export type RiskEventType =
  | "BREAKER_TRIPPED"
  | "BREAKER_RESET"
  | "DAY_ROLLOVER"
  | "WHALE_QUARANTINED"
  | "WHALE_RELEASED"
  | "KILL_SWITCH";

export interface RiskEvent {
  type: RiskEventType;
  timestamp: number;
  detail: string;
  whaleAddress?: string;
}
