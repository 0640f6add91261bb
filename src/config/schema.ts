/**
 * Configuration Schema
 *
 * Type definitions for the engine configuration.
 */

import type { Preset } from "../models/common";

/**
 * Exit triggers in the order the ledger evaluates them
 */
export type ExitTrigger = "STOP_LOSS" | "TAKE_PROFIT" | "PRE_RESOLUTION" | "WHALE_EXIT";

/**
 * What happens to open positions when their whale is quarantined
 */
export type QuarantinePolicy = "HOLD" | "LIQUIDATE";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Three-stage signal gate thresholds
 */
export interface FilterConfig {
  /** Minimum whale quality score, 0-100 (default: 75) */
  minQualityScore: number;
  /** Whale drawdown at or above this rejects (default: 0.25) */
  maxWhaleDrawdown: number;
  /** Minimum whale trade notional in USD (default: 5000) */
  minNotionalUsd: number;
  /** Maximum VWAP slippage vs mid (default: 0.01) */
  maxSlippage: number;
  /** Maximum days until market resolution (default: 90) */
  maxDaysToResolution: number;
  /** Minimum estimated edge (default: 0.03) */
  minEdge: number;
  /** Correlation at or above this rejects (default: 0.4) */
  maxCorrelation: number;
  /** Projected exposure cap as a fraction of NAV (default: 0.95) */
  maxTotalExposurePct: number;
  /** Projected category exposure cap as a fraction of NAV (default: 0.30) */
  maxSectorExposurePct: number;
  /** Copy notional assumed for projections, as a fraction of NAV (default: 0.08) */
  projectedCopyFraction: number;
  /** Correlation assumed between positions in the same category (default: 0.6) */
  sameCategoryCorrelation: number;
  /** Correlation assumed across categories (default: 0.1) */
  crossCategoryCorrelation: number;
}

/**
 * Adaptive Kelly sizing constants
 */
export interface SizingConfig {
  /** Fractional Kelly multiplier (default: 0.5) */
  kellyMultiplier: number;
  /** Hard cap on the final fraction of NAV (default: 0.08) */
  maxFraction: number;
  /** Weight of the whale win rate in the blended probability (default: 0.7) */
  whaleWeight: number;
  /** EWMA decay (default: 0.94) */
  ewmaLambda: number;
  /** Volatility assumed with no return history (default: 0.1) */
  defaultVolatility: number;
  /** Orders below this USD value are not placed (default: 1) */
  minOrderUsd: number;
}

/**
 * Circuit breakers, hard limits and whale quarantine
 */
export interface RiskConfig {
  /** Absolute daily loss that halts trading */
  dailyLossLimitUsd: number;
  /** Daily loss as a fraction of NAV that halts trading */
  dailyLossLimitPct: number;
  /** Daily realized loss from a single whale that halts trading */
  perWhaleDailyLossUsd: number;
  /** Drawdown from peak that switches to REDUCE */
  drawdownReducePct: number;
  /** Size multiplier under REDUCE (default: 0.5) */
  reduceMultiplier: number;
  /** Consecutive losing closes that trigger PAUSE */
  maxConsecutiveLosses: number;
  /** PAUSE duration in minutes */
  pauseMinutes: number;
  maxPositionUsd: number;
  maxMarketExposureUsd: number;
  maxWhaleExposureUsd: number;
  /** Total allocation cap as a fraction of NAV */
  maxTotalAllocationPct: number;
  quarantineScoreBelow: number;
  quarantineDrawdownAbove: number;
  quarantineScoreDrop: number;
  scoreDropWindowDays: number;
  releaseScoreAbove: number;
  releaseCleanDays: number;
  quarantinePolicy: QuarantinePolicy;
  /** If this file exists, every intent is vetoed */
  killSwitchFile: string;
}

/**
 * Order execution timing and retry policy
 */
export interface ExecutionConfig {
  /** Retries on transient errors (default: 3) */
  maxRetries: number;
  /** First backoff delay; doubles per attempt (default: 1000) */
  backoffBaseMs: number;
  /** Deadline for one submission attempt and for PENDING orders (default: 5000) */
  submitDeadlineMs: number;
  /** Extra wait on a submit that missed its deadline before it is parked (default: 10000) */
  submitReconcileMs: number;
  /** SUBMITTED orders unfilled after this are cancelled (default: 30000) */
  fillDeadlineMs: number;
  /** Fill ratio at which a partial fill is accepted (default: 0.8) */
  partialFillAcceptRatio: number;
  /** REST fill polling interval (default: 2000) */
  pollIntervalMs: number;
  /** Stale order sweep interval (default: 1000) */
  sweepIntervalMs: number;
}

export interface LedgerConfig {
  exitPriority: ExitTrigger[];
  /** Close positions this close to resolution (default: 24h) */
  preResolutionWindowMs: number;
  /** CLOSED positions older than this are archived (default: 30 days) */
  archiveAfterMs: number;
  /** Stop distance as a fraction of entry price (default: 0.15) */
  stopLossPct: number;
  /** Take-profit distance as a fraction of entry price (default: 0.30) */
  takeProfitPct: number;
  /** Pre-trade limit check: max open positions (default: 50) */
  maxOpenPositions: number;
  /** Pre-trade limit check: max total exposure in USD (default: 50000) */
  maxTotalExposureUsd: number;
}

export interface FeedsConfig {
  clobHost: string;
  dataApiHost: string;
  gammaApiHost: string;
  wsUserUrl: string;
  whaleAddresses: string[];
  /** JSON file of whale quality metrics */
  whaleMetricsFile: string;
  whalePollIntervalMs: number;
  pricePollIntervalMs: number;
}

export interface AuthConfig {
  /** Live trading enabled; otherwise a simulated exchange is used */
  armed: boolean;
  rpcUrl: string;
  privateKey?: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
}

export interface EngineConfig {
  preset: Preset;
  logLevel: LogLevel;
  /** Starting net asset value in USD */
  navUsd: number;
  databasePath: string;
  filter: FilterConfig;
  sizing: SizingConfig;
  risk: RiskConfig;
  execution: ExecutionConfig;
  ledger: LedgerConfig;
  feeds: FeedsConfig;
  auth: AuthConfig;
}
