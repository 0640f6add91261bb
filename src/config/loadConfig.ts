import { ConfigurationError } from "../errors/app.errors";
import type { Preset } from "../models/common";
import {
  envBool,
  envEnum,
  envList,
  envNum,
  envOptional,
  envStr,
  type EnvSource,
} from "./env";
import { DEFAULT_PRESET, RISK_PRESETS } from "./presets";
import type {
  EngineConfig,
  ExecutionConfig,
  ExitTrigger,
  FilterConfig,
  LedgerConfig,
  LogLevel,
  RiskConfig,
  SizingConfig,
} from "./schema";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  minQualityScore: 75,
  maxWhaleDrawdown: 0.25,
  minNotionalUsd: 5000,
  maxSlippage: 0.01,
  maxDaysToResolution: 90,
  minEdge: 0.03,
  maxCorrelation: 0.4,
  maxTotalExposurePct: 0.95,
  maxSectorExposurePct: 0.3,
  projectedCopyFraction: 0.08,
  sameCategoryCorrelation: 0.6,
  crossCategoryCorrelation: 0.1,
};

export const DEFAULT_SIZING_CONFIG: SizingConfig = {
  kellyMultiplier: 0.5,
  maxFraction: 0.08,
  whaleWeight: 0.7,
  ewmaLambda: 0.94,
  defaultVolatility: 0.1,
  minOrderUsd: 1,
};

export const DEFAULT_RISK_CONFIG: RiskConfig = {
  ...RISK_PRESETS[DEFAULT_PRESET],
  reduceMultiplier: 0.5,
  quarantineScoreBelow: 50,
  quarantineDrawdownAbove: 0.1,
  quarantineScoreDrop: 25,
  scoreDropWindowDays: 7,
  releaseScoreAbove: 60,
  releaseCleanDays: 7,
  quarantinePolicy: "HOLD",
  killSwitchFile: "",
};

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = {
  maxRetries: 3,
  backoffBaseMs: 1000,
  submitDeadlineMs: 5000,
  submitReconcileMs: 10000,
  fillDeadlineMs: 30000,
  partialFillAcceptRatio: 0.8,
  pollIntervalMs: 2000,
  sweepIntervalMs: 1000,
};

export const DEFAULT_EXIT_PRIORITY: ExitTrigger[] = [
  "STOP_LOSS",
  "TAKE_PROFIT",
  "PRE_RESOLUTION",
  "WHALE_EXIT",
];

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  exitPriority: DEFAULT_EXIT_PRIORITY,
  preResolutionWindowMs: 24 * HOUR_MS,
  archiveAfterMs: 30 * DAY_MS,
  stopLossPct: 0.15,
  takeProfitPct: 0.3,
  maxOpenPositions: 50,
  maxTotalExposureUsd: 50000,
};

const PRESETS: readonly Preset[] = ["conservative", "balanced", "aggressive"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const EXIT_TRIGGERS: readonly ExitTrigger[] = DEFAULT_EXIT_PRIORITY;

function isExitTrigger(value: string): value is ExitTrigger {
  return EXIT_TRIGGERS.some((trigger) => trigger === value);
}

/**
 * Parse EXIT_PRIORITY, e.g. "WHALE_EXIT,STOP_LOSS,TAKE_PROFIT,PRE_RESOLUTION".
 * Triggers left out of the list are disabled.
 */
export function parseExitPriority(raw: string[]): ExitTrigger[] {
  if (raw.length === 0) return [...DEFAULT_EXIT_PRIORITY];
  const result: ExitTrigger[] = [];
  for (const item of raw) {
    const upper = item.toUpperCase();
    if (!isExitTrigger(upper)) {
      throw new ConfigurationError(`EXIT_PRIORITY contains unknown trigger "${item}"`);
    }
    if (!result.includes(upper)) result.push(upper);
  }
  return result;
}

function assertFraction(name: string, value: number): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigurationError(`${name} must be between 0 and 1, got ${value}`);
  }
}

/**
 * Build the engine configuration from the environment.
 * Order: built-in defaults, then RISK_PRESET values, then individual overrides.
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const preset = envEnum("RISK_PRESET", PRESETS, DEFAULT_PRESET, env);
  const presetValues = RISK_PRESETS[preset];

  const risk: RiskConfig = {
    ...DEFAULT_RISK_CONFIG,
    ...presetValues,
    dailyLossLimitUsd: envNum("DAILY_LOSS_LIMIT_USD", presetValues.dailyLossLimitUsd, env),
    dailyLossLimitPct: envNum("DAILY_LOSS_LIMIT_PCT", presetValues.dailyLossLimitPct, env),
    perWhaleDailyLossUsd: envNum("WHALE_DAILY_LOSS_LIMIT_USD", presetValues.perWhaleDailyLossUsd, env),
    drawdownReducePct: envNum("DRAWDOWN_REDUCE_PCT", presetValues.drawdownReducePct, env),
    maxConsecutiveLosses: envNum("MAX_CONSECUTIVE_LOSSES", presetValues.maxConsecutiveLosses, env),
    pauseMinutes: envNum("LOSS_PAUSE_MINUTES", presetValues.pauseMinutes, env),
    maxPositionUsd: envNum("MAX_POSITION_USD", presetValues.maxPositionUsd, env),
    maxMarketExposureUsd: envNum("MAX_MARKET_EXPOSURE_USD", presetValues.maxMarketExposureUsd, env),
    maxWhaleExposureUsd: envNum("MAX_WHALE_EXPOSURE_USD", presetValues.maxWhaleExposureUsd, env),
    maxTotalAllocationPct: envNum("MAX_TOTAL_ALLOCATION_PCT", presetValues.maxTotalAllocationPct, env),
    quarantinePolicy: envEnum("QUARANTINE_POLICY", ["HOLD", "LIQUIDATE"] as const, "HOLD", env),
    killSwitchFile: envStr("KILL_SWITCH_FILE", "", env),
  };

  const filter: FilterConfig = {
    ...DEFAULT_FILTER_CONFIG,
    minQualityScore: envNum("MIN_WHALE_QUALITY", DEFAULT_FILTER_CONFIG.minQualityScore, env),
    minNotionalUsd: envNum("MIN_WHALE_TRADE_USD", DEFAULT_FILTER_CONFIG.minNotionalUsd, env),
    maxSlippage: envNum("MAX_SLIPPAGE", DEFAULT_FILTER_CONFIG.maxSlippage, env),
    minEdge: envNum("MIN_EDGE", DEFAULT_FILTER_CONFIG.minEdge, env),
  };

  const execution: ExecutionConfig = {
    ...DEFAULT_EXECUTION_CONFIG,
    maxRetries: envNum("ORDER_MAX_RETRIES", DEFAULT_EXECUTION_CONFIG.maxRetries, env),
    submitDeadlineMs: envNum("ORDER_SUBMIT_DEADLINE_MS", DEFAULT_EXECUTION_CONFIG.submitDeadlineMs, env),
    submitReconcileMs: envNum("ORDER_SUBMIT_RECONCILE_MS", DEFAULT_EXECUTION_CONFIG.submitReconcileMs, env),
    fillDeadlineMs: envNum("ORDER_FILL_DEADLINE_MS", DEFAULT_EXECUTION_CONFIG.fillDeadlineMs, env),
    pollIntervalMs: envNum("FILL_POLL_INTERVAL_MS", DEFAULT_EXECUTION_CONFIG.pollIntervalMs, env),
  };

  const ledger: LedgerConfig = {
    ...DEFAULT_LEDGER_CONFIG,
    exitPriority: parseExitPriority(envList("EXIT_PRIORITY", env)),
    preResolutionWindowMs: envNum("PRE_RESOLUTION_EXIT_HOURS", 24, env) * HOUR_MS,
    archiveAfterMs: envNum("ARCHIVE_AFTER_DAYS", 30, env) * DAY_MS,
    stopLossPct: envNum("STOP_LOSS_PCT", DEFAULT_LEDGER_CONFIG.stopLossPct, env),
    takeProfitPct: envNum("TAKE_PROFIT_PCT", DEFAULT_LEDGER_CONFIG.takeProfitPct, env),
  };

  assertFraction("DAILY_LOSS_LIMIT_PCT", risk.dailyLossLimitPct);
  assertFraction("DRAWDOWN_REDUCE_PCT", risk.drawdownReducePct);
  assertFraction("MAX_TOTAL_ALLOCATION_PCT", risk.maxTotalAllocationPct);
  assertFraction("MAX_SLIPPAGE", filter.maxSlippage);
  assertFraction("STOP_LOSS_PCT", ledger.stopLossPct);

  const navUsd = envNum("NAV_USD", 10000, env);
  if (navUsd <= 0) {
    throw new ConfigurationError(`NAV_USD must be positive, got ${navUsd}`);
  }

  const armed = envBool("ARMED", false, env);
  const privateKey = envOptional("PRIVATE_KEY", env);
  if (armed && privateKey === undefined) {
    throw new ConfigurationError("ARMED=true requires PRIVATE_KEY");
  }

  return {
    preset,
    logLevel: envEnum("LOG_LEVEL", LOG_LEVELS, "info", env),
    navUsd,
    databasePath: envStr("DATABASE_PATH", "./data/copy-engine.db", env),
    filter,
    sizing: { ...DEFAULT_SIZING_CONFIG },
    risk,
    execution,
    ledger,
    feeds: {
      clobHost: envStr("CLOB_HOST", "https://clob.polymarket.com", env),
      dataApiHost: envStr("DATA_API_HOST", "https://data-api.polymarket.com", env),
      gammaApiHost: envStr("GAMMA_API_HOST", "https://gamma-api.polymarket.com", env),
      wsUserUrl: envStr("WS_USER_URL", "wss://ws-subscriptions-clob.polymarket.com/ws/user", env),
      whaleAddresses: envList("WHALE_ADDRESSES", env).map((address) => address.toLowerCase()),
      whaleMetricsFile: envStr("WHALE_METRICS_FILE", "./data/whales.json", env),
      whalePollIntervalMs: envNum("WHALE_POLL_INTERVAL_MS", 5000, env),
      pricePollIntervalMs: envNum("PRICE_POLL_INTERVAL_MS", 10000, env),
    },
    auth: {
      armed,
      rpcUrl: envStr("RPC_URL", "https://polygon-rpc.com", env),
      privateKey,
      apiKey: envOptional("POLYMARKET_API_KEY", env),
      apiSecret: envOptional("POLYMARKET_API_SECRET", env),
      apiPassphrase: envOptional("POLYMARKET_API_PASSPHRASE", env),
    },
  };
}
