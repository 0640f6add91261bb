/**
 * Configuration Index - Re-exports all configuration utilities and types
 *
 * - env.ts: Environment variable parsing helpers
 * - schema.ts: Configuration type definitions
 * - presets.ts: Risk presets
 * - loadConfig.ts: Defaults and the env loader
 */

export { envBool, envEnum, envList, envNum, envOptional, envStr, read } from "./env";
export type { EnvSource } from "./env";

export type {
  AuthConfig,
  EngineConfig,
  ExecutionConfig,
  ExitTrigger,
  FeedsConfig,
  FilterConfig,
  LedgerConfig,
  LogLevel,
  QuarantinePolicy,
  RiskConfig,
  SizingConfig,
} from "./schema";

export { DEFAULT_PRESET, RISK_PRESETS } from "./presets";

export {
  DEFAULT_EXECUTION_CONFIG,
  DEFAULT_EXIT_PRIORITY,
  DEFAULT_FILTER_CONFIG,
  DEFAULT_LEDGER_CONFIG,
  DEFAULT_RISK_CONFIG,
  DEFAULT_SIZING_CONFIG,
  loadEngineConfig,
  parseExitPriority,
} from "./loadConfig";
