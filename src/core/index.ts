/**
 * Core Module Index
 *
 * The copy-trading pipeline:
 * - SignalFilterPipeline: whale, trade and portfolio gates (signal-filter.ts)
 * - PositionSizer: adaptive Kelly sizing (position-sizer.ts)
 * - RiskManager: circuit breakers, limits, quarantine (risk-manager.ts)
 * - OrderExecutor: idempotent order state machine (order-executor.ts)
 * - PositionLedger: positions, P&L and exit triggers (position-ledger.ts)
 * - AuditTrail: append-only history (audit-trail.ts)
 * - CopyTradingEngine: wires the above together (copy-trading-engine.ts)
 */

export {
  AuditTrail,
  type AuditInconsistency,
  type FillSource,
  type NewOrderTransition,
  type NewPositionUpdate,
  type OrderFillRecord,
} from "./audit-trail";

export {
  SignalFilterPipeline,
  estimateCorrelation,
  estimateEdge,
  type PipelineStats,
} from "./signal-filter";

export {
  PositionSizer,
  computeKellyFraction,
  type SizingBreakdown,
  type SizingDecision,
  type SizingInput,
} from "./position-sizer";

export {
  RiskManager,
  checkRiskLimits,
  tradingDayOf,
  type ExposureSource,
  type QuarantineAction,
  type QuarantineResult,
  type RiskManagerOptions,
} from "./risk-manager";

export {
  allowedTransitions,
  assertTransition,
  canTransition,
  isLive,
  isSettled,
  isTerminal,
  isValidPath,
} from "./order-state-machine";

export { NO_RETRY, createRetryPolicy, exponentialBackoff, type RetryPolicy } from "./retry-policy";

export { FillEventBus, type FillEvent, type FillHandler, type ReleaseListener } from "./fill-events";

export {
  OrderExecutor,
  incrementalFillPrice,
  validateIntent,
  type DeadLetterEntry,
  type ExecutionListener,
  type ExecutorStats,
  type FillDelta,
  type OrderExecutorOptions,
  type RecoveryResult,
  type SweepResult,
} from "./order-executor";

export {
  PositionLedger,
  defaultExitLevels,
  evaluateExitTriggers,
  type ExitSignal,
  type OpenPositionParams,
  type PositionLedgerOptions,
  type PriceUpdateResult,
} from "./position-ledger";

export {
  PortfolioReporter,
  type ActionItem,
  type ExposureSummary,
  type LimitCheck,
  type PerformanceSummary,
  type StatusCount,
} from "./reporting";

export {
  CopyTradingEngine,
  closingSideFor,
  copyOrderKey,
  positionSideFor,
  type CopyTradingEngineDeps,
  type ExitOutcome,
  type TradeOutcome,
  type TradeOutcomeStatus,
} from "./copy-trading-engine";
