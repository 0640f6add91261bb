/**
 * Models Index - Re-exports all domain model types
 */

export type {
  Order,
  OrderIntent,
  OrderPurpose,
  OrderSide,
  OrderState,
  OrderTransition,
  OrderType,
} from "./order";
export { ORDER_STATES } from "./order";

export type {
  CloseReason,
  Position,
  PositionRecord,
  PositionSide,
  PositionStatus,
  PositionUpdate,
  PositionUpdateType,
} from "./position";
export {
  MAX_PRICE,
  MIN_PRICE,
  clampPrice,
  computePnlPercentage,
  computeTotalPnl,
  computeUnrealizedPnl,
  withDerivedPnl,
} from "./position";

export type { WhaleDirectory, WhaleMetrics, WhaleTradeEvent } from "./whale";
export type { MarketInfo, OrderBookLevel, OrderBookSnapshot } from "./market";
export type {
  FilterRejection,
  FilterResult,
  FilterStage,
  PortfolioView,
  RejectionCode,
  SignalContext,
  TradeIntent,
} from "./signal";
export type {
  CircuitBreakerLevel,
  QuarantineEntry,
  RiskCheckRequest,
  RiskDecision,
  RiskEvent,
  RiskEventType,
  RiskSnapshot,
  RiskState,
} from "./risk";
export type { Clock, Preset, Result } from "./common";
export { systemClock } from "./common";
