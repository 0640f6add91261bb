/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when required environment variables are missing or invalid
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Exchange error codes. Transient codes are retried, terminal codes are not.
 */
export type ExchangeErrorCode =
  | "CONNECTION"
  | "TIMEOUT"
  | "RATE_LIMITED"
  | "UNAVAILABLE"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_MARKET"
  | "PRICE_OUT_OF_BOUNDS"
  | "INVALID_ORDER"
  | "AUTH_FAILED"
  | "UNKNOWN";

export const TRANSIENT_EXCHANGE_CODES: ReadonlySet<ExchangeErrorCode> = new Set([
  "CONNECTION",
  "TIMEOUT",
  "RATE_LIMITED",
  "UNAVAILABLE",
]);

/**
 * Exchange error - thrown by exchange clients for submit/cancel/poll failures
 */
export class ExchangeError extends AppError {
  public readonly transient: boolean;

  constructor(
    message: string,
    public readonly exchangeCode: ExchangeErrorCode,
    public readonly retryAfterMs?: number,
    cause?: Error,
  ) {
    super(message, `EXCHANGE_${exchangeCode}`, cause);
    this.transient = TRANSIENT_EXCHANGE_CODES.has(exchangeCode);
  }
}

/**
 * Our own deadline expired while the exchange call was still in flight.
 * The call is not aborted, so its outcome is unknown.
 */
export class DeadlineExceededError extends ExchangeError {
  constructor(
    public readonly label: string,
    public readonly deadlineMs: number,
  ) {
    super(`${label} exceeded ${deadlineMs}ms deadline`, "TIMEOUT");
  }
}

/**
 * Data integrity error - a write was rejected at the persistence boundary
 */
export class DataIntegrityError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "DATA_INTEGRITY", cause);
  }
}

/**
 * Duplicate idempotency key - an insert collided with an existing order
 */
export class DuplicateIdempotencyKeyError extends DataIntegrityError {
  constructor(
    public readonly idempotencyKey: string,
    cause?: Error,
  ) {
    super(`Duplicate idempotency key: ${idempotencyKey}`, cause);
  }
}

/**
 * Invalid state transition attempted on an order
 */
export class InvalidTransitionError extends DataIntegrityError {
  constructor(
    public readonly orderId: string,
    public readonly fromState: string,
    public readonly toState: string,
  ) {
    super(`Invalid transition ${fromState} -> ${toState} for order ${orderId}`);
  }
}

export class OrderNotFoundError extends AppError {
  constructor(public readonly orderId: string) {
    super(`Order not found: ${orderId}`, "ORDER_NOT_FOUND");
  }
}

export class PositionNotFoundError extends AppError {
  constructor(public readonly positionId: string) {
    super(`Position not found: ${positionId}`, "POSITION_NOT_FOUND");
  }
}
