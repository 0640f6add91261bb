/**
 * Order Model - Exchange orders and their audit transitions
 *
 * An order is created once per idempotency key and driven through the
 * execution state machine by the OrderExecutor alone.
 */

/**
 * Order side - whether buying or selling the token
 */
export type OrderSide = "BUY" | "SELL";

/**
 * Order type for execution strategy
 */
export type OrderType = "LIMIT" | "MARKET" | "FOK" | "GTC";

export const ORDER_STATES = [
  "PENDING",
  "SUBMITTED",
  "PARTIALLY_FILLED",
  "FILLED",
  "CONFIRMED",
  "CANCELLED",
  "FAILED",
  "DEAD_LETTER",
] as const;

export type OrderState = (typeof ORDER_STATES)[number];

/**
 * Why the order exists: opening a copied position or closing one
 */
export type OrderPurpose = "OPEN" | "CLOSE";

export interface Order {
  /** System-generated id */
  orderId: string;

  /** Caller-supplied key; unique for the lifetime of the system */
  idempotencyKey: string;

  /** Assigned once the exchange accepts the order */
  exchangeOrderId: string | null;

  tokenId: string;
  marketId: string;
  side: OrderSide;

  /** Requested size in shares */
  size: number;

  /** Limit price; null for market orders */
  price: number | null;

  orderType: OrderType;
  state: OrderState;

  filledSize: number;
  /** Always size - filledSize */
  remainingSize: number;
  avgFillPrice: number | null;

  createdAt: number;
  submittedAt: number | null;
  filledAt: number | null;
  confirmedAt: number | null;
  updatedAt: number;

  retryCount: number;
  maxRetries: number;
  errorMessage: string | null;

  purpose: OrderPurpose;
  whaleAddress: string | null;
  /** Position this order closes, for CLOSE orders */
  positionId: string | null;
  /** Set on child orders that retry an under-filled remainder */
  parentOrderId: string | null;
}

/**
 * Immutable audit record written on every state change
 */
export interface OrderTransition {
  id: number;
  orderId: string;
  /** null for the creation record */
  fromState: OrderState | null;
  toState: OrderState;
  timestamp: number;
  reason: string;
  metadata: Record<string, unknown>;
}

/**
 * Everything the executor needs to create an order
 */
export interface OrderIntent {
  idempotencyKey: string;
  tokenId: string;
  marketId: string;
  side: OrderSide;
  size: number;
  price?: number;
  orderType: OrderType;
  maxRetries?: number;
  purpose: OrderPurpose;
  whaleAddress?: string;
  positionId?: string;
  parentOrderId?: string;
}
