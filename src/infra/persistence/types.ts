/**
 * Persistence Types - Row shapes and health reporting
 */

// ============================================================================
// Health Check Types
// ============================================================================

/** Result of a health check */
export interface HealthStatus {
  /** Whether the store is healthy */
  healthy: boolean;

  /** Human-readable status message */
  message: string;

  /** Optional additional details */
  details?: Record<string, unknown>;

  /** Timestamp of the check */
  checkedAt: number;
}

/** Interface for components that support health checks */
export interface HealthCheckable {
  healthCheck(): HealthStatus;
  getName(): string;
}

// ============================================================================
// Row Types (snake_case, as stored)
// ============================================================================

export interface OrderRow {
  order_id: string;
  idempotency_key: string;
  exchange_order_id: string | null;
  token_id: string;
  market_id: string;
  side: string;
  size: number;
  price: number | null;
  order_type: string;
  state: string;
  filled_size: number;
  remaining_size: number;
  avg_fill_price: number | null;
  created_at: number;
  submitted_at: number | null;
  filled_at: number | null;
  confirmed_at: number | null;
  updated_at: number;
  retry_count: number;
  max_retries: number;
  error_message: string | null;
  purpose: string;
  whale_address: string | null;
  position_id: string | null;
  parent_order_id: string | null;
}

export interface OrderTransitionRow {
  id: number;
  order_id: string;
  from_state: string | null;
  to_state: string;
  timestamp: number;
  reason: string;
  metadata: string;
}

export interface PositionRow {
  position_id: string;
  whale_address: string;
  token_id: string;
  market_id: string;
  side: string;
  category: string | null;
  resolves_at: number | null;
  entry_size: number;
  entry_price: number;
  entry_amount: number;
  current_size: number;
  current_price: number;
  market_value: number;
  unrealized_pnl: number;
  realized_pnl: number;
  max_drawdown: number;
  max_profit: number;
  stop_loss_price: number | null;
  take_profit_price: number | null;
  kelly_fraction: number;
  edge: number;
  win_rate: number;
  status: string;
  whale_exited: number;
  opened_at: number;
  last_updated_at: number;
  closed_at: number | null;
  close_reason: string | null;
}

export interface PositionUpdateRow {
  id: number;
  position_id: string;
  update_type: string;
  old_size: number;
  new_size: number;
  old_price: number;
  new_price: number;
  old_market_value: number;
  new_market_value: number;
  old_unrealized_pnl: number;
  new_unrealized_pnl: number;
  timestamp: number;
  reason: string;
  metadata: string;
}
