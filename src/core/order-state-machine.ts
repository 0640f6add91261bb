/**
 * Order state machine
 *
 *   PENDING ──► SUBMITTED ──► FILLED ───────────► CONFIRMED
 *      │            │    └──► PARTIALLY_FILLED ──► CONFIRMED / FILLED
 *      │            └──► CANCELLED ◄───────────────┘
 *      └──► FAILED ──► DEAD_LETTER
 *
 * CONFIRMED, CANCELLED and DEAD_LETTER are terminal. FAILED only moves on to
 * DEAD_LETTER, when retries were exhausted or the outcome is unknown.
 */

import { InvalidTransitionError } from "../errors/app.errors";
import type { OrderState } from "../models/order";

const TRANSITIONS: Readonly<Record<OrderState, readonly OrderState[]>> = {
  PENDING: ["SUBMITTED", "FAILED"],
  SUBMITTED: ["FILLED", "PARTIALLY_FILLED", "CANCELLED"],
  PARTIALLY_FILLED: ["FILLED", "CONFIRMED", "CANCELLED"],
  FILLED: ["CONFIRMED"],
  CONFIRMED: [],
  CANCELLED: [],
  FAILED: ["DEAD_LETTER"],
  DEAD_LETTER: [],
};

const TERMINAL: ReadonlySet<OrderState> = new Set(["CONFIRMED", "CANCELLED", "DEAD_LETTER"]);

/** States in which the order may still receive fills */
const LIVE: ReadonlySet<OrderState> = new Set(["SUBMITTED", "PARTIALLY_FILLED"]);

export function canTransition(from: OrderState, to: OrderState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(orderId: string, from: OrderState, to: OrderState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(orderId, from, to);
  }
}

export function allowedTransitions(from: OrderState): readonly OrderState[] {
  return TRANSITIONS[from];
}

export function isTerminal(state: OrderState): boolean {
  return TERMINAL.has(state);
}

export function isLive(state: OrderState): boolean {
  return LIVE.has(state);
}

/**
 * Settled orders need no further work from the executor: terminal states
 * plus FAILED orders that were not sent to the dead-letter queue.
 */
export function isSettled(state: OrderState): boolean {
  return TERMINAL.has(state) || state === "FAILED";
}

/**
 * Check that a sequence of states only uses allowed transitions
 */
export function isValidPath(states: readonly OrderState[]): boolean {
  if (states.length === 0 || states[0] !== "PENDING") return false;
  for (let i = 1; i < states.length; i++) {
    if (!canTransition(states[i - 1], states[i])) return false;
  }
  return true;
}
