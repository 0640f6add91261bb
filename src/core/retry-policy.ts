/**
 * Retry policy for exchange calls: exponential backoff on transient errors,
 * no retry on terminal ones.
 */

import type { ExecutionConfig } from "../config/schema";
import { classifyError } from "../lib/error-handling";

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, where `attempt` is 1-based */
  backoffMs(attempt: number, error?: unknown): number;
  isRetryable(error: unknown): boolean;
}

export function exponentialBackoff(baseMs: number, attempt: number): number {
  return baseMs * 2 ** Math.max(0, attempt - 1);
}

/**
 * maxRetries retries after the first attempt, delays base, 2*base, 4*base...
 * A rate-limit hint from the exchange raises the delay, never lowers it.
 */
export function createRetryPolicy(config: Pick<ExecutionConfig, "maxRetries" | "backoffBaseMs">): RetryPolicy {
  return {
    maxAttempts: config.maxRetries + 1,
    backoffMs(attempt: number, error?: unknown): number {
      const backoff = exponentialBackoff(config.backoffBaseMs, attempt);
      if (error === undefined) return backoff;
      const hint = classifyError(error).retryAfterMs;
      return hint !== undefined ? Math.max(backoff, hint) : backoff;
    },
    isRetryable(error: unknown): boolean {
      return classifyError(error).transient;
    },
  };
}

export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  backoffMs: () => 0,
  isRetryable: () => false,
};
