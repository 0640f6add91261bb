/**
 * Common Models - Shared types used across the application
 */

/**
 * Trading preset levels for risk management
 */
export type Preset = "conservative" | "balanced" | "aggressive";

/**
 * Generic result type for operations that can succeed or fail
 */
export interface Result<T> {
  /** Whether the operation succeeded */
  success: boolean;

  /** The result data (if successful) */
  data?: T;

  /** Error message (if failed) */
  error?: string;
}

/**
 * Injectable wall clock
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
