/**
 * Logging Infrastructure
 *
 * Shared logger helpers and number formatting for log lines.
 */

import type { Logger } from "../../utils/logger.util";

export type { Logger } from "../../utils/logger.util";
export { ConsoleLogger } from "../../utils/logger.util";

/**
 * Create a no-op logger that discards all output
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Wrap a logger so every line carries a bracketed component tag
 */
export function withPrefix(logger: Logger, prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug: (msg) => logger.debug(`${tag} ${msg}`),
    info: (msg) => logger.info(`${tag} ${msg}`),
    warn: (msg) => logger.warn(`${tag} ${msg}`),
    error: (msg, err) => logger.error(`${tag} ${msg}`, err),
  };
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * Signed USD amount, e.g. "+$12.50" or "-$3.00"
 */
export function formatPnl(amount: number): string {
  const sign = amount >= 0 ? "+" : "-";
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

export function formatPct(fraction: number, digits = 2): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else if (ms < 3600000) {
    const mins = Math.floor(ms / 60000);
    const secs = Math.floor((ms % 60000) / 1000);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(ms / 3600000);
  const mins = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${mins}m`;
}
