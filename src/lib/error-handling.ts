/**
 * Error classification for exchange and feed failures
 *
 * Error Taxonomy:
 * - CONNECTION: socket reset/refused, DNS failure
 * - TIMEOUT: request or submission deadline expired
 * - RATE_LIMITED: HTTP 429 or "too many requests"
 * - UNAVAILABLE: HTTP 5xx, exchange temporarily down
 * - INSUFFICIENT_BALANCE: not enough USDC balance or allowance
 * - INVALID_MARKET: market closed, resolved, or no orderbook
 * - PRICE_OUT_OF_BOUNDS: price outside the tradable range
 * - INVALID_ORDER: order rejected for shape (size, tick, min order)
 * - AUTH_FAILED: credentials rejected
 * - UNKNOWN: unclassified, treated as terminal
 */

import axios from "axios";
import {
  ExchangeError,
  TRANSIENT_EXCHANGE_CODES,
  type ExchangeErrorCode,
} from "../errors/app.errors";

/**
 * Classified error information
 */
export interface ClassifiedError {
  code: ExchangeErrorCode;
  message: string;
  transient: boolean;
  retryAfterMs?: number;
}

/**
 * Safely convert an unknown error to a string. Never throws.
 */
export function safeErrorToString(error: unknown): string {
  if (error === null || error === undefined) return "";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Redact obvious credentials in plain text strings (best-effort).
 */
export function redactSecrets(message: string): string {
  const patterns: RegExp[] = [
    /(Authorization)\s*:\s*([^\r\n]+)/gi,
    /\b(api[-_\s]*key)\s*[:=]\s*([^\s&"']+)/gi,
    /\b(secret|passphrase|private[-_]?key)\s*[:=]\s*([^\s&"']+)/gi,
    /\b(POLY_SIGNATURE|POLY_API_KEY|POLY_PASSPHRASE)\s*[:=]\s*([^\s&"']+)/gi,
  ];

  let result = message;
  for (const pattern of patterns) {
    result = result.replace(pattern, (_match, p1: string) => `${p1}: [REDACTED]`);
  }
  // Bare 32-byte hex keys
  return result.replace(/0x[a-fA-F0-9]{64}\b/g, "0x[REDACTED]");
}

function classified(code: ExchangeErrorCode, message: string, retryAfterMs?: number): ClassifiedError {
  return {
    code,
    message,
    transient: TRANSIENT_EXCHANGE_CODES.has(code),
    retryAfterMs,
  };
}

function httpStatusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) return error.response?.status;
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Classify any thrown value into transient vs terminal.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ExchangeError) {
    return {
      code: error.exchangeCode,
      message: error.message,
      transient: error.transient,
      retryAfterMs: error.retryAfterMs,
    };
  }

  const raw = redactSecrets(safeErrorToString(error));
  const lower = raw.toLowerCase();
  const status = httpStatusOf(error);

  if (status === 429 || lower.includes("rate limit") || lower.includes("too many requests")) {
    return classified("RATE_LIMITED", raw || "Rate limited", 2000);
  }

  if (
    lower.includes("not enough balance") ||
    lower.includes("insufficient balance") ||
    lower.includes("not enough allowance") ||
    lower.includes("insufficient allowance") ||
    lower.includes("balance too low")
  ) {
    return classified("INSUFFICIENT_BALANCE", raw);
  }

  if (
    lower.includes("market not found") ||
    lower.includes("invalid market") ||
    lower.includes("market closed") ||
    lower.includes("market is closed") ||
    lower.includes("market resolved") ||
    lower.includes("no orderbook") ||
    lower.includes("orderbook not found")
  ) {
    return classified("INVALID_MARKET", raw);
  }

  if (
    lower.includes("price out of range") ||
    lower.includes("price out of bounds") ||
    lower.includes("outside price bounds") ||
    lower.includes("invalid price")
  ) {
    return classified("PRICE_OUT_OF_BOUNDS", raw);
  }

  if (status === 401 || status === 403 || lower.includes("unauthorized") || lower.includes("invalid api key")) {
    return classified("AUTH_FAILED", raw);
  }

  if (lower.includes("timeout") || lower.includes("etimedout") || lower.includes("timed out")) {
    return classified("TIMEOUT", raw);
  }

  if (
    lower.includes("econnreset") ||
    lower.includes("econnrefused") ||
    lower.includes("enotfound") ||
    lower.includes("socket hang up") ||
    lower.includes("network error") ||
    lower.includes("fetch failed")
  ) {
    return classified("CONNECTION", raw);
  }

  if (status !== undefined && status >= 500) {
    return classified("UNAVAILABLE", raw || `HTTP ${status}`);
  }

  if (status !== undefined && status >= 400) {
    return classified("INVALID_ORDER", raw || `HTTP ${status}`);
  }

  return classified("UNKNOWN", raw || "Unknown error");
}

/**
 * Wrap any thrown value as an ExchangeError.
 */
export function toExchangeError(error: unknown): ExchangeError {
  if (error instanceof ExchangeError) return error;
  const info = classifyError(error);
  return new ExchangeError(
    info.message,
    info.code,
    info.retryAfterMs,
    error instanceof Error ? error : undefined,
  );
}

export function isTransient(error: unknown): boolean {
  return classifyError(error).transient;
}
