/**
 * Log Deduplication
 *
 * Collapses repeated identical messages within a per-level TTL window.
 * Messages that differ only in timestamps, hex ids or amounts share a key.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogDedupeConfig {
  /** Enable/disable deduplication (default: true) */
  enabled: boolean;
  /** TTL in ms per level */
  ttlMs: Record<LogLevel, number>;
  /** Max cache entries before the oldest are evicted (default: 5000) */
  maxCacheSize: number;
}

interface DedupeEntry {
  firstSeen: number;
  suppressedCount: number;
}

export interface DedupeResult {
  emit: boolean;
  /** e.g. "(repeated 4 times)" when a suppressed window closes */
  suffix?: string;
}

const DEFAULT_DEDUPE_CONFIG: LogDedupeConfig = {
  enabled: process.env.LOG_DEDUPE_ENABLED !== "false",
  ttlMs: { debug: 60_000, info: 30_000, warn: 20_000, error: 10_000 },
  maxCacheSize: 5000,
};

/**
 * Replace dynamic fragments with stable tokens.
 */
export function normalizeMessage(message: string): string {
  return message
    .replace(/\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g, "TIME")
    .replace(/\b\d{10,13}\b/g, "TIMESTAMP")
    .replace(/0x[a-fA-F0-9]{16,}/g, "0x…")
    .replace(/\$-?\d+(?:\.\d+)?/g, "$X")
    .replace(/\b\d+(?:\.\d+)?%/g, "X%")
    .replace(/\b\d+(?:\.\d+)?(?:ms|s|min|h)\b/g, "Xtime");
}

export class LogDedupeMiddleware {
  private readonly cache = new Map<string, DedupeEntry>();
  private readonly config: LogDedupeConfig;

  constructor(config: Partial<LogDedupeConfig> = {}) {
    this.config = { ...DEFAULT_DEDUPE_CONFIG, ...config };
  }

  shouldEmit(level: LogLevel, message: string, now: number = Date.now()): DedupeResult {
    if (!this.config.enabled) return { emit: true };

    const key = `${level}:${normalizeMessage(message)}`;
    const existing = this.cache.get(key);

    if (!existing) {
      if (this.cache.size >= this.config.maxCacheSize) {
        // Map iteration order is insertion order
        const oldest = this.cache.keys().next();
        if (!oldest.done) this.cache.delete(oldest.value);
      }
      this.cache.set(key, { firstSeen: now, suppressedCount: 0 });
      return { emit: true };
    }

    if (now - existing.firstSeen >= this.config.ttlMs[level]) {
      const suppressed = existing.suppressedCount;
      existing.firstSeen = now;
      existing.suppressedCount = 0;
      return {
        emit: true,
        suffix: suppressed > 0 ? `(repeated ${suppressed} times)` : undefined,
      };
    }

    existing.suppressedCount++;
    return { emit: false };
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }
}

let globalDedupeInstance: LogDedupeMiddleware | null = null;

export function getLogDedupe(): LogDedupeMiddleware {
  if (!globalDedupeInstance) {
    globalDedupeInstance = new LogDedupeMiddleware();
  }
  return globalDedupeInstance;
}
