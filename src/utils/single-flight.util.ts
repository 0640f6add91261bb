/**
 * Single-Flight
 *
 * Ensures only one execution per key is in progress:
 * - If an execution for the key is already in flight, later callers await it
 * - Once it settles, the key is free again
 */

import type { Logger } from "./logger.util";

export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    private readonly label: string = "SingleFlight",
    private readonly logger?: Logger,
  ) {}

  async run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.logger?.debug(`[${this.label}] ${key} already in flight, awaiting result`);
      return existing;
    }

    const promise = fn();
    this.inFlight.set(key, promise);
    try {
      return await promise;
    } finally {
      this.inFlight.delete(key);
    }
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }
}
