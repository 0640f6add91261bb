/**
 * Price Feed
 *
 * Polls CLOB midpoints for the tokens the book holds and forwards each
 * price to a handler.
 */

import { safeErrorToString } from "../lib/error-handling";
import type { Logger } from "../utils/logger.util";
import type { HttpGetter } from "./interfaces";

export type PriceFeedDeps = {
  http: HttpGetter;
  logger: Logger;
  pollIntervalMs: number;
  /** Tokens to price on each tick */
  tokens: () => string[];
  onPrice: (tokenId: string, price: number) => Promise<void>;
};

export function parseMidpoint(data: unknown): number | null {
  if (typeof data !== "object" || data === null || !("mid" in data)) return null;
  const raw = data.mid;
  const mid = typeof raw === "string" ? parseFloat(raw) : typeof raw === "number" ? raw : NaN;
  return Number.isFinite(mid) && mid > 0 && mid < 1 ? mid : null;
}

export class PriceFeed {
  private readonly deps: PriceFeedDeps;
  private timer?: NodeJS.Timeout;

  constructor(deps: PriceFeedDeps) {
    this.deps = deps;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(
      () =>
        void this.tick().catch((err) =>
          this.deps.logger.error("[PriceFeed] Tick failed", err instanceof Error ? err : undefined),
        ),
      this.deps.pollIntervalMs,
    );
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  async tick(): Promise<number> {
    const { http, logger } = this.deps;
    let delivered = 0;
    for (const tokenId of new Set(this.deps.tokens())) {
      let price: number | null;
      try {
        const { data } = await http.get("/midpoint", { params: { token_id: tokenId }, timeout: 5_000 });
        price = parseMidpoint(data);
      } catch (err) {
        logger.warn(`[PriceFeed] Midpoint for ${tokenId.slice(0, 12)} failed: ${safeErrorToString(err)}`);
        continue;
      }
      if (price === null) {
        logger.debug(`[PriceFeed] No midpoint for ${tokenId.slice(0, 12)}`);
        continue;
      }
      await this.deps.onPrice(tokenId, price);
      delivered++;
    }
    return delivered;
  }
}
