import axios from "axios";
import type { OrderSide } from "../models/order";
import type { WhaleTradeEvent } from "../models/whale";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import { safeErrorToString } from "../lib/error-handling";
import type { Logger } from "../utils/logger.util";
import type { HttpGetter } from "./interfaces";

export type WhaleActivityFeedDeps = {
  http: HttpGetter;
  logger: Logger;
  whaleAddresses: string[];
  pollIntervalMs: number;
  onTrade: (event: WhaleTradeEvent) => Promise<void>;
  clock?: Clock;
};

interface ActivityItem {
  type: string;
  timestamp: number;
  conditionId: string;
  asset: string;
  size: number;
  price: number;
  side: OrderSide;
  transactionHash: string;
}

function num(value: unknown): number | undefined {
  const n = typeof value === "string" ? parseFloat(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
}

/**
 * Validate one activity row. Rows that are not complete trades are dropped.
 */
export function parseActivity(value: unknown): ActivityItem | null {
  if (typeof value !== "object" || value === null) return null;
  const row: Record<string, unknown> = { ...value };
  const side = typeof row.side === "string" ? row.side.toUpperCase() : "";
  const timestamp = num(row.timestamp);
  const size = num(row.size);
  const price = num(row.price);
  if (
    row.type !== "TRADE" ||
    (side !== "BUY" && side !== "SELL") ||
    typeof row.conditionId !== "string" ||
    typeof row.asset !== "string" ||
    typeof row.transactionHash !== "string" ||
    timestamp === undefined ||
    size === undefined ||
    price === undefined
  ) {
    return null;
  }
  return {
    type: row.type,
    timestamp,
    conditionId: row.conditionId,
    asset: row.asset,
    size,
    price,
    side,
    transactionHash: row.transactionHash,
  };
}

/**
 * Polls the data API activity endpoint for each tracked whale and emits
 * trades made since the feed started, once each.
 */
export class WhaleActivityFeed {
  private readonly deps: WhaleActivityFeedDeps;
  private readonly clock: Clock;
  private timer?: NodeJS.Timeout;
  private readonly processedHashes: Set<string> = new Set();
  private readonly lastSeen: Map<string, number> = new Map();
  private readonly startedAt: number;

  constructor(deps: WhaleActivityFeedDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.startedAt = this.clock();
  }

  async start(): Promise<void> {
    const { logger, whaleAddresses, pollIntervalMs } = this.deps;
    logger.info(`[WhaleFeed] Monitoring ${whaleAddresses.length} whale(s): ${whaleAddresses.map((a) => a.slice(0, 10)).join(", ")}`);
    this.timer = setInterval(
      () => void this.tick().catch((err) => logger.error("[WhaleFeed] Tick failed", err instanceof Error ? err : undefined)),
      pollIntervalMs,
    );
    await this.tick();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  async tick(): Promise<number> {
    let emitted = 0;
    for (const whale of this.deps.whaleAddresses) {
      emitted += await this.pollWhale(whale);
    }
    return emitted;
  }

  private async pollWhale(whale: string): Promise<number> {
    const { http, logger } = this.deps;
    let data: unknown;
    try {
      ({ data } = await http.get("/activity", { params: { user: whale, limit: 100 }, timeout: 10_000 }));
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        logger.warn(`[WhaleFeed] No activity for ${whale.slice(0, 10)} (404)`);
        return 0;
      }
      logger.error(`[WhaleFeed] Failed to fetch activity for ${whale.slice(0, 10)}: ${safeErrorToString(err)}`);
      return 0;
    }
    if (!Array.isArray(data)) {
      logger.warn(`[WhaleFeed] Unexpected activity payload for ${whale.slice(0, 10)}`);
      return 0;
    }

    // Oldest first so exits follow their entries
    const trades = data
      .map(parseActivity)
      .filter((a): a is ActivityItem => a !== null)
      .sort((a, b) => a.timestamp - b.timestamp);

    let emitted = 0;
    for (const activity of trades) {
      const timestampMs = activity.timestamp < 1e12 ? activity.timestamp * 1000 : activity.timestamp;
      if (this.processedHashes.has(activity.transactionHash)) continue;
      this.processedHashes.add(activity.transactionHash);
      if (timestampMs < this.startedAt || timestampMs < (this.lastSeen.get(whale) ?? 0)) continue;
      this.lastSeen.set(whale, timestampMs);

      const event: WhaleTradeEvent = {
        whaleAddress: whale,
        marketId: activity.conditionId,
        tokenId: activity.asset,
        side: activity.side,
        size: activity.size,
        price: activity.price,
        timestamp: timestampMs,
        sourceId: activity.transactionHash,
      };
      logger.info(
        `[WhaleFeed] ${whale.slice(0, 10)} ${event.side} ${event.size.toFixed(2)} @ ${event.price.toFixed(4)} on ${event.tokenId.slice(0, 12)}`,
      );
      try {
        await this.deps.onTrade(event);
        emitted++;
      } catch (err) {
        logger.error(`[WhaleFeed] Handler failed for ${activity.transactionHash}`, err instanceof Error ? err : undefined);
      }
    }
    return emitted;
  }
}
