/**
 * Static Whale Directory
 *
 * Whale quality metrics loaded from a JSON file:
 *
 *   { "whales": [{ "address": "0x...", "qualityScore": 88, "sharpe30d": 2.1,
 *                  "sharpe90d": 1.6, "drawdown": 0.05, "winRate": 0.64 }] }
 *
 * Missing metric fields stay undefined; the whale gate rejects them.
 */

import fs from "fs";
import { ConfigurationError } from "../errors/app.errors";
import type { WhaleDirectory, WhaleMetrics } from "../models/whale";
import type { Logger } from "../utils/logger.util";

function optionalNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function parseWhaleMetrics(value: unknown): WhaleMetrics | null {
  if (typeof value !== "object" || value === null) return null;
  const record: Record<string, unknown> = { ...value };
  if (typeof record.address !== "string" || record.address === "") return null;
  const returns = record.recentReturns;
  return {
    address: record.address,
    qualityScore: optionalNumber(record, "qualityScore"),
    sharpe30d: optionalNumber(record, "sharpe30d"),
    sharpe90d: optionalNumber(record, "sharpe90d"),
    drawdown: optionalNumber(record, "drawdown"),
    winRate: optionalNumber(record, "winRate"),
    recentReturns: Array.isArray(returns)
      ? returns.filter((r): r is number => typeof r === "number" && Number.isFinite(r))
      : undefined,
  };
}

export class StaticWhaleDirectory implements WhaleDirectory {
  private readonly whales = new Map<string, WhaleMetrics>();

  constructor(entries: readonly WhaleMetrics[] = []) {
    for (const entry of entries) this.upsert(entry);
  }

  static fromFile(path: string, logger: Logger): StaticWhaleDirectory {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(path, "utf8"));
    } catch (err) {
      throw new ConfigurationError(`Cannot read whale metrics file ${path}`, err instanceof Error ? err : undefined);
    }
    const list = typeof parsed === "object" && parsed !== null && "whales" in parsed ? parsed.whales : undefined;
    if (!Array.isArray(list)) {
      throw new ConfigurationError(`Whale metrics file ${path} has no "whales" array`);
    }

    const entries = list.map(parseWhaleMetrics).filter((m): m is WhaleMetrics => m !== null);
    if (entries.length < list.length) {
      logger.warn(`[WhaleDirectory] Skipped ${list.length - entries.length} entr(ies) without an address`);
    }
    logger.info(`[WhaleDirectory] Loaded metrics for ${entries.length} whale(s) from ${path}`);
    return new StaticWhaleDirectory(entries);
  }

  getMetrics(address: string): WhaleMetrics | undefined {
    return this.whales.get(address.toLowerCase());
  }

  list(): WhaleMetrics[] {
    return [...this.whales.values()];
  }

  upsert(metrics: WhaleMetrics): void {
    this.whales.set(metrics.address.toLowerCase(), metrics);
  }
}
