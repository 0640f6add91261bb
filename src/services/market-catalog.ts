/**
 * Gamma Market Catalog
 *
 * Market category and resolution time from the Gamma API, cached per
 * market. Markets the API does not know come back with unknown fields,
 * which the trade gate rejects.
 */

import type { MarketInfo } from "../models/market";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { Logger } from "../utils/logger.util";
import type { HttpGetter, MarketCatalog } from "./interfaces";

// Market metadata rarely changes
const CACHE_TTL_MS = 60 * 60 * 1000;

const END_DATE_FIELDS = ["endDate", "end_date", "endDateIso", "end_date_iso"] as const;

function parseEndDate(record: Record<string, unknown>): number | null {
  for (const key of END_DATE_FIELDS) {
    const value = record[key];
    if (typeof value !== "string" || value === "") continue;
    const ts = Date.parse(value);
    if (Number.isFinite(ts)) return ts;
  }
  return null;
}

function parseCategory(record: Record<string, unknown>): string | null {
  if (typeof record.category === "string" && record.category !== "") return record.category.toLowerCase();
  const tags = record.tags;
  if (Array.isArray(tags)) {
    for (const tag of tags) {
      if (typeof tag === "object" && tag !== null && "label" in tag && typeof tag.label === "string") {
        return tag.label.toLowerCase();
      }
    }
  }
  return null;
}

/**
 * Map a Gamma market row to MarketInfo
 */
export function parseGammaMarket(marketId: string, value: unknown): MarketInfo {
  if (typeof value !== "object" || value === null) return { marketId, category: null, resolvesAt: null };
  const record: Record<string, unknown> = { ...value };
  return { marketId, category: parseCategory(record), resolvesAt: parseEndDate(record) };
}

export class GammaMarketCatalog implements MarketCatalog {
  private readonly cache = new Map<string, { info: MarketInfo; cachedAt: number }>();

  constructor(
    private readonly http: HttpGetter,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  async getMarketInfo(marketId: string, tokenId: string): Promise<MarketInfo> {
    const now = this.clock();
    const cached = this.cache.get(marketId);
    if (cached && now - cached.cachedAt < CACHE_TTL_MS) return cached.info;

    let row = await this.fetchFirst({ condition_id: marketId });
    if (row === undefined) row = await this.fetchFirst({ clob_token_ids: tokenId });
    if (row === undefined) {
      this.logger.warn(`[MarketCatalog] No market found for ${marketId.slice(0, 16)}`);
      return { marketId, category: null, resolvesAt: null };
    }

    const info = parseGammaMarket(marketId, row);
    this.cache.set(marketId, { info, cachedAt: now });
    return info;
  }

  private async fetchFirst(params: Record<string, string>): Promise<unknown> {
    const { data } = await this.http.get("/markets", { params, timeout: 10_000 });
    return Array.isArray(data) && data.length > 0 ? data[0] : undefined;
  }
}
