/**
 * Signal Filter Pipeline
 *
 * Three sequential gates turn a whale trade into a TradeIntent:
 *   1. Whale gate      - quality score, momentum, drawdown (missing data rejects)
 *   2. Trade gate      - notional, book slippage, time to resolution, edge
 *   3. Portfolio gate  - correlation, total exposure, category exposure
 *
 * Each gate stops at its first failing check. Evaluation is synchronous and
 * has no side effects beyond the pipeline's own counters.
 */

import type { FilterConfig } from "../config/schema";
import type {
  FilterRejection,
  FilterResult,
  FilterStage,
  PortfolioView,
  RejectionCode,
  SignalContext,
  TradeIntent,
} from "../models/signal";
import type { WhaleMetrics } from "../models/whale";
import { walkBook } from "../lib/orderbook-utils";
import type { Logger } from "../utils/logger.util";

const DAY_MS = 24 * 60 * 60 * 1000;
const UNCATEGORIZED = "uncategorized";

/** Whale metrics with every gate-relevant field present */
type QualifiedWhale = WhaleMetrics & {
  qualityScore: number;
  sharpe30d: number;
  sharpe90d: number;
  drawdown: number;
  winRate: number;
};

export interface PipelineStats {
  processed: number;
  passedWhale: number;
  passedTrade: number;
  passedPortfolio: number;
  rejectionsByCode: Partial<Record<RejectionCode, number>>;
  /** Pass rate per stage relative to signals processed */
  passRates: { whale: number; trade: number; portfolio: number };
}

type TradeGateResult =
  | { ok: true; vwap: number; mid: number; slippage: number; edge: number; notional: number }
  | { ok: false; rejection: FilterRejection };

function reject(stage: FilterStage, code: RejectionCode, reason: string): FilterRejection {
  return { stage, code, reason };
}

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Whale-implied minus market-implied probability for the side being copied
 */
export function estimateEdge(side: "BUY" | "SELL", whaleWinRate: number, marketPrice: number): number {
  const marketProb = side === "BUY" ? marketPrice : 1 - marketPrice;
  return whaleWinRate - marketProb;
}

/**
 * Highest pairwise correlation between a candidate market and open positions.
 * Pairwise estimate: average of category similarity and resolution-date proximity.
 */
export function estimateCorrelation(
  candidate: { category: string | null; resolvesAt: number | null },
  positions: PortfolioView["openPositions"],
  config: Pick<FilterConfig, "sameCategoryCorrelation" | "crossCategoryCorrelation">,
): number {
  let max = 0;
  for (const position of positions) {
    const sameCategory =
      candidate.category !== null && position.category !== null && candidate.category === position.category;
    const categoryCorr = sameCategory ? config.sameCategoryCorrelation : config.crossCategoryCorrelation;

    let timeCorr = 0;
    if (candidate.resolvesAt !== null && position.resolvesAt !== null) {
      const daysApart = Math.floor(Math.abs(candidate.resolvesAt - position.resolvesAt) / DAY_MS);
      timeCorr = Math.max(0, 0.5 - daysApart / 60);
    }

    max = Math.max(max, (categoryCorr + timeCorr) / 2);
  }
  return max;
}

type Counters = Omit<PipelineStats, "passRates">;

function emptyCounters(): Counters {
  return { processed: 0, passedWhale: 0, passedTrade: 0, passedPortfolio: 0, rejectionsByCode: {} };
}

export class SignalFilterPipeline {
  private stats: Counters = emptyCounters();

  constructor(
    private readonly config: FilterConfig,
    private readonly logger: Logger,
  ) {}

  evaluate(ctx: SignalContext, portfolio: PortfolioView): FilterResult {
    this.stats.processed++;

    const whaleGate = this.checkWhale(ctx.whale);
    if (!whaleGate.ok) return this.rejected(ctx, whaleGate.rejection);
    this.stats.passedWhale++;
    const whale = whaleGate.whale;

    const tradeGate = this.checkTrade(ctx, whale);
    if (!tradeGate.ok) return this.rejected(ctx, tradeGate.rejection);
    this.stats.passedTrade++;

    const portfolioGate = this.checkPortfolio(ctx, tradeGate.notional, portfolio);
    if (!portfolioGate.ok) return this.rejected(ctx, portfolioGate.rejection);
    this.stats.passedPortfolio++;

    const intent: TradeIntent = {
      event: ctx.event,
      whale,
      market: ctx.market,
      side: ctx.event.side,
      price: tradeGate.vwap,
      midPrice: tradeGate.mid,
      notionalUsd: tradeGate.notional,
      slippage: tradeGate.slippage,
      edge: tradeGate.edge,
      winRate: whale.winRate,
      qualityScore: whale.qualityScore,
      portfolioCorrelation: portfolioGate.correlation,
    };

    this.logger.info(
      `[SignalFilter] PASS ${ctx.event.side} ${ctx.event.tokenId.slice(0, 12)} from ${ctx.event.whaleAddress.slice(0, 10)} ` +
        `edge=${pct(intent.edge)} slippage=${pct(intent.slippage)} corr=${intent.portfolioCorrelation.toFixed(2)}`,
    );
    return { passed: true, intent };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STAGE 1: WHALE
  // ═══════════════════════════════════════════════════════════════════════════

  private checkWhale(
    whale: WhaleMetrics | undefined,
  ): { ok: true; whale: QualifiedWhale } | { ok: false; rejection: FilterRejection } {
    if (!whale) {
      return { ok: false, rejection: reject("WHALE", "WHALE_DATA_MISSING", "Whale data unavailable") };
    }

    const { qualityScore, sharpe30d, sharpe90d, drawdown, winRate } = whale;
    if (
      qualityScore === undefined ||
      sharpe30d === undefined ||
      sharpe90d === undefined ||
      drawdown === undefined ||
      winRate === undefined ||
      ![qualityScore, sharpe30d, sharpe90d, drawdown, winRate].every(Number.isFinite)
    ) {
      return {
        ok: false,
        rejection: reject("WHALE", "WHALE_DATA_MISSING", `Whale data incomplete for ${whale.address}`),
      };
    }

    if (qualityScore < this.config.minQualityScore) {
      return {
        ok: false,
        rejection: reject(
          "WHALE",
          "WHALE_LOW_QUALITY",
          `WQS too low: ${qualityScore.toFixed(1)} < ${this.config.minQualityScore}`,
        ),
      };
    }

    if (sharpe30d <= sharpe90d) {
      return {
        ok: false,
        rejection: reject(
          "WHALE",
          "WHALE_NEGATIVE_MOMENTUM",
          `No positive momentum: 30d=${sharpe30d.toFixed(2)} <= 90d=${sharpe90d.toFixed(2)}`,
        ),
      };
    }

    if (drawdown >= this.config.maxWhaleDrawdown) {
      return {
        ok: false,
        rejection: reject(
          "WHALE",
          "WHALE_IN_DRAWDOWN",
          `Whale in trouble: drawdown ${pct(drawdown)} >= ${pct(this.config.maxWhaleDrawdown)}`,
        ),
      };
    }

    return { ok: true, whale: { ...whale, qualityScore, sharpe30d, sharpe90d, drawdown, winRate } };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STAGE 2: TRADE
  // ═══════════════════════════════════════════════════════════════════════════

  private checkTrade(ctx: SignalContext, whale: QualifiedWhale): TradeGateResult {
    const { event, market, book, now } = ctx;

    const notional = event.size * event.price;
    if (notional < this.config.minNotionalUsd) {
      return {
        ok: false,
        rejection: reject(
          "TRADE",
          "TRADE_TOO_SMALL",
          `Trade too small: $${notional.toFixed(0)} < $${this.config.minNotionalUsd}`,
        ),
      };
    }

    if (!book) {
      return { ok: false, rejection: reject("TRADE", "ORDERBOOK_EMPTY", "No liquidity: order book unavailable") };
    }
    const walk = walkBook(book, event.side, event.size);
    if (!walk.ok) {
      if (walk.reason === "EMPTY_BOOK") {
        return { ok: false, rejection: reject("TRADE", "ORDERBOOK_EMPTY", "No liquidity: order book empty") };
      }
      return {
        ok: false,
        rejection: reject(
          "TRADE",
          "INSUFFICIENT_DEPTH",
          `Insufficient depth: ${walk.availableSize.toFixed(2)} of ${event.size.toFixed(2)} shares available`,
        ),
      };
    }
    if (walk.slippage > this.config.maxSlippage) {
      return {
        ok: false,
        rejection: reject(
          "TRADE",
          "SLIPPAGE_TOO_HIGH",
          `Slippage too high: ${pct(walk.slippage)} > ${pct(this.config.maxSlippage)}`,
        ),
      };
    }

    if (market.resolvesAt === null) {
      return { ok: false, rejection: reject("TRADE", "RESOLUTION_UNKNOWN", "Resolution date unknown") };
    }
    const daysToResolution = (market.resolvesAt - now) / DAY_MS;
    if (daysToResolution <= 0) {
      return { ok: false, rejection: reject("TRADE", "MARKET_RESOLVED", "Market past its resolution date") };
    }
    if (daysToResolution > this.config.maxDaysToResolution) {
      return {
        ok: false,
        rejection: reject(
          "TRADE",
          "RESOLUTION_TOO_FAR",
          `Resolution too far: ${daysToResolution.toFixed(0)} days > ${this.config.maxDaysToResolution}`,
        ),
      };
    }

    const edge = estimateEdge(event.side, whale.winRate, walk.mid);
    if (edge < this.config.minEdge) {
      return {
        ok: false,
        rejection: reject("TRADE", "EDGE_TOO_LOW", `Edge too small: ${pct(edge)} < ${pct(this.config.minEdge)}`),
      };
    }

    return { ok: true, vwap: walk.vwap, mid: walk.mid, slippage: walk.slippage, edge, notional };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STAGE 3: PORTFOLIO
  // ═══════════════════════════════════════════════════════════════════════════

  private checkPortfolio(
    ctx: SignalContext,
    whaleNotional: number,
    portfolio: PortfolioView,
  ): { ok: true; correlation: number } | { ok: false; rejection: FilterRejection } {
    const correlation = estimateCorrelation(ctx.market, portfolio.openPositions, this.config);
    if (correlation >= this.config.maxCorrelation) {
      return {
        ok: false,
        rejection: reject(
          "PORTFOLIO",
          "CORRELATION_TOO_HIGH",
          `High correlation: ${correlation.toFixed(2)} >= ${this.config.maxCorrelation}`,
        ),
      };
    }

    const projectedCopy = Math.min(whaleNotional, this.config.projectedCopyFraction * portfolio.navUsd);

    const projectedTotal = portfolio.openExposureUsd + projectedCopy;
    const maxTotal = this.config.maxTotalExposurePct * portfolio.navUsd;
    if (projectedTotal >= maxTotal) {
      return {
        ok: false,
        rejection: reject(
          "PORTFOLIO",
          "EXPOSURE_LIMIT",
          `Exposure limit: $${projectedTotal.toFixed(0)} >= $${maxTotal.toFixed(0)}`,
        ),
      };
    }

    const category = ctx.market.category ?? UNCATEGORIZED;
    const projectedSector = (portfolio.exposureByCategory.get(category) ?? 0) + projectedCopy;
    const maxSector = this.config.maxSectorExposurePct * portfolio.navUsd;
    if (projectedSector >= maxSector) {
      return {
        ok: false,
        rejection: reject(
          "PORTFOLIO",
          "SECTOR_LIMIT",
          `Sector limit (${category}): $${projectedSector.toFixed(0)} >= $${maxSector.toFixed(0)}`,
        ),
      };
    }

    return { ok: true, correlation };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATS
  // ═══════════════════════════════════════════════════════════════════════════

  getStats(): PipelineStats {
    const { processed } = this.stats;
    const rate = (n: number): number => (processed === 0 ? 0 : n / processed);
    return {
      processed,
      passedWhale: this.stats.passedWhale,
      passedTrade: this.stats.passedTrade,
      passedPortfolio: this.stats.passedPortfolio,
      rejectionsByCode: { ...this.stats.rejectionsByCode },
      passRates: {
        whale: rate(this.stats.passedWhale),
        trade: rate(this.stats.passedTrade),
        portfolio: rate(this.stats.passedPortfolio),
      },
    };
  }

  resetStats(): void {
    this.stats = emptyCounters();
  }

  private rejected(ctx: SignalContext, rejection: FilterRejection): FilterResult {
    this.stats.rejectionsByCode[rejection.code] = (this.stats.rejectionsByCode[rejection.code] ?? 0) + 1;
    this.logger.debug(
      `[SignalFilter] REJECT stage=${rejection.stage} ${ctx.event.whaleAddress.slice(0, 10)}: ${rejection.reason}`,
    );
    return { passed: false, rejection };
  }
}

export { UNCATEGORIZED };
