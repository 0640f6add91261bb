/**
 * Position Sizer - adaptive fractional Kelly
 *
 * f_kelly = (p*b - q) / b
 * f_final = clamp(kellyMultiplier * f_kelly * k_conf * k_vol * k_corr * k_dd, 0, maxFraction)
 *
 * p blends the whale win rate with the market-implied probability of the
 * copied side. Volatility is a per-market EWMA of observed price returns.
 */

import type { SizingConfig } from "../config/schema";
import { EwmaVolatility } from "../lib/ewma-volatility";
import type { OrderSide } from "../models/order";
import type { RiskSnapshot } from "../models/risk";
import type { TradeIntent } from "../models/signal";
import type { Logger } from "../utils/logger.util";

export interface SizingInput {
  side: OrderSide;
  /** Execution price of the copied side (0, 1) */
  price: number;
  winRate: number;
  qualityScore: number;
  marketVolatility: number;
  portfolioCorrelation: number;
  /** Portfolio drawdown from peak as a fraction */
  portfolioDrawdown: number;
}

export interface SizingBreakdown {
  winProbability: number;
  payout: number;
  kelly: number;
  kConf: number;
  kVol: number;
  kCorr: number;
  kDd: number;
  /** Final fraction of NAV */
  fraction: number;
}

export interface SizingDecision extends SizingBreakdown {
  /** Shares to order; 0 means no trade */
  size: number;
  notionalUsd: number;
  /** Set when size is 0 */
  skipReason?: string;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Pure sizing formula. Returns fraction 0 whenever the raw Kelly fraction
 * is not positive or any factor is not a finite number.
 */
export function computeKellyFraction(input: SizingInput, config: SizingConfig): SizingBreakdown {
  const marketProb = input.side === "BUY" ? input.price : 1 - input.price;
  const winProbability = clamp(
    config.whaleWeight * input.winRate + (1 - config.whaleWeight) * marketProb,
    0.01,
    0.99,
  );
  const q = 1 - winProbability;

  const payout =
    input.side === "BUY" ? (1 - input.price) / input.price : input.price / (1 - input.price);

  const kConf = 0.4 + 0.6 * (clamp(input.qualityScore, 0, 100) / 100);
  const kVol = clamp(1 / (1 + 5 * input.marketVolatility), 0.5, 1.2);
  const kCorr = clamp(1 - input.portfolioCorrelation ** 2, 0.3, 1.0);
  const kDd = clamp(1 - input.portfolioDrawdown * 3, 0.2, 1.0);

  const kelly = payout > 0 && Number.isFinite(payout) ? (winProbability * payout - q) / payout : 0;
  if (!(kelly > 0)) {
    return { winProbability, payout, kelly, kConf, kVol, kCorr, kDd, fraction: 0 };
  }

  const raw = config.kellyMultiplier * kelly * kConf * kVol * kCorr * kDd;
  const fraction = Number.isFinite(raw) ? clamp(raw, 0, config.maxFraction) : 0;
  return { winProbability, payout, kelly, kConf, kVol, kCorr, kDd, fraction };
}

export class PositionSizer {
  private readonly volatility = new Map<string, EwmaVolatility>();
  private readonly lastPrice = new Map<string, number>();

  constructor(
    private readonly config: SizingConfig,
    private readonly logger: Logger,
  ) {}

  /**
   * Feed a market price observation; the return since the previous
   * observation updates that market's EWMA.
   */
  recordPrice(marketKey: string, price: number): void {
    if (!(price > 0)) return;
    const previous = this.lastPrice.get(marketKey);
    this.lastPrice.set(marketKey, price);
    if (previous === undefined) return;
    this.recordReturn(marketKey, price / previous - 1);
  }

  recordReturn(marketKey: string, ret: number): void {
    this.estimatorFor(marketKey).update([ret]);
  }

  getVolatility(marketKey: string): number {
    return this.volatility.get(marketKey)?.getVolatility() ?? this.config.defaultVolatility;
  }

  size(intent: TradeIntent, snapshot: RiskSnapshot): SizingDecision {
    const breakdown = computeKellyFraction(
      {
        side: intent.side,
        price: intent.price,
        winRate: intent.winRate,
        qualityScore: intent.qualityScore,
        marketVolatility: this.getVolatility(intent.event.tokenId),
        portfolioCorrelation: intent.portfolioCorrelation,
        portfolioDrawdown: snapshot.drawdown,
      },
      this.config,
    );

    if (breakdown.fraction <= 0) {
      return { ...breakdown, size: 0, notionalUsd: 0, skipReason: "No positive Kelly edge" };
    }

    const notionalUsd = breakdown.fraction * snapshot.navUsd;
    if (notionalUsd < this.config.minOrderUsd) {
      return {
        ...breakdown,
        size: 0,
        notionalUsd: 0,
        skipReason: `Order value $${notionalUsd.toFixed(2)} below minimum $${this.config.minOrderUsd}`,
      };
    }

    const size = notionalUsd / intent.price;
    this.logger.debug(
      `[PositionSizer] ${intent.event.tokenId.slice(0, 12)} p=${breakdown.winProbability.toFixed(3)} ` +
        `kelly=${breakdown.kelly.toFixed(4)} final=${breakdown.fraction.toFixed(4)} ` +
        `(conf=${breakdown.kConf.toFixed(2)} vol=${breakdown.kVol.toFixed(2)} corr=${breakdown.kCorr.toFixed(2)} dd=${breakdown.kDd.toFixed(2)}) ` +
        `-> ${size.toFixed(2)} shares / $${notionalUsd.toFixed(2)}`,
    );
    return { ...breakdown, size, notionalUsd };
  }

  private estimatorFor(marketKey: string): EwmaVolatility {
    let estimator = this.volatility.get(marketKey);
    if (!estimator) {
      estimator = new EwmaVolatility(this.config.ewmaLambda, this.config.defaultVolatility);
      this.volatility.set(marketKey, estimator);
    }
    return estimator;
  }
}
