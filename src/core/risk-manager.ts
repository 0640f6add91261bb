/**
 * Risk Manager
 *
 * Sole writer of the process-wide RiskState. Holds veto authority over every
 * opening order:
 * - Circuit breakers: HALT (daily loss, per-whale daily loss), PAUSE
 *   (consecutive losses), REDUCE (drawdown from peak scales sizes down)
 * - Hard limits: per-position size, per-market, per-whale and total allocation
 * - Whale quarantine on score/drawdown deterioration
 * - Kill switch file
 *
 * Limit checks run against a frozen RiskSnapshot taken at the start of the
 * check, so one decision never sees two different states.
 */

import * as fs from "fs";
import type { RiskConfig } from "../config/schema";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type {
  CircuitBreakerLevel,
  QuarantineEntry,
  RiskCheckRequest,
  RiskDecision,
  RiskEvent,
  RiskEventType,
  RiskSnapshot,
  RiskState,
} from "../models/risk";
import type { WhaleMetrics } from "../models/whale";
import type { Logger } from "../utils/logger.util";

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_EVENTS = 500;
const UNCATEGORIZED = "uncategorized";

/**
 * Open exposure contributed by one position
 */
export interface ExposureSource {
  whaleAddress: string;
  marketId: string;
  category: string | null;
  marketValue: number;
  unrealizedPnl: number;
}

export type QuarantineAction = "QUARANTINED" | "RELEASED" | "NONE";

export interface QuarantineResult {
  action: QuarantineAction;
  reason?: string;
}

export interface RiskManagerOptions {
  clock?: Clock;
  /** Defaults to fs.existsSync */
  fileExists?: (path: string) => boolean;
}

/**
 * UTC trading day key (YYYY-MM-DD)
 */
export function tradingDayOf(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

function addTo(map: Map<string, number>, key: string, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + amount);
}

/**
 * Hard-limit checks against a snapshot. Pure; no state is read or written
 * beyond the arguments.
 */
export function checkRiskLimits(
  request: RiskCheckRequest,
  snapshot: RiskSnapshot,
  config: RiskConfig,
  killSwitchActive: boolean,
): RiskDecision {
  // 1. Kill switch
  if (killSwitchActive) {
    return { approved: false, reason: "KILL_SWITCH_ACTIVE" };
  }

  // 2. Circuit breaker
  if (snapshot.breaker === "HALT") {
    return { approved: false, reason: `CIRCUIT_BREAKER_HALT: ${snapshot.breakerReason ?? "halted"}` };
  }
  if (snapshot.breaker === "PAUSE") {
    const until = snapshot.pausedUntil === null ? "reset" : new Date(snapshot.pausedUntil).toISOString();
    return { approved: false, reason: `CIRCUIT_BREAKER_PAUSE: ${snapshot.breakerReason ?? "paused"} until ${until}` };
  }

  // 3. Whale quarantine
  if (snapshot.quarantinedWhales.has(request.whaleAddress)) {
    return { approved: false, reason: `WHALE_QUARANTINED: ${request.whaleAddress}` };
  }

  // 4. Sanity
  if (!(request.size > 0) || !(request.price > 0 && request.price < 1)) {
    return { approved: false, reason: `INVALID_ORDER: size=${request.size} price=${request.price}` };
  }

  const warnings: string[] = [];
  const adjustedSize = request.size * snapshot.sizeMultiplier;
  if (snapshot.sizeMultiplier < 1) {
    warnings.push(
      `Size reduced x${snapshot.sizeMultiplier} (drawdown ${(snapshot.drawdown * 100).toFixed(1)}%)`,
    );
  }
  const valueUsd = adjustedSize * request.price;

  // 5. Per-position size
  if (valueUsd > config.maxPositionUsd) {
    return {
      approved: false,
      reason: `POSITION_LIMIT: $${valueUsd.toFixed(2)} > max $${config.maxPositionUsd}`,
    };
  }

  // 6. Per-market exposure
  const marketExposure = (snapshot.exposureByMarket.get(request.marketId) ?? 0) + valueUsd;
  if (marketExposure > config.maxMarketExposureUsd) {
    return {
      approved: false,
      reason: `MARKET_EXPOSURE_LIMIT: $${marketExposure.toFixed(2)} > max $${config.maxMarketExposureUsd}`,
    };
  }

  // 7. Per-whale exposure
  const whaleExposure = (snapshot.exposureByWhale.get(request.whaleAddress) ?? 0) + valueUsd;
  if (whaleExposure > config.maxWhaleExposureUsd) {
    return {
      approved: false,
      reason: `WHALE_EXPOSURE_LIMIT: $${whaleExposure.toFixed(2)} > max $${config.maxWhaleExposureUsd}`,
    };
  }

  // 8. Total allocation
  const totalExposure = snapshot.openExposureUsd + valueUsd;
  const maxTotal = config.maxTotalAllocationPct * snapshot.navUsd;
  if (totalExposure > maxTotal) {
    return {
      approved: false,
      reason: `ALLOCATION_LIMIT: $${totalExposure.toFixed(2)} > max $${maxTotal.toFixed(2)}`,
    };
  }

  return {
    approved: true,
    reason: snapshot.sizeMultiplier < 1 ? "APPROVED_REDUCED_SIZE" : "APPROVED",
    adjustedSize,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}

export class RiskManager {
  private readonly state: RiskState;
  private readonly clock: Clock;
  private readonly fileExists: (path: string) => boolean;
  private readonly events: RiskEvent[] = [];

  /** Unrealized P&L at the start of the trading day */
  private unrealizedAtDayStart = 0;
  /** Score observations per whale inside the drop window */
  private readonly scoreHistory = new Map<string, Array<{ at: number; score: number }>>();
  private readonly lastLossAt = new Map<string, number>();
  private killSwitchSeen = false;

  constructor(
    private readonly config: RiskConfig,
    navUsd: number,
    private readonly logger: Logger,
    options: RiskManagerOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.fileExists = options.fileExists ?? fs.existsSync;
    this.state = {
      tradingDay: tradingDayOf(this.clock()),
      dailyRealizedPnl: 0,
      unrealizedPnl: 0,
      dailyPnlByWhale: new Map(),
      navUsd,
      peakValueUsd: navUsd,
      openExposureUsd: 0,
      exposureByWhale: new Map(),
      exposureByMarket: new Map(),
      exposureByCategory: new Map(),
      breaker: "NORMAL",
      breakerReason: null,
      breakerTriggeredAt: null,
      pausedUntil: null,
      consecutiveLosses: 0,
      quarantined: new Map(),
    };

    this.logger.info(
      `[RiskManager] Initialized: nav=$${navUsd.toFixed(2)}, dailyLoss=$${config.dailyLossLimitUsd}/${(config.dailyLossLimitPct * 100).toFixed(1)}%, ` +
        `reduceAt=${(config.drawdownReducePct * 100).toFixed(1)}% drawdown, pauseAfter=${config.maxConsecutiveLosses} losses`,
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DECISIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Approve or veto an opening order. Closing orders are never vetoed.
   */
  evaluate(request: RiskCheckRequest): RiskDecision {
    const snapshot = this.getSnapshot();
    const decision = checkRiskLimits(request, snapshot, this.config, this.isKillSwitchActive());

    if (decision.approved) {
      this.logger.debug(
        `[RiskManager] APPROVED ${request.tokenId.slice(0, 12)} size=${(decision.adjustedSize ?? request.size).toFixed(2)} @ ${request.price.toFixed(4)}`,
      );
    } else {
      this.logger.warn(`[RiskManager] VETO ${request.tokenId.slice(0, 12)}: ${decision.reason}`);
    }
    return decision;
  }

  /**
   * Frozen read-only view of the current state
   */
  getSnapshot(): RiskSnapshot {
    this.refresh();
    const s = this.state;
    const portfolioValueUsd = s.navUsd + s.unrealizedPnl;
    const drawdown = s.peakValueUsd > 0 ? Math.max(0, (s.peakValueUsd - portfolioValueUsd) / s.peakValueUsd) : 0;
    return Object.freeze({
      tradingDay: s.tradingDay,
      dailyPnl: this.dailyPnl(),
      navUsd: s.navUsd,
      portfolioValueUsd,
      peakValueUsd: s.peakValueUsd,
      drawdown,
      openExposureUsd: s.openExposureUsd,
      exposureByWhale: new Map(s.exposureByWhale),
      exposureByMarket: new Map(s.exposureByMarket),
      exposureByCategory: new Map(s.exposureByCategory),
      breaker: s.breaker,
      breakerReason: s.breakerReason,
      pausedUntil: s.pausedUntil,
      consecutiveLosses: s.consecutiveLosses,
      quarantinedWhales: new Set(s.quarantined.keys()),
      sizeMultiplier: s.breaker === "REDUCE" ? this.config.reduceMultiplier : 1,
      takenAt: this.clock(),
    });
  }

  isKillSwitchActive(): boolean {
    const path = this.config.killSwitchFile;
    const active = path !== "" && this.fileExists(path);
    if (active !== this.killSwitchSeen) {
      this.killSwitchSeen = active;
      this.recordEvent("KILL_SWITCH", active ? `Kill switch file present: ${path}` : "Kill switch cleared");
      if (active) this.logger.error(`[RiskManager] 🛑 Kill switch active (${path})`);
    }
    return active;
  }

  isWhaleQuarantined(whaleAddress: string): boolean {
    return this.state.quarantined.has(whaleAddress);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATE UPDATES (single writer)
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Replace exposure and unrealized P&L with the ledger's open positions
   */
  syncPortfolio(positions: readonly ExposureSource[]): void {
    this.applyPortfolio(positions);
    this.refresh();
  }

  /**
   * Book realized P&L from a closed (or partially closed) position.
   * `openPositions` is the book after the close, so the position's
   * unrealized P&L leaves the daily figure in the same write that its
   * realized P&L enters it.
   */
  recordTradeResult(whaleAddress: string, realizedPnl: number, openPositions: readonly ExposureSource[]): void {
    this.applyPortfolio(openPositions);
    this.refresh();
    const s = this.state;
    const now = this.clock();

    s.dailyRealizedPnl += realizedPnl;
    addTo(s.dailyPnlByWhale, whaleAddress, realizedPnl);
    s.navUsd += realizedPnl;
    s.peakValueUsd = Math.max(s.peakValueUsd, s.navUsd + s.unrealizedPnl);

    if (realizedPnl < 0) {
      s.consecutiveLosses++;
      this.lastLossAt.set(whaleAddress, now);
    } else if (realizedPnl > 0) {
      s.consecutiveLosses = 0;
    }

    this.logger.info(
      `[RiskManager] Trade result ${whaleAddress.slice(0, 10)}: ${realizedPnl >= 0 ? "+" : ""}$${realizedPnl.toFixed(2)} ` +
        `(daily=$${this.dailyPnl().toFixed(2)}, streak=${s.consecutiveLosses})`,
    );
    this.refresh();
  }

  private applyPortfolio(positions: readonly ExposureSource[]): void {
    const s = this.state;
    s.exposureByWhale.clear();
    s.exposureByMarket.clear();
    s.exposureByCategory.clear();
    s.openExposureUsd = 0;
    s.unrealizedPnl = 0;

    for (const p of positions) {
      s.openExposureUsd += p.marketValue;
      s.unrealizedPnl += p.unrealizedPnl;
      addTo(s.exposureByWhale, p.whaleAddress, p.marketValue);
      addTo(s.exposureByMarket, p.marketId, p.marketValue);
      addTo(s.exposureByCategory, p.category ?? UNCATEGORIZED, p.marketValue);
    }

    s.peakValueUsd = Math.max(s.peakValueUsd, s.navUsd + s.unrealizedPnl);
  }

  /**
   * Manual breaker reset. Clears HALT and PAUSE, the loss streak and the
   * daily loss counters, which restart from the current state.
   */
  resetBreaker(reason = "manual reset"): void {
    const previous = this.state.breaker;
    this.state.consecutiveLosses = 0;
    this.state.pausedUntil = null;
    this.state.dailyRealizedPnl = 0;
    this.state.dailyPnlByWhale.clear();
    this.unrealizedAtDayStart = this.state.unrealizedPnl;
    this.setBreaker("NORMAL", null);
    this.refresh();
    if (previous !== "NORMAL") {
      this.recordEvent("BREAKER_RESET", `${previous} cleared: ${reason}`);
      this.logger.warn(`[RiskManager] Circuit breaker reset from ${previous}: ${reason}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WHALE QUARANTINE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Evaluate fresh whale metrics for quarantine or release
   */
  evaluateWhale(metrics: WhaleMetrics): QuarantineResult {
    const now = this.clock();
    const address = metrics.address;
    const score = metrics.qualityScore;

    let windowHigh: number | undefined;
    if (score !== undefined) {
      const cutoff = now - this.config.scoreDropWindowDays * DAY_MS;
      const history = (this.scoreHistory.get(address) ?? []).filter((h) => h.at >= cutoff);
      windowHigh = history.reduce<number | undefined>((max, h) => (max === undefined ? h.score : Math.max(max, h.score)), undefined);
      history.push({ at: now, score });
      this.scoreHistory.set(address, history);
    }

    const existing = this.state.quarantined.get(address);
    if (existing) {
      const lastLoss = Math.max(existing.quarantinedAt, this.lastLossAt.get(address) ?? 0);
      const cleanDays = (now - lastLoss) / DAY_MS;
      if (score !== undefined && score > this.config.releaseScoreAbove && cleanDays >= this.config.releaseCleanDays) {
        const reason = `score ${score.toFixed(1)} > ${this.config.releaseScoreAbove}, ${cleanDays.toFixed(1)} days without loss`;
        this.release(address, reason);
        return { action: "RELEASED", reason };
      }
      return { action: "NONE" };
    }

    const reasons: string[] = [];
    if (score !== undefined && score < this.config.quarantineScoreBelow) {
      reasons.push(`score ${score.toFixed(1)} < ${this.config.quarantineScoreBelow}`);
    }
    if (metrics.drawdown !== undefined && metrics.drawdown > this.config.quarantineDrawdownAbove) {
      reasons.push(
        `drawdown ${(metrics.drawdown * 100).toFixed(1)}% > ${(this.config.quarantineDrawdownAbove * 100).toFixed(1)}%`,
      );
    }
    if (score !== undefined && windowHigh !== undefined && windowHigh - score >= this.config.quarantineScoreDrop) {
      reasons.push(`score dropped ${(windowHigh - score).toFixed(1)} points in ${this.config.scoreDropWindowDays}d`);
    }

    if (reasons.length === 0) return { action: "NONE" };
    const reason = reasons.join("; ");
    this.quarantine(address, reason);
    return { action: "QUARANTINED", reason };
  }

  quarantine(whaleAddress: string, reason: string): QuarantineEntry {
    const entry: QuarantineEntry = { whaleAddress, reason, quarantinedAt: this.clock() };
    this.state.quarantined.set(whaleAddress, entry);
    this.recordEvent("WHALE_QUARANTINED", reason, whaleAddress);
    this.logger.warn(`[RiskManager] Whale ${whaleAddress.slice(0, 10)} quarantined: ${reason}`);
    return entry;
  }

  release(whaleAddress: string, reason: string): void {
    if (!this.state.quarantined.delete(whaleAddress)) return;
    this.recordEvent("WHALE_RELEASED", reason, whaleAddress);
    this.logger.info(`[RiskManager] Whale ${whaleAddress.slice(0, 10)} released: ${reason}`);
  }

  getQuarantined(): QuarantineEntry[] {
    return [...this.state.quarantined.values()];
  }

  get quarantinePolicy(): RiskConfig["quarantinePolicy"] {
    return this.config.quarantinePolicy;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // EVENTS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Risk events, newest last
   */
  getEvents(limit = 100): RiskEvent[] {
    return this.events.slice(-limit);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  private dailyPnl(): number {
    return this.state.dailyRealizedPnl + (this.state.unrealizedPnl - this.unrealizedAtDayStart);
  }

  /**
   * Roll the trading day and re-derive the breaker level
   */
  private refresh(): void {
    const now = this.clock();
    const s = this.state;

    const today = tradingDayOf(now);
    if (today !== s.tradingDay) {
      const previousDay = s.tradingDay;
      s.tradingDay = today;
      s.dailyRealizedPnl = 0;
      s.dailyPnlByWhale.clear();
      this.unrealizedAtDayStart = s.unrealizedPnl;
      this.recordEvent("DAY_ROLLOVER", `${previousDay} -> ${today}`);
      if (s.breaker === "HALT") {
        this.setBreaker("NORMAL", null);
        this.recordEvent("BREAKER_RESET", "HALT cleared by day rollover");
        this.logger.info(`[RiskManager] New trading day ${today}: HALT lifted`);
      }
    }

    if (s.breaker === "HALT") return;

    const haltReason = this.haltReason();
    if (haltReason) {
      this.trip("HALT", haltReason, now);
      return;
    }

    if (s.breaker === "PAUSE") {
      if (s.pausedUntil !== null && now < s.pausedUntil) return;
      s.pausedUntil = null;
      s.consecutiveLosses = 0;
      this.recordEvent("BREAKER_RESET", "PAUSE cooldown elapsed");
      this.logger.info("[RiskManager] Loss-streak pause elapsed, resuming");
      this.setBreaker("NORMAL", null);
    }

    if (s.consecutiveLosses >= this.config.maxConsecutiveLosses) {
      s.pausedUntil = now + this.config.pauseMinutes * 60 * 1000;
      this.trip("PAUSE", `${s.consecutiveLosses} consecutive losses`, now);
      return;
    }

    const snapshotValue = s.navUsd + s.unrealizedPnl;
    const drawdown = s.peakValueUsd > 0 ? (s.peakValueUsd - snapshotValue) / s.peakValueUsd : 0;
    if (drawdown >= this.config.drawdownReducePct) {
      if (s.breaker !== "REDUCE") {
        this.trip("REDUCE", `drawdown ${(drawdown * 100).toFixed(1)}% >= ${(this.config.drawdownReducePct * 100).toFixed(1)}%`, now);
      }
    } else if (s.breaker === "REDUCE") {
      this.recordEvent("BREAKER_RESET", "drawdown recovered");
      this.setBreaker("NORMAL", null);
    }
  }

  private haltReason(): string | null {
    const loss = -this.dailyPnl();
    if (loss >= this.config.dailyLossLimitUsd) {
      return `daily loss $${loss.toFixed(2)} >= $${this.config.dailyLossLimitUsd}`;
    }
    const pctLimit = this.config.dailyLossLimitPct * this.state.navUsd;
    if (pctLimit > 0 && loss >= pctLimit) {
      return `daily loss $${loss.toFixed(2)} >= ${(this.config.dailyLossLimitPct * 100).toFixed(1)}% of NAV`;
    }
    for (const [whale, pnl] of this.state.dailyPnlByWhale) {
      if (-pnl >= this.config.perWhaleDailyLossUsd) {
        return `whale ${whale.slice(0, 10)} daily loss $${(-pnl).toFixed(2)} >= $${this.config.perWhaleDailyLossUsd}`;
      }
    }
    return null;
  }

  private trip(level: CircuitBreakerLevel, reason: string, now: number): void {
    this.setBreaker(level, reason, now);
    this.recordEvent("BREAKER_TRIPPED", `${level}: ${reason}`);
    this.logger.error(`[RiskManager] 🚨 Circuit breaker ${level}: ${reason}`);
  }

  private setBreaker(level: CircuitBreakerLevel, reason: string | null, now: number | null = null): void {
    this.state.breaker = level;
    this.state.breakerReason = reason;
    this.state.breakerTriggeredAt = level === "NORMAL" ? null : now;
  }

  private recordEvent(type: RiskEventType, detail: string, whaleAddress?: string): void {
    this.events.push({ type, timestamp: this.clock(), detail, whaleAddress });
    if (this.events.length > MAX_EVENTS) this.events.splice(0, this.events.length - MAX_EVENTS);
  }
}
