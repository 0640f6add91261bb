/**
 * Portfolio Reporting
 *
 * Read-only queries over the position book for monitoring and for the
 * pre-trade limit check.
 */

import type { LedgerConfig } from "../config/schema";
import type { Clock } from "../models/common";
import { systemClock } from "../models/common";
import type { Position, PositionStatus } from "../models/position";
import type { PositionRepository } from "../infra/persistence/position-repository";
import { evaluateExitTriggers, type ExitSignal } from "./position-ledger";

export interface ExposureSummary {
  totalExposureUsd: number;
  byWhale: Record<string, number>;
  byCategory: Record<string, number>;
}

export interface StatusCount {
  status: PositionStatus;
  count: number;
  totalValue: number;
}

export interface PerformanceSummary {
  openCount: number;
  closedCount: number;
  winners: number;
  losers: number;
  /** Fraction of closed positions with positive total P&L */
  winRate: number;
  avgPnlPct: number;
  totalRealizedPnl: number;
  totalUnrealizedPnl: number;
  totalPnl: number;
}

export interface ActionItem {
  position: Position;
  signal: ExitSignal;
}

export interface LimitCheck {
  allowed: boolean;
  openPositions: number;
  totalExposureUsd: number;
  reasons: string[];
}

export class PortfolioReporter {
  private readonly clock: Clock;

  constructor(
    private readonly repo: PositionRepository,
    private readonly config: LedgerConfig,
    clock: Clock = systemClock,
  ) {
    this.clock = clock;
  }

  getExposureSummary(): ExposureSummary {
    const byWhale: Record<string, number> = {};
    const byCategory: Record<string, number> = {};
    let totalExposureUsd = 0;
    for (const p of this.repo.listByStatus(["OPEN", "CLOSING"])) {
      totalExposureUsd += p.marketValue;
      byWhale[p.whaleAddress] = (byWhale[p.whaleAddress] ?? 0) + p.marketValue;
      const category = p.category ?? "uncategorized";
      byCategory[category] = (byCategory[category] ?? 0) + p.marketValue;
    }
    return { totalExposureUsd, byWhale, byCategory };
  }

  getCountsByStatus(): StatusCount[] {
    return this.repo.countsByStatus();
  }

  getPerformance(): PerformanceSummary {
    const open = this.repo.listByStatus(["OPEN", "CLOSING"]);
    const closed = this.repo.listByStatus(["CLOSED", "ARCHIVED"]);

    const winners = closed.filter((p) => p.totalPnl > 0).length;
    const losers = closed.filter((p) => p.totalPnl < 0).length;
    const totalRealizedPnl = [...open, ...closed].reduce((sum, p) => sum + p.realizedPnl, 0);
    const totalUnrealizedPnl = open.reduce((sum, p) => sum + p.unrealizedPnl, 0);
    const avgPnlPct = closed.length > 0 ? closed.reduce((sum, p) => sum + p.pnlPercentage, 0) / closed.length : 0;

    return {
      openCount: open.length,
      closedCount: closed.length,
      winners,
      losers,
      winRate: closed.length > 0 ? winners / closed.length : 0,
      avgPnlPct,
      totalRealizedPnl,
      totalUnrealizedPnl,
      totalPnl: totalRealizedPnl + totalUnrealizedPnl,
    };
  }

  /**
   * OPEN positions whose exit triggers are met at their last marked price
   */
  getPositionsRequiringAction(): ActionItem[] {
    const now = this.clock();
    const items: ActionItem[] = [];
    for (const position of this.repo.listByStatus(["OPEN"])) {
      const signal = evaluateExitTriggers(position, this.config.exitPriority, this.config.preResolutionWindowMs, now);
      if (signal) items.push({ position, signal });
    }
    return items;
  }

  getPositionsByWhale(whaleAddress: string): Position[] {
    return this.repo.listByWhale(whaleAddress);
  }

  /**
   * Would opening `additionalUsd` more exposure stay within the book limits?
   */
  checkPositionLimits(additionalUsd = 0): LimitCheck {
    const live = this.repo.listByStatus(["OPEN", "CLOSING"]);
    const totalExposureUsd = live.reduce((sum, p) => sum + p.marketValue, 0);
    const reasons: string[] = [];

    if (live.length >= this.config.maxOpenPositions) {
      reasons.push(`Open positions ${live.length} at limit ${this.config.maxOpenPositions}`);
    }
    if (totalExposureUsd + additionalUsd > this.config.maxTotalExposureUsd) {
      reasons.push(
        `Exposure $${(totalExposureUsd + additionalUsd).toFixed(2)} would exceed $${this.config.maxTotalExposureUsd.toFixed(2)}`,
      );
    }
    return { allowed: reasons.length === 0, openPositions: live.length, totalExposureUsd, reasons };
  }
}
