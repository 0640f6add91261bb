import type { Preset } from "../models/common";
import type { RiskConfig } from "./schema";

/**
 * Risk preset values. Keys not listed here come from DEFAULT_RISK_CONFIG.
 */
export type RiskPresetValues = Pick<
  RiskConfig,
  | "dailyLossLimitUsd"
  | "dailyLossLimitPct"
  | "perWhaleDailyLossUsd"
  | "drawdownReducePct"
  | "maxConsecutiveLosses"
  | "pauseMinutes"
  | "maxPositionUsd"
  | "maxMarketExposureUsd"
  | "maxWhaleExposureUsd"
  | "maxTotalAllocationPct"
>;

export const RISK_PRESETS: Record<Preset, RiskPresetValues> = {
  conservative: {
    dailyLossLimitUsd: 250,
    dailyLossLimitPct: 0.03,
    perWhaleDailyLossUsd: 100,
    drawdownReducePct: 0.07,
    maxConsecutiveLosses: 3,
    pauseMinutes: 120,
    maxPositionUsd: 500,
    maxMarketExposureUsd: 1000,
    maxWhaleExposureUsd: 1500,
    maxTotalAllocationPct: 0.6,
  },
  balanced: {
    dailyLossLimitUsd: 500,
    dailyLossLimitPct: 0.05,
    perWhaleDailyLossUsd: 200,
    drawdownReducePct: 0.1,
    maxConsecutiveLosses: 5,
    pauseMinutes: 60,
    maxPositionUsd: 1000,
    maxMarketExposureUsd: 2000,
    maxWhaleExposureUsd: 3000,
    maxTotalAllocationPct: 0.95,
  },
  aggressive: {
    dailyLossLimitUsd: 1000,
    dailyLossLimitPct: 0.08,
    perWhaleDailyLossUsd: 400,
    drawdownReducePct: 0.15,
    maxConsecutiveLosses: 7,
    pauseMinutes: 30,
    maxPositionUsd: 2500,
    maxMarketExposureUsd: 5000,
    maxWhaleExposureUsd: 7500,
    maxTotalAllocationPct: 0.95,
  },
};

export const DEFAULT_PRESET: Preset = "balanced";
