import type { MissingMetricIssue, RiskThresholds, ScoreRange, ScoredComponent } from "@/src/lib/types";
import { clampScore, isPresent, lookupTier, missingMetric } from "./tiers";

export type LiquidityRiskInput = {
  holdingId: string;
  volume24h: number | null;
  marketCap: number | null;
};

export const scoreLiquidityRisk = (
  input: LiquidityRiskInput,
  thresholds: RiskThresholds,
  range: ScoreRange
): ScoredComponent => {
  const issues: MissingMetricIssue[] = [];
  const { volume24h, marketCap } = input;

  if (!isPresent(volume24h)) {
    issues.push(missingMetric(input.holdingId, "volume24h"));
  }
  if (!isPresent(marketCap) || marketCap <= 0) {
    issues.push(missingMetric(input.holdingId, "marketCap"));
  }
  if (!isPresent(volume24h) || !isPresent(marketCap) || marketCap <= 0) {
    return { score: range.max, issues };
  }

  const ratio = volume24h / marketCap;
  return { score: clampScore(lookupTier(ratio, thresholds.liquidityRatio), range), issues };
};
