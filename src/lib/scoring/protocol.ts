import type { RiskThresholds, ScoreRange, ScoredComponent } from "@/src/lib/types";
import { clampScore, isPresent, lookupTier, missingMetric } from "./tiers";

export type ProtocolRiskInput = {
  holdingId: string;
  tvl: number | null;
};

export const scoreProtocolRisk = (
  input: ProtocolRiskInput,
  thresholds: RiskThresholds,
  range: ScoreRange
): ScoredComponent => {
  if (!isPresent(input.tvl)) {
    return { score: range.max, issues: [missingMetric(input.holdingId, "tvl")] };
  }
  return { score: clampScore(lookupTier(input.tvl, thresholds.tvl), range), issues: [] };
};

// Tokens without a tracked protocol carry a flat score; TVL is never consulted.
export const untrackedProtocolRisk = (thresholds: RiskThresholds): ScoredComponent => ({
  score: thresholds.untrackedProtocolScore,
  issues: []
});
