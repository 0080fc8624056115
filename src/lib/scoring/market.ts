import type {
  Classification,
  CorrelationPair,
  MissingMetricIssue,
  RiskThresholds,
  ScoreRange,
  ScoredComponent
} from "@/src/lib/types";
import { clampScore, isPresent, lookupTier, missingMetric, roundScore } from "./tiers";

export type MarketRiskInput = {
  holdingId: string;
  classification: Classification;
  volatility: number | null;
  marketCap: number | null;
  correlation: CorrelationPair;
};

export const marketCapTier = (marketCap: number, thresholds: RiskThresholds) =>
  lookupTier(marketCap, thresholds.marketCap);

export const averageAbsoluteCorrelation = (correlation: CorrelationPair): number | null => {
  if (!isPresent(correlation.btc) || !isPresent(correlation.eth)) return null;
  return (Math.abs(correlation.btc) + Math.abs(correlation.eth)) / 2;
};

export const scoreMarketRisk = (
  input: MarketRiskInput,
  thresholds: RiskThresholds,
  range: ScoreRange
): ScoredComponent => {
  if (input.classification === "stable") {
    return { score: thresholds.stableMarketScore, issues: [] };
  }

  const issues: MissingMetricIssue[] = [];

  let volatilityScore = range.max;
  if (!isPresent(input.volatility)) {
    issues.push(missingMetric(input.holdingId, "volatility"));
  } else {
    volatilityScore = lookupTier(input.volatility, thresholds.volatility);
  }

  let capScore = range.max;
  if (!isPresent(input.marketCap)) {
    issues.push(missingMetric(input.holdingId, "marketCap"));
  } else {
    capScore = marketCapTier(input.marketCap, thresholds);
  }

  let correlationScore = range.max;
  const avgCorrelation = averageAbsoluteCorrelation(input.correlation);
  if (avgCorrelation === null) {
    issues.push(missingMetric(input.holdingId, "correlation"));
  } else {
    correlationScore = lookupTier(avgCorrelation, thresholds.correlation);
  }

  const blend = thresholds.marketBlend;
  const score = roundScore(
    volatilityScore * blend.volatility +
      capScore * blend.marketCap +
      correlationScore * blend.correlation
  );

  return { score: clampScore(score, range), issues };
};
