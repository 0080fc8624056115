import type { MissingMetricIssue, MissingMetricName, ScoreRange, TierTable } from "@/src/lib/types";

export const isPresent = (value: number | null | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const lookupTier = (value: number, table: TierTable): number => {
  const match = table.tiers.find((tier) =>
    table.mode === "below" ? value < tier.limit : value > tier.limit
  );
  return match ? match.score : table.otherwise;
};

export const clampScore = (score: number, range: ScoreRange) =>
  Math.max(range.min, Math.min(range.max, score));

export const roundScore = (score: number) => Math.round(score * 100) / 100;

export const missingMetric = (
  holdingId: string,
  metric: MissingMetricName
): MissingMetricIssue => ({
  code: "MISSING_METRIC",
  holdingId,
  metric,
  message: `${holdingId}: ${metric} unavailable, scored at maximum risk.`
});
