import { RISK_CATEGORIES } from "@/src/lib/types";
import type { CategoryScores, CategoryWeights, HorizonScores, HorizonWeights } from "@/src/lib/types";

export const composite = (scores: CategoryScores, weights: CategoryWeights) =>
  RISK_CATEGORIES.reduce((sum, category) => sum + scores[category] * weights[category], 0);

export const compositeByHorizon = (
  scores: CategoryScores,
  weights: HorizonWeights
): HorizonScores => ({
  short: composite(scores, weights.short),
  medium: composite(scores, weights.medium),
  long: composite(scores, weights.long)
});
