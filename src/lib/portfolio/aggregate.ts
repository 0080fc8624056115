import type {
  CategoryScores,
  HoldingEvaluation,
  HorizonScores,
  Portfolio,
  PortfolioRisk
} from "@/src/lib/types";

/**
 * Allocation-weighted roll-up of holding scores.
 *
 * Holdings that could not be scored are dropped and the remaining weights are
 * renormalised to 1. Any exclusion or substituted metric marks the result as
 * degraded; `coverage` reports how much of the book the figures describe.
 */
export const aggregatePortfolio = (
  portfolio: Portfolio,
  evaluations: HoldingEvaluation[]
): PortfolioRisk => {
  const scoredIds = new Set(evaluations.map((item) => item.holdingId));
  const excluded = portfolio.holdings
    .filter((holding) => !scoredIds.has(holding.id))
    .map((holding) => holding.id);
  const coverage = evaluations.reduce((sum, item) => sum + item.weight, 0);
  const hasSubstitutions = evaluations.some((item) => item.issues.length > 0);
  const degraded = excluded.length > 0 || hasSubstitutions;

  if (evaluations.length === 0 || coverage <= 0) {
    return { categories: null, composite: null, degraded: true, excluded, coverage: 0 };
  }

  const weightedMean = (pick: (item: HoldingEvaluation) => number) =>
    evaluations.reduce((sum, item) => sum + (item.weight / coverage) * pick(item), 0);

  const categories: CategoryScores = {
    market: weightedMean((item) => item.score.categories.market),
    liquidity: weightedMean((item) => item.score.categories.liquidity),
    protocol: weightedMean((item) => item.score.categories.protocol),
    regulatory: weightedMean((item) => item.score.categories.regulatory)
  };
  const composite: HorizonScores = {
    short: weightedMean((item) => item.score.composite.short),
    medium: weightedMean((item) => item.score.composite.medium),
    long: weightedMean((item) => item.score.composite.long)
  };

  return { categories, composite, degraded, excluded, coverage };
};
