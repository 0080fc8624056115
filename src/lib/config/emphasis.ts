import { RISK_CATEGORIES } from "@/src/lib/types";
import type { CategoryWeights, HorizonEmphasis, HorizonWeights } from "@/src/lib/types";

export type EmphasisConfig = {
  marketBoost: number;
  marketCap: number;
};

const DEFAULT_CONFIG: EmphasisConfig = {
  marketBoost: 0.1,
  marketCap: 0.7
};

const normalize = (weights: CategoryWeights): CategoryWeights => {
  const total = RISK_CATEGORIES.reduce((sum, category) => sum + weights[category], 0);
  if (total <= 0) return weights;
  return {
    market: weights.market / total,
    liquidity: weights.liquidity / total,
    protocol: weights.protocol / total,
    regulatory: weights.regulatory / total
  };
};

/**
 * Tilts one horizon toward market risk: the market weight is raised by
 * `marketBoost` (never past `marketCap`) and the vector is renormalised.
 * Other horizons are returned untouched.
 */
export const applyHorizonEmphasis = (
  weights: HorizonWeights,
  emphasis: HorizonEmphasis,
  config: Partial<EmphasisConfig> = {}
): HorizonWeights => {
  if (emphasis === "balanced") return weights;
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const current = weights[emphasis];
  const boosted = normalize({
    ...current,
    market: Math.min(current.market + cfg.marketBoost, cfg.marketCap)
  });
  return { ...weights, [emphasis]: boosted };
};
