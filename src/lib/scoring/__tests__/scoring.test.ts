import { describe, expect, it } from "vitest";
import { DEFAULT_RISK_MODEL_CONFIG } from "@/src/lib/config/defaults";
import type { CategoryScores, CategoryWeights } from "@/src/lib/types";
import { composite, compositeByHorizon } from "../composite";
import { scoreLiquidityRisk } from "../liquidity";
import { marketCapTier, scoreMarketRisk } from "../market";
import { scoreProtocolRisk, untrackedProtocolRisk } from "../protocol";
import { scoreRegulatoryRisk } from "../regulatory";
import { isPresent, lookupTier } from "../tiers";

const { thresholds, scoreRange } = DEFAULT_RISK_MODEL_CONFIG;

describe("isPresent", () => {
  it("accepts finite numbers only", () => {
    expect(isPresent(0)).toBe(true);
    expect(isPresent(-2.5)).toBe(true);
    expect(isPresent(null)).toBe(false);
    expect(isPresent(undefined)).toBe(false);
    expect(isPresent(Number.NaN)).toBe(false);
    expect(isPresent(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isPresent(Number.NEGATIVE_INFINITY)).toBe(false);
  });
});

describe("tier lookup", () => {
  it("uses strict bounds for below-mode tables", () => {
    expect(lookupTier(0.3, thresholds.volatility)).toBe(1);
    expect(lookupTier(0.5, thresholds.volatility)).toBe(3);
    expect(lookupTier(0.99, thresholds.volatility)).toBe(3);
    expect(lookupTier(1, thresholds.volatility)).toBe(5);
  });

  it("uses strict bounds for above-mode tables", () => {
    expect(marketCapTier(20_000_000_000, thresholds)).toBe(1);
    expect(marketCapTier(10_000_000_000, thresholds)).toBe(3);
    expect(marketCapTier(500_000_000, thresholds)).toBe(5);
  });
});

describe("market risk", () => {
  const base = {
    holdingId: "TKN",
    classification: "other" as const,
    volatility: 0.4,
    marketCap: 50_000_000_000,
    correlation: { btc: 0.9, eth: 0.8 }
  };

  it("gives stables the flat stable score without reading metrics", () => {
    const result = scoreMarketRisk(
      { ...base, classification: "stable", volatility: null, marketCap: null },
      thresholds,
      scoreRange
    );
    expect(result).toEqual({ score: 1.5, issues: [] });
  });

  it("blends volatility, cap and correlation tiers", () => {
    expect(scoreMarketRisk(base, thresholds, scoreRange).score).toBe(1.8);

    const midTier = scoreMarketRisk(
      { ...base, volatility: 0.7, marketCap: 2_000_000_000, correlation: { btc: -0.5, eth: 0.5 } },
      thresholds,
      scoreRange
    );
    expect(midTier.score).toBe(3);
  });

  it("scores missing metrics at the top tier and reports each one", () => {
    const result = scoreMarketRisk(
      { ...base, volatility: null, marketCap: Number.NaN, correlation: { btc: null, eth: 0.5 } },
      thresholds,
      scoreRange
    );
    expect(result.score).toBe(5);
    expect(result.issues.map((issue) => issue.metric)).toEqual([
      "volatility",
      "marketCap",
      "correlation"
    ]);
  });

  it("stays inside the score range for any input", () => {
    const volatilities = [null, 0, 0.2, 0.5, 0.9, 1, 4];
    const caps = [null, 0, 1, 2_000_000_000, 1e13];
    const correlations = [null, -1, -0.2, 0.4, 0.7, 1];

    volatilities.forEach((volatility) =>
      caps.forEach((marketCap) =>
        correlations.forEach((btc) => {
          const { score } = scoreMarketRisk(
            { ...base, volatility, marketCap, correlation: { btc, eth: 0.1 } },
            thresholds,
            scoreRange
          );
          expect(score).toBeGreaterThanOrEqual(1);
          expect(score).toBeLessThanOrEqual(5);
        })
      )
    );
  });
});

describe("liquidity risk", () => {
  const score = (volume24h: number | null, marketCap: number | null) =>
    scoreLiquidityRisk({ holdingId: "TKN", volume24h, marketCap }, thresholds, scoreRange);

  it("buckets the volume-to-cap ratio", () => {
    expect(score(1_000_000_000, 10_000_000_000).score).toBe(1);
    expect(score(500_000_000, 10_000_000_000).score).toBe(3);
    expect(score(200_000_000, 10_000_000_000).score).toBe(3);
    expect(score(10_000_000, 10_000_000_000).score).toBe(5);
  });

  it("fails closed on missing volume or a non-positive cap", () => {
    expect(score(null, 10_000_000_000)).toEqual({
      score: 5,
      issues: [
        {
          code: "MISSING_METRIC",
          holdingId: "TKN",
          metric: "volume24h",
          message: "TKN: volume24h unavailable, scored at maximum risk."
        }
      ]
    });
    const zeroCap = score(1_000_000, 0);
    expect(zeroCap.score).toBe(5);
    expect(zeroCap.issues.map((issue) => issue.metric)).toEqual(["marketCap"]);
  });
});

describe("protocol risk", () => {
  const score = (tvl: number | null) =>
    scoreProtocolRisk({ holdingId: "TKN", tvl }, thresholds, scoreRange);

  it("tiers by TVL magnitude", () => {
    expect(score(2_000_000_000).score).toBe(1);
    expect(score(500_000_000).score).toBe(3);
    expect(score(50_000_000).score).toBe(5);
  });

  it("substitutes maximum protocol risk when TVL is missing", () => {
    const result = score(null);
    expect(result.score).toBe(5);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]?.metric).toBe("tvl");
  });

  it("uses the flat score for untracked protocols", () => {
    expect(untrackedProtocolRisk(thresholds)).toEqual({ score: 3, issues: [] });
  });
});

describe("regulatory risk", () => {
  it("is a fixed table keyed by classification", () => {
    expect(scoreRegulatoryRisk("stable")).toBe(3);
    expect(scoreRegulatoryRisk("blue-chip")).toBe(2);
    expect(scoreRegulatoryRisk("other")).toBe(4);
  });
});

describe("composite", () => {
  const scores: CategoryScores = { market: 2, liquidity: 1, protocol: 3, regulatory: 3 };

  it("equals the weighted sum of category scores", () => {
    const weights: CategoryWeights = DEFAULT_RISK_MODEL_CONFIG.horizonWeights.medium;
    const expected =
      scores.market * weights.market +
      scores.liquidity * weights.liquidity +
      scores.protocol * weights.protocol +
      scores.regulatory * weights.regulatory;

    expect(composite(scores, weights)).toBe(expected);
  });

  it("computes every horizon from its own weight vector", () => {
    const result = compositeByHorizon(scores, DEFAULT_RISK_MODEL_CONFIG.horizonWeights);
    expect(result.short).toBeCloseTo(1.8, 10);
    expect(result.medium).toBeCloseTo(2.3, 10);
    expect(result.long).toBeCloseTo(2.6, 10);
  });
});
