import modelPortfolio from "./data/model-portfolio.json";
import { createRiskModelConfig } from "./schema";

export const DEFAULT_HORIZON_WEIGHTS = {
  short: { market: 0.4, liquidity: 0.4, protocol: 0.1, regulatory: 0.1 },
  medium: { market: 0.3, liquidity: 0.2, protocol: 0.3, regulatory: 0.2 },
  long: { market: 0.2, liquidity: 0.1, protocol: 0.4, regulatory: 0.3 }
};

export const DEFAULT_THRESHOLDS = {
  volatility: {
    mode: "below",
    tiers: [
      { limit: 0.5, score: 1 },
      { limit: 1, score: 3 }
    ],
    otherwise: 5
  },
  marketCap: {
    mode: "above",
    tiers: [
      { limit: 10_000_000_000, score: 1 },
      { limit: 1_000_000_000, score: 3 }
    ],
    otherwise: 5
  },
  correlation: {
    mode: "below",
    tiers: [
      { limit: 0.4, score: 1 },
      { limit: 0.7, score: 3 }
    ],
    otherwise: 5
  },
  liquidityRatio: {
    mode: "above",
    tiers: [
      { limit: 0.05, score: 1 },
      { limit: 0.01, score: 3 }
    ],
    otherwise: 5
  },
  tvl: {
    mode: "above",
    tiers: [
      { limit: 1_000_000_000, score: 1 },
      { limit: 100_000_000, score: 3 }
    ],
    otherwise: 5
  },
  marketBlend: { volatility: 0.5, marketCap: 0.3, correlation: 0.2 },
  stableMarketScore: 1.5,
  untrackedProtocolScore: 3
};

export const DEFAULT_MARKET_DATA = {
  historyDays: 90,
  volatilityWindow: 30,
  excludeStables: true,
  benchmarks: { btc: "bitcoin", eth: "ethereum" }
};

export const DEFAULT_RISK_MODEL_INPUT = {
  portfolio: modelPortfolio,
  horizonWeights: DEFAULT_HORIZON_WEIGHTS,
  thresholds: DEFAULT_THRESHOLDS,
  scoreRange: { min: 1, max: 5 },
  marketData: DEFAULT_MARKET_DATA
};

// Throws InvalidConfigError on import when the model portfolio is malformed.
export const DEFAULT_RISK_MODEL_CONFIG = createRiskModelConfig(DEFAULT_RISK_MODEL_INPUT);
