import type { Classification, Portfolio } from "./holding";
import type { Horizon, HorizonWeights } from "./risk";

export type Tier = {
  limit: number;
  score: number;
};

export type TierTable = {
  mode: "below" | "above";
  tiers: readonly Tier[];
  otherwise: number;
};

export type MarketBlend = {
  volatility: number;
  marketCap: number;
  correlation: number;
};

export type RiskThresholds = {
  volatility: TierTable;
  marketCap: TierTable;
  correlation: TierTable;
  liquidityRatio: TierTable;
  tvl: TierTable;
  marketBlend: MarketBlend;
  stableMarketScore: number;
  untrackedProtocolScore: number;
};

export type ScoreRange = {
  min: number;
  max: number;
};

export type BenchmarkIds = {
  btc: string;
  eth: string;
};

export type MarketDataSettings = {
  historyDays: number;
  volatilityWindow: number;
  excludeStables: boolean;
  benchmarks: BenchmarkIds;
};

export type RiskModelConfig = {
  portfolio: Portfolio;
  horizonWeights: HorizonWeights;
  thresholds: RiskThresholds;
  scoreRange: ScoreRange;
  marketData: MarketDataSettings;
};

export type HorizonEmphasis = "balanced" | Horizon;

export type RegulatoryTable = Readonly<Record<Classification, number>>;
