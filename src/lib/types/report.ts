import type { HorizonEmphasis } from "./config";
import type { MarketSnapshot } from "./market";
import type { FetchFailure, HorizonWeights, PortfolioEvaluation } from "./risk";
import type { PortfolioValuation } from "./valuation";

export type RiskRunSettings = {
  emphasis: HorizonEmphasis;
  historyDays: number;
  volatilityWindow: number;
  excludeStables: boolean;
};

export type RiskReport = {
  generatedAt: string;
  settings: RiskRunSettings;
  horizonWeights: HorizonWeights;
  evaluation: PortfolioEvaluation;
  snapshots: Record<string, MarketSnapshot>;
  valuation: PortfolioValuation;
  failures: FetchFailure[];
};
