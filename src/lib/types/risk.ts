export const RISK_CATEGORIES = ["market", "liquidity", "protocol", "regulatory"] as const;

export type RiskCategory = (typeof RISK_CATEGORIES)[number];

export const HORIZONS = ["short", "medium", "long"] as const;

export type Horizon = (typeof HORIZONS)[number];

export type CategoryScores = Readonly<Record<RiskCategory, number>>;

export type CategoryWeights = Readonly<Record<RiskCategory, number>>;

export type HorizonWeights = Readonly<Record<Horizon, CategoryWeights>>;

export type HorizonScores = Readonly<Record<Horizon, number>>;

export type RiskScore = {
  categories: CategoryScores;
  composite: HorizonScores;
};

/** One holding seen from a single horizon: its category scores and that horizon's composite. */
export type HorizonHoldingScore = {
  categories: CategoryScores;
  composite: number;
};

export type MissingMetricName =
  | "marketCap"
  | "volume24h"
  | "volatility"
  | "tvl"
  | "correlation";

export type RiskIssue =
  | {
      code: "MISSING_METRIC";
      holdingId: string;
      metric: MissingMetricName;
      message: string;
    }
  | {
      code: "DATA_FETCH_FAILURE";
      holdingId: string;
      message: string;
    };

export type MissingMetricIssue = Extract<RiskIssue, { code: "MISSING_METRIC" }>;

export type FetchFailure = Extract<RiskIssue, { code: "DATA_FETCH_FAILURE" }>;

export type ScoredComponent = {
  score: number;
  issues: MissingMetricIssue[];
};

export type HoldingEvaluation = {
  holdingId: string;
  weight: number;
  score: RiskScore;
  issues: MissingMetricIssue[];
};

export type PortfolioRisk = {
  categories: CategoryScores | null;
  composite: HorizonScores | null;
  degraded: boolean;
  excluded: string[];
  coverage: number;
};

export type PortfolioEvaluation = {
  horizons: Record<Horizon, Record<string, HorizonHoldingScore>>;
  holdings: HoldingEvaluation[];
  portfolio: PortfolioRisk;
  issues: RiskIssue[];
};
