export { CLASSIFICATIONS } from "./holding";
export type { Classification, Holding, Portfolio } from "./holding";
export type { CorrelationPair, MarketQuote, MarketSnapshot } from "./market";
export { HORIZONS, RISK_CATEGORIES } from "./risk";
export type {
  CategoryScores,
  CategoryWeights,
  FetchFailure,
  HoldingEvaluation,
  Horizon,
  HorizonHoldingScore,
  HorizonScores,
  HorizonWeights,
  MissingMetricIssue,
  MissingMetricName,
  PortfolioEvaluation,
  PortfolioRisk,
  RiskCategory,
  RiskIssue,
  RiskScore,
  ScoredComponent
} from "./risk";
export type {
  BenchmarkIds,
  HorizonEmphasis,
  MarketBlend,
  MarketDataSettings,
  RegulatoryTable,
  RiskModelConfig,
  RiskThresholds,
  ScoreRange,
  Tier,
  TierTable
} from "./config";
export type { RiskReport, RiskRunSettings } from "./report";
export type { HoldingValuation, PortfolioValuation } from "./valuation";
