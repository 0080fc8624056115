import { aggregatePortfolio } from "@/src/lib/portfolio/aggregate";
import type {
  FetchFailure,
  Holding,
  HoldingEvaluation,
  Horizon,
  HorizonHoldingScore,
  MarketSnapshot,
  Portfolio,
  PortfolioEvaluation,
  RiskIssue,
  RiskModelConfig
} from "@/src/lib/types";
import { compositeByHorizon } from "./composite";
import { scoreLiquidityRisk } from "./liquidity";
import { scoreMarketRisk } from "./market";
import { scoreProtocolRisk, untrackedProtocolRisk } from "./protocol";
import { scoreRegulatoryRisk } from "./regulatory";

export const scoreHolding = (
  holding: Holding,
  snapshot: MarketSnapshot,
  config: Pick<RiskModelConfig, "horizonWeights" | "thresholds" | "scoreRange">
): HoldingEvaluation => {
  const { thresholds, scoreRange } = config;

  const market = scoreMarketRisk(
    {
      holdingId: holding.id,
      classification: holding.classification,
      volatility: snapshot.volatility,
      marketCap: snapshot.marketCap,
      correlation: snapshot.correlation
    },
    thresholds,
    scoreRange
  );
  const liquidity = scoreLiquidityRisk(
    { holdingId: holding.id, volume24h: snapshot.volume24h, marketCap: snapshot.marketCap },
    thresholds,
    scoreRange
  );
  const protocol =
    holding.defillamaSlug === null
      ? untrackedProtocolRisk(thresholds)
      : scoreProtocolRisk({ holdingId: holding.id, tvl: snapshot.tvl }, thresholds, scoreRange);

  const categories = {
    market: market.score,
    liquidity: liquidity.score,
    protocol: protocol.score,
    regulatory: scoreRegulatoryRisk(holding.classification)
  };

  // marketCap feeds both market and liquidity; report the gap once.
  const issues = [...market.issues, ...liquidity.issues, ...protocol.issues].filter(
    (issue, index, all) => all.findIndex((other) => other.metric === issue.metric) === index
  );

  return {
    holdingId: holding.id,
    weight: holding.weight,
    score: {
      categories,
      composite: compositeByHorizon(categories, config.horizonWeights)
    },
    issues
  };
};

const fetchFailureFor = (holding: Holding, failures: FetchFailure[]): FetchFailure =>
  failures.find((failure) => failure.holdingId === holding.id) ?? {
    code: "DATA_FETCH_FAILURE",
    holdingId: holding.id,
    message: `${holding.id}: no market snapshot available.`
  };

/**
 * Scores every holding that has a snapshot and rolls the results up to the
 * portfolio. Holdings without a snapshot are reported as fetch failures and
 * left out of the portfolio figures (see `aggregatePortfolio`).
 *
 * Pure: performs no I/O and never throws for missing market data.
 */
export const evaluate = (
  portfolio: Portfolio,
  snapshots: Readonly<Record<string, MarketSnapshot>>,
  config: Pick<RiskModelConfig, "horizonWeights" | "thresholds" | "scoreRange">,
  failures: FetchFailure[] = []
): PortfolioEvaluation => {
  const holdings: HoldingEvaluation[] = [];
  const issues: RiskIssue[] = [];

  portfolio.holdings.forEach((holding) => {
    const snapshot = snapshots[holding.id];
    if (!snapshot) {
      issues.push(fetchFailureFor(holding, failures));
      return;
    }
    const evaluation = scoreHolding(holding, snapshot, config);
    holdings.push(evaluation);
    issues.push(...evaluation.issues);
  });

  const scoresFor = (horizon: Horizon): Record<string, HorizonHoldingScore> =>
    Object.fromEntries(
      holdings.map((item): [string, HorizonHoldingScore] => [
        item.holdingId,
        { categories: item.score.categories, composite: item.score.composite[horizon] }
      ])
    );
  const horizons: Record<Horizon, Record<string, HorizonHoldingScore>> = {
    short: scoresFor("short"),
    medium: scoresFor("medium"),
    long: scoresFor("long")
  };

  return {
    horizons,
    holdings,
    portfolio: aggregatePortfolio(portfolio, holdings),
    issues
  };
};
