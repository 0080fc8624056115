import { applyHorizonEmphasis } from "@/src/lib/config/emphasis";
import { DEFAULT_RISK_MODEL_CONFIG } from "@/src/lib/config/defaults";
import { moduleLogger } from "@/src/lib/logger";
import { buildValuation } from "@/src/lib/portfolio/valuation";
import { CoinGeckoClient } from "@/src/lib/providers/coingecko";
import { DefiLlamaClient } from "@/src/lib/providers/defillama";
import { evaluate } from "@/src/lib/scoring/engine";
import { buildMarketSnapshots } from "@/src/lib/snapshots/builder";
import type { MarketDataClients } from "@/src/lib/snapshots/builder";
import type { RiskModelConfig, RiskReport, RiskRunSettings } from "@/src/lib/types";

const log = moduleLogger("risk.run");

export type RiskRunDeps = {
  config?: RiskModelConfig;
  clients?: MarketDataClients;
  requestSpacingMs?: number;
  now?: () => Date;
};

export const defaultRunSettings = (config: RiskModelConfig): RiskRunSettings => ({
  emphasis: "balanced",
  historyDays: config.marketData.historyDays,
  volatilityWindow: config.marketData.volatilityWindow,
  excludeStables: config.marketData.excludeStables
});

const createClients = (): MarketDataClients => ({
  coingecko: new CoinGeckoClient(),
  defillama: new DefiLlamaClient()
});

/** config → fetch → score for one dashboard refresh. */
export const runRiskModel = async (
  settings: Partial<RiskRunSettings> = {},
  deps: RiskRunDeps = {}
): Promise<RiskReport> => {
  const config = deps.config ?? DEFAULT_RISK_MODEL_CONFIG;
  const now = deps.now ?? (() => new Date());
  const resolved: RiskRunSettings = { ...defaultRunSettings(config), ...settings };
  const startedAt = Date.now();

  const horizonWeights = applyHorizonEmphasis(config.horizonWeights, resolved.emphasis);

  const { snapshots, failures } = await buildMarketSnapshots(
    config.portfolio,
    {
      historyDays: resolved.historyDays,
      volatilityWindow: resolved.volatilityWindow,
      excludeStables: resolved.excludeStables,
      benchmarks: config.marketData.benchmarks,
      requestSpacingMs: deps.requestSpacingMs,
      now
    },
    deps.clients ?? createClients()
  );

  const evaluation = evaluate(
    config.portfolio,
    snapshots,
    { horizonWeights, thresholds: config.thresholds, scoreRange: config.scoreRange },
    failures
  );

  log.info(
    {
      durationMs: Date.now() - startedAt,
      scored: evaluation.holdings.length,
      degraded: evaluation.portfolio.degraded,
      excluded: evaluation.portfolio.excluded
    },
    "risk run complete"
  );

  return {
    generatedAt: now().toISOString(),
    settings: resolved,
    horizonWeights,
    evaluation,
    snapshots,
    valuation: buildValuation(config.portfolio, snapshots),
    failures
  };
};
