import { rollingVolatility, returnCorrelation } from "@/src/lib/analytics/returns";
import { RunCache } from "@/src/lib/cache/memory";
import { describeError } from "@/src/lib/errors";
import { moduleLogger } from "@/src/lib/logger";
import type { CoinGeckoClient } from "@/src/lib/providers/coingecko";
import type { DefiLlamaClient } from "@/src/lib/providers/defillama";
import type {
  FetchFailure,
  Holding,
  MarketDataSettings,
  MarketQuote,
  MarketSnapshot,
  Portfolio
} from "@/src/lib/types";

const log = moduleLogger("snapshots");

const KEYED_SPACING_MS = 250;
const PUBLIC_SPACING_MS = 1000;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export type MarketDataClients = {
  coingecko: Pick<CoinGeckoClient, "getMarkets" | "getPriceHistory" | "hasApiKey">;
  defillama: Pick<DefiLlamaClient, "getProtocolTvl">;
};

export type SnapshotBuildOptions = Pick<
  MarketDataSettings,
  "historyDays" | "volatilityWindow" | "excludeStables" | "benchmarks"
> & {
  requestSpacingMs?: number;
  now?: () => Date;
};

export type SnapshotBuildResult = {
  snapshots: Record<string, MarketSnapshot>;
  failures: FetchFailure[];
};

const fetchFailure = (holdingId: string, message: string): FetchFailure => ({
  code: "DATA_FETCH_FAILURE",
  holdingId,
  message
});

const usesHistory = (holding: Holding, excludeStables: boolean) =>
  !(excludeStables && holding.classification === "stable");

/**
 * Fetch layer for one evaluation: a batch quote request, daily price history
 * for volatility and BTC/ETH correlation, and protocol TVL.
 *
 * A failed quote request removes the affected holdings (returned as
 * failures). History and TVL failures only blank the metric, which the
 * scoring engine then treats as maximum risk.
 */
export const buildMarketSnapshots = async (
  portfolio: Portfolio,
  options: SnapshotBuildOptions,
  clients: MarketDataClients
): Promise<SnapshotBuildResult> => {
  const now = options.now ?? (() => new Date());
  const spacingMs =
    options.requestSpacingMs ??
    (clients.coingecko.hasApiKey ? KEYED_SPACING_MS : PUBLIC_SPACING_MS);
  const failures: FetchFailure[] = [];

  let quotes: Record<string, MarketQuote>;
  try {
    quotes = await clients.coingecko.getMarkets(
      portfolio.holdings.map((holding) => holding.coingeckoId)
    );
  } catch (error) {
    const message = describeError(error, "Market data request failed.");
    log.warn({ err: message }, "market quotes unavailable");
    return {
      snapshots: {},
      failures: portfolio.holdings.map((holding) => fetchFailure(holding.id, message))
    };
  }

  const historyCache = new RunCache<number[]>();
  let requests = 0;

  const loadHistory = async (coingeckoId: string): Promise<number[] | null> => {
    try {
      return await historyCache.withCache(coingeckoId, async () => {
        if (requests > 0 && spacingMs > 0) await sleep(spacingMs);
        requests += 1;
        return clients.coingecko.getPriceHistory(coingeckoId, options.historyDays);
      });
    } catch (error) {
      log.warn({ coingeckoId, err: describeError(error) }, "price history unavailable");
      return null;
    }
  };

  const loadTvl = async (slug: string): Promise<number | null> => {
    try {
      return await clients.defillama.getProtocolTvl(slug);
    } catch (error) {
      log.warn({ slug, err: describeError(error) }, "protocol TVL unavailable");
      return null;
    }
  };

  const btcHistory = await loadHistory(options.benchmarks.btc);
  const ethHistory = await loadHistory(options.benchmarks.eth);
  const asOf = now().toISOString();
  const snapshots: Record<string, MarketSnapshot> = {};

  for (const holding of portfolio.holdings) {
    const quote = quotes[holding.coingeckoId];
    if (!quote) {
      failures.push(fetchFailure(holding.id, `${holding.id}: no market data returned.`));
      continue;
    }

    let volatility: number | null = null;
    let correlation: MarketSnapshot["correlation"] = { btc: null, eth: null };
    if (usesHistory(holding, options.excludeStables)) {
      const history = await loadHistory(holding.coingeckoId);
      if (history) {
        volatility = rollingVolatility(history, options.volatilityWindow);
        correlation = {
          btc: btcHistory ? returnCorrelation(history, btcHistory) : null,
          eth: ethHistory ? returnCorrelation(history, ethHistory) : null
        };
      }
    }

    const tvl = holding.defillamaSlug ? await loadTvl(holding.defillamaSlug) : null;

    snapshots[holding.id] = {
      holdingId: holding.id,
      ...quote,
      volatility,
      tvl,
      correlation,
      asOf
    };
  }

  if (failures.length > 0) {
    log.warn({ failed: failures.map((failure) => failure.holdingId) }, "holdings without market data");
  }

  return { snapshots, failures };
};
