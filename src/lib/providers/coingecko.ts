import { readProviderEnv } from "@/src/lib/config/env";
import { DataFetchFailureError } from "@/src/lib/errors";
import type { MarketQuote } from "@/src/lib/types";
import { buildQuery, coerceNumber, isRecord, requestJson } from "./http";
import type { RequestPolicy } from "./http";

const PROVIDER = "coingecko";
const DEFAULT_BASE_URL = "https://api.coingecko.com/api/v3";
const DEFAULT_RETRY_DELAY_MS = 250;

export type CoinGeckoClientOptions = {
  apiKey?: string;
  baseUrl?: string;
} & Partial<RequestPolicy>;

export class CoinGeckoClient {
  private apiKey: string;
  private baseUrl: string;
  private policy: RequestPolicy;

  constructor(options: CoinGeckoClientOptions = {}) {
    const env = readProviderEnv();
    this.apiKey = options.apiKey ?? env.COINGECKO_API_KEY ?? "";
    this.baseUrl = options.baseUrl ?? env.COINGECKO_BASE_URL ?? DEFAULT_BASE_URL;
    this.policy = {
      timeoutMs: options.timeoutMs ?? env.RISK_FETCH_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? env.RISK_FETCH_MAX_RETRIES,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    };
  }

  get hasApiKey() {
    return this.apiKey.length > 0;
  }

  private request(path: string, query: Record<string, string | number | undefined>) {
    return requestJson({
      provider: PROVIDER,
      url: `${this.baseUrl}${path}${buildQuery(query)}`,
      headers: this.hasApiKey ? { "x-cg-pro-api-key": this.apiKey } : undefined,
      policy: this.policy
    });
  }

  async getMarkets(ids: readonly string[]): Promise<Record<string, MarketQuote>> {
    const uniqueIds = Array.from(new Set(ids.filter(Boolean))).sort();
    if (uniqueIds.length === 0) return {};

    const payload = await this.request("/coins/markets", {
      vs_currency: "usd",
      ids: uniqueIds.join(","),
      per_page: 250,
      page: 1
    });

    if (!Array.isArray(payload)) {
      throw new DataFetchFailureError(PROVIDER, "markets response is not a list");
    }

    const quotes: Record<string, MarketQuote> = {};
    payload.forEach((row) => {
      if (!isRecord(row) || typeof row.id !== "string") return;
      quotes[row.id] = {
        price: coerceNumber(row.current_price),
        marketCap: coerceNumber(row.market_cap),
        volume24h: coerceNumber(row.total_volume)
      };
    });
    return quotes;
  }

  async getPriceHistory(id: string, days: number): Promise<number[]> {
    const payload = await this.request(`/coins/${encodeURIComponent(id)}/market_chart`, {
      vs_currency: "usd",
      days,
      interval: "daily"
    });

    if (!isRecord(payload) || !Array.isArray(payload.prices)) {
      throw new DataFetchFailureError(PROVIDER, `price history for ${id} is malformed`);
    }

    return payload.prices
      .map((point) => (Array.isArray(point) ? coerceNumber(point[1]) : null))
      .filter((price): price is number => price !== null);
  }
}
