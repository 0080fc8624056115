import { readProviderEnv } from "@/src/lib/config/env";
import { DataFetchFailureError } from "@/src/lib/errors";
import { coerceNumber, requestJson } from "./http";
import type { RequestPolicy } from "./http";

const PROVIDER = "defillama";
const DEFAULT_BASE_URL = "https://api.llama.fi";
const DEFAULT_RETRY_DELAY_MS = 250;

export type DefiLlamaClientOptions = {
  baseUrl?: string;
} & Partial<RequestPolicy>;

export class DefiLlamaClient {
  private baseUrl: string;
  private policy: RequestPolicy;

  constructor(options: DefiLlamaClientOptions = {}) {
    const env = readProviderEnv();
    this.baseUrl = options.baseUrl ?? env.DEFILLAMA_BASE_URL ?? DEFAULT_BASE_URL;
    this.policy = {
      timeoutMs: options.timeoutMs ?? env.RISK_FETCH_TIMEOUT_MS,
      maxRetries: options.maxRetries ?? env.RISK_FETCH_MAX_RETRIES,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    };
  }

  async getProtocolTvl(slug: string): Promise<number> {
    const payload = await requestJson({
      provider: PROVIDER,
      url: `${this.baseUrl}/tvl/${encodeURIComponent(slug)}`,
      policy: this.policy
    });

    const tvl = coerceNumber(payload);
    if (tvl === null) {
      throw new DataFetchFailureError(PROVIDER, `TVL for ${slug} is not a number`);
    }
    return tvl;
  }
}
