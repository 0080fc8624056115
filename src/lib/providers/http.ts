import { DataFetchFailureError, describeError } from "@/src/lib/errors";
import { moduleLogger } from "@/src/lib/logger";

const log = moduleLogger("providers.http");

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export type RequestPolicy = {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
};

export type JsonRequest = {
  provider: string;
  url: string;
  headers?: Record<string, string>;
  policy: RequestPolicy;
};

export const buildQuery = (query?: Record<string, string | number | boolean | undefined>) => {
  if (!query) return "";
  const params = new URLSearchParams();
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined) return;
    params.append(key, String(value));
  });
  const qs = params.toString();
  return qs ? `?${qs}` : "";
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const coerceNumber = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  return null;
};

const isRetryableStatus = (status: number) => status === 408 || status === 429 || status >= 500;

// Waits never exceed one attempt's timeout, whatever `retry-after` asks for.
const retryDelay = (response: Response | null, attempt: number, policy: RequestPolicy) => {
  const retryAfter = Number(response?.headers.get("retry-after"));
  const requested =
    Number.isFinite(retryAfter) && retryAfter > 0
      ? retryAfter * 1000
      : policy.retryDelayMs * 2 ** attempt;
  return Math.min(requested, policy.timeoutMs);
};

/**
 * GETs a JSON document. Each attempt is bounded by `policy.timeoutMs`; network
 * errors, timeouts, 408, 429 and 5xx are retried up to `policy.maxRetries`
 * times, waiting at most `policy.timeoutMs` between attempts. Everything else
 * surfaces as a `DataFetchFailureError`.
 */
export const requestJson = async ({
  provider,
  url,
  headers,
  policy
}: JsonRequest): Promise<unknown> => {
  for (let attempt = 0; attempt <= policy.maxRetries; attempt += 1) {
    const isLastAttempt = attempt === policy.maxRetries;
    let response: Response;

    try {
      response = await fetch(url, {
        headers: { Accept: "application/json", ...headers },
        signal: AbortSignal.timeout(policy.timeoutMs)
      });
    } catch (error) {
      if (isLastAttempt) {
        throw new DataFetchFailureError(provider, `request to ${url} failed: ${describeError(error)}`, {
          cause: error
        });
      }
      log.warn({ provider, url, attempt, err: describeError(error) }, "request failed, retrying");
      await sleep(retryDelay(null, attempt, policy));
      continue;
    }

    if (response.ok) {
      try {
        return await response.json();
      } catch (error) {
        throw new DataFetchFailureError(provider, `invalid JSON from ${url}`, {
          status: response.status,
          cause: error
        });
      }
    }

    if (!isRetryableStatus(response.status) || isLastAttempt) {
      const body = await response.text().catch(() => "");
      throw new DataFetchFailureError(
        provider,
        `HTTP ${response.status} from ${url}${body ? `: ${body.slice(0, 200)}` : ""}`,
        { status: response.status }
      );
    }

    log.warn({ provider, url, attempt, status: response.status }, "retryable response, retrying");
    await sleep(retryDelay(response, attempt, policy));
  }

  throw new DataFetchFailureError(provider, `request to ${url} failed after retries`);
};
