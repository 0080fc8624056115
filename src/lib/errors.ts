export type RiskModelErrorCode = "DATA_FETCH_FAILURE" | "INVALID_CONFIG";

export class RiskModelError extends Error {
  readonly code: RiskModelErrorCode;

  constructor(code: RiskModelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DataFetchFailureError extends RiskModelError {
  readonly provider: string;
  readonly status: number | null;

  constructor(
    provider: string,
    message: string,
    details: { status?: number | null; cause?: unknown } = {}
  ) {
    super("DATA_FETCH_FAILURE", `${provider}: ${message}`, { cause: details.cause });
    this.provider = provider;
    this.status = details.status ?? null;
  }
}

export class InvalidConfigError extends RiskModelError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `Invalid risk model configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export const describeError = (error: unknown, fallback = "Unknown error") =>
  error instanceof Error ? error.message : fallback;
