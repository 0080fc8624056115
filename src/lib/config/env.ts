import { z } from "zod";
import { InvalidConfigError } from "@/src/lib/errors";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const providerEnvSchema = z.object({
  COINGECKO_API_KEY: optionalString,
  COINGECKO_BASE_URL: optionalString.pipe(z.string().url().optional()),
  DEFILLAMA_BASE_URL: optionalString.pipe(z.string().url().optional()),
  RISK_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(25_000),
  RISK_FETCH_MAX_RETRIES: z.coerce.number().int().min(0).max(3).default(1)
});

export type ProviderEnv = z.infer<typeof providerEnvSchema>;

export const readProviderEnv = (env: Partial<NodeJS.ProcessEnv> = process.env): ProviderEnv => {
  const parsed = providerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
};
