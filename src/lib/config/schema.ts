import { z } from "zod";
import { InvalidConfigError } from "@/src/lib/errors";
import { CLASSIFICATIONS, RISK_CATEGORIES } from "@/src/lib/types";
import type { RiskModelConfig, TierTable } from "@/src/lib/types";

const SUM_TOLERANCE = 1e-6;

const sumsToOne = (values: number[]) =>
  Math.abs(values.reduce((sum, value) => sum + value, 0) - 1) <= SUM_TOLERANCE;

const fraction = z.number().finite().min(0).max(1);

const holdingSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  coingeckoId: z.string().trim().min(1),
  defillamaSlug: z.string().trim().min(1).nullable(),
  weight: fraction,
  classification: z.enum(CLASSIFICATIONS),
  pegPrice: z.number().positive().nullable()
});

const categoryWeightsSchema = z
  .object({
    market: fraction,
    liquidity: fraction,
    protocol: fraction,
    regulatory: fraction
  })
  .strict()
  .refine((weights) => sumsToOne(RISK_CATEGORIES.map((category) => weights[category])), {
    message: "category weights must sum to 1"
  });

const horizonWeightsSchema = z.object({
  short: categoryWeightsSchema,
  medium: categoryWeightsSchema,
  long: categoryWeightsSchema
});

const tierTableSchema = z
  .object({
    mode: z.enum(["below", "above"]),
    tiers: z.array(z.object({ limit: z.number().finite(), score: z.number().finite() })).min(1),
    otherwise: z.number().finite()
  })
  .refine(
    (table) =>
      table.tiers.every((tier, index) => {
        if (index === 0) return true;
        const previous = table.tiers[index - 1].limit;
        return table.mode === "below" ? tier.limit > previous : tier.limit < previous;
      }),
    { message: "tier limits must be strictly ordered for the lookup mode" }
  );

const configSchema = z
  .object({
    portfolio: z.object({
      startingNav: z.number().positive(),
      holdings: z.array(holdingSchema).min(1)
    }),
    horizonWeights: horizonWeightsSchema,
    thresholds: z.object({
      volatility: tierTableSchema,
      marketCap: tierTableSchema,
      correlation: tierTableSchema,
      liquidityRatio: tierTableSchema,
      tvl: tierTableSchema,
      marketBlend: z
        .object({ volatility: fraction, marketCap: fraction, correlation: fraction })
        .refine((blend) => sumsToOne([blend.volatility, blend.marketCap, blend.correlation]), {
          message: "market blend weights must sum to 1"
        }),
      stableMarketScore: z.number().finite(),
      untrackedProtocolScore: z.number().finite()
    }),
    scoreRange: z
      .object({ min: z.number().finite(), max: z.number().finite() })
      .refine((range) => range.min < range.max, { message: "score range min must be below max" }),
    marketData: z.object({
      historyDays: z.number().int().min(2),
      volatilityWindow: z.number().int().min(2),
      excludeStables: z.boolean(),
      benchmarks: z.object({
        btc: z.string().trim().min(1),
        eth: z.string().trim().min(1)
      })
    })
  })
  .superRefine((config, ctx) => {
    const { holdings } = config.portfolio;
    const weights = holdings.map((holding) => holding.weight);
    if (!sumsToOne(weights)) {
      const total = weights.reduce((sum, weight) => sum + weight, 0);
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["portfolio", "holdings"],
        message: `holding weights must sum to 1 (got ${total.toFixed(4)})`
      });
    }

    const seen = new Set<string>();
    holdings.forEach((holding, index) => {
      if (seen.has(holding.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["portfolio", "holdings", index, "id"],
          message: `duplicate holding id ${holding.id}`
        });
      }
      seen.add(holding.id);
    });

    const { min, max } = config.scoreRange;
    const inRange = (score: number) => score >= min && score <= max;
    const tables: Array<[string, TierTable]> = [
      ["volatility", config.thresholds.volatility],
      ["marketCap", config.thresholds.marketCap],
      ["correlation", config.thresholds.correlation],
      ["liquidityRatio", config.thresholds.liquidityRatio],
      ["tvl", config.thresholds.tvl]
    ];
    tables.forEach(([name, table]) => {
      const scores = [...table.tiers.map((tier) => tier.score), table.otherwise];
      if (!scores.every(inRange)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["thresholds", name],
          message: `tier scores must lie within ${min}-${max}`
        });
      }
    });

    (["stableMarketScore", "untrackedProtocolScore"] as const).forEach((key) => {
      if (!inRange(config.thresholds[key])) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["thresholds", key],
          message: `${key} must lie within ${min}-${max}`
        });
      }
    });
  });

const formatIssue = (issue: z.ZodIssue) => {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object") {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

export const createRiskModelConfig = (input: unknown): RiskModelConfig => {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(parsed.error.issues.map(formatIssue));
  }
  return deepFreeze(parsed.data);
};
