import { z } from "zod";
import { HORIZONS } from "@/src/lib/types";
import type { RiskRunSettings } from "@/src/lib/types";

const EMPHASES = ["balanced", ...HORIZONS] as const;

const booleanParam = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const runQuerySchema = z.object({
  emphasis: z.enum(EMPHASES).optional(),
  historyDays: z.coerce.number().int().min(45).max(180).optional(),
  volatilityWindow: z.coerce.number().int().min(14).max(60).optional(),
  excludeStables: booleanParam.optional()
});

export type RiskQueryResult =
  | { success: true; settings: Partial<RiskRunSettings> }
  | { success: false; errors: string[] };

export const parseRiskQuery = (params: URLSearchParams): RiskQueryResult => {
  const raw = Object.fromEntries(
    Array.from(params.entries()).filter(([, value]) => value.trim().length > 0)
  );
  const parsed = runQuerySchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    };
  }

  const settings: Partial<RiskRunSettings> = {};
  if (parsed.data.emphasis !== undefined) settings.emphasis = parsed.data.emphasis;
  if (parsed.data.historyDays !== undefined) settings.historyDays = parsed.data.historyDays;
  if (parsed.data.volatilityWindow !== undefined) {
    settings.volatilityWindow = parsed.data.volatilityWindow;
  }
  if (parsed.data.excludeStables !== undefined) {
    settings.excludeStables = parsed.data.excludeStables;
  }
  return { success: true, settings };
};
