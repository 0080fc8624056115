import { describe, expect, it } from "vitest";
import { parseRiskQuery } from "../request";

describe("parseRiskQuery", () => {
  it("returns no overrides for an empty query", () => {
    expect(parseRiskQuery(new URLSearchParams())).toEqual({ success: true, settings: {} });
  });

  it("parses every supported setting", () => {
    const result = parseRiskQuery(
      new URLSearchParams("emphasis=long&historyDays=120&volatilityWindow=21&excludeStables=0")
    );
    expect(result).toEqual({
      success: true,
      settings: { emphasis: "long", historyDays: 120, volatilityWindow: 21, excludeStables: false }
    });
  });

  it("ignores blank parameters", () => {
    expect(parseRiskQuery(new URLSearchParams("historyDays=&emphasis=short"))).toEqual({
      success: true,
      settings: { emphasis: "short" }
    });
  });

  it("reports out-of-range and unknown values by field", () => {
    const result = parseRiskQuery(new URLSearchParams("historyDays=400&emphasis=weekly"));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]?.startsWith("emphasis: ")).toBe(true);
    expect(result.errors[1]?.startsWith("historyDays: ")).toBe(true);
  });
});
