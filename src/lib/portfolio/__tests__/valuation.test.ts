import { describe, expect, it } from "vitest";
import type { MarketSnapshot, Portfolio } from "@/src/lib/types";
import { buildValuation } from "../valuation";

const portfolio: Portfolio = {
  startingNav: 100_000,
  holdings: [
    {
      id: "AAA",
      name: "Alpha",
      coingeckoId: "aaa",
      defillamaSlug: "aaa-protocol",
      weight: 0.5,
      classification: "other",
      pegPrice: null
    },
    {
      id: "STB",
      name: "Stable Dollar",
      coingeckoId: "stb",
      defillamaSlug: null,
      weight: 0.3,
      classification: "stable",
      pegPrice: 1
    },
    {
      id: "CCC",
      name: "Gamma",
      coingeckoId: "ccc",
      defillamaSlug: null,
      weight: 0.2,
      classification: "other",
      pegPrice: null
    }
  ]
};

const snapshot = (holdingId: string, price: number | null): MarketSnapshot => ({
  holdingId,
  price,
  marketCap: null,
  volume24h: null,
  volatility: null,
  tvl: null,
  correlation: { btc: null, eth: null },
  asOf: "2026-01-01T00:00:00.000Z"
});

describe("buildValuation", () => {
  it("sizes each holding from its target allocation and live price", () => {
    const valuation = buildValuation(portfolio, {
      AAA: snapshot("AAA", 10),
      STB: snapshot("STB", 0.5),
      CCC: snapshot("CCC", 4)
    });

    expect(valuation.holdings[0]).toEqual({
      holdingId: "AAA",
      weight: 0.5,
      targetUsd: 50_000,
      price: 10,
      pricePinned: false,
      units: 5000,
      currentValue: 50_000
    });
    expect(valuation.holdings[1]?.units).toBe(60_000);
    expect(valuation.nav).toBe(100_000);
    expect(valuation.unpriced).toEqual([]);
  });

  it("pins pegged holdings to their peg when no price is available", () => {
    const valuation = buildValuation(portfolio, { AAA: snapshot("AAA", 10), STB: snapshot("STB", null) });

    expect(valuation.holdings[1]).toMatchObject({ price: 1, pricePinned: true, units: 30_000 });
    expect(valuation.holdings[2]).toMatchObject({ price: null, units: null, currentValue: null });
    expect(valuation.unpriced).toEqual(["CCC"]);
    expect(valuation.nav).toBe(80_000);
  });
});
