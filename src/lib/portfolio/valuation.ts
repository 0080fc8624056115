import type {
  HoldingValuation,
  MarketSnapshot,
  Portfolio,
  PortfolioValuation
} from "@/src/lib/types";

const isPositivePrice = (value: number | null | undefined): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

export const buildValuation = (
  portfolio: Portfolio,
  snapshots: Readonly<Record<string, MarketSnapshot>>
): PortfolioValuation => {
  const holdings: HoldingValuation[] = portfolio.holdings.map((holding) => {
    const targetUsd = holding.weight * portfolio.startingNav;
    const livePrice = snapshots[holding.id]?.price ?? null;
    // Pegged stables fall back to their peg so the NAV still sums.
    const pricePinned = !isPositivePrice(livePrice) && isPositivePrice(holding.pegPrice);
    const price = isPositivePrice(livePrice) ? livePrice : pricePinned ? holding.pegPrice : null;

    if (price === null) {
      return {
        holdingId: holding.id,
        weight: holding.weight,
        targetUsd,
        price: null,
        pricePinned: false,
        units: null,
        currentValue: null
      };
    }

    const units = targetUsd / price;
    return {
      holdingId: holding.id,
      weight: holding.weight,
      targetUsd,
      price,
      pricePinned,
      units,
      currentValue: units * price
    };
  });

  return {
    startingNav: portfolio.startingNav,
    nav: holdings.reduce((sum, item) => sum + (item.currentValue ?? 0), 0),
    holdings,
    unpriced: holdings.filter((item) => item.price === null).map((item) => item.holdingId)
  };
};
