export type HoldingValuation = {
  holdingId: string;
  weight: number;
  targetUsd: number;
  price: number | null;
  pricePinned: boolean;
  units: number | null;
  currentValue: number | null;
};

export type PortfolioValuation = {
  startingNav: number;
  nav: number;
  holdings: HoldingValuation[];
  unpriced: string[];
};
