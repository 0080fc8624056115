export const CLASSIFICATIONS = ["stable", "blue-chip", "other"] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export type Holding = {
  id: string;
  name: string;
  coingeckoId: string;
  defillamaSlug: string | null;
  weight: number;
  classification: Classification;
  pegPrice: number | null;
};

export type Portfolio = {
  startingNav: number;
  holdings: readonly Holding[];
};
