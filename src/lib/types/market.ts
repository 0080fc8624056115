export type CorrelationPair = {
  btc: number | null;
  eth: number | null;
};

export type MarketQuote = {
  price: number | null;
  marketCap: number | null;
  volume24h: number | null;
};

export type MarketSnapshot = MarketQuote & {
  holdingId: string;
  volatility: number | null;
  tvl: number | null;
  correlation: CorrelationPair;
  asOf: string;
};
