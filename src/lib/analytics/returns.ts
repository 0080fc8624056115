const DAYS_PER_YEAR = 365;

const mean = (values: number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

const sampleStdev = (values: number[]) => {
  const avg = mean(values);
  const variance =
    values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
};

export const simpleReturns = (prices: readonly number[]): number[] => {
  const returns: number[] = [];
  for (let index = 1; index < prices.length; index += 1) {
    const previous = prices[index - 1];
    if (previous === 0) continue;
    returns.push((prices[index] - previous) / previous);
  }
  return returns;
};

/** Annualised stdev of the most recent `window` daily returns. */
export const rollingVolatility = (prices: readonly number[], window: number): number | null => {
  if (prices.length < 2) return null;
  const span = Math.min(window, prices.length - 1);
  const recent = simpleReturns(prices).slice(-span);
  if (recent.length < 2) return null;
  return sampleStdev(recent) * Math.sqrt(DAYS_PER_YEAR);
};

/**
 * Pearson correlation of daily returns. Series are aligned on their most
 * recent points, so histories of different lengths compare the same days.
 */
export const returnCorrelation = (
  a: readonly number[],
  b: readonly number[]
): number | null => {
  const returnsA = simpleReturns(a);
  const returnsB = simpleReturns(b);
  const length = Math.min(returnsA.length, returnsB.length);
  if (length < 3) return null;

  const x = returnsA.slice(-length);
  const y = returnsB.slice(-length);
  const meanX = mean(x);
  const meanY = mean(y);

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let index = 0; index < length; index += 1) {
    const dx = x[index] - meanX;
    const dy = y[index] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
};
