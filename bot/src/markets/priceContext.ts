import type { PriceContext, PriceStats } from '../types';

export interface HistoryPoint {
  t: number;
  p: number;
}

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** Summary statistics over a price history. Empty history yields zeros. */
export function historyStats(history: readonly HistoryPoint[]): PriceStats {
  const prices = history.map(h => h.p).filter(p => Number.isFinite(p));
  if (prices.length === 0) return { high: 0, low: 0, avg: 0, change1hPct: 0 };

  const last = prices[prices.length - 1];
  // history is sampled every 5 minutes, so 12 points back is one hour
  const hourAgo = prices.length > 12 ? prices[prices.length - 12] : prices[0];

  return {
    high: round(Math.max(...prices), 3),
    low: round(Math.min(...prices), 3),
    avg: round(prices.reduce((sum, p) => sum + p, 0) / prices.length, 3),
    change1hPct: hourAgo > 0 ? round(((last - hourAgo) / hourAgo) * 100, 1) : 0,
  };
}

/** Where the current price sits inside its recent range. */
export function buildPriceContext(price: number, stats: PriceStats): PriceContext {
  const { high, low, avg } = stats;

  let priceVsAvg: PriceContext['priceVsAvg'] = 'unknown';
  if (avg > 0) {
    if (price < avg * 0.92) priceVsAvg = 'below average';
    else if (price > avg * 1.08) priceVsAvg = 'above average';
    else priceVsAvg = 'near average';
  }

  const mid = high || low ? (high + low) / 2 : 0;
  const inLowerHalf = (mid > 0 && price <= mid) || (low > 0 && price <= low * 1.08);
  const nearHistoricalLow = low > 0 && price <= low * 1.05;
  const rangePct = avg > 0 && high - low > 0 ? round(((high - low) / avg) * 100, 1) : 0;

  return { ...stats, priceVsAvg, inLowerHalf, nearHistoricalLow, rangePct };
}

export function describePriceContext(price: number, ctx: PriceContext): string {
  const lines = [
    `Price now ${price} is ${ctx.priceVsAvg} (history: high=${ctx.high} low=${ctx.low} avg=${ctx.avg}).`,
    `Historical range: ${ctx.rangePct}%.`,
  ];
  if (ctx.inLowerHalf) lines.push('Price is in the LOWER half of its range.');
  if (ctx.nearHistoricalLow) lines.push('Price is NEAR its historical low.');
  lines.push(`Change in the last hour: ${ctx.change1hPct}%.`);
  return lines.join(' ');
}
