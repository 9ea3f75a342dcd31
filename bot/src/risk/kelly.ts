/**
 * Kelly fraction for buying a binary outcome at `price` when the estimated
 * probability of it resolving YES is `winProbability`:
 *
 *   f* = (p - price) / (1 - price)
 *
 * Returns 0 when there is no edge or the inputs are out of range.
 */
export function kellyFraction(winProbability: number, price: number): number {
  if (!Number.isFinite(winProbability) || !Number.isFinite(price)) return 0;
  if (price <= 0 || price >= 1) return 0;
  if (winProbability <= price) return 0;

  const f = (winProbability - price) / (1 - price);
  return Math.min(1, f);
}
