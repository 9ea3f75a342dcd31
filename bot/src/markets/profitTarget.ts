export interface ProfitTargetInput {
  fillPrice: number;
  daysToResolution: number | null;
  rangePct: number;
  sentimentScore: number;
  spreadPct: number | null;
  maxPrice: number | null;
}

const BASE_TARGET_PCT = 0.07;
const CHEAP_FILL_TARGET_PCT = 0.1;
const CHEAP_FILL_THRESHOLD = 0.3;

const round3 = (value: number) => Math.round(value * 1000) / 1000;

/**
 * Take-profit price for a fresh fill, clamped to [0.01, 0.99]. Cheap fills aim
 * higher; time left, volatility and sentiment widen the target, a wide spread
 * narrows it. Never above the sizing stage's maximum price.
 */
export function computeProfitTarget(input: ProfitTargetInput): number {
  let pct = input.fillPrice < CHEAP_FILL_THRESHOLD ? CHEAP_FILL_TARGET_PCT : BASE_TARGET_PCT;

  const days = input.daysToResolution;
  if (days !== null) {
    if (days > 14) pct *= 1.3;
    else if (days > 7) pct *= 1.15;
    else if (days < 1) pct *= 0.5;
    else if (days < 2) pct *= 0.7;
  }

  if (input.rangePct > 30) pct *= 1.2;
  else if (input.rangePct > 20) pct *= 1.1;
  else if (input.rangePct < 10) pct *= 0.8;

  if (input.sentimentScore >= 8) pct *= 1.15;
  else if (input.sentimentScore <= 3) pct *= 0.85;

  if (input.spreadPct !== null) {
    if (input.spreadPct > 10) pct *= 0.8;
    else if (input.spreadPct > 6) pct *= 0.9;
  }

  let target = round3(input.fillPrice * (1 + pct));
  if (input.maxPrice !== null && input.maxPrice >= 0.01) {
    target = Math.min(target, round3(input.maxPrice));
  }
  return round3(Math.max(0.01, Math.min(0.99, target)));
}
