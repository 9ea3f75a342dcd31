import type { RiskConfig } from '../config/env';

export interface HeldMarket {
  title: string;
  category: string;
}

function significantWords(title: string): Set<string> {
  return new Set(
    title
      .toLowerCase()
      .split(/\s+/)
      .filter(w => w.length > 3)
  );
}

/**
 * Portfolio-wide limits checked right before a buy: position count, drawdown
 * from the peak balance, and clustering of similar markets in one category.
 */
export class PortfolioGuard {
  private peakBalance = 0;

  constructor(private readonly risk: RiskConfig) {}

  public get peak(): number {
    return this.peakBalance;
  }

  /** Percentage below the highest balance seen so far. Updates the peak. */
  public drawdownPct(balance: number): number {
    if (balance > this.peakBalance) this.peakBalance = balance;
    if (this.peakBalance <= 0) return 0;
    return ((this.peakBalance - balance) / this.peakBalance) * 100;
  }

  public correlatedCount(candidate: HeldMarket, held: readonly HeldMarket[]): number {
    const words = significantWords(candidate.title);
    let count = 0;
    for (const position of held) {
      if (position.category.trim() !== candidate.category.trim()) continue;
      let shared = 0;
      for (const w of significantWords(position.title)) {
        if (words.has(w)) shared++;
      }
      if (shared >= 2) count++;
    }
    return count;
  }

  /** Reason the buy must be refused, or null. */
  public check(candidate: HeldMarket, held: readonly HeldMarket[], balance: number | null): string | null {
    if (held.length >= this.risk.maxOpenPositions) {
      return `max open positions reached (${held.length}/${this.risk.maxOpenPositions})`;
    }
    if (balance !== null) {
      const drawdown = this.drawdownPct(balance);
      if (drawdown >= this.risk.maxDrawdownPct) {
        return `drawdown ${drawdown.toFixed(1)}% at or above ${this.risk.maxDrawdownPct}%`;
      }
    }
    const correlated = this.correlatedCount(candidate, held);
    if (correlated >= this.risk.maxCorrelatedPositions) {
      return `${correlated} correlated open positions in ${candidate.category}`;
    }
    return null;
  }
}
