import { randomUUID } from 'node:crypto';
import { ExecutionFailure } from '../core/errors';
import type { MarketRef } from '../types';
import { Logger } from '../utils/logger';
import type { ExecutionClient, FillResult } from './adapter';

/**
 * Simulated venue. Orders fill in full at their limit price against a virtual
 * USDC bankroll; nothing is sent over the network.
 */
export class PaperExecutionAdapter implements ExecutionClient {
  private bankroll: number;
  private readonly holdings = new Map<string, number>();

  constructor(startingBankroll: number) {
    this.bankroll = startingBankroll;
  }

  async placeBuy(market: MarketRef, maxPrice: number, size: number): Promise<FillResult> {
    const cost = maxPrice * size;
    if (cost > this.bankroll) {
      throw new ExecutionFailure(`Paper bankroll ${this.bankroll.toFixed(2)} cannot cover ${cost.toFixed(2)}`);
    }
    this.bankroll -= cost;
    this.holdings.set(market.tokenId, (this.holdings.get(market.tokenId) ?? 0) + size);
    return this.fill('BUY', market, maxPrice, size);
  }

  async placeSell(market: MarketRef, minPrice: number, size: number): Promise<FillResult> {
    const held = this.holdings.get(market.tokenId) ?? 0;
    if (held <= 0) throw new ExecutionFailure(`Paper sell with no holdings in ${market.tokenId}`);

    const filled = Math.min(held, size);
    this.bankroll += minPrice * filled;
    if (held - filled <= 0) this.holdings.delete(market.tokenId);
    else this.holdings.set(market.tokenId, held - filled);
    return this.fill('SELL', market, minPrice, filled);
  }

  async cancelOrder(orderId: string): Promise<void> {
    Logger.info(`[PAPER_EXEC] Simulated Order Cancel: ${orderId}`);
  }

  async getCollateralBalance(): Promise<number> {
    return this.bankroll;
  }

  private fill(side: 'BUY' | 'SELL', market: MarketRef, price: number, size: number): FillResult {
    const orderId = `paper_${randomUUID()}`;
    Logger.info(`[PAPER_EXEC] Simulated ${side}: ${orderId} | ${market.marketId} | ${size} @ ${price}`);
    return { orderId, filledSize: size, avgPrice: price };
  }
}
