import { ExecutionFailure, PositionExitFailure, errorMessage } from '../core/errors';
import type { ExecutionClient, FillResult } from '../execution/adapter';
import type { MarketRef } from '../types';
import { Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';

export interface ExecutionRetryPolicy {
  retries: number;
  baseDelayMs: number;
}

/** Whole cents of shares, rounded down so the cost never exceeds the stake. */
export function sharesForStake(stakeUsdc: number, price: number): number {
  if (price <= 0) return 0;
  return Math.floor((stakeUsdc / price) * 100) / 100;
}

/**
 * Retry boundary around the ExecutionClient. Transient venue errors are
 * retried with backoff; anything left over becomes an ExecutionFailure (buy)
 * or a PositionExitFailure (sell) attributed to that one trade.
 */
export class ExecutionService {
  constructor(
    private readonly client: ExecutionClient,
    private readonly policy: ExecutionRetryPolicy
  ) {}

  public async buy(market: MarketRef, maxPrice: number, stakeUsdc: number): Promise<FillResult> {
    const size = sharesForStake(stakeUsdc, maxPrice);
    if (size <= 0) throw new ExecutionFailure(`Stake ${stakeUsdc} buys no shares at ${maxPrice}`);

    try {
      const fill = await withRetry(() => this.client.placeBuy(market, maxPrice, size), {
        ...this.policy,
        label: `BUY ${market.marketId}`,
      });
      Logger.info(`[EXEC] BUY filled ${fill.filledSize} @ ${fill.avgPrice} on ${market.marketId} (${fill.orderId})`);
      return fill;
    } catch (err) {
      if (err instanceof ExecutionFailure) throw err;
      throw new ExecutionFailure(`BUY ${market.marketId} failed: ${errorMessage(err)}`);
    }
  }

  public async sell(market: MarketRef, minPrice: number, size: number): Promise<FillResult> {
    try {
      const fill = await withRetry(() => this.client.placeSell(market, minPrice, size), {
        ...this.policy,
        label: `SELL ${market.marketId}`,
      });
      Logger.info(`[EXEC] SELL filled ${fill.filledSize} @ ${fill.avgPrice} on ${market.marketId} (${fill.orderId})`);
      return fill;
    } catch (err) {
      if (err instanceof PositionExitFailure) throw err;
      throw new PositionExitFailure(`SELL ${market.marketId} failed: ${errorMessage(err)}`, market.marketId);
    }
  }

  public async cancel(orderId: string): Promise<void> {
    await withRetry(() => this.client.cancelOrder(orderId), { ...this.policy, label: `CANCEL ${orderId}` });
  }

  /** Collateral balance, or null when the venue cannot be reached. */
  public async balance(): Promise<number | null> {
    try {
      return await withRetry(() => this.client.getCollateralBalance(), { ...this.policy, label: 'BALANCE' });
    } catch (err) {
      Logger.warn(`[EXEC] Balance unavailable: ${errorMessage(err)}`);
      return null;
    }
  }
}
