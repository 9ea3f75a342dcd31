import type { MarketRef } from '../types';

export interface FillResult {
  orderId: string;
  /** Shares actually filled. Never zero: an unfilled order is an ExecutionFailure. */
  filledSize: number;
  avgPrice: number;
}

/**
 * Order placement against the venue. Implementations may be slow and may
 * throw; transient failures are retried by ExecutionService, everything else
 * surfaces as ExecutionFailure for that one trade. A transient error may only
 * escape while no order has been posted: a retry posts a new order.
 */
export interface ExecutionClient {
  /** Buys up to `size` shares at no more than `maxPrice`. */
  placeBuy(market: MarketRef, maxPrice: number, size: number): Promise<FillResult>;

  /** Sells up to `size` shares at no less than `minPrice`. */
  placeSell(market: MarketRef, minPrice: number, size: number): Promise<FillResult>;

  cancelOrder(orderId: string): Promise<void>;

  /** USDC available for new positions. */
  getCollateralBalance(): Promise<number>;
}
