import type { ExecutionConfig } from '../config/env';
import { ExecutionFailure, errorMessage } from '../core/errors';
import type { VenueOrder } from '../services/polymarket';
import type { MarketRef } from '../types';
import { sleep, withRetry } from '../utils/retry';
import { Logger } from '../utils/logger';
import type { ExecutionClient, FillResult } from './adapter';

type OrderSide = 'BUY' | 'SELL';

/** The order calls of the venue client the adapter drives. */
export interface OrderVenue {
  placeOrder(tokenId: string, side: OrderSide, price: number, size: number): Promise<string>;
  getOrder(orderId: string): Promise<VenueOrder | null>;
  cancelOrder(orderId: string): Promise<void>;
  /** Volume-weighted price of what the order matched, or null when unknown. */
  getMatchedPrice(order: VenueOrder): Promise<number | null>;
  getCollateralBalance(): Promise<number>;
}

/**
 * Places real limit orders on the CLOB. After posting, polls the order until
 * it fills or the fill timeout passes, then cancels whatever is still resting.
 *
 * An order is posted at most once per call. Once the venue has returned an
 * order id, every later failure is settled against that order and surfaces as
 * a fill or as an ExecutionFailure, never as a retryable error.
 */
export class LiveExecutionAdapter implements ExecutionClient {
  constructor(
    private readonly venue: OrderVenue,
    private readonly config: ExecutionConfig
  ) {
    if (config.mode !== 'LIVE') {
      throw new Error(`[EXECUTION_FATAL] LiveExecutionAdapter instantiated in ${config.mode} mode.`);
    }
  }

  async placeBuy(market: MarketRef, maxPrice: number, size: number): Promise<FillResult> {
    return this.execute(market, 'BUY', maxPrice, size);
  }

  async placeSell(market: MarketRef, minPrice: number, size: number): Promise<FillResult> {
    return this.execute(market, 'SELL', minPrice, size);
  }

  async cancelOrder(orderId: string): Promise<void> {
    await this.venue.cancelOrder(orderId);
  }

  async getCollateralBalance(): Promise<number> {
    return this.venue.getCollateralBalance();
  }

  private async execute(market: MarketRef, side: OrderSide, price: number, size: number): Promise<FillResult> {
    const orderId = await this.venue.placeOrder(market.tokenId, side, price, size);
    Logger.info(`[LIVE_EXEC] ${side} ${size} @ ${price} on ${market.marketId} -> ${orderId}`);

    try {
      return await this.settle(orderId, market, side, price, size);
    } catch (err) {
      if (err instanceof ExecutionFailure) throw err;
      return this.reconcile(orderId, market, side, price, err);
    }
  }

  private async settle(
    orderId: string,
    market: MarketRef,
    side: OrderSide,
    price: number,
    size: number
  ): Promise<FillResult> {
    let order = await this.awaitFill(orderId, size);
    if (order.sizeMatched < size) {
      await this.venue.cancelOrder(orderId);
      // matches can land between the last poll and the cancel
      order = (await this.venue.getOrder(orderId)) ?? order;
      Logger.warn(`[LIVE_EXEC] ${orderId} filled ${order.sizeMatched}/${size}; remainder cancelled`);
    }
    return this.toFill(order, market, side, price);
  }

  /** Settlement broke off after posting: cancel what rests and report what matched. */
  private async reconcile(
    orderId: string,
    market: MarketRef,
    side: OrderSide,
    price: number,
    cause: unknown
  ): Promise<FillResult> {
    Logger.warn(`[LIVE_EXEC] ${orderId} settlement interrupted (${errorMessage(cause)}); reconciling`);
    const retry = { retries: this.config.maxRetries, baseDelayMs: this.config.retryBaseDelayMs };

    try {
      await withRetry(() => this.venue.cancelOrder(orderId), { ...retry, label: `CANCEL ${orderId}` });
    } catch (err) {
      Logger.error(`[LIVE_EXEC] ${orderId} could not be cancelled and may still be resting`, err);
    }

    let order: VenueOrder | null;
    try {
      order = await withRetry(() => this.venue.getOrder(orderId), { ...retry, label: `READ ${orderId}` });
    } catch (err) {
      throw new ExecutionFailure(
        `${side} ${orderId} on ${market.marketId}: fill state unknown (${errorMessage(err)}). Check the venue before trading this market again.`
      );
    }
    if (!order) {
      throw new ExecutionFailure(`${side} ${orderId} on ${market.marketId}: order not found after ${errorMessage(cause)}`);
    }
    return this.toFill(order, market, side, price);
  }

  private async awaitFill(orderId: string, size: number): Promise<VenueOrder> {
    const deadline = Date.now() + this.config.fillTimeoutMs;
    let last: VenueOrder = { orderId, sizeMatched: 0, status: '', tradeIds: [] };
    for (;;) {
      last = (await this.venue.getOrder(orderId)) ?? last;
      if (last.sizeMatched >= size || Date.now() >= deadline) return last;
      await sleep(this.config.fillPollMs);
    }
  }

  private async toFill(order: VenueOrder, market: MarketRef, side: OrderSide, limit: number): Promise<FillResult> {
    if (order.sizeMatched <= 0) {
      throw new ExecutionFailure(`${side} ${order.orderId} on ${market.marketId} not filled at ${limit}`);
    }
    return { orderId: order.orderId, filledSize: order.sizeMatched, avgPrice: await this.fillPrice(order, limit) };
  }

  private async fillPrice(order: VenueOrder, limit: number): Promise<number> {
    try {
      const matched = await this.venue.getMatchedPrice(order);
      if (matched !== null) return matched;
      Logger.debug(`[LIVE_EXEC] No trades reported for ${order.orderId}; using limit ${limit}`);
    } catch (err) {
      Logger.warn(`[LIVE_EXEC] Fill price for ${order.orderId} unavailable (${errorMessage(err)}); using limit ${limit}`);
    }
    return limit;
  }
}
