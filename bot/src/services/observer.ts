import { InvariantViolation } from '../core/errors';
import type { PriceEvent } from '../types';
import { Logger } from '../utils/logger';
import type { PriceStream, PriceTick } from './priceStream';

export interface PriceWatcher {
  watch(marketId: string, tokenId: string): void;
  unwatch(marketId: string): void;
}

export type PriceEventHandler = (event: PriceEvent) => void;

/**
 * Maps the token-level price stream onto markets. Each open market has
 * exactly one subscription; watching a market twice is an invariant
 * violation.
 */
export class Observer implements PriceWatcher {
  private readonly tokenToMarket = new Map<string, string>();
  private readonly marketToToken = new Map<string, string>();
  private handler: PriceEventHandler | null = null;

  constructor(private readonly stream: PriceStream) {
    stream.onPrice(tick => this.route(tick));
  }

  /** Receiver of every routed price event (the position supervisor). */
  public attach(handler: PriceEventHandler) {
    this.handler = handler;
  }

  public watch(marketId: string, tokenId: string) {
    if (this.marketToToken.has(marketId)) {
      throw new InvariantViolation(`Market ${marketId} is already being observed`, 'SUPERVISOR');
    }
    this.marketToToken.set(marketId, tokenId);
    this.tokenToMarket.set(tokenId, marketId);
    this.stream.subscribe(tokenId);
    Logger.info(`[OBSERVER] Watching ${marketId} (${this.marketToToken.size} active)`);
  }

  public unwatch(marketId: string) {
    const tokenId = this.marketToToken.get(marketId);
    if (tokenId === undefined) return;
    this.marketToToken.delete(marketId);
    this.tokenToMarket.delete(tokenId);
    this.stream.unsubscribe(tokenId);
    Logger.info(`[OBSERVER] Stopped watching ${marketId} (${this.marketToToken.size} active)`);
  }

  public isWatching(marketId: string): boolean {
    return this.marketToToken.has(marketId);
  }

  public get watchedCount(): number {
    return this.marketToToken.size;
  }

  private route(tick: PriceTick) {
    const marketId = this.tokenToMarket.get(tick.tokenId);
    if (marketId === undefined || !this.handler) return;
    this.handler({ marketId, price: tick.price, timestamp: tick.timestamp });
  }
}
