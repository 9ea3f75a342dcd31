import { describe, expect, it } from 'vitest';
import { ExecutionFailure, TransientServiceError } from '../core/errors';
import { LiveExecutionAdapter, type OrderVenue } from '../execution/liveAdapter';
import { ExecutionService } from '../services/execution';
import { matchedPrice, type VenueOrder } from '../services/polymarket';
import { testConfig } from './fakes';

const market = { marketId: 'm-1', tokenId: 't-1' };

interface PostedOrder {
  tokenId: string;
  side: 'BUY' | 'SELL';
  price: number;
  size: number;
}

/**
 * Venue stand-in. Each getOrder call reports the next entry of `matched`
 * (the last one repeats). Cancel and read failures are thrown in order.
 */
class FakeVenue implements OrderVenue {
  public readonly posted: PostedOrder[] = [];
  public readonly cancelled: string[] = [];
  public matched: number[] = [0];
  public cancelFailures: Error[] = [];
  public readFailure: Error | null = null;
  public price: number | null = null;
  public priceFailure: Error | null = null;
  public reads = 0;

  async placeOrder(tokenId: string, side: 'BUY' | 'SELL', price: number, size: number): Promise<string> {
    this.posted.push({ tokenId, side, price, size });
    return `o${this.posted.length}`;
  }

  async getOrder(orderId: string): Promise<VenueOrder | null> {
    this.reads++;
    if (this.readFailure) throw this.readFailure;
    const sizeMatched = this.matched.length > 1 ? (this.matched.shift() ?? 0) : (this.matched[0] ?? 0);
    return { orderId, sizeMatched, status: 'LIVE', tradeIds: [] };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const failure = this.cancelFailures.shift();
    if (failure) throw failure;
    this.cancelled.push(orderId);
  }

  async getMatchedPrice(): Promise<number | null> {
    if (this.priceFailure) throw this.priceFailure;
    return this.price;
  }

  async getCollateralBalance(): Promise<number> {
    return 250;
  }
}

function live(env: Record<string, string> = {}) {
  return testConfig({ EXECUTION_MODE: 'LIVE', FILL_POLL_MS: '0', FILL_TIMEOUT_MS: '0', ...env }).execution;
}

describe('LiveExecutionAdapter', () => {
  it('refuses to run outside LIVE mode', () => {
    expect(() => new LiveExecutionAdapter(new FakeVenue(), testConfig().execution)).toThrow(
      '[EXECUTION_FATAL] LiveExecutionAdapter instantiated in PAPER mode.'
    );
  });

  it('polls the order until it is fully matched', async () => {
    const venue = new FakeVenue();
    venue.matched = [0, 8, 20];
    venue.price = 0.48;
    const adapter = new LiveExecutionAdapter(venue, live({ FILL_TIMEOUT_MS: '60000' }));

    const fill = await adapter.placeBuy(market, 0.5, 20);

    expect(fill).toEqual({ orderId: 'o1', filledSize: 20, avgPrice: 0.48 });
    expect(venue.posted).toEqual([{ tokenId: 't-1', side: 'BUY', price: 0.5, size: 20 }]);
    expect(venue.reads).toBe(3);
    expect(venue.cancelled).toEqual([]);
  });

  it('cancels the remainder and reports what matched up to the cancel', async () => {
    const venue = new FakeVenue();
    venue.matched = [5, 7];
    const adapter = new LiveExecutionAdapter(venue, live());

    const fill = await adapter.placeSell(market, 0.45, 20);

    expect(venue.cancelled).toEqual(['o1']);
    expect(fill).toEqual({ orderId: 'o1', filledSize: 7, avgPrice: 0.45 });
  });

  it('fails when nothing matched before the timeout', async () => {
    const venue = new FakeVenue();
    const adapter = new LiveExecutionAdapter(venue, live());

    const result = adapter.placeBuy(market, 0.5, 20);

    await expect(result).rejects.toThrow(ExecutionFailure);
    await expect(result).rejects.toThrow('BUY o1 on m-1 not filled at 0.5');
    expect(venue.cancelled).toEqual(['o1']);
  });

  it('falls back to the limit price when the trade price cannot be read', async () => {
    const venue = new FakeVenue();
    venue.matched = [20];
    venue.priceFailure = new TransientServiceError('trades endpoint down', 'EXECUTION');
    const adapter = new LiveExecutionAdapter(venue, live());

    await expect(adapter.placeBuy(market, 0.5, 20)).resolves.toEqual({ orderId: 'o1', filledSize: 20, avgPrice: 0.5 });
  });

  it('settles a partial fill against the posted order when the cancel fails transiently', async () => {
    const venue = new FakeVenue();
    venue.matched = [5];
    venue.price = 0.49;
    venue.cancelFailures = [new TransientServiceError('cancel timed out', 'EXECUTION')];
    const config = live({ MAX_RETRIES: '2' });
    const service = new ExecutionService(new LiveExecutionAdapter(venue, config), {
      retries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
    });

    const fill = await service.buy(market, 0.5, 10);

    expect(venue.posted.map(p => p.size)).toEqual([20]);
    expect(venue.cancelled).toEqual(['o1']);
    expect(fill).toEqual({ orderId: 'o1', filledSize: 5, avgPrice: 0.49 });
  });

  it('never posts a second order when the fill state cannot be read', async () => {
    const venue = new FakeVenue();
    venue.readFailure = new TransientServiceError('venue down', 'EXECUTION');
    const config = live({ MAX_RETRIES: '2' });
    const service = new ExecutionService(new LiveExecutionAdapter(venue, config), {
      retries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
    });

    await expect(service.buy(market, 0.5, 10)).rejects.toThrow(
      'BUY o1 on m-1: fill state unknown (venue down). Check the venue before trading this market again.'
    );
    expect(venue.posted).toHaveLength(1);
    expect(venue.cancelled).toEqual(['o1']);
  });
});

describe('matchedPrice', () => {
  it('averages the trades the order took, weighted by size', () => {
    const trades = [
      { taker_order_id: 'o1', price: '0.5', size: '10' },
      { taker_order_id: 'o1', price: '0.52', size: '30' },
      { taker_order_id: 'o2', price: '0.9', size: '100' },
    ];
    expect(matchedPrice('o1', trades)).toBeCloseTo(0.515, 10);
  });

  it('reads the maker side when the order rested on the book', () => {
    const trades = [
      {
        taker_order_id: 'o9',
        price: '0.6',
        size: '15',
        maker_orders: [
          { order_id: 'o1', price: '0.4', matched_amount: '5' },
          { order_id: 'o3', price: '0.41', matched_amount: '10' },
        ],
      },
    ];
    expect(matchedPrice('o1', trades)).toBeCloseTo(0.4, 10);
  });

  it('is null when the order has no trades', () => {
    expect(matchedPrice('o1', [])).toBeNull();
  });
});
