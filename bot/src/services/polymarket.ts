import { Wallet } from 'ethers';
import { AssetType, ClobClient, OrderType, Side } from '@polymarket/clob-client';
import axios, { type AxiosInstance } from 'axios';
import type { ExecutionConfig } from '../config/env';
import { TransientServiceError } from '../core/errors';
import { extractCategory } from '../markets/category';
import type { HistoryPoint } from '../markets/priceContext';
import { isRecord, readNumber, readRecords, readString, readStringArray, type JsonRecord } from '../utils/json';
import { Logger } from '../utils/logger';
import type { BookQuote, FeedEvent, FeedMarket, MarketFeed } from './marketFeed';

export interface VenueOrder {
  orderId: string;
  sizeMatched: number;
  status: string;
  tradeIds: string[];
}

/**
 * Volume-weighted price `orderId` traded at across `trades`, whether it took
 * (`taker_order_id`) or was matched as a maker. Null when nothing matched.
 */
export function matchedPrice(orderId: string, trades: readonly JsonRecord[]): number | null {
  let notional = 0;
  let shares = 0;
  const add = (price: number | null, size: number | null) => {
    if (price === null || size === null || size <= 0) return;
    notional += price * size;
    shares += size;
  };

  for (const trade of trades) {
    if (readString(trade, 'taker_order_id') === orderId) {
      add(readNumber(trade, 'price'), readNumber(trade, 'size'));
      continue;
    }
    for (const maker of readRecords(trade.maker_orders)) {
      if (readString(maker, 'order_id') === orderId) add(readNumber(maker, 'price'), readNumber(maker, 'matched_amount'));
    }
  }
  return shares > 0 ? notional / shares : null;
}

/**
 * Venue client. Reads come from the public Gamma and CLOB endpoints; order
 * calls need the signer and API credentials and only work in LIVE mode.
 */
export class PolymarketService implements MarketFeed {
  private readonly http: AxiosInstance;
  private readonly client: ClobClient;
  private readonly tradingEnabled: boolean;

  constructor(private readonly config: ExecutionConfig) {
    this.http = axios.create({ timeout: 10_000, headers: { 'User-Agent': 'prediction-sniper' } });

    if (config.privateKey) {
      const signer = new Wallet(config.privateKey);
      this.client = new ClobClient(
        config.clobHost,
        config.chainId,
        signer,
        { key: config.apiKey, secret: config.apiSecret, passphrase: config.passphrase },
        config.funderAddress ? 1 : undefined,
        config.funderAddress || undefined
      );
      this.tradingEnabled = true;
    } else {
      this.client = new ClobClient(config.clobHost, config.chainId);
      this.tradingEnabled = false;
    }
  }

  // ---- Feed ----

  public async fetchEvents(offset: number, limit: number): Promise<FeedEvent[]> {
    const res = await this.http.get<unknown>(`${this.config.gammaHost}/events`, {
      params: {
        active: 'true',
        closed: 'false',
        order: 'volume24hr',
        ascending: 'false',
        limit,
        offset,
      },
    });
    return readRecords(res.data).map(raw => this.toFeedEvent(raw));
  }

  public async getQuote(tokenId: string): Promise<BookQuote> {
    const book = await this.client.getOrderBook(tokenId);
    const bids = (book.bids ?? []).map(l => ({ price: Number(l.price), size: Number(l.size) }));
    const asks = (book.asks ?? []).map(l => ({ price: Number(l.price), size: Number(l.size) }));

    const bestBid = bids.length > 0 ? Math.max(...bids.map(b => b.price)) : null;
    const bestAsk = asks.length > 0 ? Math.min(...asks.map(a => a.price)) : null;
    const bidLiquidity = bids.reduce((sum, b) => sum + b.price * b.size, 0);

    return { bid: bestBid, ask: bestAsk, bidLiquidity };
  }

  public async getPriceHistory(tokenId: string): Promise<HistoryPoint[]> {
    const res = await this.http.get<unknown>(`${this.config.clobHost}/prices-history`, {
      params: { market: tokenId, interval: '6h', fidelity: 5 },
    });
    if (!isRecord(res.data)) return [];
    return readRecords(res.data.history).flatMap(h => {
      const t = readNumber(h, 't');
      const p = readNumber(h, 'p');
      return t !== null && p !== null ? [{ t, p }] : [];
    });
  }

  // ---- Orders ----

  /** Posts a GTC limit order and returns the venue order id. */
  public async placeOrder(tokenId: string, side: 'BUY' | 'SELL', price: number, size: number): Promise<string> {
    this.assertTrading();

    const order = await this.client.createOrder({
      tokenID: tokenId,
      price,
      side: side === 'BUY' ? Side.BUY : Side.SELL,
      size,
      feeRateBps: 0,
    });

    const response: unknown = await this.client.postOrder(order, OrderType.GTC);
    const orderId = isRecord(response) ? readString(response, 'orderID') : '';
    if (!orderId) {
      const reason = isRecord(response) ? readString(response, 'errorMsg', 'no order id') : 'no order id';
      throw new TransientServiceError(`Order rejected by venue: ${reason}`, 'EXECUTION', response);
    }
    return orderId;
  }

  public async getOrder(orderId: string): Promise<VenueOrder | null> {
    this.assertTrading();
    const raw: unknown = await this.client.getOrder(orderId);
    if (!isRecord(raw)) return null;
    return {
      orderId,
      sizeMatched: readNumber(raw, 'size_matched') ?? 0,
      status: readString(raw, 'status'),
      tradeIds: readStringArray(raw, 'associate_trades'),
    };
  }

  public async getMatchedPrice(order: VenueOrder): Promise<number | null> {
    this.assertTrading();
    const trades: JsonRecord[] = [];
    for (const id of order.tradeIds) {
      const raw: unknown = await this.client.getTrades({ id }, true);
      trades.push(...readRecords(raw));
    }
    return matchedPrice(order.orderId, trades);
  }

  public async cancelOrder(orderId: string): Promise<void> {
    this.assertTrading();
    await this.client.cancelOrder({ orderID: orderId });
  }

  /** USDC collateral available to the trading wallet. */
  public async getCollateralBalance(): Promise<number> {
    this.assertTrading();
    const res = await this.client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL });
    const raw = Number(res.balance);
    return Number.isFinite(raw) ? raw / 1e6 : 0;
  }

  private assertTrading() {
    if (!this.tradingEnabled) {
      throw new Error('[EXECUTION_FATAL] Polymarket trading client not initialized (missing PRIVATE_KEY)');
    }
  }

  private toFeedEvent(raw: Record<string, unknown>): FeedEvent {
    const title = readString(raw, 'title', 'Untitled');
    const tags = readRecords(raw.tags).map(t => readString(t, 'label') || readString(t, 'slug'));
    const explicit = readString(raw, 'category');

    const markets: FeedMarket[] = readRecords(raw.markets)
      .filter(m => m.closed !== true && m.active !== false)
      .map(m => ({
        id: readString(m, 'id'),
        question: readString(m, 'question'),
        groupItemTitle: readString(m, 'groupItemTitle', 'Yes'),
        tokenIds: readStringArray(m, 'clobTokenIds'),
        outcomes: readStringArray(m, 'outcomes'),
      }))
      .filter(m => m.id && m.tokenIds.length > 0);

    const event: FeedEvent = {
      id: readString(raw, 'id'),
      title,
      category: explicit && explicit !== 'Unknown' ? explicit : extractCategory(tags, title),
      description: readString(raw, 'description'),
      startDate: readString(raw, 'startDate') || undefined,
      endDate: readString(raw, 'endDate') || undefined,
      markets,
    };
    Logger.debug(`[FEED] ${event.id} ${event.category} "${title}" (${markets.length} markets)`);
    return event;
  }
}
