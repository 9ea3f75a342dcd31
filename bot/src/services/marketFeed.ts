import type { HistoryPoint } from '../markets/priceContext';

/** One tradeable market inside an event, as listed by the feed. */
export interface FeedMarket {
  id: string;
  question: string;
  groupItemTitle: string;
  tokenIds: string[];
  outcomes: string[];
}

export interface FeedEvent {
  id: string;
  title: string;
  category: string;
  description: string;
  startDate?: string;
  endDate?: string;
  markets: FeedMarket[];
}

export interface BookQuote {
  bid: number | null;
  ask: number | null;
  /** Sum of price * size over all bids, in USDC. */
  bidLiquidity: number;
}

/**
 * Read side of the venue: paginated active events, top of book and price
 * history per outcome token.
 */
export interface MarketFeed {
  fetchEvents(offset: number, limit: number): Promise<FeedEvent[]>;
  getQuote(tokenId: string): Promise<BookQuote>;
  getPriceHistory(tokenId: string): Promise<HistoryPoint[]>;
}

/** Price a buyer would pay now: best ask, else the best bid. */
export function quotePrice(quote: BookQuote): number | null {
  if (quote.ask !== null && quote.ask > 0) return quote.ask;
  return quote.bid !== null && quote.bid > 0 ? quote.bid : null;
}

export function spreadPct(quote: BookQuote): number | null {
  const { bid, ask } = quote;
  if (!bid || !ask || bid + ask <= 0) return null;
  const mid = (bid + ask) / 2;
  return Math.round(((ask - bid) / mid) * 1000) / 10;
}

/** "Yes"/"No" for binary markets, "Outcome<n>" otherwise. */
export function outcomeLabel(index: number, tokenCount: number): string {
  if (tokenCount === 2) return index === 0 ? 'Yes' : 'No';
  return `Outcome${index}`;
}
