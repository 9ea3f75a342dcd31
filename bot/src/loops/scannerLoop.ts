/**
 * loops/scannerLoop.ts
 *
 * Producer side of the pipeline. Each round pages through active events,
 * applies the cheap filter, asks the gatekeeper, and enqueues survivors.
 * `queue.put` blocks while the queue is full; that wait is the throttle on
 * everything downstream.
 */

import type { FilterConfig, ScannerConfig } from '../config/env';
import type { CandidateQueue } from '../core/candidateQueue';
import { DAY_MS, type Clock } from '../core/clock';
import { QueueClosedError, errorMessage, type Stage } from '../core/errors';
import { Scheduler } from '../core/scheduler';
import { applyFilter, eventExclusion } from '../markets/candidateFilter';
import type { EventGroupRegistry } from '../markets/eventGroups';
import { buildPriceContext, historyStats } from '../markets/priceContext';
import type { RiskManager } from '../risk/riskManager';
import type { Gatekeeper } from '../services/gatekeeper';
import {
  outcomeLabel,
  quotePrice,
  spreadPct,
  type BookQuote,
  type FeedEvent,
  type MarketFeed,
} from '../services/marketFeed';
import type { Candidate, PriceContext, SiblingOutcome } from '../types';
import type { PersistenceSink } from '../types/tables';
import { Logger } from '../utils/logger';
import { withRetry, type RetryOptions } from '../utils/retry';

export interface ScannerDeps {
  feed: MarketFeed;
  gatekeeper: Gatekeeper;
  queue: CandidateQueue<Candidate>;
  riskManager: RiskManager;
  eventGroups: EventGroupRegistry;
  sink: PersistenceSink;
  clock: Clock;
  isHeld: (marketId: string) => boolean;
  retry: Pick<RetryOptions, 'retries' | 'baseDelayMs'>;
}

export interface ScanStats {
  events: number;
  considered: number;
  filtered: number;
  gated: number;
  enqueued: number;
  failed: number;
}

interface QuotedToken {
  marketId: string;
  tokenId: string;
  title: string;
  outcome: string;
  quote: BookQuote;
  price: number;
}

const emptyStats = (): ScanStats => ({ events: 0, considered: 0, filtered: 0, gated: 0, enqueued: 0, failed: 0 });

export class ScannerLoop {
  private readonly scheduler = new Scheduler('scanner');
  // market:token -> time it last reached the gatekeeper
  private readonly seen = new Map<string, number>();
  private stopping = false;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly config: ScannerConfig,
    private readonly filter: FilterConfig,
    private readonly deps: ScannerDeps
  ) {}

  public start() {
    this.stopping = false;
    Logger.info(`[SCANNER] Starting (every ${this.config.intervalMs}ms, up to ${this.config.eventLimit} events)`);
    void this.runRound();
    this.scheduler.start(() => this.runRound(), this.config.intervalMs);
  }

  /** Stops producing. The round in flight ends after its current candidate. */
  public async stop() {
    this.stopping = true;
    await this.scheduler.stop();
    if (this.inFlight) await this.inFlight;
    Logger.info('[SCANNER] Stopped');
  }

  // The kick-off round and scheduled rounds share one slot
  private runRound(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.scanRound()
        .then(
          () => undefined,
          err => Logger.error(`[SCANNER] Round aborted: ${errorMessage(err)}`)
        )
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }

  /** One full pass over the feed. */
  public async scanRound(): Promise<ScanStats> {
    const stats = emptyStats();
    this.pruneSeen();

    const events = await this.fetchEvents();
    stats.events = events.length;

    for (const event of events) {
      if (this.stopping) break;
      try {
        await this.scanEvent(event, stats);
      } catch (err) {
        if (err instanceof QueueClosedError) {
          Logger.info('[SCANNER] Queue closed; ending round');
          break;
        }
        stats.failed++;
        Logger.warn(`[SCANNER] Event ${event.id} skipped: ${errorMessage(err)}`);
      }
    }

    Logger.info(
      `[SCANNER] Round done: ${stats.events} events, ${stats.considered} tokens, ` +
        `${stats.filtered} passed filter, ${stats.gated} gated, ${stats.enqueued} enqueued, ${stats.failed} failed`
    );
    return stats;
  }

  private async fetchEvents(): Promise<FeedEvent[]> {
    const events: FeedEvent[] = [];
    const { pageSize, eventLimit } = this.config;

    for (let offset = 0; offset < eventLimit && !this.stopping; offset += pageSize) {
      const page = await withRetry(() => this.deps.feed.fetchEvents(offset, pageSize), {
        ...this.deps.retry,
        label: `FEED offset=${offset}`,
      });
      events.push(...page);
      if (page.length < pageSize) break;
    }

    // Preferred categories first so they reach the queue before it fills
    const rank = (e: FeedEvent) => (this.deps.riskManager.classify(e.category) === 'PREFERRED' ? 0 : 1);
    return events.slice(0, eventLimit).sort((a, b) => rank(a) - rank(b));
  }

  private async scanEvent(event: FeedEvent, stats: ScanStats) {
    const now = this.deps.clock.now();
    const excluded = eventExclusion(event, this.filter, now);
    if (excluded) {
      Logger.debug(`[SCANNER] Event "${event.title}" skipped: ${excluded}`);
      return;
    }

    const endMs = event.endDate ? Date.parse(event.endDate) : Number.NaN;
    const daysToResolution = Math.round(((endMs - now) / DAY_MS) * 100) / 100;

    const quoted = await this.quoteEvent(event);
    const band = this.deps.riskManager.filterBand();

    for (const token of quoted) {
      if (this.stopping) return;
      stats.considered++;

      if (this.deps.isHeld(token.marketId)) continue;
      const key = `${token.marketId}:${token.tokenId}`;
      if (this.seen.has(key)) continue;

      const verdict = applyFilter({ price: token.price, daysToResolution, bidLiquidity: token.quote.bidLiquidity }, band);
      if (!verdict.admitted) {
        Logger.debug(`[SCANNER] FILTER reject ${token.marketId}: ${verdict.reason}`);
        continue;
      }
      stats.filtered++;

      const candidate = await this.buildCandidate(event, token, quoted, daysToResolution);
      const groupKey = { eventId: event.id, category: event.category, eventMarketCount: event.markets.length };
      if (!this.deps.eventGroups.hasCapacity(groupKey)) {
        this.reportAdmission(candidate, 'EVENT_CAP', 'REJECTED', 'event group cap reached');
        continue;
      }

      this.seen.set(key, now);
      const gate = await this.deps.gatekeeper.check(candidate);
      if (!gate.admitted) {
        Logger.info(`[SCANNER] GATEKEEPER reject ${candidate.marketId}: ${gate.reason}`);
        this.reportAdmission(candidate, 'GATEKEEPER', 'REJECTED', gate.reason);
        continue;
      }
      stats.gated++;

      await this.deps.queue.put(candidate);
      stats.enqueued++;
      this.reportAdmission(candidate, 'GATEKEEPER', 'ADMITTED', 'enqueued');
      Logger.info(`[SCANNER] Enqueued ${candidate.title} @ ${candidate.price} (queue ${this.deps.queue.size})`);
    }
  }

  /** Top of book for every outcome token in the event. Unquotable tokens are dropped. */
  private async quoteEvent(event: FeedEvent): Promise<QuotedToken[]> {
    const quoted: QuotedToken[] = [];
    for (const market of event.markets) {
      for (const [index, tokenId] of market.tokenIds.entries()) {
        try {
          const quote = await withRetry(() => this.deps.feed.getQuote(tokenId), {
            ...this.deps.retry,
            label: `QUOTE ${tokenId}`,
          });
          const price = quotePrice(quote);
          if (price === null) continue;

          const outcome = market.outcomes[index] ?? outcomeLabel(index, market.tokenIds.length);
          const base = market.question || market.groupItemTitle;
          quoted.push({
            marketId: market.id,
            tokenId,
            title: index === 0 ? base : `${base} (${outcome})`,
            outcome,
            quote,
            price,
          });
        } catch (err) {
          Logger.warn(`[SCANNER] Quote failed for ${tokenId}: ${errorMessage(err)}`);
        }
      }
    }
    return quoted;
  }

  private async buildCandidate(
    event: FeedEvent,
    token: QuotedToken,
    quoted: readonly QuotedToken[],
    daysToResolution: number
  ): Promise<Candidate> {
    const siblings: SiblingOutcome[] = quoted
      .filter(q => q.marketId !== token.marketId)
      .map(q => ({ title: q.title, outcome: q.outcome, price: q.price }));

    const candidate: Candidate = {
      marketId: token.marketId,
      tokenId: token.tokenId,
      eventId: event.id,
      eventTitle: event.title,
      title: token.title,
      category: event.category,
      price: token.price,
      bid: token.quote.bid,
      ask: token.quote.ask,
      spreadPct: spreadPct(token.quote),
      bidLiquidity: token.quote.bidLiquidity,
      endDate: event.endDate ?? '',
      daysToResolution,
      rules: event.description,
      eventMarketCount: event.markets.length,
      priceContext: await this.priceContext(token),
      siblings,
      discoveredAt: this.deps.clock.now(),
      metadata: { outcome: token.outcome },
    };
    return Object.freeze(candidate);
  }

  private async priceContext(token: QuotedToken): Promise<PriceContext | null> {
    try {
      const history = await this.deps.feed.getPriceHistory(token.tokenId);
      if (history.length === 0) return null;
      return buildPriceContext(token.price, historyStats(history));
    } catch (err) {
      Logger.debug(`[SCANNER] No price history for ${token.tokenId}: ${errorMessage(err)}`);
      return null;
    }
  }

  private reportAdmission(candidate: Candidate, stage: Stage, outcome: 'ADMITTED' | 'REJECTED', reason: string) {
    this.deps.sink.record({
      kind: 'ADMISSION',
      market_id: candidate.marketId,
      token_id: candidate.tokenId,
      title: candidate.title,
      category: candidate.category,
      stage,
      outcome,
      reason,
      price: candidate.price,
    });
  }

  private pruneSeen() {
    const cutoff = this.deps.clock.now() - this.config.dedupTtlMs;
    for (const [key, at] of this.seen) {
      if (at <= cutoff) this.seen.delete(key);
    }
  }
}
