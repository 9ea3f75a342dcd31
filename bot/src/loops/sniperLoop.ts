/**
 * loops/sniperLoop.ts
 *
 * Consumer side of the pipeline. Takes one candidate at a time off the queue
 * and walks it through war room, portfolio guard, price re-check, sizing,
 * event-group reservation, buy and supervisor registration. Any stage can
 * end the candidate; none of them ends the loop.
 */

import type { ExecutionMode } from '../config/executionMode';
import type { CandidateQueue } from '../core/candidateQueue';
import { DAY_MS, type Clock } from '../core/clock';
import { InvariantViolation, errorMessage, type Stage } from '../core/errors';
import type { FilterBand } from '../markets/candidateFilter';
import type { EventGroupRegistry } from '../markets/eventGroups';
import { computeProfitTarget } from '../markets/profitTarget';
import type { PortfolioGuard } from '../risk/portfolioGuard';
import type { RiskManager } from '../risk/riskManager';
import type { FillResult } from '../execution/adapter';
import type { ExecutionService } from '../services/execution';
import { quotePrice, type MarketFeed } from '../services/marketFeed';
import type { PositionSupervisor } from '../services/positionSupervisor';
import type { BuySignal, WarRoom } from '../services/warRoom';
import type { Candidate, Position } from '../types';
import type { PersistenceSink } from '../types/tables';
import { Logger } from '../utils/logger';

export interface SniperDeps {
  queue: CandidateQueue<Candidate>;
  warRoom: WarRoom;
  riskManager: RiskManager;
  portfolioGuard: PortfolioGuard;
  eventGroups: EventGroupRegistry;
  execution: ExecutionService;
  feed: MarketFeed;
  supervisor: PositionSupervisor;
  sink: PersistenceSink;
  clock: Clock;
  mode: ExecutionMode;
}

export type SniperOutcome =
  | { status: 'BOUGHT'; position: Position }
  | { status: 'REJECTED' | 'FAILED'; stage: Stage; reason: string };

export const PRICE_MOVED = 'PRICE_MOVED';

export class SniperLoop {
  private running: Promise<void> | null = null;
  private processed = 0;

  constructor(private readonly deps: SniperDeps) {}

  public start() {
    if (this.running) return;
    Logger.info('[SNIPER] Consumer started');
    this.running = this.run();
  }

  /** Resolves once the queue is closed and drained. */
  public async drained(): Promise<void> {
    if (this.running) await this.running;
  }

  public get processedCount(): number {
    return this.processed;
  }

  private async run() {
    for (;;) {
      const candidate = await this.deps.queue.take();
      if (candidate === undefined) break;
      try {
        await this.process(candidate);
      } catch (err) {
        Logger.error(`[SNIPER] Unhandled error on ${candidate.marketId}`, err);
      }
      this.processed++;
    }
    Logger.info(`[SNIPER] Queue drained after ${this.processed} candidates`);
  }

  public async process(candidate: Candidate): Promise<SniperOutcome> {
    const { deps } = this;
    const groupKey = {
      eventId: candidate.eventId,
      category: candidate.category,
      eventMarketCount: candidate.eventMarketCount,
    };

    if (deps.supervisor.hasPosition(candidate.marketId)) {
      return this.reject(candidate, 'DEDUP', 'market already held');
    }
    if (!deps.eventGroups.hasCapacity(groupKey)) {
      return this.reject(candidate, 'EVENT_CAP', 'event group cap reached');
    }

    const decision = await deps.warRoom.evaluate(candidate);
    if (decision.outcome === 'REJECT') return this.reject(candidate, decision.stage, decision.reason);

    const balance = await deps.execution.balance();
    const guard = deps.portfolioGuard.check(candidate, deps.supervisor.openPositions(), balance);
    if (guard) return this.reject(candidate, 'PORTFOLIO', guard);

    const recheck = await this.recheckPrice(candidate, decision);
    if (recheck.outcome === 'FAILED') return this.fail(candidate, 'FEED', recheck.reason);
    if (recheck.outcome === 'MOVED') return this.reject(candidate, 'RISK', recheck.reason);
    const livePrice = recheck.price;

    const sizing = deps.riskManager.size({
      rawKelly: decision.rawKelly,
      category: candidate.category,
      entryPrice: livePrice,
      capital: balance ?? 0,
    });
    if (sizing.stakeUsdc <= 0) return this.reject(candidate, 'RISK', sizing.reason ?? 'zero stake');

    const reservation = deps.eventGroups.tryReserve(groupKey);
    if (!reservation) return this.reject(candidate, 'EVENT_CAP', 'event group cap reached');

    const ref = { marketId: candidate.marketId, tokenId: candidate.tokenId };
    let fill: FillResult;
    try {
      fill = await deps.execution.buy(ref, livePrice, sizing.stakeUsdc);
    } catch (err) {
      reservation.release();
      return this.fail(candidate, 'EXECUTION', errorMessage(err));
    }

    const targetPrice = computeProfitTarget({
      fillPrice: fill.avgPrice,
      daysToResolution: candidate.daysToResolution,
      rangePct: candidate.priceContext?.rangePct ?? 0,
      sentimentScore: decision.sentimentScore,
      spreadPct: candidate.spreadPct,
      maxPrice: decision.maxPrice,
    });

    const endMs = Date.parse(candidate.endDate);
    const resolutionTime = Number.isFinite(endMs)
      ? endMs
      : candidate.discoveredAt + candidate.daysToResolution * DAY_MS;
    const stakeUsdc = Math.round(fill.filledSize * fill.avgPrice * 100) / 100;

    let position: Position;
    try {
      position = deps.supervisor.register(
        {
          marketId: candidate.marketId,
          tokenId: candidate.tokenId,
          eventId: candidate.eventId,
          title: candidate.title,
          category: candidate.category,
          entryPrice: fill.avgPrice,
          size: fill.filledSize,
          stakeUsdc,
          resolutionTime,
          targetPrice,
        },
        reservation
      );
    } catch (err) {
      // Filled but unowned: only a human can reconcile this
      reservation.release();
      const message = `Buy ${fill.orderId} on ${candidate.marketId} filled but could not be registered: ${errorMessage(err)}`;
      Logger.error(`[SNIPER] ${message}`);
      deps.sink.record({ kind: 'ALERT', market_id: candidate.marketId, severity: 'CRITICAL', message });
      return this.fail(candidate, err instanceof InvariantViolation ? err.stage : 'SUPERVISOR', message);
    }

    deps.sink.record({
      kind: 'TRADE',
      market_id: candidate.marketId,
      token_id: candidate.tokenId,
      event_id: candidate.eventId,
      title: candidate.title,
      category: candidate.category,
      order_id: fill.orderId,
      entry_price: fill.avgPrice,
      size: fill.filledSize,
      stake_usdc: stakeUsdc,
      target_price: targetPrice,
      end_date: candidate.endDate,
      mode: deps.mode,
    });
    this.report(candidate, 'SIZING', 'ADMITTED', decision.reason || 'bought', decision);
    Logger.info(
      `[SNIPER] BOUGHT ${candidate.title} x${fill.filledSize} @ ${fill.avgPrice} ` +
        `(stake $${stakeUsdc}, ${sizing.categoryClass}, target ${targetPrice})`
    );
    return { status: 'BOUGHT', position };
  }

  private async recheckPrice(
    candidate: Candidate,
    signal: BuySignal
  ): Promise<{ outcome: 'OK'; price: number } | { outcome: 'MOVED'; reason: string } | { outcome: 'FAILED'; reason: string }> {
    let price: number | null;
    try {
      price = quotePrice(await this.deps.feed.getQuote(candidate.tokenId));
    } catch (err) {
      return { outcome: 'FAILED', reason: `quote unavailable: ${errorMessage(err)}` };
    }
    if (price === null) return { outcome: 'FAILED', reason: 'no quote' };

    const band: FilterBand = this.deps.riskManager.filterBand();
    if (price > signal.maxPrice || price < band.priceMin || price > band.priceMax) {
      return { outcome: 'MOVED', reason: `${PRICE_MOVED}: ${candidate.price} -> ${price} (max ${signal.maxPrice})` };
    }
    return { outcome: 'OK', price };
  }

  private reject(candidate: Candidate, stage: Stage, reason: string): SniperOutcome {
    Logger.info(`[SNIPER] REJECT ${candidate.marketId} at ${stage}: ${reason}`);
    this.report(candidate, stage, 'REJECTED', reason);
    return { status: 'REJECTED', stage, reason };
  }

  private fail(candidate: Candidate, stage: Stage, reason: string): SniperOutcome {
    Logger.warn(`[SNIPER] FAILED ${candidate.marketId} at ${stage}: ${reason}`);
    this.report(candidate, stage, 'FAILED', reason);
    return { status: 'FAILED', stage, reason };
  }

  private report(
    candidate: Candidate,
    stage: Stage,
    outcome: 'ADMITTED' | 'REJECTED' | 'FAILED',
    reason: string,
    signal?: BuySignal
  ) {
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
      max_price: signal?.maxPrice,
      sentiment_score: signal?.sentimentScore,
    });
  }
}
