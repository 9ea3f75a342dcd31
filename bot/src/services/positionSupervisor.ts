/**
 * services/positionSupervisor.ts
 *
 * Owns every open position from confirmed buy to confirmed sell.
 *
 * Each position has a lane: a promise chain that runs its price updates,
 * clock ticks and exit attempts one at a time. Lanes of different positions
 * run independently. Nothing outside a lane mutates a Position.
 */

import type { SupervisorConfig } from '../config/env';
import type { Clock } from '../core/clock';
import { InvariantViolation, errorMessage } from '../core/errors';
import { Scheduler } from '../core/scheduler';
import type { EventReservation } from '../markets/eventGroups';
import {
  applyPriceUpdate,
  applyQuote,
  exitMinPrice,
  exitPolicy,
  exitReason,
  shouldArm,
  stopLossPrice,
  transition,
  type ExitPolicy,
} from '../markets/positionState';
import type { MarketRef, Position, PriceEvent } from '../types';
import type { PersistenceSink, SnapshotReason } from '../types/tables';
import { Logger } from '../utils/logger';
import type { ExecutionService } from './execution';
import type { PriceWatcher } from './observer';
import type { StoredPosition } from './positionStore';
import type { LogEvent } from './supabase';

export interface OpenPositionInput {
  marketId: string;
  tokenId: string;
  eventId: string;
  title: string;
  category: string;
  entryPrice: number;
  size: number;
  stakeUsdc: number;
  resolutionTime: number;
  targetPrice: number;
}

export interface SupervisorDeps {
  execution: ExecutionService;
  watcher: PriceWatcher;
  sink: PersistenceSink;
  clock: Clock;
  logEvent?: LogEvent;
  /** REST fallback used on ticks when the stream has gone quiet. */
  quote?: (tokenId: string) => Promise<number | null>;
}

type LaneTask = (position: Position) => Promise<void>;

export class PositionSupervisor {
  private readonly positions = new Map<string, Position>();
  private readonly reservations = new Map<string, EventReservation>();
  private readonly lanes = new Map<string, Promise<void>>();
  private readonly scheduler = new Scheduler('supervisor');
  private readonly policy: ExitPolicy;

  constructor(
    private readonly config: SupervisorConfig,
    private readonly deps: SupervisorDeps
  ) {
    this.policy = exitPolicy(config);
  }

  // ---- Registry ----

  /**
   * Takes ownership of a freshly filled position and starts observing it.
   * The event-group reservation is released when the position closes.
   */
  public register(input: OpenPositionInput, reservation: EventReservation): Position {
    const now = this.deps.clock.now();
    const position = this.adopt(
      {
        ...input,
        entryTime: now,
        armingDeadline: now + this.policy.armingDelayMs,
        openSize: input.size,
        state: 'HOLDING_UNARMED',
        currentPrice: input.entryPrice,
        highWaterMark: input.entryPrice,
        lastPriceAt: now,
        lastEventTs: null,
        revision: 0,
        exitReason: null,
        exitAttempts: 0,
        lastExitAttemptAt: null,
        escalated: false,
      },
      reservation,
      'OPENED'
    );

    Logger.info(
      `[SUPERVISOR] Registered ${position.marketId} @ ${position.entryPrice} x${position.size} ` +
        `(stop ${stopLossPrice(position, this.policy).toFixed(3)} armed after ${this.config.armingDelayHours}h, target ${position.targetPrice})`
    );
    return position;
  }

  /**
   * Resumes supervision of a position held before a restart. Entry time and
   * lifecycle state come from the ledger; the exit attempt budget starts over.
   */
  public restore(stored: StoredPosition, reservation: EventReservation): Position {
    const position = this.adopt(
      {
        marketId: stored.marketId,
        tokenId: stored.tokenId,
        eventId: stored.eventId,
        title: stored.title,
        category: stored.category,
        entryPrice: stored.entryPrice,
        entryTime: stored.entryTime,
        size: stored.size,
        stakeUsdc: stored.stakeUsdc,
        openSize: stored.size,
        armingDeadline: stored.entryTime + this.policy.armingDelayMs,
        resolutionTime: stored.resolutionTime,
        targetPrice: stored.targetPrice,
        state: stored.state,
        currentPrice: stored.currentPrice,
        highWaterMark: stored.highWaterMark,
        lastPriceAt: stored.capturedAt,
        lastEventTs: null,
        revision: 0,
        exitReason: stored.exitReason,
        exitAttempts: 0,
        lastExitAttemptAt: null,
        escalated: false,
      },
      reservation,
      'RESTORED'
    );

    Logger.info(
      `[SUPERVISOR] Restored ${position.marketId} ${position.state} @ ${position.entryPrice} x${position.openSize} ` +
        `(held since ${new Date(position.entryTime).toISOString()})`
    );
    return position;
  }

  public hasPosition(marketId: string): boolean {
    return this.positions.has(marketId);
  }

  public get(marketId: string): Position | undefined {
    return this.positions.get(marketId);
  }

  public openPositions(): readonly Position[] {
    return [...this.positions.values()];
  }

  public get openCount(): number {
    return this.positions.size;
  }

  // ---- Inputs ----

  /** Applies one observed price on the position's lane. Never rejects. */
  public onPrice(event: PriceEvent): Promise<void> {
    return this.enqueue(event.marketId, position => this.handlePrice(position, event));
  }

  /** Fire-and-forget entry point for the Observer. */
  public ingest(event: PriceEvent): void {
    void this.onPrice(event);
  }

  /** Re-evaluates every position against the clock. */
  public async tick(): Promise<void> {
    const ids = [...this.positions.keys()];
    await Promise.all(ids.map(id => this.enqueue(id, position => this.handleTick(position))));
  }

  public start() {
    this.scheduler.start(() => this.tick(), this.config.tickMs);
    Logger.info(`[SUPERVISOR] Monitoring loop started (tick ${this.config.tickMs}ms)`);
  }

  /** Resolves once every lane has drained, including work queued meanwhile. */
  public async idle(): Promise<void> {
    while (this.lanes.size > 0) {
      await Promise.all([...this.lanes.values()]);
    }
  }

  /**
   * Stops the clock, lets in-flight exits finish, then records every position
   * still open so none is abandoned silently.
   */
  public async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.idle();

    for (const position of this.positions.values()) this.snapshot(position, 'SHUTDOWN');
    Logger.info(`[SUPERVISOR] Stopped with ${this.positions.size} open positions persisted`);
  }

  // ---- Ledger ----

  private adopt(position: Position, reservation: EventReservation, reason: SnapshotReason): Position {
    if (this.positions.has(position.marketId)) {
      throw new InvariantViolation(`Duplicate position for market ${position.marketId}`, 'SUPERVISOR');
    }
    this.deps.watcher.watch(position.marketId, position.tokenId);
    this.positions.set(position.marketId, position);
    this.reservations.set(position.marketId, reservation);
    this.snapshot(position, reason);
    return position;
  }

  private snapshot(position: Position, reason: SnapshotReason) {
    this.deps.sink.record({
      kind: 'POSITION_SNAPSHOT',
      reason,
      market_id: position.marketId,
      token_id: position.tokenId,
      event_id: position.eventId,
      title: position.title,
      category: position.category,
      state: position.state,
      exit_reason: position.exitReason,
      entry_price: position.entryPrice,
      entry_time: position.entryTime,
      resolution_time: position.resolutionTime,
      target_price: position.targetPrice,
      stake_usdc: position.stakeUsdc,
      current_price: position.currentPrice,
      high_water_mark: position.highWaterMark,
      size: position.openSize,
      escalated: position.escalated,
      captured_at: this.deps.clock.now(),
    });
  }

  // ---- Lanes ----

  private enqueue(marketId: string, task: LaneTask): Promise<void> {
    const previous = this.lanes.get(marketId) ?? Promise.resolve();

    const next: Promise<void> = previous
      .then(async () => {
        const position = this.positions.get(marketId);
        if (!position || position.state === 'CLOSED') return;
        await task(position);
      })
      .catch(err => this.onLaneError(marketId, err))
      .finally(() => {
        if (this.lanes.get(marketId) === next) this.lanes.delete(marketId);
      });

    this.lanes.set(marketId, next);
    return next;
  }

  private onLaneError(marketId: string, err: unknown) {
    if (err instanceof InvariantViolation) {
      Logger.error(`[SUPERVISOR] INVARIANT VIOLATION on ${marketId}: ${err.message}`);
      this.deps.sink.record({ kind: 'ALERT', market_id: marketId, severity: 'CRITICAL', message: err.message });
      return;
    }
    Logger.error(`[SUPERVISOR] Lane error on ${marketId}`, err);
  }

  // ---- Lifecycle ----

  private async handlePrice(position: Position, event: PriceEvent) {
    if (!applyPriceUpdate(position, event, this.deps.clock.now())) {
      Logger.debug(`[SUPERVISOR] Stale price for ${position.marketId} ignored (ts ${event.timestamp})`);
      return;
    }
    await this.evaluate(position);
  }

  private async handleTick(position: Position) {
    const now = this.deps.clock.now();
    if (this.deps.quote && now - position.lastPriceAt >= this.config.tickMs) {
      try {
        const price = await this.deps.quote(position.tokenId);
        if (price !== null) applyQuote(position, price, now);
      } catch (err) {
        Logger.warn(`[SUPERVISOR] Quote refresh failed for ${position.marketId}: ${errorMessage(err)}`);
      }
    }
    await this.evaluate(position);
  }

  private async evaluate(position: Position) {
    const now = this.deps.clock.now();

    if (position.state === 'EXITING') {
      await this.attemptExit(position);
      return;
    }

    if (shouldArm(position, now)) {
      transition(position, 'HOLDING_ARMED');
      Logger.info(`[SUPERVISOR] ${position.marketId} stop-loss ARMED`);
      this.snapshot(position, 'UPDATED');
    }

    const reason = exitReason(position, position.currentPrice, now, this.policy);
    if (!reason) return;

    transition(position, 'EXITING');
    position.exitReason = reason;
    Logger.warn(
      `[SUPERVISOR] ${reason} ${position.marketId}: entry ${position.entryPrice} -> ${position.currentPrice}`
    );
    this.snapshot(position, 'UPDATED');
    await this.attemptExit(position);
  }

  private async attemptExit(position: Position) {
    if (position.escalated || !position.exitReason) return;

    const now = this.deps.clock.now();
    if (position.lastExitAttemptAt !== null && now - position.lastExitAttemptAt < this.config.exitRetryMs) {
      Logger.debug(`[SUPERVISOR] Exit retry for ${position.marketId} deferred until the retry interval passes`);
      return;
    }
    position.lastExitAttemptAt = now;
    position.exitAttempts++;
    const ref: MarketRef = { marketId: position.marketId, tokenId: position.tokenId };
    const minPrice = exitMinPrice(position.currentPrice, this.config.exitSlippage);

    try {
      const fill = await this.deps.execution.sell(ref, minPrice, position.openSize);
      this.deps.sink.record({
        kind: 'EXIT',
        market_id: position.marketId,
        token_id: position.tokenId,
        reason: position.exitReason,
        order_id: fill.orderId,
        entry_price: position.entryPrice,
        exit_price: fill.avgPrice,
        size: fill.filledSize,
        realized_pnl: (fill.avgPrice - position.entryPrice) * fill.filledSize,
        held_ms: this.deps.clock.now() - position.entryTime,
      });

      position.openSize = Math.max(0, position.openSize - fill.filledSize);
      if (position.openSize > 0) {
        Logger.warn(`[SUPERVISOR] Partial exit on ${position.marketId}; ${position.openSize} shares left`);
        this.snapshot(position, 'UPDATED');
        return;
      }
      this.close(position);
    } catch (err) {
      this.onExitFailure(position, err);
    }
  }

  private onExitFailure(position: Position, err: unknown) {
    const attempts = `${position.exitAttempts}/${this.config.maxExitAttempts}`;
    if (position.exitAttempts < this.config.maxExitAttempts) {
      Logger.warn(`[SUPERVISOR] Exit attempt ${attempts} failed for ${position.marketId}: ${errorMessage(err)}`);
      return;
    }

    position.escalated = true;
    const message =
      `Exit of ${position.marketId} failed after ${attempts} attempts (${errorMessage(err)}). ` +
      `${position.openSize} shares still held. Manual intervention required.`;
    Logger.error(`[SUPERVISOR] ${message}`);
    this.deps.sink.record({ kind: 'ALERT', market_id: position.marketId, severity: 'CRITICAL', message });
    this.snapshot(position, 'UPDATED');
    if (this.deps.logEvent) void this.deps.logEvent('ERROR', message);
  }

  private close(position: Position) {
    transition(position, 'CLOSED');
    this.snapshot(position, 'CLOSED');
    this.positions.delete(position.marketId);
    this.deps.watcher.unwatch(position.marketId);
    this.reservations.get(position.marketId)?.release();
    this.reservations.delete(position.marketId);
    Logger.info(`[SUPERVISOR] ${position.marketId} CLOSED (${position.exitReason})`);
  }
}
