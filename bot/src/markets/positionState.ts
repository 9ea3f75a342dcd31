/**
 * markets/positionState.ts
 *
 * Pure lifecycle rules for a single position:
 *
 *   HOLDING_UNARMED -> HOLDING_ARMED -> EXITING -> CLOSED
 *   HOLDING_UNARMED -> EXITING        (time exit, take profit, break-even)
 *
 * The supervisor owns the mutable Position; everything here is a function of
 * its current fields, the observed price and the clock.
 */

import type { SupervisorConfig } from '../config/env';
import { DAY_MS, HOUR_MS } from '../core/clock';
import { InvariantViolation } from '../core/errors';
import type { ExitReason, Position, PositionState, PriceEvent } from '../types';

export interface ExitPolicy {
  stopLossFraction: number;
  armingDelayMs: number;
  timeExitMs: number;
  timeExitProfitMargin: number;
  breakEvenTrigger: number;
  breakEvenFloor: number;
}

export function exitPolicy(cfg: SupervisorConfig): ExitPolicy {
  return {
    stopLossFraction: cfg.stopLossFraction,
    armingDelayMs: cfg.armingDelayHours * HOUR_MS,
    timeExitMs: cfg.timeExitDays * DAY_MS,
    timeExitProfitMargin: cfg.timeExitProfitMargin,
    breakEvenTrigger: cfg.breakEvenTrigger,
    breakEvenFloor: cfg.breakEvenFloor,
  };
}

const TRANSITIONS: Record<PositionState, readonly PositionState[]> = {
  HOLDING_UNARMED: ['HOLDING_ARMED', 'EXITING'],
  HOLDING_ARMED: ['EXITING'],
  EXITING: ['CLOSED'],
  CLOSED: [],
};

export function canTransition(from: PositionState, to: PositionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(position: Position, to: PositionState): void {
  if (!canTransition(position.state, to)) {
    throw new InvariantViolation(
      `Illegal transition ${position.state} -> ${to} for ${position.marketId}`,
      'SUPERVISOR'
    );
  }
  position.state = to;
}

export function isHolding(state: PositionState): boolean {
  return state === 'HOLDING_UNARMED' || state === 'HOLDING_ARMED';
}

/** Arming depends only on hold time; price plays no part. */
export function shouldArm(position: Position, now: number): boolean {
  return position.state === 'HOLDING_UNARMED' && now >= position.armingDeadline;
}

export function stopLossPrice(position: Position, policy: ExitPolicy): number {
  return position.entryPrice * (1 - policy.stopLossFraction);
}

/** True once the high-water mark has cleared entry by the break-even trigger. */
export function breakEvenArmed(position: Position, policy: ExitPolicy): boolean {
  return position.highWaterMark >= position.entryPrice * (1 + policy.breakEvenTrigger);
}

/**
 * Exit condition for a holding position at `price`, highest priority first:
 * stop-loss (armed only), time exit (any holding state, unprofitable only),
 * take profit, then break-even (gave back a run-up to near entry).
 */
export function exitReason(position: Position, price: number, now: number, policy: ExitPolicy): ExitReason | null {
  if (!isHolding(position.state)) return null;

  const armed = position.state === 'HOLDING_ARMED' || shouldArm(position, now);
  if (armed && price <= stopLossPrice(position, policy)) return 'STOP_LOSS';

  const timeLeft = position.resolutionTime - now;
  const profitable = price >= position.entryPrice * (1 + policy.timeExitProfitMargin);
  if (timeLeft < policy.timeExitMs && !profitable) return 'TIME_EXIT';

  if (position.targetPrice > 0 && price >= position.targetPrice) return 'TAKE_PROFIT';

  if (breakEvenArmed(position, policy) && price <= position.entryPrice * (1 + policy.breakEvenFloor)) {
    return 'BREAK_EVEN';
  }

  return null;
}

/**
 * True when `event` is newer than every stream event already applied. Venue
 * timestamps are only compared with each other, never with the local clock.
 * Closed positions take no further updates.
 */
export function isFreshUpdate(position: Position, event: PriceEvent): boolean {
  if (position.state === 'CLOSED' || !Number.isFinite(event.price)) return false;
  return position.lastEventTs === null || event.timestamp > position.lastEventTs;
}

function observe(position: Position, price: number, receivedAt: number) {
  position.currentPrice = price;
  position.highWaterMark = Math.max(position.highWaterMark, price);
  position.lastPriceAt = receivedAt;
  position.revision++;
}

/** Applies a stream event received at local time `receivedAt`. */
export function applyPriceUpdate(position: Position, event: PriceEvent, receivedAt: number): boolean {
  if (!isFreshUpdate(position, event)) return false;
  position.lastEventTs = event.timestamp;
  observe(position, event.price, receivedAt);
  return true;
}

/** Applies a REST quote taken at local time `now`. Stream ordering is untouched. */
export function applyQuote(position: Position, price: number, now: number): boolean {
  if (position.state === 'CLOSED' || !Number.isFinite(price)) return false;
  observe(position, price, now);
  return true;
}

export function floor3(value: number): number {
  return Math.floor(value * 1000 + 1e-9) / 1000;
}

/** Lowest acceptable price for an exit sell at the observed price. */
export function exitMinPrice(observed: number, slippage: number): number {
  return Math.max(0.01, floor3(observed * (1 - slippage)));
}
