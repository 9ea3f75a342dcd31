import type { EventCapConfig } from '../config/env';
import { InvariantViolation } from '../core/errors';
import { Logger } from '../utils/logger';

export interface EventGroupKey {
  eventId: string;
  category: string;
  eventMarketCount: number;
}

/** A held slot in an event group. Releasing it twice is a no-op. */
export interface EventReservation {
  readonly eventId: string;
  release(): void;
}

/**
 * Open-position counters per event. Every method is synchronous: a check and
 * its increment never straddle an await, so two admissions for the same event
 * cannot both pass a cap with one slot left.
 */
export class EventGroupRegistry {
  private readonly open = new Map<string, number>();

  constructor(private readonly caps: EventCapConfig) {}

  /** 1 for balanced or single-market events, the multi-outcome cap otherwise. */
  public capFor(key: EventGroupKey): number {
    const balanced = this.caps.balancedCategories.includes(key.category) || key.eventMarketCount <= 1;
    return balanced ? this.caps.balanced : this.caps.multiOutcome;
  }

  public openCount(eventId: string): number {
    return this.open.get(eventId) ?? 0;
  }

  public hasCapacity(key: EventGroupKey): boolean {
    if (!key.eventId) return true;
    return this.openCount(key.eventId) < this.capFor(key);
  }

  /** Takes a slot if one is free, otherwise returns null. */
  public tryReserve(key: EventGroupKey): EventReservation | null {
    if (!key.eventId) return { eventId: '', release: () => undefined };

    const cap = this.capFor(key);
    const current = this.openCount(key.eventId);
    if (current >= cap) return null;

    this.open.set(key.eventId, current + 1);
    Logger.debug(`[EVENT_GROUP] ${key.eventId} reserved ${current + 1}/${cap}`);
    return this.reservation(key.eventId);
  }

  /**
   * Takes a slot for a position that is already held, even past the cap. Used
   * when positions are restored at startup.
   */
  public reserveHeld(eventId: string): EventReservation {
    if (!eventId) return { eventId: '', release: () => undefined };
    const current = this.openCount(eventId);
    this.open.set(eventId, current + 1);
    Logger.debug(`[EVENT_GROUP] ${eventId} restored slot ${current + 1}`);
    return this.reservation(eventId);
  }

  private reservation(eventId: string): EventReservation {
    let released = false;
    return {
      eventId,
      release: () => {
        if (released) return;
        released = true;
        this.decrement(eventId);
      },
    };
  }

  private decrement(eventId: string) {
    const current = this.openCount(eventId);
    if (current <= 0) {
      throw new InvariantViolation(`Event group ${eventId} released with no open positions`, 'EVENT_CAP');
    }
    if (current === 1) this.open.delete(eventId);
    else this.open.set(eventId, current - 1);
  }
}
