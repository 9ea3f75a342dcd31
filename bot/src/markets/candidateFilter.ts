/**
 * markets/candidateFilter.ts
 *
 * Cheap, pure admission checks that run before any advisory call.
 */

import type { FilterConfig } from '../config/env';
import type { Candidate } from '../types';

export interface FilterBand {
  priceMin: number;
  priceMax: number;
  minDays: number;
  maxDays: number;
  minLiquidity: number;
}

export type FilterVerdict = { admitted: true } | { admitted: false; reason: string };

export type FilterInput = Pick<Candidate, 'price' | 'daysToResolution' | 'bidLiquidity'>;

/**
 * Admits iff price, time-to-resolution and bid liquidity are all inside the band.
 * Bounds are inclusive.
 */
export function applyFilter(candidate: FilterInput, band: FilterBand): FilterVerdict {
  const { price, daysToResolution, bidLiquidity } = candidate;

  if (!Number.isFinite(price) || price < band.priceMin || price > band.priceMax) {
    return { admitted: false, reason: `price ${price} outside [${band.priceMin}, ${band.priceMax}]` };
  }
  if (!Number.isFinite(daysToResolution) || daysToResolution < band.minDays || daysToResolution > band.maxDays) {
    return {
      admitted: false,
      reason: `${daysToResolution} days to resolution outside [${band.minDays}, ${band.maxDays}]`,
    };
  }
  if (!Number.isFinite(bidLiquidity) || bidLiquidity < band.minLiquidity) {
    return { admitted: false, reason: `bid liquidity ${bidLiquidity} below ${band.minLiquidity}` };
  }
  return { admitted: true };
}

const SPORTS_TITLE_MARKERS = [' vs', 'winner', 'o/u', 'points', 'goals'];

export interface EventHeader {
  title: string;
  startDate?: string;
}

/**
 * Event-level exclusions applied by the scanner before building candidates.
 * Returns the reason for skipping, or null when the event is eligible.
 */
export function eventExclusion(event: EventHeader, filter: FilterConfig, now: number): string | null {
  const title = event.title.toLowerCase();

  const pattern = filter.skipTitlePatterns.find(p => title.includes(p));
  if (pattern) return `title matches "${pattern}"`;

  if (event.startDate) {
    const start = Date.parse(event.startDate);
    const isSports = SPORTS_TITLE_MARKERS.some(marker => title.includes(marker));
    if (isSports && !Number.isNaN(start) && now > start + filter.sportsStartedGraceHours * 3_600_000) {
      return 'sports event already underway';
    }
  }
  return null;
}
