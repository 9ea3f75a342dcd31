/**
 * types/index.ts
 *
 * Shared contracts between the scanner, the war room, the risk layer and the
 * position supervisor.
 */

export type CategoryClass = 'PREFERRED' | 'STANDARD' | 'HIGH_RISK';

export type RiskMode = 'NORMAL' | 'DEFENSIVE';

export interface PriceStats {
  high: number;
  low: number;
  avg: number;
  change1hPct: number;
}

export interface PriceContext extends PriceStats {
  priceVsAvg: 'below average' | 'near average' | 'above average' | 'unknown';
  inLowerHalf: boolean;
  nearHistoricalLow: boolean;
  rangePct: number;
}

// Another outcome of the same event, shown to the sizing stage for comparison
export interface SiblingOutcome {
  title: string;
  outcome: string;
  price: number;
}

/**
 * A market snapshot under evaluation. Built once by the scanner, never mutated.
 */
export interface Candidate {
  readonly marketId: string;
  readonly tokenId: string;
  readonly eventId: string;
  readonly eventTitle: string;
  readonly title: string;
  readonly category: string;
  readonly price: number;
  readonly bid: number | null;
  readonly ask: number | null;
  readonly spreadPct: number | null;
  readonly bidLiquidity: number;
  readonly endDate: string;
  readonly daysToResolution: number;
  readonly rules: string;
  readonly eventMarketCount: number;
  readonly priceContext: PriceContext | null;
  readonly siblings: readonly SiblingOutcome[];
  readonly discoveredAt: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface MarketRef {
  marketId: string;
  tokenId: string;
}

export type PositionState = 'HOLDING_UNARMED' | 'HOLDING_ARMED' | 'EXITING' | 'CLOSED';

export type ExitReason = 'STOP_LOSS' | 'TIME_EXIT' | 'TAKE_PROFIT' | 'BREAK_EVEN';

/**
 * An open position. Owned by the PositionSupervisor; only its lanes mutate it.
 */
export interface Position {
  readonly marketId: string;
  readonly tokenId: string;
  readonly eventId: string;
  readonly title: string;
  readonly category: string;
  readonly entryPrice: number;
  readonly entryTime: number;
  readonly size: number;
  readonly stakeUsdc: number;
  // shares still held; drops below size only on a partial exit fill
  openSize: number;
  readonly armingDeadline: number;
  readonly resolutionTime: number;
  readonly targetPrice: number;
  state: PositionState;
  currentPrice: number;
  // highest price seen since entry; arms the break-even exit
  highWaterMark: number;
  // local receive time of the last applied price
  lastPriceAt: number;
  // venue timestamp of the last applied stream event; orders stream events only
  lastEventTs: number | null;
  // bumped on every applied price update; stale events never move it backwards
  revision: number;
  exitReason: ExitReason | null;
  exitAttempts: number;
  lastExitAttemptAt: number | null;
  escalated: boolean;
}

export interface PriceEvent {
  marketId: string;
  price: number;
  timestamp: number;
}

export type AdvisoryRole = 'GATEKEEPER' | 'RULE_CLARITY' | 'SENTIMENT' | 'SIZING';
