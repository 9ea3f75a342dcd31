import type { SupabaseClient } from '@supabase/supabase-js';
import type { Clock } from '../core/clock';
import { TransientServiceError } from '../core/errors';
import type { ExitReason, PositionState } from '../types';
import { isRecord, readNumber, readString, type JsonRecord } from '../utils/json';
import { Logger } from '../utils/logger';
import type { OpenPositionInput } from './positionSupervisor';

export type HeldState = Exclude<PositionState, 'CLOSED'>;

/** A position read back from the ledger. `size` is the share count still held. */
export interface StoredPosition extends OpenPositionInput {
  entryTime: number;
  state: HeldState;
  exitReason: ExitReason | null;
  currentPrice: number;
  highWaterMark: number;
  capturedAt: number;
}

export interface PositionStore {
  /** Positions whose newest ledger row is not CLOSED. */
  loadOpen(): Promise<StoredPosition[]>;
}

const HELD_STATES: readonly HeldState[] = ['HOLDING_UNARMED', 'HOLDING_ARMED', 'EXITING'];
const EXIT_REASONS: readonly ExitReason[] = ['STOP_LOSS', 'TIME_EXIT', 'TAKE_PROFIT', 'BREAK_EVEN'];

function isHeldState(value: string): value is HeldState {
  return HELD_STATES.some(s => s === value);
}

function isExitReason(value: string): value is ExitReason {
  return EXIT_REASONS.some(r => r === value);
}

function toStored(row: JsonRecord, marketId: string): StoredPosition | null {
  const state = readString(row, 'state');
  if (!isHeldState(state)) return null;

  const tokenId = readString(row, 'token_id');
  const entryPrice = readNumber(row, 'entry_price');
  const entryTime = readNumber(row, 'entry_time');
  const resolutionTime = readNumber(row, 'resolution_time');
  const size = readNumber(row, 'size');
  const capturedAt = readNumber(row, 'captured_at');
  if (!tokenId || entryPrice === null || entryTime === null || resolutionTime === null || size === null || capturedAt === null) {
    Logger.error(`[POSITION_STORE] Ledger row for ${marketId} is incomplete and cannot be restored`, row);
    return null;
  }
  if (size <= 0) return null;

  const reason = readString(row, 'exit_reason');
  const exitReason = isExitReason(reason) ? reason : null;

  return {
    marketId,
    tokenId,
    eventId: readString(row, 'event_id'),
    title: readString(row, 'title'),
    category: readString(row, 'category'),
    entryPrice,
    size,
    stakeUsdc: readNumber(row, 'stake_usdc') ?? entryPrice * size,
    resolutionTime,
    targetPrice: readNumber(row, 'target_price') ?? 0,
    entryTime,
    // an exit with no recorded reason is re-decided from scratch
    state: state === 'EXITING' && exitReason === null ? 'HOLDING_UNARMED' : state,
    exitReason,
    currentPrice: readNumber(row, 'current_price') ?? entryPrice,
    highWaterMark: readNumber(row, 'high_water_mark') ?? entryPrice,
    capturedAt,
  };
}

/**
 * Reduces ledger rows, newest first, to the positions still held: the first
 * row seen for a market wins and CLOSED markets drop out.
 */
export function openFromLedger(rows: readonly unknown[]): StoredPosition[] {
  const seen = new Set<string>();
  const open: StoredPosition[] = [];

  for (const raw of rows) {
    if (!isRecord(raw)) continue;
    const marketId = readString(raw, 'market_id');
    if (!marketId || seen.has(marketId)) continue;
    seen.add(marketId);

    const stored = toStored(raw, marketId);
    if (stored) open.push(stored);
  }
  return open;
}

/**
 * Reads the `position_snapshots` ledger written by the TradeLogger. Only rows
 * inside the lookback window are scanned: no position outlives the longest
 * resolution horizon the filter admits.
 */
export class SupabasePositionStore implements PositionStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly botId: string,
    private readonly clock: Clock,
    private readonly lookbackMs: number,
    private readonly pageSize = 1000
  ) {}

  async loadOpen(): Promise<StoredPosition[]> {
    const since = this.clock.now() - this.lookbackMs;
    const rows: unknown[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.client
        .from('position_snapshots')
        .select('*')
        .eq('bot_id', this.botId)
        .gte('captured_at', since)
        .order('captured_at', { ascending: false })
        .range(from, from + this.pageSize - 1);

      if (error) {
        throw new TransientServiceError(`position_snapshots read failed: ${error.message}`, 'SUPERVISOR', error);
      }
      const page: unknown[] = data ?? [];
      rows.push(...page);
      if (page.length < this.pageSize) break;
    }

    const open = openFromLedger(rows);
    Logger.info(`[POSITION_STORE] ${open.length} open positions in ledger (${rows.length} rows scanned)`);
    return open;
  }
}
