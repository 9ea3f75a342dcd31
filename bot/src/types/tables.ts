/**
 * types/tables.ts
 *
 * Rows reported to the persistence sink. Mirrors the Supabase tables.
 */

import type { Stage } from '../core/errors';
import type { ExitReason, PositionState } from './index';

export interface AdmissionRecord {
  kind: 'ADMISSION';
  market_id: string;
  token_id: string;
  title: string;
  category: string;
  stage: Stage;
  outcome: 'ADMITTED' | 'REJECTED' | 'FAILED';
  reason: string;
  price: number;
  max_price?: number;
  sentiment_score?: number;
}

export interface TradeRecord {
  kind: 'TRADE';
  market_id: string;
  token_id: string;
  event_id: string;
  title: string;
  category: string;
  order_id: string;
  entry_price: number;
  size: number;
  stake_usdc: number;
  target_price: number;
  end_date: string;
  mode: 'LIVE' | 'PAPER';
}

export interface ExitRecord {
  kind: 'EXIT';
  market_id: string;
  token_id: string;
  reason: ExitReason;
  order_id: string;
  entry_price: number;
  exit_price: number;
  size: number;
  realized_pnl: number;
  held_ms: number;
}

export interface AlertRecord {
  kind: 'ALERT';
  market_id: string;
  severity: 'CRITICAL';
  message: string;
}

export type SnapshotReason = 'OPENED' | 'RESTORED' | 'UPDATED' | 'CLOSED' | 'SHUTDOWN';

/**
 * Position ledger row. Written on every lifecycle change; the newest row per
 * market is what a restart restores. Times are epoch milliseconds.
 */
export interface PositionSnapshotRecord {
  kind: 'POSITION_SNAPSHOT';
  reason: SnapshotReason;
  market_id: string;
  token_id: string;
  event_id: string;
  title: string;
  category: string;
  state: PositionState;
  exit_reason: ExitReason | null;
  entry_price: number;
  entry_time: number;
  resolution_time: number;
  target_price: number;
  stake_usdc: number;
  current_price: number;
  high_water_mark: number;
  // shares still held
  size: number;
  escalated: boolean;
  captured_at: number;
}

export interface HeartbeatRecord {
  kind: 'HEARTBEAT';
  bot_id: string;
  queue_depth: number;
  open_positions: number;
  balance: number | null;
}

export type PipelineRecord =
  | AdmissionRecord
  | TradeRecord
  | ExitRecord
  | AlertRecord
  | PositionSnapshotRecord
  | HeartbeatRecord;

export type PipelineRecordKind = PipelineRecord['kind'];

export interface PersistenceSink {
  /** Fire-and-forget; must never throw or block the caller. */
  record(record: PipelineRecord): void;
}
