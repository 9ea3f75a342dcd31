import type { SupabaseClient } from '@supabase/supabase-js';
import type { PersistenceSink, PipelineRecord, PipelineRecordKind } from '../types/tables';
import { Logger } from '../utils/logger';

const TABLES: Record<PipelineRecordKind, string> = {
  ADMISSION: 'admission_decisions',
  TRADE: 'trades',
  EXIT: 'exits',
  ALERT: 'alerts',
  POSITION_SNAPSHOT: 'position_snapshots',
  HEARTBEAT: 'bot_heartbeats',
};

/**
 * Supabase-backed persistence sink. `record` returns immediately; the insert
 * runs detached and a failure is only logged.
 */
export class TradeLogger implements PersistenceSink {
  private pending = new Set<Promise<void>>();

  constructor(
    private readonly client: SupabaseClient,
    private readonly botId: string
  ) {}

  public record(record: PipelineRecord): void {
    const { kind, ...fields } = record;
    const row = { ...fields, bot_id: this.botId, created_at: new Date().toISOString() };

    const insert = Promise.resolve()
      .then(async () => {
        const { error } = await this.client.from(TABLES[kind]).insert(row);
        if (error) Logger.error(`DB_LOG_FAIL ${TABLES[kind]}`, error.message);
      })
      .catch(err => Logger.error('TradeLogger: Unexpected error', err))
      .finally(() => {
        this.pending.delete(insert);
      });
    this.pending.add(insert);
  }

  /** Waits for inserts already in flight. Used once at shutdown. */
  public async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
