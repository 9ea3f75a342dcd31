import type { HeartbeatRecord, PersistenceSink } from '../types/tables';
import { Logger } from '../utils/logger';

export interface HeartbeatStatus {
  queueDepth: number;
  openPositions: number;
  balance: number | null;
}

export class HeartbeatService {
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly sink: PersistenceSink,
    private readonly botId: string,
    private readonly intervalMs: number
  ) {}

  public start(status: () => HeartbeatStatus) {
    if (this.intervalId) return;
    Logger.info('Starting Heartbeat Service...');

    // First pulse immediately, then on the interval
    this.pulse(status());
    this.intervalId = setInterval(() => this.pulse(status()), this.intervalMs);
  }

  public pulse(status: HeartbeatStatus) {
    const record: HeartbeatRecord = {
      kind: 'HEARTBEAT',
      bot_id: this.botId,
      queue_depth: status.queueDepth,
      open_positions: status.openPositions,
      balance: status.balance,
    };
    this.sink.record(record);
    Logger.info(
      `[BOT_HEARTBEAT] ID: ${this.botId} | Queue: ${status.queueDepth} | Open positions: ${status.openPositions}`
    );
  }

  public stop() {
    if (this.intervalId) clearInterval(this.intervalId);
    this.intervalId = null;
  }
}
