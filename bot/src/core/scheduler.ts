/**
 * core/scheduler.ts
 *
 * Runs an async task on a fixed interval. A tick that is still running when
 * the next one is due is skipped, so ticks never overlap.
 */

import { Logger } from '../utils/logger';

export class Scheduler {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(private readonly name: string) {}

  public start(task: () => Promise<void>, intervalMs: number) {
    if (this.intervalId) return;
    this.intervalId = setInterval(() => {
      if (this.inFlight) {
        Logger.debug(`[SCHEDULER] ${this.name} tick skipped (previous still running)`);
        return;
      }
      this.inFlight = task()
        .catch(err => Logger.error(`[SCHEDULER] ${this.name} tick failed`, err))
        .finally(() => {
          this.inFlight = null;
        });
    }, intervalMs);
  }

  /** Stops future ticks and waits for the running one, if any. */
  public async stop() {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  public isRunning(): boolean {
    return this.intervalId !== null;
  }
}
