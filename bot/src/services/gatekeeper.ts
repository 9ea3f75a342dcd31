import { errorMessage } from '../core/errors';
import type { Candidate } from '../types';
import { Logger } from '../utils/logger';
import { withRetry, withTimeout } from '../utils/retry';
import type { AdvisoryService } from './advisory/types';

export interface GatekeeperPolicy {
  timeoutMs: number;
  retries: number;
  baseDelayMs: number;
}

export type GateDecision = { admitted: true } | { admitted: false; reason: string };

/**
 * First advisory check, run by the scanner before enqueue. Transient errors
 * are retried; a candidate that still cannot be judged is discarded.
 */
export class Gatekeeper {
  constructor(
    private readonly advisory: AdvisoryService,
    private readonly policy: GatekeeperPolicy
  ) {}

  async check(candidate: Candidate): Promise<GateDecision> {
    try {
      const verdict = await withRetry(
        () => withTimeout(this.advisory.gatekeeper(candidate), this.policy.timeoutMs, 'gatekeeper', 'GATEKEEPER'),
        { retries: this.policy.retries, baseDelayMs: this.policy.baseDelayMs, label: `GATEKEEPER ${candidate.marketId}` }
      );
      return verdict.outcome === 'APPROVE' ? { admitted: true } : { admitted: false, reason: verdict.reason };
    } catch (err) {
      Logger.warn(`[GATEKEEPER] ${candidate.marketId} unavailable: ${errorMessage(err)}`);
      return { admitted: false, reason: 'advisory unavailable' };
    }
  }
}
