/**
 * services/warRoom.ts
 *
 * Three advisory stages per candidate, strictly in order of cost:
 *
 *   1. rule clarity   (cheap)
 *   2. sentiment      (web and news research)
 *   3. sizing         (slow reasoning model)
 *
 * The first REJECT ends the evaluation. A stage that errors or times out is a
 * REJECT with reason "advisory unavailable", never an approval.
 */

import { errorMessage, type Stage } from '../core/errors';
import { kellyFraction } from '../risk/kelly';
import type { Candidate } from '../types';
import { Logger } from '../utils/logger';
import { withRetry, withTimeout } from '../utils/retry';
import { reject, type AdvisoryService, type AdvisoryVerdict } from './advisory/types';

export interface WarRoomPolicy {
  timeoutMs: number;
  sizingTimeoutMs: number;
  retries: number;
  baseDelayMs: number;
  minSentimentScore: number;
  minEdge: number;
}

export interface BuySignal {
  outcome: 'BUY';
  maxPrice: number;
  rawKelly: number;
  sentimentScore: number;
  criteria: string;
  reason: string;
}

export interface WarRoomRejection {
  outcome: 'REJECT';
  stage: Stage;
  reason: string;
}

export type WarRoomDecision = BuySignal | WarRoomRejection;

export const ADVISORY_UNAVAILABLE = 'advisory unavailable';

export class WarRoom {
  constructor(
    private readonly advisory: AdvisoryService,
    private readonly policy: WarRoomPolicy
  ) {}

  async evaluate(candidate: Candidate): Promise<WarRoomDecision> {
    const rules = await this.runStage('RULE_CLARITY', candidate, this.policy.timeoutMs, () =>
      this.advisory.ruleClarity(candidate)
    );
    if (rules.outcome === 'REJECT') return this.rejected('RULE_CLARITY', candidate, rules.reason);
    const criteria = rules.payload.criteria;

    const sentiment = await this.runStage('SENTIMENT', candidate, this.policy.timeoutMs, () =>
      this.advisory.sentiment({ candidate, criteria })
    );
    if (sentiment.outcome === 'REJECT') return this.rejected('SENTIMENT', candidate, sentiment.reason);
    if (sentiment.payload.score < this.policy.minSentimentScore) {
      return this.rejected('SENTIMENT', candidate, 'no edge');
    }

    const sizing = await this.runStage('SIZING', candidate, this.policy.sizingTimeoutMs, () =>
      this.advisory.sizing({ candidate, criteria, sentiment: sentiment.payload })
    );
    if (sizing.outcome === 'REJECT') return this.rejected('SIZING', candidate, sizing.reason);

    const { maxPrice, kellyFraction: modelKelly, reason } = sizing.payload;
    if (candidate.price > maxPrice || maxPrice - candidate.price < this.policy.minEdge) {
      return this.rejected('SIZING', candidate, 'edge below minimum');
    }

    const rawKelly = modelKelly ?? kellyFraction(maxPrice, candidate.price);
    Logger.info(
      `[WAR_ROOM] BUY ${candidate.marketId} max=${maxPrice} kelly=${rawKelly.toFixed(3)} score=${sentiment.payload.score}`
    );
    return { outcome: 'BUY', maxPrice, rawKelly, sentimentScore: sentiment.payload.score, criteria, reason };
  }

  private async runStage<P>(
    stage: Stage,
    candidate: Candidate,
    timeoutMs: number,
    call: () => Promise<AdvisoryVerdict<P>>
  ): Promise<AdvisoryVerdict<P>> {
    try {
      return await withRetry(() => withTimeout(call(), timeoutMs, stage, stage), {
        retries: this.policy.retries,
        baseDelayMs: this.policy.baseDelayMs,
        label: `${stage} ${candidate.marketId}`,
      });
    } catch (err) {
      Logger.warn(`[WAR_ROOM] ${stage} failed for ${candidate.marketId}: ${errorMessage(err)}`);
      return reject(ADVISORY_UNAVAILABLE);
    }
  }

  private rejected(stage: Stage, candidate: Candidate, reason: string): WarRoomRejection {
    Logger.info(`[WAR_ROOM] REJECT ${candidate.marketId} at ${stage}: ${reason}`);
    return { outcome: 'REJECT', stage, reason };
  }
}
