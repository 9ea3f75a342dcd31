import type { Candidate } from '../../types';

/**
 * Result of one advisory stage. A REJECT always carries a reason; an APPROVE
 * carries the stage's payload.
 */
export type AdvisoryVerdict<P> =
  | { readonly outcome: 'APPROVE'; readonly payload: P }
  | { readonly outcome: 'REJECT'; readonly reason: string };

export const approve = <P>(payload: P): AdvisoryVerdict<P> => ({ outcome: 'APPROVE', payload });

export const reject = <P = never>(reason: string): AdvisoryVerdict<P> => ({ outcome: 'REJECT', reason });

export interface GatekeeperPayload {
  note: string;
}

export interface RuleClarityPayload {
  /** What has to happen for the market to resolve YES. */
  criteria: string;
}

export interface SentimentPayload {
  /** 1 (no upside) to 10 (strong catalyst). */
  score: number;
  summary: string;
}

export interface SizingPayload {
  maxPrice: number;
  /** Raw Kelly fraction from the model; null when it gave none. */
  kellyFraction: number | null;
  reason: string;
}

export interface SentimentContext {
  candidate: Candidate;
  criteria: string;
}

export interface SizingContext {
  candidate: Candidate;
  criteria: string;
  sentiment: SentimentPayload;
}

/**
 * One method per advisory role. Implementations may throw or hang; callers
 * treat both as "advisory unavailable".
 */
export interface AdvisoryService {
  gatekeeper(candidate: Candidate): Promise<AdvisoryVerdict<GatekeeperPayload>>;
  ruleClarity(candidate: Candidate): Promise<AdvisoryVerdict<RuleClarityPayload>>;
  sentiment(context: SentimentContext): Promise<AdvisoryVerdict<SentimentPayload>>;
  sizing(context: SizingContext): Promise<AdvisoryVerdict<SizingPayload>>;
}

export interface CompletionRequest {
  system?: string;
  prompt: string;
  temperature: number;
}

/** A single text-completion backend (one provider + model). */
export interface AdvisoryModel {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}
