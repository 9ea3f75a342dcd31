import type { Clock } from '../../core/clock';
import type { AdvisoryRole, Candidate } from '../../types';
import { Logger } from '../../utils/logger';
import type { ResearchProvider } from '../research';
import { parseCriteria, parsePassFail, parseSentiment, parseSizing } from './parse';
import { gatekeeperPrompt, researchQuery, ruleClarityPrompt, sentimentPrompt, sizingPrompt } from './prompts';
import {
  approve,
  reject,
  type AdvisoryModel,
  type AdvisoryService,
  type AdvisoryVerdict,
  type GatekeeperPayload,
  type RuleClarityPayload,
  type SentimentContext,
  type SentimentPayload,
  type SizingContext,
  type SizingPayload,
} from './types';

/**
 * AdvisoryService backed by language models, one model per role. Model and
 * network errors propagate; the caller decides what a failure means.
 */
export class LlmAdvisoryService implements AdvisoryService {
  constructor(
    private readonly models: Readonly<Record<AdvisoryRole, AdvisoryModel>>,
    private readonly research: ResearchProvider,
    private readonly clock: Clock
  ) {}

  async gatekeeper(candidate: Candidate): Promise<AdvisoryVerdict<GatekeeperPayload>> {
    const today = new Date(this.clock.now()).toISOString().slice(0, 10);
    const text = await this.models.GATEKEEPER.complete(gatekeeperPrompt(candidate, today));
    const pass = parsePassFail(text);
    if (pass === null) return reject('unparseable gatekeeper reply');
    return pass ? approve({ note: text.slice(0, 200) }) : reject('time horizon not viable');
  }

  async ruleClarity(candidate: Candidate): Promise<AdvisoryVerdict<RuleClarityPayload>> {
    const text = await this.models.RULE_CLARITY.complete(ruleClarityPrompt(candidate));
    const pass = parsePassFail(text);
    if (pass === null) return reject('unparseable rule-clarity reply');
    return pass ? approve({ criteria: parseCriteria(text) }) : reject('ambiguous resolution criteria');
  }

  async sentiment(context: SentimentContext): Promise<AdvisoryVerdict<SentimentPayload>> {
    const { candidate, criteria } = context;
    const research = await this.research.gather(researchQuery(candidate));
    if (research) Logger.debug(`[ADVISORY] research attached for ${candidate.marketId}`);

    const text = await this.models.SENTIMENT.complete(sentimentPrompt(candidate, criteria, research));
    const parsed = parseSentiment(text);
    if (!parsed) return reject('unparseable sentiment reply');
    return approve(parsed);
  }

  async sizing(context: SizingContext): Promise<AdvisoryVerdict<SizingPayload>> {
    const { candidate, criteria, sentiment } = context;
    const text = await this.models.SIZING.complete(sizingPrompt(candidate, criteria, sentiment));
    const parsed = parseSizing(text);

    if (!parsed) return reject('unparseable sizing reply');
    if (parsed.action === 'REJECT') return reject(parsed.reason || 'sizing rejected');
    if (parsed.maxPrice === null || parsed.maxPrice < 0.01 || parsed.maxPrice > 0.99) {
      return reject(`invalid max price ${parsed.maxPrice}`);
    }

    const kelly = parsed.kellyFraction !== null && parsed.kellyFraction > 1 ? null : parsed.kellyFraction;
    return approve({ maxPrice: parsed.maxPrice, kellyFraction: kelly, reason: parsed.reason });
  }
}
