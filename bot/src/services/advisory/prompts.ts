import { describePriceContext } from '../../markets/priceContext';
import type { Candidate } from '../../types';
import type { CompletionRequest, SentimentPayload } from './types';
import profiles from './profiles.json';

const SENTIMENT_PROFILES: ReadonlyMap<string, string> = new Map(Object.entries(profiles.sentiment));
const SIZING_LOGIC: ReadonlyMap<string, string> = new Map(Object.entries(profiles.sizing));

const GOAL =
  'We buy outcome shares when they are cheap relative to their value and sell them at a higher price before the market resolves. ' +
  'We only enter when there is a realistic path to a profitable exit.';

export function gatekeeperPrompt(c: Candidate, today: string): CompletionRequest {
  return {
    system:
      `You are a time-horizon gatekeeper. Today is ${today}. ${GOAL}\n` +
      'PASS when there is enough time for the price to move and for us to sell at a profit before resolution ' +
      '(Sports, Elections, Politics: 12h+ is fine if the event is imminent; crypto price levels: at least 2 days; ' +
      'Geopolitics: at least 3 days; other: about 2 days).\n' +
      'FAIL when there is too little time, or resolution is so far out that the outcome is guesswork.\n' +
      "Reply ONLY with 'PASS' or 'FAIL'.",
    prompt: `Category: ${c.category}. Market: ${c.title}. Resolution: ${c.endDate}.`,
    temperature: 0.1,
  };
}

export function ruleClarityPrompt(c: Candidate): CompletionRequest {
  return {
    prompt:
      `${GOAL}\n\n` +
      'Decide whether this market has objectively determinable resolution criteria.\n\n' +
      `Category: ${c.category}\nMarket: ${c.title}\n\nRules: ${c.rules || 'No rules provided.'}\n\n` +
      'First work out exactly what must happen for YES (closing level, a specific source, a specific time). ' +
      'PASS if the rules are clear enough to resolve without dispute. FAIL if they are vague, depend on ' +
      'subjective judgment without a named source, or the market is prone to manipulation.\n\n' +
      'Reply with:\nPASS or FAIL\nIf PASS, on the next line: CRITERIA: <what is required for YES, at most 2 sentences>',
    temperature: 0.2,
  };
}

export function sentimentPrompt(c: Candidate, criteria: string, research: string): CompletionRequest {
  const profile = SENTIMENT_PROFILES.get(c.category) ?? profiles.defaultSentiment;
  const researchBlock = research.trim() ? `LIVE RESEARCH:\n${research.trim().slice(0, 2000)}\n\n` : '';
  const criteriaLine = criteria ? `Resolution criteria: ${criteria}\n` : '';

  return {
    system:
      `${GOAL} You are the research scout. ${profile} ` +
      'Score high only if you see a realistic path for the price to move UP so we can sell higher. ' +
      'Reply format: SCORE: <1-10> | INFO: <findings>',
    prompt:
      researchBlock +
      criteriaLine +
      `Assess: ${c.title}. Is there anything that can drive the price up from ${c.price} before ${c.endDate}?`,
    temperature: 0.3,
  };
}

export function sizingPrompt(c: Candidate, criteria: string, sentiment: SentimentPayload): CompletionRequest {
  const logic = SIZING_LOGIC.get(c.category) ?? profiles.defaultSizing;
  const lines = [
    `${GOAL} You make the final BUY or REJECT call and set the highest price worth paying.`,
    'BUY only if the current price is clearly below what buyers are likely to pay before close, and that level is reachable, not a hope.',
    `CATEGORY: ${c.category}`,
    `LOGIC: ${logic}`,
    `QUESTION: ${c.title}`,
    `PRICE NOW: ${c.price}`,
    `CLOSES IN: ${c.daysToResolution.toFixed(1)} days`,
  ];
  if (criteria) lines.push(`CRITERIA: ${criteria}`);
  if (c.priceContext) lines.push(`PRICE CONTEXT: ${describePriceContext(c.price, c.priceContext)}`);
  if (c.spreadPct !== null) {
    lines.push(`SPREAD: ${c.spreadPct}% (bid=${c.bid ?? '?'} ask=${c.ask ?? '?'}). A wide spread makes a profitable exit harder.`);
  }
  lines.push(`SCOUT (score ${sentiment.score}/10): ${sentiment.summary}`);
  if (c.siblings.length > 0) {
    lines.push(`OTHER OUTCOMES IN "${c.eventTitle.slice(0, 60)}":`);
    for (const s of c.siblings) lines.push(`  - ${s.title} (${s.outcome}): ${s.price.toFixed(2)}`);
  }
  lines.push(
    'MAX_PRICE is a decimal between 0.01 and 0.99. KELLY is the fraction of bankroll you would stake (0-1).',
    'Reply exactly:\nACTION: BUY or REJECT\nMAX_PRICE: <number>\nKELLY: <number>\nREASON: <short justification>'
  );

  return { prompt: lines.join('\n'), temperature: 0.2 };
}

export function researchQuery(c: Candidate): string {
  return c.title.replace(/[?[\]()]/g, ' ').replace(/\s+/g, ' ').trim().slice(0, 300);
}
