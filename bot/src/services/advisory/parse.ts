/**
 * Parsers for the plain-text reply formats the advisory prompts ask for.
 * Each returns null when the reply does not follow the format.
 */

export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```\w*\n?/, '')
    .replace(/\n?```\s*$/, '')
    .trim();
}

/** First standalone PASS or FAIL wins. */
export function parsePassFail(text: string): boolean | null {
  const match = /\b(PASS|FAIL)\b/.exec(text.toUpperCase());
  if (!match) return null;
  return match[1] === 'PASS';
}

export function parseCriteria(text: string): string {
  const idx = text.toUpperCase().indexOf('CRITERIA:');
  if (idx < 0) return '';
  const rest = text.slice(idx + 'CRITERIA:'.length).trim();
  return rest.split('\n')[0].trim().slice(0, 400);
}

export interface ParsedSentiment {
  score: number;
  summary: string;
}

/** `SCORE: <1-10> | INFO: <findings>`; score clamped to 1..10. */
export function parseSentiment(text: string): ParsedSentiment | null {
  const scoreMatch = /SCORE\s*:\s*\[?\s*(\d+)/i.exec(text);
  if (!scoreMatch) return null;
  const score = Math.min(10, Math.max(1, parseInt(scoreMatch[1], 10)));

  const infoIdx = text.toUpperCase().indexOf('INFO:');
  const summary = (infoIdx >= 0 ? text.slice(infoIdx + 'INFO:'.length) : text).trim().slice(0, 500);
  return { score, summary };
}

export interface ParsedSizing {
  action: 'BUY' | 'REJECT';
  maxPrice: number | null;
  kellyFraction: number | null;
  reason: string;
}

function numberAfter(label: string, text: string): number | null {
  const match = new RegExp(`${label}\\s*:\\s*\\[?\\s*([0-9]*\\.?[0-9]+)`, 'i').exec(text);
  if (!match) return null;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

/**
 * ACTION: BUY|REJECT
 * MAX_PRICE: 0.01-0.99
 * KELLY: 0-1 (optional)
 * REASON: ...
 */
export function parseSizing(raw: string): ParsedSizing | null {
  const text = stripCodeFence(raw);
  const action = /ACTION\s*:\s*\[?\s*(BUY|REJECT)/i.exec(text);
  if (!action) return null;

  const reasonLine = text.split('\n').find(line => /REASON\s*:/i.test(line));
  const reason = reasonLine
    ? reasonLine.replace(/^.*?REASON\s*:\s*/i, '').trim().slice(0, 300)
    : text.replace(/\s+/g, ' ').slice(0, 200);

  return {
    action: action[1].toUpperCase() === 'BUY' ? 'BUY' : 'REJECT',
    maxPrice: numberAfter('MAX_PRICE', text),
    kellyFraction: numberAfter('KELLY', text),
    reason,
  };
}
