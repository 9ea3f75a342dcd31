import { isTransient, errorMessage, TransientServiceError, type Stage } from '../core/errors';
import { Logger } from './logger';

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  label: string;
  /** Overrides the default transient check. */
  shouldRetry?: (err: unknown) => boolean;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 * `retries` counts additional attempts after the first one.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const shouldRetry = opts.shouldRetry ?? isTransient;
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= opts.retries || !shouldRetry(err)) throw err;
      const delay = opts.baseDelayMs * 2 ** attempt;
      attempt++;
      Logger.warn(`[RETRY] ${opts.label} failed (${errorMessage(err)}). Attempt ${attempt}/${opts.retries} in ${delay}ms`);
      await sleep(delay);
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string, stage: Stage): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransientServiceError(`${label} timed out after ${ms}ms`, stage)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
