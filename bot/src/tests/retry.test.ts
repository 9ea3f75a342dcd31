import { ApiError } from '@google/genai';
import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import { ExecutionFailure, TransientServiceError, isTransient } from '../core/errors';
import { withRetry, withTimeout } from '../utils/retry';

function httpError(status: number) {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`status ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    status,
    statusText: '',
    headers: {},
    config,
    data: null,
  });
}

describe('isTransient', () => {
  it('classifies network failures, 429 and 5xx as transient', () => {
    expect(isTransient(new TransientServiceError('timeout', 'FEED'))).toBe(true);
    expect(isTransient(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
    expect(isTransient(httpError(429))).toBe(true);
    expect(isTransient(httpError(503))).toBe(true);
    expect(isTransient(httpError(400))).toBe(false);
    expect(isTransient(new ExecutionFailure('not filled'))).toBe(false);
    expect(isTransient(new Error('boom'))).toBe(false);
  });

  it('classifies Gemini rate limits and server errors as transient', () => {
    expect(isTransient(new ApiError({ message: 'UNAVAILABLE', status: 503 }))).toBe(true);
    expect(isTransient(new ApiError({ message: 'RESOURCE_EXHAUSTED', status: 429 }))).toBe(true);
    expect(isTransient(new ApiError({ message: 'INVALID_ARGUMENT', status: 400 }))).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries transient failures up to the retry count', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new TransientServiceError('busy', 'FEED');
        return 'ok';
      },
      { retries: 2, baseDelayMs: 0, label: 'test' }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('gives up after the last retry with the last error', async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new TransientServiceError(`busy ${calls}`, 'FEED');
      },
      { retries: 2, baseDelayMs: 0, label: 'test' }
    );

    await expect(attempt).rejects.toThrow('busy 3');
    expect(calls).toBe(3);
  });

  it('retries a Gemini server error', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls === 1) throw new ApiError({ message: 'UNAVAILABLE', status: 503 });
        return 'ok';
      },
      { retries: 2, baseDelayMs: 0, label: 'test' }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(2);
  });

  it('does not retry permanent errors', async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new ExecutionFailure('not filled');
      },
      { retries: 5, baseDelayMs: 0, label: 'test' }
    );

    await expect(attempt).rejects.toBeInstanceOf(ExecutionFailure);
    expect(calls).toBe(1);
  });
});

describe('withTimeout', () => {
  it('fails a slow call with a transient error for its stage', async () => {
    const slow = new Promise<string>(() => undefined);
    const attempt = withTimeout(slow, 10, 'sizing', 'SIZING');

    await expect(attempt).rejects.toBeInstanceOf(TransientServiceError);
    await expect(withTimeout(slow, 10, 'sizing', 'SIZING')).rejects.toMatchObject({
      stage: 'SIZING',
      message: 'sizing timed out after 10ms',
    });
  });

  it('passes a fast result through', async () => {
    expect(await withTimeout(Promise.resolve(7), 1000, 'quick', 'FEED')).toBe(7);
  });
});
