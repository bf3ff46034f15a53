import { describe, it, expect } from '@jest/globals';
import { TimeoutError } from '../src/pipeline/errors';
import { errorMessage } from '../src/utils/logger';
import { computeBackoffDelay, errorCode, isTransientError, withRetry } from '../src/utils/retry';

class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly retryAfterMs?: number
  ) {
    super(`HTTP ${status}`);
  }
}

function failing(errors: unknown[], value: string) {
  let calls = 0;
  const fn = async () => {
    const error = errors[calls];
    calls += 1;
    if (error !== undefined) throw error;
    return value;
  };
  return { fn, calls: () => calls };
}

describe('isTransientError', () => {
  it('retries rate limits, server errors and timeouts', () => {
    expect(isTransientError(new HttpError(429))).toBe(true);
    expect(isTransientError(new HttpError(503))).toBe(true);
    expect(isTransientError(new TimeoutError('lookup', 10))).toBe(true);
    expect(isTransientError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isTransientError(new Error('[GoogleGenerativeAI Error]: Too Many Requests'))).toBe(true);
  });

  it('treats client errors as final', () => {
    expect(isTransientError(new HttpError(404))).toBe(false);
    expect(isTransientError(new HttpError(400))).toBe(false);
    expect(isTransientError(new Error('bad request'))).toBe(false);
  });
});

describe('errorCode', () => {
  it('reads codes from errors that are not instances of this realm', () => {
    const foreign = { name: 'Error', code: 'ENOENT', message: 'no such file' };
    expect(errorCode(foreign)).toBe('ENOENT');
    expect(errorMessage(foreign)).toBe('no such file');
  });

  it('returns undefined when there is no string code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 404 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });

  it('treats a FetchError from another realm as transient', () => {
    expect(isTransientError({ name: 'FetchError', message: 'socket hang up' })).toBe(true);
  });
});

describe('computeBackoffDelay', () => {
  const noJitter = { baseMs: 500, maxMs: 8_000, random: () => 0 };

  it('doubles per attempt up to the cap', () => {
    expect(computeBackoffDelay(1, noJitter)).toBe(500);
    expect(computeBackoffDelay(3, noJitter)).toBe(2_000);
    expect(computeBackoffDelay(10, noJitter)).toBe(8_000);
  });

  it('adds jitter on top', () => {
    expect(computeBackoffDelay(1, { ...noJitter, jitterMs: 250, random: () => 0.5 })).toBe(625);
  });
});

describe('withRetry', () => {
  it('retries transient failures with backoff', async () => {
    const sleeps: number[] = [];
    const retries: number[] = [];
    const { fn, calls } = failing([new HttpError(503), new HttpError(503)], 'ok');

    const result = await withRetry(fn, {
      tries: 3,
      baseMs: 500,
      random: () => 0,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      onRetry: (_error, attempt) => retries.push(attempt),
    });

    expect(result).toBe('ok');
    expect(calls()).toBe(3);
    expect(sleeps).toEqual([500, 1_000]);
    expect(retries).toEqual([1, 2]);
  });

  it('honours Retry-After within the cap', async () => {
    const sleeps: number[] = [];
    const { fn } = failing([new HttpError(429, 20_000), new HttpError(429, 1_500)], 'ok');

    await withRetry(fn, {
      maxMs: 8_000,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(sleeps).toEqual([8_000, 1_500]);
  });

  it('gives up immediately on a final error', async () => {
    const { fn, calls } = failing([new HttpError(404)], 'ok');

    await expect(withRetry(fn, { sleep: async () => undefined })).rejects.toThrow('HTTP 404');
    expect(calls()).toBe(1);
  });

  it('rethrows the last error once tries run out', async () => {
    const { fn, calls } = failing([new HttpError(500), new HttpError(502), new HttpError(504)], 'ok');

    await expect(withRetry(fn, { tries: 3, sleep: async () => undefined })).rejects.toThrow('HTTP 504');
    expect(calls()).toBe(3);
  });
});
