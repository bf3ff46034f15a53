import { TimeoutError } from '../pipeline/errors';
import { sleep as defaultSleep } from './timeout';

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE']);

function numericProperty(error: unknown, key: 'status' | 'retryAfterMs'): number | undefined {
  if (error && typeof error === 'object' && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  }
  return undefined;
}

/** Node-style `code`, read without `instanceof` so errors from other realms match too. */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const value: unknown = error.code;
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function statusOf(error: unknown): number | undefined {
  return numericProperty(error, 'status');
}

export function retryAfterOf(error: unknown): number | undefined {
  return numericProperty(error, 'retryAfterMs');
}

/**
 * Rate limits, server errors, timeouts and dropped connections are worth
 * another attempt. Anything else is final.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  if (error && typeof error === 'object' && 'name' in error && error.name === 'FetchError') return true;

  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code)) return true;

  const msg = error instanceof Error ? error.message : String(error ?? '');
  const is429 =
    msg.includes(' 429 ') ||
    msg.includes('"code": "429"') ||
    msg.toLowerCase().includes('too many requests');
  const is5xx =
    msg.includes(' 500 ') ||
    msg.includes(' 502 ') ||
    msg.includes(' 503 ') ||
    msg.includes(' 504 ');
  return is429 || is5xx;
}

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  jitterMs?: number;
  random?: () => number;
}

export function computeBackoffDelay(attempt: number, opts: BackoffOptions): number {
  const random = opts.random ?? Math.random;
  const jitter = Math.floor(random() * (opts.jitterMs ?? 250));
  return Math.min(opts.maxMs, opts.baseMs * Math.pow(2, Math.max(0, attempt - 1))) + jitter;
}

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
  const tries = opts?.tries ?? 6;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  const isRetryable = opts?.isRetryable ?? isTransientError;
  const sleep = opts?.sleep ?? defaultSleep;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || i === tries - 1) {
        throw e;
      }
      const retryAfter = retryAfterOf(e);
      const delay =
        retryAfter !== undefined
          ? Math.min(maxMs, retryAfter)
          : computeBackoffDelay(i + 1, { baseMs, maxMs, random: opts?.random });
      opts?.onRetry?.(e, i + 1, delay);
      await sleep(delay, opts?.signal);
    }
  }
  throw lastErr;
}
