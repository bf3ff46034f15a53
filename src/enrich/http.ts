import fetch from 'node-fetch';
import type { RegistryName } from '../pipeline/types';
import { withTimeout } from '../utils/timeout';

export class RegistryHttpError extends Error {
  constructor(
    public readonly registry: RegistryName,
    public readonly status: number,
    public readonly url: string,
    public readonly retryAfterMs?: number
  ) {
    super(`${registry} request failed: ${status} ${url}`);
    this.name = 'RegistryHttpError';
  }
}

/** The registry answered, but not with something we can read. */
export class RegistryResponseError extends Error {
  constructor(
    public readonly registry: RegistryName,
    message: string
  ) {
    super(`${registry} returned an unusable response: ${message}`);
    this.name = 'RegistryResponseError';
  }
}

/** Retry-After as delta-seconds or an HTTP date, in milliseconds. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  return Number.isFinite(date) ? Math.max(0, date - now) : undefined;
}

export interface RegistryRequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  userAgent?: string;
  signal?: AbortSignal;
}

/**
 * GETs a JSON document. Resolves null on 404 and throws RegistryHttpError
 * for every other non-2xx status.
 */
export async function getJson(
  registry: RegistryName,
  url: string,
  options: RegistryRequestOptions
): Promise<unknown | null> {
  const headers: Record<string, string> = { Accept: 'application/json', ...options.headers };
  if (options.userAgent) headers['User-Agent'] = options.userAgent;

  const request = async (): Promise<unknown | null> => {
    const res = await fetch(url, { headers, timeout: options.timeoutMs });
    if (res.status === 404) {
      return null;
    }
    if (!res.ok) {
      throw new RegistryHttpError(registry, res.status, url, parseRetryAfter(res.headers.get('retry-after')));
    }
    const text = await res.text();
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new RegistryResponseError(registry, error instanceof Error ? error.message : String(error));
    }
  };

  return withTimeout(request(), options.timeoutMs, `${registry} request`, options.signal);
}
