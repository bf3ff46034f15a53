import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { errorCode } from './retry';

export const DEFAULT_CACHE_ROOT = path.resolve('.cache/agent_cache');

export interface CacheKeyParts {
  agentName: string;
  model: string;
  provider: string;
  promptVersion: string;
  schemaVersion: string;
  input: unknown;
}

const CacheMetaSchema = z.object({
  createdAt: z.string(),
  durationMs: z.number(),
  agentName: z.string(),
  promptVersion: z.string(),
  schemaVersion: z.string(),
  provider: z.string(),
  model: z.string(),
  inputHash: z.string(),
  outputHash: z.string(),
  finishReason: z.string().optional(),
});

export type CacheMeta = z.infer<typeof CacheMetaSchema>;

export interface CacheEntry<T> {
  meta: CacheMeta;
  value: T;
}

export function stableStringify(value: unknown): string {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const mapped = value.map((item) => stableStringify(item));
    return `[${mapped.join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== 'function' && typeof v !== 'symbol')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const mapped = entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${mapped.join(',')}}`;
}

export function sha256(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

export function buildCacheKey(parts: CacheKeyParts): {
  key: string;
  inputHash: string;
  canonicalInput: string;
} {
  const canonicalInput = stableStringify(parts.input);
  const inputHash = sha256(canonicalInput);
  const raw = [
    parts.provider,
    parts.model,
    parts.agentName,
    parts.promptVersion,
    parts.schemaVersion,
    inputHash,
  ].join('|');
  return {
    key: sha256(raw),
    inputHash,
    canonicalInput,
  };
}

/**
 * Reads a cached agent response. Entries whose value no longer matches the
 * schema are treated as misses.
 */
export async function readCache<T>(
  cacheKey: string,
  schema: z.ZodType<T>,
  root: string = DEFAULT_CACHE_ROOT
): Promise<CacheEntry<T> | null> {
  const filePath = path.join(root, `${cacheKey}.json`);
  let data: string;
  try {
    data = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || !('meta' in parsed) || !('value' in parsed)) {
    return null;
  }
  const meta = CacheMetaSchema.safeParse(parsed.meta);
  const value = schema.safeParse(parsed.value);
  if (!meta.success || !value.success) {
    return null;
  }
  return { meta: meta.data, value: value.data };
}

export async function writeCache<T>(
  cacheKey: string,
  entry: CacheEntry<T>,
  root: string = DEFAULT_CACHE_ROOT
): Promise<void> {
  await fs.mkdir(root, { recursive: true });
  const filePath = path.join(root, `${cacheKey}.json`);
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const payload = JSON.stringify(entry);
  await fs.writeFile(tmpPath, payload, { encoding: 'utf8' });
  await fs.rename(tmpPath, filePath);
}

function computeOutputHash(value: unknown): string {
  return sha256(stableStringify(value));
}

export function buildCacheEntry<T>(
  meta: Omit<CacheMeta, 'outputHash' | 'createdAt'>,
  value: T
): CacheEntry<T> {
  const outputHash = computeOutputHash(value);
  return {
    meta: {
      ...meta,
      outputHash,
      createdAt: new Date().toISOString(),
    },
    value,
  };
}
