import { EnrichmentUnavailable, RunCancelledError } from '../pipeline/errors';
import { normalizeDoi } from '../reconcile/fields';
import { createLogger, type Logger } from '../utils/logger';
import { computeBackoffDelay, isTransientError, retryAfterOf } from '../utils/retry';
import { sleep as defaultSleep, throwIfAborted } from '../utils/timeout';
import { bestMatch, recordFields } from './matchScore';
import type {
  Enricher,
  EnrichmentOutcome,
  EnrichmentResult,
  EnrichmentState,
  LookupKind,
  PartialRecord,
  RegistryAttempt,
  RegistryClient,
  RegistryRecord,
} from './types';

export interface EnrichmentClientOptions {
  registries: RegistryClient[];
  minMatchConfidence: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

interface Lookup {
  kind: LookupKind;
  doi?: string;
  title?: string;
  year?: number;
}

function lookupFor(partial: PartialRecord): Lookup | null {
  const doi = partial.doi ? normalizeDoi(partial.doi) : null;
  if (doi) return { kind: 'doi', doi, title: partial.title, year: partial.year };
  const title = partial.title?.trim();
  if (title) return { kind: 'title', title, year: partial.year };
  return null;
}

/**
 * Queries registries in order until one returns a confident match. Each
 * registry runs through `try_primary`/`try_fallback` → `backoff` → retry
 * until `maxAttempts`; an exhausted registry is recorded as unavailable and
 * the next one is tried. Only cancellation escapes as an exception.
 */
export class EnrichmentClient implements Enricher {
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: EnrichmentClientOptions) {
    this.logger = options.logger ?? createLogger('Enrichment');
    this.sleep = options.sleep ?? defaultSleep;
  }

  private async query(
    registry: RegistryClient,
    lookup: Lookup,
    signal?: AbortSignal
  ): Promise<RegistryRecord[]> {
    if (lookup.kind === 'doi' && lookup.doi) {
      const record = await registry.lookupByDoi(lookup.doi, signal);
      return record ? [record] : [];
    }
    return lookup.title ? registry.searchByTitle(lookup.title, lookup.year, signal) : [];
  }

  async enrich(partial: PartialRecord, signal?: AbortSignal): Promise<EnrichmentOutcome> {
    const { registries, maxAttempts } = this.options;
    const attempts: RegistryAttempt[] = [];
    const transitions: EnrichmentState[] = [];
    const lookup = lookupFor(partial);
    if (!lookup || registries.length === 0) {
      return { kind: 'skipped', attempts, transitions };
    }

    let state: EnrichmentState = 'try_primary';
    let registryIndex = 0;
    let attempt = 0;
    let lastError: unknown;
    let result: EnrichmentResult | null = null;

    const advance = (): EnrichmentState => {
      registryIndex += 1;
      attempt = 0;
      lastError = undefined;
      return registryIndex < registries.length ? 'try_fallback' : 'exhausted';
    };

    while (state !== 'done' && state !== 'exhausted') {
      transitions.push(state);
      throwIfAborted(signal);
      const registry = registries[registryIndex];
      if (!registry) {
        state = 'exhausted';
        break;
      }

      if (state === 'backoff') {
        const retryAfter = retryAfterOf(lastError);
        const delay =
          retryAfter !== undefined
            ? Math.min(this.options.backoffMaxMs, retryAfter)
            : computeBackoffDelay(attempt, {
                baseMs: this.options.backoffBaseMs,
                maxMs: this.options.backoffMaxMs,
                random: this.options.random,
              });
        this.logger.info(`${registry.name}: retrying in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`);
        await this.sleep(delay, signal);
        state = registryIndex === 0 ? 'try_primary' : 'try_fallback';
        continue;
      }

      attempt += 1;
      try {
        const records = await this.query(registry, lookup, signal);
        const best = bestMatch(lookup.kind, partial, records);
        if (best && best.score >= this.options.minMatchConfidence) {
          attempts.push({
            registry: registry.name,
            lookup: lookup.kind,
            attempts: attempt,
            outcome: 'matched',
            matchConfidence: best.score,
          });
          result = {
            matched: true,
            registry: registry.name,
            lookup: lookup.kind,
            matchConfidence: best.score,
            fields: recordFields(best.record),
            externalId: best.record.externalId,
          };
          state = 'done';
        } else {
          attempts.push({
            registry: registry.name,
            lookup: lookup.kind,
            attempts: attempt,
            outcome: best ? 'below_threshold' : 'not_found',
            matchConfidence: best?.score,
          });
          state = advance();
        }
      } catch (error) {
        if (error instanceof RunCancelledError) {
          throw error;
        }
        lastError = error;
        if (isTransientError(error) && attempt < maxAttempts) {
          state = 'backoff';
        } else {
          const unavailable = new EnrichmentUnavailable(registry.name, attempt, error);
          this.logger.warn(unavailable.message);
          attempts.push({
            registry: registry.name,
            lookup: lookup.kind,
            attempts: attempt,
            outcome: 'unavailable',
            error: unavailable,
          });
          state = advance();
        }
      }
    }
    transitions.push(state);

    if (result) {
      return { kind: 'matched', result, attempts, transitions };
    }
    const allUnavailable = attempts.length > 0 && attempts.every((a) => a.outcome === 'unavailable');
    return { kind: allUnavailable ? 'unavailable' : 'not_found', attempts, transitions };
  }
}
