import type { EnrichmentUnavailable } from '../pipeline/errors';
import type { FieldName, FieldValue, RegistryName } from '../pipeline/types';

/** A registry work mapped onto our field vocabulary. */
export interface RegistryRecord {
  externalId?: string;
  title?: string;
  authors?: string[];
  venue?: string;
  year?: number;
  doi?: string;
  keywords?: string[];
  countries?: string[];
}

export interface RegistryClient {
  readonly name: RegistryName;
  /** Resolves null when the registry does not know the DOI. */
  lookupByDoi(doi: string, signal?: AbortSignal): Promise<RegistryRecord | null>;
  searchByTitle(title: string, year: number | undefined, signal?: AbortSignal): Promise<RegistryRecord[]>;
}

export interface PartialRecord {
  title?: string;
  year?: number;
  doi?: string;
}

export type LookupKind = 'doi' | 'title';

export interface EnrichmentResult {
  matched: true;
  registry: RegistryName;
  lookup: LookupKind;
  matchConfidence: number;
  fields: Partial<Record<FieldName, FieldValue>>;
  externalId?: string;
}

export type EnrichmentState = 'try_primary' | 'backoff' | 'try_fallback' | 'exhausted' | 'done';

export type RegistryAttemptOutcome = 'matched' | 'not_found' | 'below_threshold' | 'unavailable';

export interface RegistryAttempt {
  registry: RegistryName;
  lookup: LookupKind;
  attempts: number;
  outcome: RegistryAttemptOutcome;
  matchConfidence?: number;
  error?: EnrichmentUnavailable;
}

interface OutcomeBase {
  attempts: RegistryAttempt[];
  transitions: EnrichmentState[];
}

export type EnrichmentOutcome =
  | (OutcomeBase & { kind: 'matched'; result: EnrichmentResult })
  | (OutcomeBase & { kind: 'not_found' | 'unavailable' | 'skipped' });

export interface Enricher {
  enrich(partial: PartialRecord, signal?: AbortSignal): Promise<EnrichmentOutcome>;
}
