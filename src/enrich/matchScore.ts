import { roundConfidence } from '../reconcile/confidence';
import { textSimilarity } from '../reconcile/similarity';
import type { FieldName, FieldValue } from '../pipeline/types';
import type { LookupKind, PartialRecord, RegistryRecord } from './types';

const DOI_WITHOUT_TITLE = 0.9;

export function yearFactor(local: number | undefined, remote: number | undefined): number {
  if (local === undefined || remote === undefined || local === remote) return 1;
  return Math.abs(local - remote) <= 1 ? 0.95 : 0.8;
}

/**
 * How sure we are that a registry work is the document. A DOI hit is strong
 * on its own; title searches lean entirely on title similarity and year.
 */
export function scoreMatch(lookup: LookupKind, partial: PartialRecord, record: RegistryRecord): number {
  if (lookup === 'doi') {
    if (!partial.title || !record.title) return DOI_WITHOUT_TITLE;
    return roundConfidence(Math.min(1, 0.5 + 0.5 * textSimilarity(partial.title, record.title)));
  }
  return roundConfidence(
    textSimilarity(partial.title, record.title) * yearFactor(partial.year, record.year)
  );
}

export function bestMatch(
  lookup: LookupKind,
  partial: PartialRecord,
  records: readonly RegistryRecord[]
): { record: RegistryRecord; score: number } | null {
  let best: { record: RegistryRecord; score: number } | null = null;
  for (const record of records) {
    const score = scoreMatch(lookup, partial, record);
    if (!best || score > best.score) {
      best = { record, score };
    }
  }
  return best;
}

export function recordFields(record: RegistryRecord): Partial<Record<FieldName, FieldValue>> {
  const fields: Partial<Record<FieldName, FieldValue>> = {};
  if (record.title) fields.title = record.title;
  if (record.authors?.length) fields.authors = record.authors.join('; ');
  if (record.venue) fields.venue = record.venue;
  if (record.year !== undefined) fields.year = record.year;
  if (record.doi) fields.doi = record.doi;
  if (record.keywords?.length) fields.keywords = record.keywords.join('; ');
  if (record.countries?.length) fields.country = record.countries.join('; ');
  return fields;
}
