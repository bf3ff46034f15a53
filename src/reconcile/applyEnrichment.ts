import type { EnrichmentOutcome } from '../enrich/types';
import type {
  EnrichmentSummary,
  FieldName,
  FieldValue,
  RegistryName,
  ResolvedField,
} from '../pipeline/types';
import { FIELD_NAMES } from '../pipeline/types';
import { roundConfidence } from './confidence';
import { normalizeField, toMetadata } from './fields';
import { keysAgree, type ReconciledRecord } from './reconcile';

/** Registries classify works differently; study type stays a local call. */
const NOT_ENRICHED: ReadonlySet<FieldName> = new Set<FieldName>(['studyType']);

export interface EnrichedRecord {
  record: ReconciledRecord;
  summary: EnrichmentSummary;
}

function unavailableRegistries(outcome: EnrichmentOutcome): RegistryName[] {
  return outcome.attempts.filter((a) => a.outcome === 'unavailable').map((a) => a.registry);
}

/**
 * Folds a registry match into a reconciled record. A registry value replaces
 * a local one only when its match confidence is higher and the normalized
 * values differ; agreeing values keep their local provenance.
 */
export function applyEnrichment(
  local: ReconciledRecord,
  outcome: EnrichmentOutcome,
  fuzzyThreshold: number
): EnrichedRecord {
  const summary: EnrichmentSummary = {
    outcome: outcome.kind,
    overriddenFields: [],
    filledFields: [],
    unavailableRegistries: unavailableRegistries(outcome),
  };
  if (outcome.kind !== 'matched') {
    return { record: local, summary };
  }

  const { result } = outcome;
  summary.registry = result.registry;
  summary.matchConfidence = result.matchConfidence;
  if (result.externalId) summary.externalId = result.externalId;

  const matchConfidence = roundConfidence(result.matchConfidence);
  const fields: Partial<Record<FieldName, ResolvedField>> = {};

  for (const field of FIELD_NAMES) {
    const current = local.fields[field];
    const incoming = result.fields[field];
    const normalized =
      incoming === undefined || NOT_ENRICHED.has(field) ? null : normalizeField(field, incoming);

    if (!normalized) {
      if (current) fields[field] = current;
      continue;
    }

    if (!current) {
      fields[field] = {
        value: normalized.display,
        provenance: 'enrichment',
        confidence: matchConfidence,
        agreement: false,
        contributors: [],
      };
      summary.filledFields.push(field);
      continue;
    }

    const localKey = normalizeField(field, current.value)?.key;
    if (localKey !== undefined && keysAgree(field, localKey, normalized.key, fuzzyThreshold)) {
      fields[field] = { ...current, confirmedBy: result.registry };
    } else if (matchConfidence > current.confidence) {
      fields[field] = {
        value: normalized.display,
        provenance: 'enrichment',
        confidence: matchConfidence,
        agreement: false,
        contributors: [],
        overriddenFrom: current.provenance,
      };
      summary.overriddenFields.push(field);
    } else {
      fields[field] = current;
    }
  }

  const values: Partial<Record<FieldName, FieldValue>> = {};
  for (const field of FIELD_NAMES) {
    const resolved = fields[field];
    if (resolved) values[field] = resolved.value;
  }

  return {
    record: {
      documentPath: local.documentPath,
      fields,
      metadata: toMetadata(values),
      missingFields: local.missingFields.filter((field) => !fields[field]),
      conflictingFields: local.conflictingFields,
    },
    summary,
  };
}
