import type { PipelineConfig } from '../config/pipelineConfig';
import {
  EXTRACTOR_NAMES,
  FIELD_NAMES,
  type CandidateField,
  type CandidateSet,
  type CanonicalMetadata,
  type ExtractorName,
  type FieldName,
  type FieldValue,
  type ResolvedField,
} from '../pipeline/types';
import { calibrate, combineConfidences } from './confidence';
import { normalizeField, toMetadata } from './fields';
import { editSimilarity } from './similarity';

export interface ReconcileOptions {
  extractorOrder: readonly ExtractorName[];
  calibration: PipelineConfig['calibration'];
  fuzzyThreshold: number;
  maxConfidence: number;
}

export function reconcileOptionsFrom(config: PipelineConfig): ReconcileOptions {
  return {
    extractorOrder: config.extractorOrder,
    calibration: config.calibration,
    fuzzyThreshold: config.reconciliation.fuzzyThreshold,
    maxConfidence: config.reconciliation.maxConfidence,
  };
}

export interface ScoredCandidate {
  candidate: CandidateField;
  key: string;
  display: FieldValue;
  /** Calibrated confidence on the canonical 0–1 band. */
  confidence: number;
  priority: number;
}

export interface ReconciledRecord {
  documentPath: string;
  fields: Partial<Record<FieldName, ResolvedField>>;
  metadata: CanonicalMetadata;
  missingFields: FieldName[];
  conflictingFields: FieldName[];
}

interface CandidateGroup {
  key: string;
  members: ScoredCandidate[];
  weight: number;
  bestPriority: number;
}

const WEIGHT_EPSILON = 1e-9;
const FUZZY_FIELDS: ReadonlySet<FieldName> = new Set<FieldName>(['title', 'venue']);

function extractorPriority(extractor: ExtractorName, order: readonly ExtractorName[]): number {
  const index = order.indexOf(extractor);
  return index >= 0 ? index : order.length + EXTRACTOR_NAMES.indexOf(extractor);
}

/**
 * Whether two normalized keys count as the same value. Titles and venues
 * tolerate small edits; every other field needs an exact key match.
 */
export function keysAgree(field: FieldName, a: string, b: string, fuzzyThreshold: number): boolean {
  if (a === b) return true;
  return FUZZY_FIELDS.has(field) && editSimilarity(a, b) >= fuzzyThreshold;
}

export function scoreCandidates(
  candidates: readonly CandidateField[],
  options: ReconcileOptions
): ScoredCandidate[] {
  const scored: ScoredCandidate[] = [];
  for (const candidate of candidates) {
    const normalized = normalizeField(candidate.field, candidate.value);
    if (!normalized) continue;
    scored.push({
      candidate,
      key: normalized.key,
      display: normalized.display,
      confidence: calibrate(candidate.confidence, options.calibration[candidate.source]),
      priority: extractorPriority(candidate.source, options.extractorOrder),
    });
  }
  return scored;
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.key !== b.key) return a.key < b.key ? -1 : 1;
  return b.confidence - a.confidence;
}

function groupCandidates(
  field: FieldName,
  scored: ScoredCandidate[],
  fuzzyThreshold: number
): CandidateGroup[] {
  const groups: CandidateGroup[] = [];
  for (const entry of [...scored].sort(compareScored)) {
    const group = groups.find((g) => keysAgree(field, g.key, entry.key, fuzzyThreshold));
    if (group) {
      group.members.push(entry);
      group.weight += entry.confidence;
      group.bestPriority = Math.min(group.bestPriority, entry.priority);
    } else {
      groups.push({
        key: entry.key,
        members: [entry],
        weight: entry.confidence,
        bestPriority: entry.priority,
      });
    }
  }
  return groups;
}

function pickWinner(groups: CandidateGroup[]): CandidateGroup | undefined {
  let winner: CandidateGroup | undefined;
  for (const group of groups) {
    if (!winner) {
      winner = group;
      continue;
    }
    const delta = group.weight - winner.weight;
    if (delta > WEIGHT_EPSILON) {
      winner = group;
    } else if (Math.abs(delta) <= WEIGHT_EPSILON) {
      if (
        group.bestPriority < winner.bestPriority ||
        (group.bestPriority === winner.bestPriority && group.key < winner.key)
      ) {
        winner = group;
      }
    }
  }
  return winner;
}

function resolveGroup(group: CandidateGroup, maxConfidence: number): ResolvedField | undefined {
  const ranked = [...group.members].sort(
    (a, b) => b.confidence - a.confidence || a.priority - b.priority
  );
  const best = ranked[0];
  if (!best) return undefined;

  // members were added in priority order
  const contributors = [...new Set(group.members.map((m) => m.candidate.source))];

  return {
    value: best.display,
    provenance: best.candidate.source,
    confidence: combineConfidences(
      ranked.map((m) => m.confidence),
      maxConfidence
    ),
    agreement: contributors.length >= 2,
    contributors,
  };
}

/**
 * Merges every extractor's proposals into one value per field. Pure: the
 * same candidate set and options always produce the same record.
 */
export function reconcile(set: CandidateSet, options: ReconcileOptions): ReconciledRecord {
  const scored = scoreCandidates(set.candidates, options);
  const fields: Partial<Record<FieldName, ResolvedField>> = {};
  const values: Partial<Record<FieldName, FieldValue>> = {};
  const missingFields: FieldName[] = [];
  const conflictingFields: FieldName[] = [];

  for (const field of FIELD_NAMES) {
    const forField = scored.filter((entry) => entry.candidate.field === field);
    const groups = groupCandidates(field, forField, options.fuzzyThreshold);
    const winner = pickWinner(groups);
    const resolved = winner ? resolveGroup(winner, options.maxConfidence) : undefined;
    if (!resolved) {
      missingFields.push(field);
      continue;
    }
    if (groups.length > 1) {
      conflictingFields.push(field);
    }
    fields[field] = resolved;
    values[field] = resolved.value;
  }

  return {
    documentPath: set.documentPath,
    fields,
    metadata: toMetadata(values),
    missingFields,
    conflictingFields,
  };
}
