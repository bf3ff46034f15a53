import type { Logger } from '../utils/logger';
import type {
  CandidateField,
  ExtractorName,
  FieldName,
  FieldValue,
  PaperDocument,
} from '../pipeline/types';

export interface ExtractorContext {
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Proposes candidate values for one document from one signal source.
 * Implementations keep no state between documents and may throw; the runner
 * isolates their failures.
 */
export interface Extractor {
  readonly name: ExtractorName;
  extract(document: PaperDocument, context: ExtractorContext): Promise<CandidateField[]>;
}

const EVIDENCE_LIMIT = 200;

export function makeCandidate(
  source: ExtractorName,
  field: FieldName,
  value: FieldValue,
  confidence: number,
  evidence: string
): CandidateField {
  return Object.freeze({
    field,
    value,
    source,
    confidence,
    evidence: evidence.length > EVIDENCE_LIMIT ? `${evidence.slice(0, EVIDENCE_LIMIT - 1)}…` : evidence,
  });
}

/** Drops empty strings so extractors can map optional values without checks. */
export function present(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
