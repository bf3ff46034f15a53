import type { EnrichmentOutcome, Enricher } from '../enrich/types';
import { runExtractors } from '../extractors/runExtractors';
import type { Extractor } from '../extractors/types';
import { DiagnosticsAccumulator } from '../diagnostics/accumulator';
import type { DuplicateIndex } from '../identity/duplicateIndex';
import { assignStableId, fallbackId, type StableIdentity } from '../identity/stableId';
import { applyEnrichment } from '../reconcile/applyEnrichment';
import { reconcile, type ReconcileOptions, type ReconciledRecord } from '../reconcile/reconcile';
import { errorMessage, type Logger } from '../utils/logger';
import { throwIfAborted } from '../utils/timeout';
import { DuplicateDetected, UnresolvedDocument } from './errors';
import {
  FIELD_NAMES,
  type CandidateSet,
  type CanonicalRecord,
  type EnrichmentSummary,
  type ExtractorName,
  type PaperDocument,
  type RecordFlag,
} from './types';

export interface ProcessDocumentDeps {
  extractors: readonly Extractor[];
  /** Omitted when enrichment is disabled. */
  enricher?: Enricher;
  options: ReconcileOptions;
  extractorTimeoutMs: number;
  signal: AbortSignal;
  logger: Logger;
}

/** Everything one worker computes for a document, before duplicate detection. */
export interface ProcessedDocument {
  documentPath: string;
  contentHash: string;
  candidateSet: CandidateSet;
  local: ReconciledRecord;
  enriched: ReconciledRecord;
  enrichment: EnrichmentSummary;
  identity: StableIdentity;
  /** Set when processing threw before a record could be built. */
  failure?: string;
}

export interface FinalizedDocument {
  record: CanonicalRecord;
  diagnostics: DiagnosticsAccumulator;
}

const SKIPPED: EnrichmentOutcome = { kind: 'skipped', attempts: [], transitions: [] };

/**
 * Extract, reconcile, enrich and identify one document. Touches no shared
 * state; the duplicate decision happens later, in ingestion order.
 */
export async function processDocument(
  document: PaperDocument,
  deps: ProcessDocumentDeps
): Promise<ProcessedDocument> {
  throwIfAborted(deps.signal);
  const candidateSet = await runExtractors(document, deps.extractors, {
    timeoutMs: deps.extractorTimeoutMs,
    signal: deps.signal,
    logger: deps.logger,
  });
  const local = reconcile(candidateSet, deps.options);

  const { title, year, doi } = local.metadata;
  const outcome = deps.enricher ? await deps.enricher.enrich({ title, year, doi }, deps.signal) : SKIPPED;
  const { record: enriched, summary } = applyEnrichment(local, outcome, deps.options.fuzzyThreshold);

  return {
    documentPath: document.path,
    contentHash: document.contentHash,
    candidateSet,
    local,
    enriched,
    enrichment: summary,
    identity: assignStableId(enriched.metadata, document.contentHash),
  };
}

function degradedExtractors(candidateSet: CandidateSet): ExtractorName[] {
  return candidateSet.runs.filter((run) => run.status !== 'ok').map((run) => run.extractor);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Turns a processed document into its output record. Must be called in
 * ingestion order: the first document to claim a paper ID keeps it and
 * later claimants become duplicates with a content-hash ID.
 */
export function finalizeDocument(
  processed: ProcessedDocument,
  index: DuplicateIndex,
  ordinal: number,
  options: ReconcileOptions,
  logger: Logger
): FinalizedDocument {
  const { identity, enriched, candidateSet } = processed;
  const flags: RecordFlag[] = [];
  const degraded = degradedExtractors(candidateSet);

  let status: CanonicalRecord['status'] = identity.resolved ? 'resolved' : 'unresolved';
  let paperId = identity.paperId;
  let duplicateOf: string | undefined;

  if (processed.failure !== undefined) {
    flags.push('processing_failed');
  } else if (!identity.resolved) {
    const empty = FIELD_NAMES.every((field) => !enriched.fields[field]);
    flags.push(empty ? 'no_candidates' : 'incomplete_identity');
    const reason = empty ? 'no extractor proposed any field' : 'title, first author or year is missing';
    logger.warn(new UnresolvedDocument(processed.documentPath, reason).message);
  }

  const earlier = index.register(identity.paperId, processed.documentPath);
  if (earlier) {
    status = 'duplicate';
    duplicateOf = earlier.paperId;
    // Copies of the same file share a content hash, so the ordinal keeps their IDs apart.
    const ownId = fallbackId(processed.contentHash);
    paperId = index.register(ownId, processed.documentPath) ? `${ownId}_${ordinal}` : ownId;
    flags.push('duplicate');
    logger.info(new DuplicateDetected(processed.documentPath, earlier.paperId).message, {
      firstPath: earlier.firstPath,
    });
  }

  if (processed.enrichment.unavailableRegistries.length > 0) flags.push('enrichment_unavailable');
  if (degraded.length > 0) flags.push('degraded_extractors');

  const record: CanonicalRecord = {
    paperId,
    documentPath: processed.documentPath,
    contentHash: processed.contentHash,
    status,
    metadata: enriched.metadata,
    fields: enriched.fields,
    missingFields: enriched.missingFields,
    conflictingFields: enriched.conflictingFields,
    flags,
    enrichment: processed.enrichment,
    degradedExtractors: degraded,
  };
  if (duplicateOf !== undefined) record.duplicateOf = duplicateOf;
  if (processed.failure !== undefined) record.error = processed.failure;

  const diagnostics = new DiagnosticsAccumulator(options);
  diagnostics.recordDocument({ candidateSet, local: processed.local, final: record });
  return { record: deepFreeze(record), diagnostics };
}

/** Stand-in result for a document whose processing threw; the run carries on. */
export function failedDocument(
  document: Pick<PaperDocument, 'path' | 'contentHash'>,
  error: unknown
): ProcessedDocument {
  const empty: ReconciledRecord = {
    documentPath: document.path,
    fields: {},
    metadata: {},
    missingFields: [...FIELD_NAMES],
    conflictingFields: [],
  };
  return {
    documentPath: document.path,
    contentHash: document.contentHash,
    candidateSet: { documentPath: document.path, candidates: [], runs: [] },
    local: empty,
    enriched: empty,
    enrichment: { outcome: 'skipped', overriddenFields: [], filledFields: [], unavailableRegistries: [] },
    identity: { paperId: fallbackId(document.contentHash), resolved: false },
    failure: errorMessage(error),
  };
}
