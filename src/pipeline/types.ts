export const FIELD_NAMES = [
  'title',
  'authors',
  'venue',
  'year',
  'doi',
  'keywords',
  'country',
  'studyType',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export const EXTRACTOR_NAMES = ['tei', 'embedded_metadata', 'filename', 'llm', 'text_scan'] as const;

export type ExtractorName = (typeof EXTRACTOR_NAMES)[number];

export const REGISTRY_NAMES = ['crossref', 'openalex', 'semantic_scholar'] as const;

export type RegistryName = (typeof REGISTRY_NAMES)[number];

export type Provenance = ExtractorName | 'enrichment';

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((name) => name === value);
}

export interface PaperDocument {
  readonly path: string;
  readonly fileName: string;
  /** sha256 of the file bytes. */
  readonly contentHash: string;
  readonly pageCount: number;
  readonly pages: readonly string[];
  /** PDF info dictionary (Title, Author, CreationDate, ...). */
  readonly embeddedMetadata: Readonly<Record<string, string>>;
  /** Pre-rendered TEI header; without one the TEI extractor asks GROBID. */
  readonly teiXml?: string;
}

export type FieldValue = string | number;

export interface CandidateField {
  readonly field: FieldName;
  readonly value: FieldValue;
  readonly source: ExtractorName;
  /** Extractor-local scale; calibrated before any comparison. */
  readonly confidence: number;
  readonly evidence: string;
}

export type ExtractorStatus = 'ok' | 'degraded' | 'timed_out';

export interface ExtractorRun {
  extractor: ExtractorName;
  status: ExtractorStatus;
  durationMs: number;
  candidateCount: number;
  error?: string;
}

export interface CandidateSet {
  documentPath: string;
  candidates: readonly CandidateField[];
  runs: readonly ExtractorRun[];
}

export interface ResolvedField {
  value: FieldValue;
  provenance: Provenance;
  confidence: number;
  agreement: boolean;
  contributors: ExtractorName[];
  confirmedBy?: RegistryName;
  overriddenFrom?: Provenance;
}

export interface CanonicalMetadata {
  title?: string;
  authors?: string[];
  venue?: string;
  year?: number;
  doi?: string;
  keywords?: string[];
  country?: string;
  studyType?: string;
}

export type RecordStatus = 'resolved' | 'unresolved' | 'duplicate';

export type RecordFlag =
  | 'no_candidates'
  | 'incomplete_identity'
  | 'duplicate'
  | 'enrichment_unavailable'
  | 'processing_failed'
  | 'degraded_extractors';

export type EnrichmentOutcomeKind = 'matched' | 'not_found' | 'unavailable' | 'skipped';

export interface EnrichmentSummary {
  outcome: EnrichmentOutcomeKind;
  registry?: RegistryName;
  matchConfidence?: number;
  externalId?: string;
  overriddenFields: FieldName[];
  filledFields: FieldName[];
  unavailableRegistries: RegistryName[];
}

export interface CanonicalRecord {
  paperId: string;
  documentPath: string;
  contentHash: string;
  status: RecordStatus;
  metadata: CanonicalMetadata;
  fields: Partial<Record<FieldName, ResolvedField>>;
  missingFields: FieldName[];
  conflictingFields: FieldName[];
  flags: RecordFlag[];
  duplicateOf?: string;
  enrichment: EnrichmentSummary;
  degradedExtractors: ExtractorName[];
  /** Why processing failed, for records flagged processing_failed. */
  error?: string;
}
