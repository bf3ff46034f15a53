import { normalizeField } from '../reconcile/fields';
import { keysAgree, scoreCandidates, type ReconcileOptions, type ReconciledRecord } from '../reconcile/reconcile';
import { roundConfidence } from '../reconcile/confidence';
import {
  EXTRACTOR_NAMES,
  FIELD_NAMES,
  REGISTRY_NAMES,
  type CandidateSet,
  type CanonicalRecord,
  type EnrichmentOutcomeKind,
  type ExtractorName,
  type ExtractorStatus,
  type FieldName,
  type RegistryName,
} from '../pipeline/types';

interface ExtractorCounters {
  proposals: number;
  agreements: number;
  overriddenByReconciliation: number;
  overriddenByEnrichment: number;
  soleContributions: number;
  runs: Record<ExtractorStatus, number>;
  fieldCoverage: Record<FieldName, number>;
}

export interface DiagnosticsRow {
  extractor: ExtractorName;
  proposals: number;
  agreements: number;
  overrides: number;
  overriddenByReconciliation: number;
  overriddenByEnrichment: number;
  soleContributions: number;
  agreementRate: number;
  overrideRate: number;
  contributionRate: number;
  runs: Record<ExtractorStatus, number>;
  /** Documents for which the extractor proposed each field. */
  fieldCoverage: Record<FieldName, number>;
}

export interface DiagnosticsTable {
  rows: DiagnosticsRow[];
  documents: number;
  resolved: number;
  unresolved: number;
  duplicates: number;
  degradedRuns: number;
  resolvedFields: number;
  enrichment: Record<EnrichmentOutcomeKind, number>;
  registryUnavailable: Record<RegistryName, number>;
}

export interface DocumentObservation {
  candidateSet: CandidateSet;
  /** Reconciled record before enrichment was applied. */
  local: ReconciledRecord;
  final: CanonicalRecord;
}

const OUTCOME_KINDS: readonly EnrichmentOutcomeKind[] = ['matched', 'not_found', 'unavailable', 'skipped'];

function zeroFields(): Record<FieldName, number> {
  return {
    title: 0,
    authors: 0,
    venue: 0,
    year: 0,
    doi: 0,
    keywords: 0,
    country: 0,
    studyType: 0,
  };
}

function zeroCounters(): ExtractorCounters {
  return {
    proposals: 0,
    agreements: 0,
    overriddenByReconciliation: 0,
    overriddenByEnrichment: 0,
    soleContributions: 0,
    runs: { ok: 0, degraded: 0, timed_out: 0 },
    fieldCoverage: zeroFields(),
  };
}

function rate(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : roundConfidence(numerator / denominator);
}

/**
 * Corpus-level extractor statistics. Each document gets its own instance;
 * the driver merges them as workers finish.
 */
export class DiagnosticsAccumulator {
  private readonly extractors = new Map<ExtractorName, ExtractorCounters>();
  private documents = 0;
  private resolved = 0;
  private unresolved = 0;
  private duplicates = 0;
  private degradedRuns = 0;
  private resolvedFields = 0;
  private readonly enrichment: Record<EnrichmentOutcomeKind, number> = {
    matched: 0,
    not_found: 0,
    unavailable: 0,
    skipped: 0,
  };
  private readonly registryUnavailable: Record<RegistryName, number> = {
    crossref: 0,
    openalex: 0,
    semantic_scholar: 0,
  };

  constructor(private readonly options: ReconcileOptions) {}

  private counters(extractor: ExtractorName): ExtractorCounters {
    let counters = this.extractors.get(extractor);
    if (!counters) {
      counters = zeroCounters();
      this.extractors.set(extractor, counters);
    }
    return counters;
  }

  recordDocument({ candidateSet, local, final }: DocumentObservation): void {
    this.documents += 1;
    if (final.status === 'resolved') this.resolved += 1;
    else if (final.status === 'unresolved') this.unresolved += 1;
    else this.duplicates += 1;

    this.enrichment[final.enrichment.outcome] += 1;
    for (const registry of final.enrichment.unavailableRegistries) {
      this.registryUnavailable[registry] += 1;
    }

    const okExtractors = new Set<ExtractorName>();
    for (const run of candidateSet.runs) {
      this.counters(run.extractor).runs[run.status] += 1;
      if (run.status === 'ok') okExtractors.add(run.extractor);
      else this.degradedRuns += 1;
    }

    const scored = scoreCandidates(candidateSet.candidates, this.options);
    for (const extractor of okExtractors) {
      const counters = this.counters(extractor);
      for (const field of FIELD_NAMES) {
        const representative = scored
          .filter((s) => s.candidate.source === extractor && s.candidate.field === field)
          .reduce<(typeof scored)[number] | undefined>(
            (best, s) => (!best || s.confidence > best.confidence ? s : best),
            undefined
          );
        if (!representative) continue;

        counters.proposals += 1;
        counters.fieldCoverage[field] += 1;

        const finalValue = final.fields[field]?.value;
        const finalKey = finalValue === undefined ? undefined : normalizeField(field, finalValue)?.key;
        if (finalKey !== undefined && keysAgree(field, representative.key, finalKey, this.options.fuzzyThreshold)) {
          counters.agreements += 1;
          continue;
        }

        const localValue = local.fields[field]?.value;
        const localKey = localValue === undefined ? undefined : normalizeField(field, localValue)?.key;
        if (localKey !== undefined && keysAgree(field, representative.key, localKey, this.options.fuzzyThreshold)) {
          counters.overriddenByEnrichment += 1;
        } else {
          counters.overriddenByReconciliation += 1;
        }
      }
    }

    for (const field of FIELD_NAMES) {
      const resolved = final.fields[field];
      if (!resolved) continue;
      this.resolvedFields += 1;
      const [only, ...others] = resolved.contributors;
      if (resolved.provenance !== 'enrichment' && only === resolved.provenance && others.length === 0) {
        this.counters(resolved.provenance).soleContributions += 1;
      }
    }
  }

  merge(other: DiagnosticsAccumulator): this {
    this.documents += other.documents;
    this.resolved += other.resolved;
    this.unresolved += other.unresolved;
    this.duplicates += other.duplicates;
    this.degradedRuns += other.degradedRuns;
    this.resolvedFields += other.resolvedFields;
    for (const kind of OUTCOME_KINDS) {
      this.enrichment[kind] += other.enrichment[kind];
    }
    for (const registry of REGISTRY_NAMES) {
      this.registryUnavailable[registry] += other.registryUnavailable[registry];
    }
    for (const [extractor, theirs] of other.extractors) {
      const mine = this.counters(extractor);
      mine.proposals += theirs.proposals;
      mine.agreements += theirs.agreements;
      mine.overriddenByReconciliation += theirs.overriddenByReconciliation;
      mine.overriddenByEnrichment += theirs.overriddenByEnrichment;
      mine.soleContributions += theirs.soleContributions;
      mine.runs.ok += theirs.runs.ok;
      mine.runs.degraded += theirs.runs.degraded;
      mine.runs.timed_out += theirs.runs.timed_out;
      for (const field of FIELD_NAMES) {
        mine.fieldCoverage[field] += theirs.fieldCoverage[field];
      }
    }
    return this;
  }

  buildTable(): DiagnosticsTable {
    const rows: DiagnosticsRow[] = [];
    for (const extractor of EXTRACTOR_NAMES) {
      const counters = this.extractors.get(extractor);
      if (!counters) continue;
      const overrides = counters.overriddenByReconciliation + counters.overriddenByEnrichment;
      rows.push({
        extractor,
        proposals: counters.proposals,
        agreements: counters.agreements,
        overrides,
        overriddenByReconciliation: counters.overriddenByReconciliation,
        overriddenByEnrichment: counters.overriddenByEnrichment,
        soleContributions: counters.soleContributions,
        agreementRate: rate(counters.agreements, counters.proposals),
        overrideRate: rate(overrides, counters.proposals),
        contributionRate: rate(counters.soleContributions, this.resolvedFields),
        runs: { ...counters.runs },
        fieldCoverage: { ...counters.fieldCoverage },
      });
    }
    return {
      rows,
      documents: this.documents,
      resolved: this.resolved,
      unresolved: this.unresolved,
      duplicates: this.duplicates,
      degradedRuns: this.degradedRuns,
      resolvedFields: this.resolvedFields,
      enrichment: { ...this.enrichment },
      registryUnavailable: { ...this.registryUnavailable },
    };
  }
}
