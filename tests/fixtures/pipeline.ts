import type { Enricher, EnrichmentOutcome, PartialRecord } from '../../src/enrich/types';
import { makeCandidate, type Extractor } from '../../src/extractors/types';
import type { CandidateField, ExtractorName, FieldName, FieldValue, PaperDocument } from '../../src/pipeline/types';

type Proposal = [FieldName, FieldValue, number];

/** Extractor that answers from a per-file table and abstains on anything else. */
export function scriptedExtractor(
  name: ExtractorName,
  byFile: Record<string, Proposal[] | Error | 'hang'>
): Extractor {
  return {
    name,
    async extract(document: PaperDocument): Promise<CandidateField[]> {
      const script = byFile[document.fileName];
      if (script === undefined) return [];
      if (script === 'hang') return new Promise<CandidateField[]>(() => undefined);
      if (script instanceof Error) throw script;
      return script.map(([field, value, confidence]) => makeCandidate(name, field, value, confidence, document.fileName));
    },
  };
}

export class StaticEnricher implements Enricher {
  readonly requests: PartialRecord[] = [];

  constructor(private readonly outcome: (partial: PartialRecord) => EnrichmentOutcome) {}

  async enrich(partial: PartialRecord): Promise<EnrichmentOutcome> {
    this.requests.push(partial);
    return this.outcome(partial);
  }
}

export function matchedOutcome(fields: Partial<Record<FieldName, FieldValue>>, matchConfidence = 0.9): EnrichmentOutcome {
  return {
    kind: 'matched',
    result: { matched: true, registry: 'openalex', lookup: 'title', matchConfidence, fields },
    attempts: [{ registry: 'openalex', lookup: 'title', attempts: 1, outcome: 'matched', matchConfidence }],
    transitions: ['try_primary', 'done'],
  };
}
