import { describe, it, expect } from '@jest/globals';
import { parsePipelineConfig } from '../src/config/pipelineConfig';
import { formatDiagnosticsCsv, formatDiagnosticsSummary } from '../src/diagnostics/table';
import { DuplicateIndex } from '../src/identity/duplicateIndex';
import { finalizeDocument, processDocument } from '../src/pipeline/processDocument';
import { reconcileOptionsFrom } from '../src/reconcile/reconcile';
import { silentLogger } from '../src/utils/logger';
import { makeDocument } from './fixtures/documents';
import { matchedOutcome, scriptedExtractor, StaticEnricher } from './fixtures/pipeline';

const options = reconcileOptionsFrom(parsePipelineConfig({}));
const fileName = 'graph.pdf';

const extractors = [
  scriptedExtractor('tei', { [fileName]: [['title', 'Graph Methods', 1]] }),
  scriptedExtractor('embedded_metadata', { [fileName]: [['authors', 'Jane Smith', 0.6]] }),
  scriptedExtractor('filename', {
    [fileName]: [
      ['title', 'Graph Methods', 70],
      ['year', '2019', 70],
    ],
  }),
  scriptedExtractor('llm', {
    [fileName]: [
      ['title', 'Other Title', 0.5],
      ['year', 2018, 0.5],
    ],
  }),
  scriptedExtractor('text_scan', { [fileName]: 'hang' }),
];

async function finalized() {
  const enricher = new StaticEnricher(() => matchedOutcome({ year: 2018, doi: '10.5555/gm.1' }));
  const processed = await processDocument(makeDocument({ fileName }), {
    extractors,
    enricher,
    options,
    extractorTimeoutMs: 20,
    signal: new AbortController().signal,
    logger: silentLogger,
  });
  return { enricher, ...finalizeDocument(processed, new DuplicateIndex(), 0, options, silentLogger) };
}

describe('document processing', () => {
  it('builds the record from reconciliation and enrichment', async () => {
    const { record, enricher } = await finalized();

    expect(enricher.requests).toEqual([{ title: 'Graph Methods', year: 2019, doi: undefined }]);
    expect(record.paperId).toBe('paper_edeeb8252b5b2e34');
    expect(record.status).toBe('resolved');
    expect(record.metadata).toEqual({
      title: 'Graph Methods',
      authors: ['Jane Smith'],
      year: 2018,
      doi: '10.5555/gm.1',
    });
    expect(record.fields.year).toMatchObject({ provenance: 'enrichment', overriddenFrom: 'filename' });
    expect(record.flags).toEqual(['degraded_extractors']);
    expect(record.degradedExtractors).toEqual(['text_scan']);
    expect(record.enrichment).toMatchObject({ outcome: 'matched', overriddenFields: ['year'], filledFields: ['doi'] });
    expect(Object.isFrozen(record.fields.title)).toBe(true);
  });
});

describe('DiagnosticsAccumulator', () => {
  it('counts agreements, overrides and sole contributions per extractor', async () => {
    const { diagnostics } = await finalized();
    const table = diagnostics.buildTable();

    expect(
      table.rows.map((r) => [
        r.extractor,
        r.proposals,
        r.agreements,
        r.overriddenByReconciliation,
        r.overriddenByEnrichment,
        r.soleContributions,
      ])
    ).toEqual([
      ['tei', 1, 1, 0, 0, 0],
      ['embedded_metadata', 1, 1, 0, 0, 1],
      ['filename', 2, 1, 0, 1, 0],
      ['llm', 2, 1, 1, 0, 0],
      ['text_scan', 0, 0, 0, 0, 0],
    ]);
    expect(table.rows[1]?.contributionRate).toBe(0.25);
    expect(table.rows[2]).toMatchObject({ agreementRate: 0.5, overrideRate: 0.5, overrides: 1 });
    expect(table.rows[4]?.runs).toEqual({ ok: 0, degraded: 0, timed_out: 1 });
    expect(table).toMatchObject({ documents: 1, resolved: 1, degradedRuns: 1, resolvedFields: 4 });
    expect(table.enrichment.matched).toBe(1);
  });

  it('merges per-document counters', async () => {
    const first = await finalized();
    const second = await finalized();
    const table = first.diagnostics.merge(second.diagnostics).buildTable();

    expect(table.documents).toBe(2);
    expect(table.rows[2]).toMatchObject({ proposals: 4, agreements: 2, agreementRate: 0.5 });
    expect(table.rows[2]?.fieldCoverage.year).toBe(2);
  });

  it('formats a CSV table', async () => {
    const { diagnostics } = await finalized();
    const csv = formatDiagnosticsCsv(diagnostics.buildTable());
    const lines = csv.split('\n');

    expect(lines[0]).toBe(
      'extractor,proposals,agreements,overrides,overridden_by_reconciliation,overridden_by_enrichment,sole_contributions,agreement_rate,override_rate,contribution_rate,runs_ok,runs_degraded,runs_timed_out'
    );
    expect(lines[3]).toBe('filename,2,1,1,0,1,0,0.5000,0.5000,0.0000,1,0,0');
    expect(lines).toHaveLength(7);
    expect(formatDiagnosticsSummary(diagnostics.buildTable())[0]).toBe(
      'documents=1 resolved=1 unresolved=0 duplicates=0 degradedRuns=1'
    );
  });
});
