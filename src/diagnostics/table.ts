import type { DiagnosticsTable } from './accumulator';

const CSV_COLUMNS = [
  'extractor',
  'proposals',
  'agreements',
  'overrides',
  'overridden_by_reconciliation',
  'overridden_by_enrichment',
  'sole_contributions',
  'agreement_rate',
  'override_rate',
  'contribution_rate',
  'runs_ok',
  'runs_degraded',
  'runs_timed_out',
] as const;

export function formatDiagnosticsCsv(table: DiagnosticsTable): string {
  const lines: string[] = [CSV_COLUMNS.join(',')];
  for (const row of table.rows) {
    lines.push(
      [
        row.extractor,
        row.proposals,
        row.agreements,
        row.overrides,
        row.overriddenByReconciliation,
        row.overriddenByEnrichment,
        row.soleContributions,
        row.agreementRate.toFixed(4),
        row.overrideRate.toFixed(4),
        row.contributionRate.toFixed(4),
        row.runs.ok,
        row.runs.degraded,
        row.runs.timed_out,
      ].join(',')
    );
  }
  return `${lines.join('\n')}\n`;
}

/** Human-readable digest for the run log. */
export function formatDiagnosticsSummary(table: DiagnosticsTable): string[] {
  const lines = [
    `documents=${table.documents} resolved=${table.resolved} unresolved=${table.unresolved} duplicates=${table.duplicates} degradedRuns=${table.degradedRuns}`,
    `enrichment matched=${table.enrichment.matched} not_found=${table.enrichment.not_found} unavailable=${table.enrichment.unavailable} skipped=${table.enrichment.skipped}`,
  ];
  for (const row of table.rows) {
    lines.push(
      `${row.extractor}: agreement ${(row.agreementRate * 100).toFixed(1)}%, override ${(row.overrideRate * 100).toFixed(1)}%, sole source ${(row.contributionRate * 100).toFixed(1)}% (${row.proposals} proposals)`
    );
  }
  return lines;
}
