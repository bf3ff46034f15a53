import type { DiagnosticsTable } from '../diagnostics/accumulator';
import type { CanonicalRecord } from '../pipeline/types';

/**
 * Destination for finalized output. The driver calls it sequentially in
 * ingestion order; any rejection aborts the run.
 */
export interface RecordSink {
  writeRecord(record: CanonicalRecord): Promise<void>;
  writeDuplicate(record: CanonicalRecord): Promise<void>;
  writeDiagnostics(table: DiagnosticsTable): Promise<void>;
}
