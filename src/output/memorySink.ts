import type { DiagnosticsTable } from '../diagnostics/accumulator';
import type { CanonicalRecord } from '../pipeline/types';
import type { RecordSink } from './types';

export class MemorySink implements RecordSink {
  readonly records: CanonicalRecord[] = [];
  readonly duplicates: CanonicalRecord[] = [];
  diagnostics: DiagnosticsTable | null = null;

  async writeRecord(record: CanonicalRecord): Promise<void> {
    this.records.push(record);
  }

  async writeDuplicate(record: CanonicalRecord): Promise<void> {
    this.duplicates.push(record);
  }

  async writeDiagnostics(table: DiagnosticsTable): Promise<void> {
    this.diagnostics = table;
  }
}
