import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { DiagnosticsTable } from '../diagnostics/accumulator';
import { formatDiagnosticsCsv } from '../diagnostics/table';
import type { CanonicalRecord } from '../pipeline/types';
import { stableStringify } from '../utils/cache';
import { errorCode } from '../utils/retry';
import type { RecordSink } from './types';

export const OUTPUT_FILES = {
  records: 'records.jsonl',
  duplicates: 'duplicates.jsonl',
  diagnosticsCsv: 'diagnostics.csv',
  diagnosticsJson: 'diagnostics.json',
} as const;

export interface JsonlSinkOptions {
  /** Keep records an earlier run wrote, as a resumed run must. */
  append?: boolean;
}

/**
 * Writes one stable-stringified record per line. A fresh sink empties the
 * record files on first use so a re-run replaces the earlier output.
 */
export class JsonlSink implements RecordSink {
  private ready: Promise<void> | null = null;

  constructor(
    private readonly outDir: string,
    private readonly options: JsonlSinkOptions = {}
  ) {}

  private prepare(): Promise<void> {
    if (!this.ready) {
      this.ready = this.open();
    }
    return this.ready;
  }

  private async open(): Promise<void> {
    await fs.mkdir(this.outDir, { recursive: true });
    if (this.options.append) return;
    await fs.writeFile(path.join(this.outDir, OUTPUT_FILES.records), '', 'utf8');
    await fs.writeFile(path.join(this.outDir, OUTPUT_FILES.duplicates), '', 'utf8');
  }

  private async append(file: string, record: CanonicalRecord): Promise<void> {
    await this.prepare();
    await fs.appendFile(path.join(this.outDir, file), `${stableStringify(record)}\n`, 'utf8');
  }

  writeRecord(record: CanonicalRecord): Promise<void> {
    return this.append(OUTPUT_FILES.records, record);
  }

  writeDuplicate(record: CanonicalRecord): Promise<void> {
    return this.append(OUTPUT_FILES.duplicates, record);
  }

  async writeDiagnostics(table: DiagnosticsTable): Promise<void> {
    await this.prepare();
    await fs.writeFile(path.join(this.outDir, OUTPUT_FILES.diagnosticsCsv), formatDiagnosticsCsv(table), 'utf8');
    await fs.writeFile(
      path.join(this.outDir, OUTPUT_FILES.diagnosticsJson),
      `${JSON.stringify(table, null, 2)}\n`,
      'utf8'
    );
  }
}

const ProcessedLineSchema = z.object({
  paperId: z.string(),
  contentHash: z.string(),
  status: z.enum(['resolved', 'unresolved', 'duplicate']),
});

export interface ProcessedKeys {
  contentHashes: Set<string>;
  paperIds: Set<string>;
}

/**
 * Reads what a previous run already emitted so a restart can skip it.
 * Missing files mean nothing was processed; unreadable lines are ignored.
 */
export async function loadProcessedKeys(outDir: string): Promise<ProcessedKeys> {
  const keys: ProcessedKeys = { contentHashes: new Set(), paperIds: new Set() };
  for (const file of [OUTPUT_FILES.records, OUTPUT_FILES.duplicates]) {
    let text: string;
    try {
      text = await fs.readFile(path.join(outDir, file), 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') continue;
      throw error;
    }
    for (const line of text.split('\n')) {
      if (!line.trim()) continue;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        // a run killed mid-write can leave a partial last line
        continue;
      }
      const parsed = ProcessedLineSchema.safeParse(json);
      if (!parsed.success) continue;
      keys.contentHashes.add(parsed.data.contentHash);
      if (parsed.data.status !== 'duplicate') {
        keys.paperIds.add(parsed.data.paperId);
      }
    }
  }
  return keys;
}
