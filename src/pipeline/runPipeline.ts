import type { PipelineConfig } from '../config/pipelineConfig';
import { DiagnosticsAccumulator, type DiagnosticsTable } from '../diagnostics/accumulator';
import type { Enricher } from '../enrich/types';
import type { Extractor } from '../extractors/types';
import { DuplicateIndex } from '../identity/duplicateIndex';
import type { RecordSink } from '../output/types';
import { reconcileOptionsFrom } from '../reconcile/reconcile';
import { LaneLimiter } from '../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { RunCancelledError, SinkError } from './errors';
import {
  failedDocument,
  finalizeDocument,
  processDocument,
  type ProcessedDocument,
} from './processDocument';
import type { CanonicalRecord, PaperDocument } from './types';

export type DocumentSource = AsyncIterable<PaperDocument> | Iterable<PaperDocument>;

/** Keys emitted by an earlier run over the same output. */
export interface ResumeState {
  contentHashes?: Iterable<string>;
  paperIds?: Iterable<string>;
}

export interface RunPipelineOptions {
  source: DocumentSource;
  sink: RecordSink;
  extractors: readonly Extractor[];
  /** Omit to skip enrichment. */
  enricher?: Enricher;
  config: PipelineConfig;
  signal?: AbortSignal;
  resume?: ResumeState;
  logger?: Logger;
}

export interface RunSummary {
  documents: number;
  resolved: number;
  unresolved: number;
  duplicates: number;
  failed: number;
  /** Documents skipped because an earlier run already emitted them. */
  skipped: number;
  /** Documents dropped mid-flight by cancellation. */
  abandoned: number;
  cancelled: boolean;
  durationMs: number;
  diagnostics: DiagnosticsTable;
}

type Settled =
  | { ok: true; processed: ProcessedDocument }
  | { ok: false; document: PaperDocument; error: unknown };

// Identifies previously emitted IDs in the duplicate index.
const EARLIER_RUN = '(earlier run)';

/**
 * Processes every document from `source` on a bounded pool and streams
 * records to `sink` in ingestion order. Cancellation stops new work and
 * returns what was finalized; a sink failure aborts the run.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<RunSummary> {
  const { source, sink, extractors, enricher, config } = options;
  const logger = options.logger ?? createLogger('Pipeline');
  const startedAt = Date.now();
  const reconcileOptions = reconcileOptionsFrom(config);

  const controller = new AbortController();
  const onAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) controller.abort(options.signal.reason);
  options.signal?.addEventListener('abort', onAbort, { once: true });
  const signal = controller.signal;

  const pool = new LaneLimiter({ documents: { concurrency: config.concurrency, minIntervalMs: 0 } });
  const readAhead = config.concurrency * 2;
  const duplicates = new DuplicateIndex();
  const diagnostics = new DiagnosticsAccumulator(reconcileOptions);
  const skipHashes = new Set(options.resume?.contentHashes ?? []);
  for (const paperId of options.resume?.paperIds ?? []) {
    duplicates.register(paperId, EARLIER_RUN);
  }

  const summary: Omit<RunSummary, 'cancelled' | 'durationMs' | 'diagnostics'> = {
    documents: 0,
    resolved: 0,
    unresolved: 0,
    duplicates: 0,
    failed: 0,
    skipped: 0,
    abandoned: 0,
  };

  const pending = new Map<number, Promise<Settled>>();
  let ingested = 0;
  let finalized = 0;

  const write = async (record: CanonicalRecord): Promise<void> => {
    try {
      if (record.status === 'duplicate') await sink.writeDuplicate(record);
      else await sink.writeRecord(record);
    } catch (error) {
      throw new SinkError(`write ${record.documentPath}`, error);
    }
  };

  const finalizeNext = async (): Promise<void> => {
    const ordinal = finalized;
    const task = pending.get(ordinal);
    finalized += 1;
    if (!task) return;
    pending.delete(ordinal);
    const settled = await task;

    let processed: ProcessedDocument;
    if (settled.ok) {
      processed = settled.processed;
    } else if (settled.error instanceof RunCancelledError) {
      summary.abandoned += 1;
      return;
    } else {
      logger.error(`Processing failed for ${settled.document.path}: ${errorMessage(settled.error)}`);
      processed = failedDocument(settled.document, settled.error);
      summary.failed += 1;
    }

    const { record, diagnostics: perDocument } = finalizeDocument(
      processed,
      duplicates,
      ordinal,
      reconcileOptions,
      logger
    );
    await write(record);
    diagnostics.merge(perDocument);
    summary.documents += 1;
    if (record.status === 'resolved') summary.resolved += 1;
    else if (record.status === 'duplicate') summary.duplicates += 1;
    else summary.unresolved += 1;
    logger.info(`${record.status} ${record.documentPath} -> ${record.paperId}`);
  };

  try {
    try {
      for await (const document of source) {
        if (signal.aborted) break;
        if (skipHashes.has(document.contentHash)) {
          summary.skipped += 1;
          continue;
        }
        const task: Promise<Settled> = pool
          .limit('documents', () =>
            processDocument(document, {
              extractors,
              enricher,
              options: reconcileOptions,
              extractorTimeoutMs: config.extractorTimeoutMs,
              signal,
              logger,
            })
          )
          .then(
            (processed): Settled => ({ ok: true, processed }),
            (error: unknown): Settled => ({ ok: false, document, error })
          );
        pending.set(ingested, task);
        ingested += 1;
        while (pending.size >= readAhead) {
          await finalizeNext();
        }
      }
      while (finalized < ingested) {
        await finalizeNext();
      }
    } catch (error) {
      controller.abort(error);
      // Let in-flight documents observe the abort before surfacing the error.
      await Promise.all(pending.values());
      throw error;
    }

    const table = diagnostics.buildTable();
    try {
      await sink.writeDiagnostics(table);
    } catch (error) {
      throw new SinkError('write diagnostics', error);
    }

    const cancelled = options.signal?.aborted ?? false;
    if (cancelled) {
      logger.warn(`Run cancelled after ${summary.documents} documents; ${summary.abandoned} abandoned`);
    }
    logger.info(
      `Processed ${summary.documents} documents: ${summary.resolved} resolved, ${summary.unresolved} unresolved, ${summary.duplicates} duplicates, ${summary.skipped} skipped`
    );
    return { ...summary, cancelled, durationMs: Date.now() - startedAt, diagnostics: table };
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}
