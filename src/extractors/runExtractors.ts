import {
  ExtractorFailure,
  RunCancelledError,
  TimeoutError,
} from '../pipeline/errors';
import {
  isFieldName,
  type CandidateField,
  type CandidateSet,
  type ExtractorRun,
  type PaperDocument,
} from '../pipeline/types';
import type { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import type { Extractor } from './types';

export interface RunExtractorsOptions {
  timeoutMs: number;
  signal: AbortSignal;
  logger: Logger;
}

interface ExtractorOutcome {
  run: ExtractorRun;
  candidates: CandidateField[];
}

async function runOne(
  extractor: Extractor,
  document: PaperDocument,
  options: RunExtractorsOptions
): Promise<ExtractorOutcome> {
  const { logger, signal } = options;
  const startedAt = Date.now();
  try {
    const proposed = await withTimeout(
      Promise.resolve().then(() => extractor.extract(document, { signal, logger })),
      options.timeoutMs,
      `Extractor ${extractor.name}`,
      signal
    );
    const candidates = proposed.filter(
      (c) => c.source === extractor.name && isFieldName(c.field)
    );
    return {
      run: {
        extractor: extractor.name,
        status: 'ok',
        durationMs: Date.now() - startedAt,
        candidateCount: candidates.length,
      },
      candidates,
    };
  } catch (error) {
    if (error instanceof RunCancelledError) {
      throw error;
    }
    const durationMs = Date.now() - startedAt;
    if (error instanceof TimeoutError) {
      logger.warn(`${error.message}; treating as abstained`, { document: document.path });
      return {
        run: { extractor: extractor.name, status: 'timed_out', durationMs, candidateCount: 0, error: error.message },
        candidates: [],
      };
    }
    const failure = new ExtractorFailure(extractor.name, document.path, error);
    logger.warn(failure.message);
    return {
      run: { extractor: extractor.name, status: 'degraded', durationMs, candidateCount: 0, error: failure.message },
      candidates: [],
    };
  }
}

/**
 * Runs every extractor concurrently with its own timeout. Candidates are
 * collected in extractor order regardless of completion order; a failed or
 * timed-out extractor contributes nothing.
 */
export async function runExtractors(
  document: PaperDocument,
  extractors: readonly Extractor[],
  options: RunExtractorsOptions
): Promise<CandidateSet> {
  const outcomes = await Promise.all(extractors.map((extractor) => runOne(extractor, document, options)));
  return {
    documentPath: document.path,
    candidates: outcomes.flatMap((o) => o.candidates),
    runs: outcomes.map((o) => o.run),
  };
}
