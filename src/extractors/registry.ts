import type { LlmClient } from '../agents/llmClient';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { ExtractorName } from '../pipeline/types';
import { createLogger, type Logger } from '../utils/logger';
import { embeddedMetadataExtractor } from './embeddedMetadataExtractor';
import { filenameExtractor } from './filenameExtractor';
import { createLlmExtractor } from './llmExtractor';
import { createTeiExtractor, teiExtractor, type TeiHeaderService } from './teiExtractor';
import { textScanExtractor } from './textScanExtractor';
import type { Extractor } from './types';

export interface ExtractorDeps {
  llmClient?: LlmClient;
  /** Without it the TEI extractor only reads headers already on the document. */
  grobid?: TeiHeaderService;
  /** Replaces or adds implementations by name, mainly for tests. */
  overrides?: Partial<Record<ExtractorName, Extractor>>;
  logger?: Logger;
}

/**
 * Instantiates the configured extractors in priority order. The LLM extractor
 * is left out when it is disabled or no client is available.
 */
export function buildExtractors(config: PipelineConfig, deps: ExtractorDeps = {}): Extractor[] {
  const logger = deps.logger ?? createLogger('Extractors');
  const available: Partial<Record<ExtractorName, Extractor>> = {
    tei: deps.grobid ? createTeiExtractor(deps.grobid) : teiExtractor,
    embedded_metadata: embeddedMetadataExtractor,
    filename: filenameExtractor,
    text_scan: textScanExtractor,
  };
  if (config.llm.enabled && deps.llmClient) {
    available.llm = createLlmExtractor({
      client: deps.llmClient,
      agentConfig: {
        maxRetries: config.llm.maxRetries,
        timeoutMs: config.llm.timeoutMs,
        maxTokens: config.llm.maxTokens,
      },
      firstPageChars: config.llm.firstPageChars,
      cacheRoot: config.llm.cacheDir,
      disableCache: config.llm.disableCache,
    });
  }
  Object.assign(available, deps.overrides);

  const extractors: Extractor[] = [];
  for (const name of config.extractorOrder) {
    const extractor = available[name];
    if (extractor) {
      extractors.push(extractor);
    } else {
      logger.warn(`Extractor ${name} is configured but unavailable; skipping`);
    }
  }
  return extractors;
}
