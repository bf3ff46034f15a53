import { SchemaValidationError } from '../agents/errors';
import type { LlmClient } from '../agents/llmClient';
import { buildMetadataUserMessage, METADATA_EXTRACTION_PROMPT } from '../agents/prompts/metadataExtraction';
import { runAgent } from '../agents/runAgent';
import { MetadataExtractionSchema, type MetadataExtractionField } from '../agents/schemas';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../agents/versions';
import type { AgentConfig } from '../agents/config';
import type { CandidateField, FieldName, PaperDocument } from '../pipeline/types';
import { makeCandidate, present, type Extractor, type ExtractorContext } from './types';

const AGENT_NAME = 'MetadataExtraction';
const DEFAULT_MODEL_CONFIDENCE = 0.5;
/** Raw confidence for values salvaged from an invalid response; maps to the band minimum. */
const SALVAGED_CONFIDENCE = 0;

const FIELD_MAP: ReadonlyArray<[MetadataExtractionField, FieldName]> = [
  ['title', 'title'],
  ['author', 'authors'],
  ['year', 'year'],
  ['doi', 'doi'],
  ['author_keywords', 'keywords'],
  ['country', 'country'],
  ['source_journal', 'venue'],
  ['study_type', 'studyType'],
];

export interface LlmExtractorOptions {
  client: LlmClient;
  agentConfig: AgentConfig;
  firstPageChars: number;
  cacheRoot?: string;
  disableCache?: boolean;
}

/** Lists become "; "-joined strings, numbers stay numbers, anything else is dropped. */
function flatten(value: unknown): string | number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') return present(value) ? value.trim() : undefined;
  if (Array.isArray(value)) {
    const items = value.filter((item): item is string => typeof item === 'string' && present(item));
    return items.length > 0 ? items.map((item) => item.trim()).join('; ') : undefined;
  }
  return undefined;
}

function toCandidates(payload: unknown, confidence: number, evidence: string): CandidateField[] {
  if (typeof payload !== 'object' || payload === null) return [];
  const candidates: CandidateField[] = [];
  for (const [key, field] of FIELD_MAP) {
    const value = flatten(Reflect.get(payload, key));
    if (value !== undefined) {
      candidates.push(makeCandidate('llm', field, value, confidence, evidence));
    }
  }
  return candidates;
}

export function createLlmExtractor(options: LlmExtractorOptions): Extractor {
  return {
    name: 'llm',
    async extract(document: PaperDocument, context: ExtractorContext): Promise<CandidateField[]> {
      const firstPage = document.pages[0] ?? '';
      if (!present(firstPage)) return [];

      const userMessage = buildMetadataUserMessage(firstPage, options.firstPageChars);
      const evidence = `first page (${Math.min(firstPage.length, options.firstPageChars)} chars)`;

      try {
        const output = await runAgent(AGENT_NAME, METADATA_EXTRACTION_PROMPT, userMessage, MetadataExtractionSchema, {
          client: options.client,
          config: options.agentConfig,
          logger: context.logger,
          signal: context.signal,
          cache: {
            input: { contentHash: document.contentHash, userMessage },
            promptVersion: PROMPT_VERSIONS.metadataExtraction,
            schemaVersion: SCHEMA_VERSIONS.metadataExtraction,
            root: options.cacheRoot,
            disableCache: options.disableCache,
          },
        });
        return toCandidates(output, output.confidence ?? DEFAULT_MODEL_CONFIDENCE, evidence);
      } catch (error) {
        if (error instanceof SchemaValidationError) {
          context.logger.warn(`[${AGENT_NAME}] Salvaging fields from invalid response`, {
            document: document.path,
          });
          return toCandidates(error.rawJson, SALVAGED_CONFIDENCE, `${evidence}, salvaged`);
        }
        throw error;
      }
    },
  };
}
