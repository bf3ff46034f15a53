#!/usr/bin/env node
import 'dotenv/config';
import { GeminiClient, type LlmClient } from './agents/llmClient';
import { loadPipelineConfig, type PipelineConfigInput } from './config/pipelineConfig';
import { formatDiagnosticsSummary } from './diagnostics/table';
import { createEnrichmentClient } from './enrich';
import { buildExtractors } from './extractors/registry';
import { GrobidClient } from './ingest/grobidClient';
import { readPdfDocuments } from './ingest/pdfDocumentSource';
import { JsonlSink, loadProcessedKeys } from './output/jsonlSink';
import { ConfigurationError } from './pipeline/errors';
import { runPipeline } from './pipeline/runPipeline';
import { createLogger, errorMessage } from './utils/logger';

const USAGE = `Usage: paper-metadata <pdf-dir> <out-dir> [options]

Options:
  --config <file>       JSON config file
  --concurrency <n>     documents processed at once
  --no-enrich           skip registry lookups
  --no-llm              skip the LLM extractor
  --resume              skip documents already written to <out-dir>`;

export interface CliArgs {
  pdfDir: string;
  outDir: string;
  configFile?: string;
  overrides: PipelineConfigInput;
  resume: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const overrides: PipelineConfigInput = {};
  let configFile: string | undefined;
  let resume = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        configFile = argv[++i];
        if (!configFile) throw new ConfigurationError('--config needs a file');
        break;
      case '--concurrency': {
        const value = Number(argv[++i]);
        if (!Number.isInteger(value)) throw new ConfigurationError('--concurrency needs an integer');
        overrides.concurrency = value;
        break;
      }
      case '--no-enrich':
        overrides.enrichment = { enabled: false };
        break;
      case '--no-llm':
        overrides.llm = { enabled: false };
        break;
      case '--resume':
        resume = true;
        break;
      default:
        if (arg === undefined || arg.startsWith('--')) {
          throw new ConfigurationError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [pdfDir, outDir, ...extra] = positional;
  if (!pdfDir || !outDir || extra.length > 0) {
    throw new ConfigurationError('Expected exactly <pdf-dir> and <out-dir>');
  }
  return { pdfDir, outDir, configFile, overrides, resume };
}

async function main(): Promise<number> {
  const logger = createLogger('CLI');
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }

  try {
    const config = loadPipelineConfig({ file: args.configFile, overrides: args.overrides });

    let llmClient: LlmClient | undefined;
    if (config.llm.enabled && config.llm.apiKey) {
      llmClient = new GeminiClient(config.llm.apiKey, config.llm.model);
    } else if (config.llm.enabled) {
      logger.warn('GOOGLE_API_KEY is not set; running without the LLM extractor');
    }

    let grobid: GrobidClient | undefined;
    if (config.grobid.url) {
      const candidate = new GrobidClient({ url: config.grobid.url, timeoutMs: config.grobid.timeoutMs });
      if (await candidate.isAlive()) grobid = candidate;
    }

    const resume = args.resume ? await loadProcessedKeys(args.outDir) : undefined;
    if (resume) {
      logger.info(`Resuming: ${resume.contentHashes.size} documents already written`);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted; finishing documents in flight');
      controller.abort();
    });

    const summary = await runPipeline({
      source: readPdfDocuments(args.pdfDir, { signal: controller.signal }),
      sink: new JsonlSink(args.outDir, { append: args.resume }),
      extractors: buildExtractors(config, { llmClient, grobid }),
      enricher: config.enrichment.enabled ? createEnrichmentClient(config) : undefined,
      config,
      signal: controller.signal,
      resume,
    });

    for (const line of formatDiagnosticsSummary(summary.diagnostics)) {
      console.log(line);
    }
    console.log(
      `Done in ${(summary.durationMs / 1000).toFixed(1)}s: ${summary.resolved} resolved, ${summary.unresolved} unresolved, ${summary.duplicates} duplicates, ${summary.failed} failed`
    );
    return summary.cancelled ? 130 : 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return 2;
    }
    console.error('Fatal error:', errorMessage(error));
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    }
  );
}
