import { describe, it, expect } from '@jest/globals';
import { parsePipelineConfig } from '../src/config/pipelineConfig';
import { buildExtractors } from '../src/extractors/registry';
import { runExtractors } from '../src/extractors/runExtractors';
import { makeCandidate, type Extractor } from '../src/extractors/types';
import { RunCancelledError } from '../src/pipeline/errors';
import type { CandidateField } from '../src/pipeline/types';
import { silentLogger } from '../src/utils/logger';
import { makeDocument } from './fixtures/documents';
import { ScriptedLlmClient } from './fixtures/llm';

const document = makeDocument();

const fixed: Extractor = {
  name: 'filename',
  async extract() {
    return [makeCandidate('filename', 'year', '2019', 70, 'paper.pdf')];
  },
};

const hanging: Extractor = {
  name: 'llm',
  extract: () => new Promise<CandidateField[]>(() => undefined),
};

const broken: Extractor = {
  name: 'tei',
  async extract() {
    throw new Error('bad xml');
  },
};

const impostor: Extractor = {
  name: 'text_scan',
  async extract() {
    return [makeCandidate('tei', 'title', 'Not mine', 1, '')];
  },
};

describe('runExtractors', () => {
  it('isolates failures and timeouts', async () => {
    const set = await runExtractors(document, [broken, fixed, hanging], {
      timeoutMs: 20,
      signal: new AbortController().signal,
      logger: silentLogger,
    });

    expect(set.candidates).toEqual([makeCandidate('filename', 'year', '2019', 70, 'paper.pdf')]);
    expect(set.runs.map((r) => [r.extractor, r.status, r.candidateCount])).toEqual([
      ['tei', 'degraded', 0],
      ['filename', 'ok', 1],
      ['llm', 'timed_out', 0],
    ]);
    expect(set.runs[0]?.error).toBe('Extractor tei failed on papers/paper.pdf: bad xml');
    expect(set.runs[2]?.error).toBe('Extractor llm timed out after 20ms');
  });

  it('drops candidates attributed to another extractor', async () => {
    const set = await runExtractors(document, [impostor], {
      timeoutMs: 1_000,
      signal: new AbortController().signal,
      logger: silentLogger,
    });
    expect(set.candidates).toEqual([]);
    expect(set.runs[0]?.status).toBe('ok');
  });

  it('propagates cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      runExtractors(document, [hanging], { timeoutMs: 1_000, signal: controller.signal, logger: silentLogger })
    ).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe('buildExtractors', () => {
  it('follows the configured order and leaves out the LLM without a client', () => {
    const config = parsePipelineConfig({ extractorOrder: ['llm', 'text_scan', 'tei'] });
    expect(buildExtractors(config, { logger: silentLogger }).map((e) => e.name)).toEqual(['text_scan', 'tei']);
  });

  it('includes the LLM extractor when a client is given', () => {
    const config = parsePipelineConfig({});
    const names = buildExtractors(config, { llmClient: new ScriptedLlmClient(['{}']), logger: silentLogger }).map(
      (e) => e.name
    );
    expect(names).toEqual(['tei', 'embedded_metadata', 'filename', 'llm', 'text_scan']);
  });

  it('respects a disabled LLM', () => {
    const config = parsePipelineConfig({ llm: { enabled: false } });
    const names = buildExtractors(config, { llmClient: new ScriptedLlmClient(['{}']), logger: silentLogger }).map(
      (e) => e.name
    );
    expect(names).not.toContain('llm');
  });
});
