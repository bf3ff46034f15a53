import { describe, it, expect } from '@jest/globals';
import { EnrichmentClient, type EnrichmentClientOptions } from '../src/enrich/enrichmentClient';
import { RegistryHttpError } from '../src/enrich/http';
import { scoreMatch, yearFactor } from '../src/enrich/matchScore';
import { EnrichmentUnavailable, RunCancelledError, TimeoutError } from '../src/pipeline/errors';
import { silentLogger } from '../src/utils/logger';
import { FakeRegistry } from './fixtures/registries';

const work = {
  externalId: 'crossref:10.5555/gm.1',
  title: 'Graph Methods',
  doi: '10.5555/gm.1',
  year: 2019,
  authors: ['Smith, Jane'],
};

function client(registries: FakeRegistry[], overrides: Partial<EnrichmentClientOptions> = {}) {
  const sleeps: number[] = [];
  const enricher = new EnrichmentClient({
    registries,
    minMatchConfidence: 0.85,
    maxAttempts: 3,
    backoffBaseMs: 500,
    backoffMaxMs: 8_000,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
    logger: silentLogger,
    ...overrides,
  });
  return { enricher, sleeps };
}

describe('scoreMatch', () => {
  it('trusts DOI hits and discounts year drift on title searches', () => {
    expect(scoreMatch('doi', { title: 'Graph Methods' }, { title: 'graph methods' })).toBe(1);
    expect(scoreMatch('doi', { doi: '10.1/x' }, { title: 'Anything' })).toBe(0.9);
    expect(scoreMatch('title', { title: 'Graph Methods', year: 2019 }, { title: 'Graph Methods', year: 2020 })).toBe(0.95);
    expect(yearFactor(2019, 2015)).toBe(0.8);
    expect(yearFactor(undefined, 2015)).toBe(1);
  });
});

describe('EnrichmentClient', () => {
  it('matches on the primary registry by DOI', async () => {
    const crossref = new FakeRegistry('crossref', [work]);
    const { enricher } = client([crossref]);
    const outcome = await enricher.enrich({ title: 'Graph Methods', doi: 'https://doi.org/10.5555/GM.1' });

    expect(outcome.kind).toBe('matched');
    expect(outcome.transitions).toEqual(['try_primary', 'done']);
    if (outcome.kind !== 'matched') return;
    expect(outcome.result).toEqual({
      matched: true,
      registry: 'crossref',
      lookup: 'doi',
      matchConfidence: 1,
      fields: { title: 'Graph Methods', doi: '10.5555/gm.1', year: 2019, authors: 'Smith, Jane' },
      externalId: 'crossref:10.5555/gm.1',
    });
  });

  it('backs off, gives up on a timing-out registry and falls back', async () => {
    const crossref = new FakeRegistry('crossref', new TimeoutError('crossref request', 10_000));
    const openalex = new FakeRegistry('openalex', [{ ...work, externalId: 'https://openalex.org/W1' }]);
    const { enricher, sleeps } = client([crossref, openalex]);
    const outcome = await enricher.enrich({ title: 'Graph Methods', doi: '10.5555/gm.1' });

    expect(outcome.transitions).toEqual([
      'try_primary',
      'backoff',
      'try_primary',
      'backoff',
      'try_primary',
      'try_fallback',
      'done',
    ]);
    expect(sleeps).toEqual([500, 1000]);
    expect(crossref.calls).toBe(3);
    expect(outcome.attempts.map((a) => [a.registry, a.attempts, a.outcome])).toEqual([
      ['crossref', 3, 'unavailable'],
      ['openalex', 1, 'matched'],
    ]);
    expect(outcome.attempts[0]?.error).toBeInstanceOf(EnrichmentUnavailable);
    expect(outcome.kind === 'matched' && outcome.result.registry).toBe('openalex');
  });

  it('reports unavailable when every registry fails', async () => {
    const timeout = new TimeoutError('request', 10);
    const { enricher, sleeps } = client(
      [new FakeRegistry('crossref', timeout), new FakeRegistry('openalex', timeout)],
      { maxAttempts: 2 }
    );
    const outcome = await enricher.enrich({ title: 'Graph Methods' });

    expect(outcome.kind).toBe('unavailable');
    expect(outcome.transitions).toEqual([
      'try_primary',
      'backoff',
      'try_primary',
      'try_fallback',
      'backoff',
      'try_fallback',
      'exhausted',
    ]);
    expect(sleeps).toEqual([500, 500]);
  });

  it('does not retry permanent errors', async () => {
    const crossref = new FakeRegistry('crossref', new RegistryHttpError('crossref', 400, 'https://example.test'));
    const { enricher, sleeps } = client([crossref]);
    const outcome = await enricher.enrich({ title: 'Graph Methods' });

    expect(outcome.kind).toBe('unavailable');
    expect(crossref.calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('waits as long as Retry-After asks, up to the cap', async () => {
    let calls = 0;
    const crossref = new FakeRegistry('crossref', () =>
      ++calls === 1 ? new RegistryHttpError('crossref', 429, 'https://example.test', 2_000) : [work]
    );
    const { enricher, sleeps } = client([crossref]);
    const outcome = await enricher.enrich({ doi: '10.5555/gm.1' });

    expect(sleeps).toEqual([2_000]);
    expect(outcome.kind).toBe('matched');
  });

  it('treats weak title matches as not found', async () => {
    const crossref = new FakeRegistry('crossref', [{ title: 'Completely Unrelated Work', year: 2019 }]);
    const { enricher } = client([crossref]);
    const outcome = await enricher.enrich({ title: 'Graph Methods', year: 2019 });

    expect(outcome.kind).toBe('not_found');
    expect(outcome.attempts[0]?.outcome).toBe('below_threshold');
    expect(outcome.transitions).toEqual(['try_primary', 'exhausted']);
  });

  it('skips documents with nothing to look up', async () => {
    const crossref = new FakeRegistry('crossref', [work]);
    const { enricher } = client([crossref]);
    await expect(enricher.enrich({ year: 2019, doi: 'unknown' })).resolves.toEqual({
      kind: 'skipped',
      attempts: [],
      transitions: [],
    });
    expect(crossref.calls).toBe(0);
  });

  it('stops on cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const { enricher } = client([new FakeRegistry('crossref', [work])]);
    await expect(enricher.enrich({ title: 'Graph Methods' }, controller.signal)).rejects.toBeInstanceOf(
      RunCancelledError
    );
  });
});
