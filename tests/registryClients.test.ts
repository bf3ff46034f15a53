import { describe, it, expect, jest, beforeAll, beforeEach } from '@jest/globals';
import fetch, { Response } from 'node-fetch';
import { CrossrefClient } from '../src/enrich/crossrefClient';
import { parseRetryAfter, RegistryHttpError, RegistryResponseError } from '../src/enrich/http';
import { OpenAlexClient } from '../src/enrich/openAlexClient';
import { SemanticScholarClient } from '../src/enrich/semanticScholarClient';
import { configureLane } from '../src/utils/limiter';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(fetch);

function respond(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): void {
  mockedFetch.mockResolvedValueOnce(new Response(JSON.stringify(body), { status: init.status ?? 200, headers: init.headers }));
}

function requestedUrl(call = 0): unknown {
  return mockedFetch.mock.calls[call]?.[0];
}

beforeAll(() => {
  configureLane('crossref', { minIntervalMs: 0 });
  configureLane('openalex', { minIntervalMs: 0 });
  configureLane('semantic_scholar', { minIntervalMs: 0 });
});

beforeEach(() => {
  mockedFetch.mockReset();
});

describe('parseRetryAfter', () => {
  it('reads seconds and HTTP dates', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:05 GMT', Date.parse('Wed, 21 Oct 2015 07:28:00 GMT'))).toBe(5000);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('CrossrefClient', () => {
  const crossref = new CrossrefClient({ timeoutMs: 1_000, mailto: 'test@example.org', userAgent: 'test-agent' });

  it('looks up a DOI', async () => {
    respond({
      message: {
        DOI: '10.5555/gm.1',
        title: ['Graph Methods'],
        author: [{ family: 'Smith', given: 'Jane' }, { name: 'Consortium X' }],
        issued: { 'date-parts': [[2019, 4]] },
        'container-title': ['Journal of Tests'],
        subject: ['Graphs'],
      },
    });

    await expect(crossref.lookupByDoi('10.5555/gm.1')).resolves.toEqual({
      externalId: 'crossref:10.5555/gm.1',
      title: 'Graph Methods',
      authors: ['Smith, Jane', 'Consortium X'],
      venue: 'Journal of Tests',
      year: 2019,
      doi: '10.5555/gm.1',
      keywords: ['Graphs'],
    });
    expect(requestedUrl()).toBe('https://api.crossref.org/works/10.5555%2Fgm.1?mailto=test%40example.org');
    expect(mockedFetch.mock.calls[0]?.[1]).toMatchObject({
      headers: { Accept: 'application/json', 'User-Agent': 'test-agent' },
    });
  });

  it('searches by title within a year window', async () => {
    respond({ message: { items: [{ title: ['Graph Methods'], issued: { 'date-parts': [[2019]] } }] } });

    const records = await crossref.searchByTitle('Graph Methods', 2019);
    expect(records.map((r) => [r.title, r.year])).toEqual([['Graph Methods', 2019]]);
    expect(requestedUrl()).toBe(
      'https://api.crossref.org/works?query.bibliographic=Graph+Methods&rows=3&filter=from-pub-date%3A2018%2Cuntil-pub-date%3A2020&mailto=test%40example.org'
    );
  });

  it('returns null for unknown DOIs', async () => {
    respond({ status: 'not found' }, { status: 404 });
    await expect(crossref.lookupByDoi('10.5555/missing')).resolves.toBeNull();
  });

  it('surfaces rate limiting with its Retry-After', async () => {
    respond({}, { status: 429, headers: { 'Retry-After': '3' } });
    const error = await crossref.lookupByDoi('10.5555/gm.1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryHttpError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 3000 });
  });

  it('rejects payloads of the wrong shape', async () => {
    respond({ message: { title: 'not a list' } });
    await expect(crossref.lookupByDoi('10.5555/gm.1')).rejects.toBeInstanceOf(RegistryResponseError);
  });
});

describe('OpenAlexClient', () => {
  const openalex = new OpenAlexClient({ timeoutMs: 1_000 });

  it('maps venues, keywords and institution countries', async () => {
    respond({
      id: 'https://openalex.org/W1',
      doi: 'https://doi.org/10.5555/gm.1',
      display_name: 'Graph Methods',
      publication_year: 2019,
      authorships: [
        { author: { display_name: 'Jane Smith' }, institutions: [{ country_code: 'GB' }] },
        { author: { display_name: 'Bo Chen' }, institutions: [{ country_code: 'CA' }, { country_code: 'GB' }] },
      ],
      primary_location: { source: { display_name: 'Journal of Tests' } },
      concepts: [
        { display_name: 'Computer science', level: 0 },
        { display_name: 'Graph theory', level: 1 },
        { display_name: 'Spectral clustering', level: 3 },
      ],
    });

    await expect(openalex.lookupByDoi('10.5555/gm.1')).resolves.toEqual({
      externalId: 'https://openalex.org/W1',
      title: 'Graph Methods',
      authors: ['Jane Smith', 'Bo Chen'],
      venue: 'Journal of Tests',
      year: 2019,
      doi: 'https://doi.org/10.5555/gm.1',
      keywords: ['Computer science', 'Graph theory'],
      countries: ['GB', 'CA'],
    });
    expect(requestedUrl()).toBe('https://api.openalex.org/works/doi:10.5555%2Fgm.1?');
  });

  it('filters title searches by publication year', async () => {
    respond({ results: [] });
    await expect(openalex.searchByTitle('Graph Methods', 2019)).resolves.toEqual([]);
    expect(requestedUrl()).toBe('https://api.openalex.org/works?search=Graph+Methods&per-page=3&filter=publication_year%3A2018-2020');
  });
});

describe('SemanticScholarClient', () => {
  const s2 = new SemanticScholarClient({ timeoutMs: 1_000, apiKey: 'test-secret' });

  it('sends the API key and maps external IDs', async () => {
    respond({
      paperId: 'abc123',
      title: 'Graph Methods',
      year: 2019,
      venue: '',
      authors: [{ name: 'Jane Smith' }],
      externalIds: { DOI: '10.5555/gm.1', CorpusId: 42 },
    });

    await expect(s2.lookupByDoi('10.5555/gm.1')).resolves.toEqual({
      externalId: 's2:abc123',
      title: 'Graph Methods',
      authors: ['Jane Smith'],
      venue: undefined,
      year: 2019,
      doi: '10.5555/gm.1',
    });
    expect(mockedFetch.mock.calls[0]?.[1]).toMatchObject({ headers: { 'x-api-key': 'test-secret' } });
  });
});
