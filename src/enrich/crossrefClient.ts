import { z } from 'zod';
import { limit } from '../utils/limiter';
import { getJson, RegistryResponseError } from './http';
import type { RegistryClient, RegistryRecord } from './types';

const DateSchema = z
  .object({ 'date-parts': z.array(z.array(z.number().nullable())).optional() })
  .nullish();

const CrossrefWorkSchema = z.object({
  DOI: z.string().optional(),
  title: z.array(z.string()).optional(),
  author: z
    .array(
      z.object({
        family: z.string().optional(),
        given: z.string().optional(),
        name: z.string().optional(),
      })
    )
    .optional(),
  issued: DateSchema,
  'published-print': DateSchema,
  'published-online': DateSchema,
  'container-title': z.array(z.string()).optional(),
  subject: z.array(z.string()).optional(),
  type: z.string().optional(),
});

type CrossrefWork = z.infer<typeof CrossrefWorkSchema>;

const WorkResponseSchema = z.object({ message: CrossrefWorkSchema });
const SearchResponseSchema = z.object({
  message: z.object({ items: z.array(CrossrefWorkSchema).default([]) }),
});

function yearOf(work: CrossrefWork): number | undefined {
  for (const date of [work.issued, work['published-print'], work['published-online']]) {
    const year = date?.['date-parts']?.[0]?.[0];
    if (typeof year === 'number') return year;
  }
  return undefined;
}

export function mapCrossrefWork(work: CrossrefWork): RegistryRecord {
  const authors = (work.author ?? [])
    .map((a) => (a.family ? [a.family, a.given].filter(Boolean).join(', ') : a.name))
    .filter((name): name is string => Boolean(name));
  return {
    externalId: work.DOI ? `crossref:${work.DOI}` : undefined,
    title: work.title?.[0],
    authors: authors.length > 0 ? authors : undefined,
    venue: work['container-title']?.[0],
    year: yearOf(work),
    doi: work.DOI,
    keywords: work.subject,
  };
}

export interface CrossrefClientOptions {
  timeoutMs: number;
  mailto?: string;
  userAgent?: string;
  baseUrl?: string;
  rows?: number;
}

export class CrossrefClient implements RegistryClient {
  readonly name = 'crossref' as const;
  private baseUrl: string;

  constructor(private readonly options: CrossrefClientOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.crossref.org';
  }

  private params(extra: Record<string, string>): string {
    const params = new URLSearchParams(extra);
    if (this.options.mailto) params.set('mailto', this.options.mailto);
    return params.toString();
  }

  async lookupByDoi(doi: string, signal?: AbortSignal): Promise<RegistryRecord | null> {
    return limit('crossref', async () => {
      const url = `${this.baseUrl}/works/${encodeURIComponent(doi)}?${this.params({})}`;
      const json = await getJson('crossref', url, {
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return null;
      const parsed = WorkResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('crossref', parsed.error.message);
      }
      return mapCrossrefWork(parsed.data.message);
    });
  }

  async searchByTitle(
    title: string,
    year: number | undefined,
    signal?: AbortSignal
  ): Promise<RegistryRecord[]> {
    return limit('crossref', async () => {
      const query: Record<string, string> = {
        'query.bibliographic': title,
        rows: String(this.options.rows ?? 3),
      };
      if (year !== undefined) {
        query.filter = `from-pub-date:${year - 1},until-pub-date:${year + 1}`;
      }
      const url = `${this.baseUrl}/works?${this.params(query)}`;
      const json = await getJson('crossref', url, {
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return [];
      const parsed = SearchResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('crossref', parsed.error.message);
      }
      return parsed.data.message.items.map(mapCrossrefWork);
    });
  }
}
