import { z } from 'zod';
import { limit } from '../utils/limiter';
import { getJson, RegistryResponseError } from './http';
import type { RegistryClient, RegistryRecord } from './types';

const FIELDS = 'paperId,title,year,venue,authors,externalIds';

const SSPaperSchema = z.object({
  paperId: z.string().nullish(),
  title: z.string().nullish(),
  year: z.number().int().nullish(),
  venue: z.string().nullish(),
  authors: z.array(z.object({ name: z.string().nullish() })).optional(),
  externalIds: z.record(z.string(), z.union([z.string(), z.number()])).nullish(),
});

export type SSPaper = z.infer<typeof SSPaperSchema>;

const SearchResponseSchema = z.object({ data: z.array(SSPaperSchema).default([]) });

export function mapSemanticScholarPaper(paper: SSPaper): RegistryRecord {
  const authors = (paper.authors ?? [])
    .map((a) => a.name)
    .filter((name): name is string => Boolean(name));
  const doi = paper.externalIds?.DOI;
  return {
    externalId: paper.paperId ? `s2:${paper.paperId}` : undefined,
    title: paper.title ?? undefined,
    authors: authors.length > 0 ? authors : undefined,
    venue: paper.venue || undefined,
    year: paper.year ?? undefined,
    doi: typeof doi === 'string' ? doi : undefined,
  };
}

export interface SemanticScholarClientOptions {
  timeoutMs: number;
  apiKey?: string;
  userAgent?: string;
  baseUrl?: string;
  limit?: number;
}

export class SemanticScholarClient implements RegistryClient {
  readonly name = 'semantic_scholar' as const;
  private baseUrl: string;

  constructor(private readonly options: SemanticScholarClientOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.semanticscholar.org/graph/v1';
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = {};
    if (this.options.apiKey) h['x-api-key'] = this.options.apiKey;
    return h;
  }

  async lookupByDoi(doi: string, signal?: AbortSignal): Promise<RegistryRecord | null> {
    return limit('semantic_scholar', async () => {
      const url =
        `${this.baseUrl}/paper/DOI:${encodeURIComponent(doi)}?` +
        new URLSearchParams({ fields: FIELDS }).toString();
      const json = await getJson('semantic_scholar', url, {
        timeoutMs: this.options.timeoutMs,
        headers: this.headers(),
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return null;
      const parsed = SSPaperSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('semantic_scholar', parsed.error.message);
      }
      return mapSemanticScholarPaper(parsed.data);
    });
  }

  async searchByTitle(
    title: string,
    year: number | undefined,
    signal?: AbortSignal
  ): Promise<RegistryRecord[]> {
    return limit('semantic_scholar', async () => {
      const query: Record<string, string> = {
        query: title,
        limit: String(this.options.limit ?? 3),
        fields: FIELDS,
      };
      if (year !== undefined) {
        query.year = `${year - 1}-${year + 1}`;
      }
      const url = `${this.baseUrl}/paper/search?` + new URLSearchParams(query).toString();
      const json = await getJson('semantic_scholar', url, {
        timeoutMs: this.options.timeoutMs,
        headers: this.headers(),
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return [];
      const parsed = SearchResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('semantic_scholar', parsed.error.message);
      }
      return parsed.data.data.map(mapSemanticScholarPaper);
    });
  }
}
