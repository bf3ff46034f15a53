import { z } from 'zod';
import { limit } from '../utils/limiter';
import { getJson, RegistryResponseError } from './http';
import type { RegistryClient, RegistryRecord } from './types';

const NamedSchema = z.object({ display_name: z.string().nullish() });

const OpenAlexWorkSchema = z.object({
  id: z.string().nullish(),
  doi: z.string().nullish(),
  display_name: z.string().nullish(),
  title: z.string().nullish(),
  publication_year: z.number().int().nullish(),
  authorships: z
    .array(
      z.object({
        author: NamedSchema.nullish(),
        institutions: z.array(z.object({ country_code: z.string().nullish() })).optional(),
      })
    )
    .optional(),
  primary_location: z.object({ source: NamedSchema.nullish() }).nullish(),
  host_venue: NamedSchema.nullish(),
  keywords: z.array(NamedSchema).optional(),
  concepts: z.array(NamedSchema.extend({ level: z.number().optional() })).optional(),
});

type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;

const SearchResponseSchema = z.object({ results: z.array(OpenAlexWorkSchema).default([]) });

function names(items: Array<{ display_name?: string | null }> | undefined): string[] {
  return (items ?? [])
    .map((item) => item.display_name)
    .filter((name): name is string => Boolean(name));
}

export function mapOpenAlexWork(work: OpenAlexWork): RegistryRecord {
  const authors = names((work.authorships ?? []).map((a) => a.author ?? {}));
  const countries = [
    ...new Set(
      (work.authorships ?? [])
        .flatMap((a) => a.institutions ?? [])
        .map((inst) => inst.country_code)
        .filter((code): code is string => Boolean(code))
    ),
  ];
  const keywords = work.keywords?.length
    ? names(work.keywords)
    : names((work.concepts ?? []).filter((c) => (c.level ?? 0) <= 1));
  return {
    externalId: work.id ?? undefined,
    title: work.display_name ?? work.title ?? undefined,
    authors: authors.length > 0 ? authors : undefined,
    venue: work.primary_location?.source?.display_name ?? work.host_venue?.display_name ?? undefined,
    year: work.publication_year ?? undefined,
    doi: work.doi ?? undefined,
    keywords: keywords.length > 0 ? keywords : undefined,
    countries: countries.length > 0 ? countries : undefined,
  };
}

export interface OpenAlexClientOptions {
  timeoutMs: number;
  mailto?: string;
  userAgent?: string;
  baseUrl?: string;
  perPage?: number;
}

export class OpenAlexClient implements RegistryClient {
  readonly name = 'openalex' as const;
  private baseUrl: string;

  constructor(private readonly options: OpenAlexClientOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.openalex.org';
  }

  private params(extra: Record<string, string>): string {
    const params = new URLSearchParams(extra);
    if (this.options.mailto) params.set('mailto', this.options.mailto);
    return params.toString();
  }

  async lookupByDoi(doi: string, signal?: AbortSignal): Promise<RegistryRecord | null> {
    return limit('openalex', async () => {
      const url = `${this.baseUrl}/works/doi:${encodeURIComponent(doi)}?${this.params({})}`;
      const json = await getJson('openalex', url, {
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return null;
      const parsed = OpenAlexWorkSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('openalex', parsed.error.message);
      }
      return mapOpenAlexWork(parsed.data);
    });
  }

  async searchByTitle(
    title: string,
    year: number | undefined,
    signal?: AbortSignal
  ): Promise<RegistryRecord[]> {
    return limit('openalex', async () => {
      const query: Record<string, string> = {
        search: title,
        'per-page': String(this.options.perPage ?? 3),
      };
      if (year !== undefined) {
        query.filter = `publication_year:${year - 1}-${year + 1}`;
      }
      const url = `${this.baseUrl}/works?${this.params(query)}`;
      const json = await getJson('openalex', url, {
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent,
        signal,
      });
      if (json === null) return [];
      const parsed = SearchResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryResponseError('openalex', parsed.error.message);
      }
      return parsed.data.results.map(mapOpenAlexWork);
    });
  }
}
