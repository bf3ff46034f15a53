import { z } from 'zod';

const textOrList = z.union([z.string(), z.array(z.string())]).nullish();

export const MetadataExtractionSchema = z.object({
  title: z.string().nullish(),
  author: textOrList,
  year: z.union([z.number().int(), z.string()]).nullish(),
  doi: z.string().nullish(),
  author_keywords: textOrList,
  country: textOrList,
  source_journal: z.string().nullish(),
  study_type: z.string().nullish(),
  confidence: z.number().min(0).max(1).optional(),
});

export type MetadataExtractionOutput = z.infer<typeof MetadataExtractionSchema>;

export const METADATA_FIELDS = [
  'title',
  'author',
  'year',
  'doi',
  'author_keywords',
  'country',
  'source_journal',
  'study_type',
] as const;

export type MetadataExtractionField = (typeof METADATA_FIELDS)[number];
