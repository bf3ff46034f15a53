import * as fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../pipeline/errors';
import { EXTRACTOR_NAMES, REGISTRY_NAMES } from '../pipeline/types';

const CalibrationSchema = z
  .object({
    /** Range of the extractor's raw confidence values. */
    scale: z.tuple([z.number(), z.number()]),
    /** Canonical band the raw range is mapped onto. */
    band: z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)]),
  })
  .refine((c) => c.scale[1] > c.scale[0], { message: 'scale max must exceed scale min' })
  .refine((c) => c.band[1] >= c.band[0], { message: 'band max must not be below band min' });

export type Calibration = z.infer<typeof CalibrationSchema>;

const LaneSchema = z.object({
  concurrency: z.number().int().min(1),
  minIntervalMs: z.number().min(0),
});

const unique = <T>(values: T[]) => new Set(values).size === values.length;

export const PipelineConfigSchema = z.object({
  extractorOrder: z
    .array(z.enum(EXTRACTOR_NAMES))
    .min(1)
    .refine(unique, { message: 'extractors must be listed once' })
    .default([...EXTRACTOR_NAMES]),
  extractorTimeoutMs: z.number().int().positive().default(30_000),
  concurrency: z.number().int().min(1).max(64).default(4),
  calibration: z
    .object({
      tei: CalibrationSchema.default({ scale: [0, 1], band: [0.5, 0.95] }),
      embedded_metadata: CalibrationSchema.default({ scale: [0, 1], band: [0.2, 0.6] }),
      filename: CalibrationSchema.default({ scale: [0, 100], band: [0.25, 0.6] }),
      llm: CalibrationSchema.default({ scale: [0, 1], band: [0.1, 0.7] }),
      text_scan: CalibrationSchema.default({ scale: [0, 1], band: [0.4, 0.9] }),
    })
    .default({}),
  reconciliation: z
    .object({
      /** Minimum normalized similarity for two titles or venues to agree. */
      fuzzyThreshold: z.number().min(0).max(1).default(0.9),
      maxConfidence: z.number().min(0).max(1).default(0.99),
    })
    .default({}),
  enrichment: z
    .object({
      enabled: z.boolean().default(true),
      registries: z
        .array(z.enum(REGISTRY_NAMES))
        .refine(unique, { message: 'registries must be listed once' })
        .default([...REGISTRY_NAMES]),
      minMatchConfidence: z.number().min(0).max(1).default(0.85),
      requestTimeoutMs: z.number().int().positive().default(10_000),
      maxAttempts: z.number().int().min(1).max(10).default(3),
      backoffBaseMs: z.number().int().min(0).default(500),
      backoffMaxMs: z.number().int().min(0).default(8_000),
      rateLimits: z
        .object({
          crossref: LaneSchema.default({ concurrency: 2, minIntervalMs: 100 }),
          openalex: LaneSchema.default({ concurrency: 2, minIntervalMs: 100 }),
          semantic_scholar: LaneSchema.default({ concurrency: 1, minIntervalMs: 1_000 }),
        })
        .default({}),
      credentials: z
        .object({
          crossrefMailto: z.string().email().optional(),
          openAlexMailto: z.string().email().optional(),
          semanticScholarApiKey: z.string().min(1).optional(),
        })
        .default({}),
      userAgent: z.string().min(1).default('paper-metadata-reconciler/0.1'),
    })
    .refine((e) => e.backoffMaxMs >= e.backoffBaseMs, {
      message: 'backoffMaxMs must be at least backoffBaseMs',
    })
    .default({}),
  llm: z
    .object({
      enabled: z.boolean().default(true),
      model: z.string().min(1).default('gemini-2.5-flash'),
      apiKey: z.string().min(1).optional(),
      firstPageChars: z.number().int().positive().default(3_500),
      maxRetries: z.number().int().min(0).default(2),
      timeoutMs: z.number().int().positive().default(60_000),
      maxTokens: z.number().int().positive().default(2_048),
      cacheDir: z.string().optional(),
      disableCache: z.boolean().default(false),
    })
    .default({}),
  grobid: z
    .object({
      url: z.string().url().optional(),
      timeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.') || '(root)';
    return `- ${path}: ${issue.message}`;
  });
}

export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid pipeline configuration:\n${issues.join('\n')}`, issues);
  }
  return result.data;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, overlay: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function setPath(target: PlainObject, path: string[], value: unknown): PlainObject {
  const [head, ...rest] = path;
  if (head === undefined) return target;
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setPath(isPlainObject(child) ? child : {}, rest, value) };
}

const ENV_BINDINGS: Array<{ name: string; path: string[]; parse?: (raw: string) => unknown }> = [
  { name: 'PIPELINE_CONCURRENCY', path: ['concurrency'], parse: Number },
  { name: 'ENRICHMENT_ENABLED', path: ['enrichment', 'enabled'], parse: (raw) => raw !== 'false' },
  { name: 'CROSSREF_MAILTO', path: ['enrichment', 'credentials', 'crossrefMailto'] },
  { name: 'OPENALEX_MAILTO', path: ['enrichment', 'credentials', 'openAlexMailto'] },
  { name: 'SS_API_KEY', path: ['enrichment', 'credentials', 'semanticScholarApiKey'] },
  { name: 'METADATA_LLM_MODEL', path: ['llm', 'model'] },
  { name: 'GOOGLE_API_KEY', path: ['llm', 'apiKey'] },
  { name: 'GROBID_URL', path: ['grobid', 'url'] },
];

export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  let layer: PlainObject = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined || raw === '') continue;
    layer = setPath(layer, binding.path, binding.parse ? binding.parse(raw) : raw);
  }
  return layer;
}

function readConfigFile(file: string): PlainObject {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PipelineConfigInput;
}

/**
 * Layers defaults < file < environment < overrides, then validates once.
 * Throws ConfigurationError before any document is touched.
 */
export function loadPipelineConfig(options: LoadConfigOptions = {}): PipelineConfig {
  let layered: PlainObject = {};
  if (options.file) {
    layered = deepMerge(layered, readConfigFile(options.file));
  }
  layered = deepMerge(layered, configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    layered = deepMerge(layered, { ...options.overrides });
  }
  return parsePipelineConfig(layered);
}
