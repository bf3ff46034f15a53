import type { PipelineConfig } from '../config/pipelineConfig';
import type { RegistryName } from '../pipeline/types';
import { configureLane } from '../utils/limiter';
import type { Logger } from '../utils/logger';
import { CrossrefClient } from './crossrefClient';
import { EnrichmentClient } from './enrichmentClient';
import { OpenAlexClient } from './openAlexClient';
import { SemanticScholarClient } from './semanticScholarClient';
import type { RegistryClient } from './types';

export function createRegistryClient(name: RegistryName, config: PipelineConfig['enrichment']): RegistryClient {
  const { requestTimeoutMs: timeoutMs, userAgent, credentials } = config;
  switch (name) {
    case 'crossref':
      return new CrossrefClient({ timeoutMs, userAgent, mailto: credentials.crossrefMailto });
    case 'openalex':
      return new OpenAlexClient({ timeoutMs, userAgent, mailto: credentials.openAlexMailto });
    case 'semantic_scholar':
      return new SemanticScholarClient({ timeoutMs, userAgent, apiKey: credentials.semanticScholarApiKey });
  }
}

/**
 * Registry clients in configured order behind one retrying client. Rate
 * limits are applied to the process-wide lanes, so every caller shares them.
 */
export function createEnrichmentClient(config: PipelineConfig, logger?: Logger): EnrichmentClient {
  const enrichment = config.enrichment;
  for (const name of enrichment.registries) {
    configureLane(name, enrichment.rateLimits[name]);
  }
  return new EnrichmentClient({
    registries: enrichment.registries.map((name) => createRegistryClient(name, enrichment)),
    minMatchConfidence: enrichment.minMatchConfidence,
    maxAttempts: enrichment.maxAttempts,
    backoffBaseMs: enrichment.backoffBaseMs,
    backoffMaxMs: enrichment.backoffMaxMs,
    logger,
  });
}

export { EnrichmentClient } from './enrichmentClient';
export type { Enricher, EnrichmentOutcome, RegistryClient, RegistryRecord } from './types';
