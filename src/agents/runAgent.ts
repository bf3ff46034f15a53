import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AGENT_CONFIG, type AgentConfig } from './config';
import { AgentExecutionError, SchemaValidationError } from './errors';
import { extractFirstJson, looksLikeCompleteJson } from './jsonResponse';
import type { LlmClient } from './llmClient';
import { RunCancelledError, TimeoutError } from '../pipeline/errors';
import { buildCacheEntry, buildCacheKey, readCache, writeCache } from '../utils/cache';
import { limit } from '../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

const defaultLogger = createLogger('Agent');

function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path}: ${issue.message}`;
  });
  return `Schema validation errors:\n${issues.join('\n')}`;
}

export interface AgentCacheOptions {
  input: unknown;
  promptVersion: string;
  schemaVersion: string;
  root?: string;
  disableCache?: boolean;
}

export interface RunAgentOptions {
  client: LlmClient;
  config?: AgentConfig;
  logger?: Logger;
  cache?: AgentCacheOptions;
  signal?: AbortSignal;
}

/**
 * Sends one prompt to the model and validates the JSON answer against
 * `schema`, feeding validation errors back on retry. Timeouts and
 * cancellation are not retried.
 */
export async function runAgent<T>(
  agentName: string,
  systemPrompt: string,
  userMessage: string,
  schema: z.ZodType<T>,
  options: RunAgentOptions
): Promise<T> {
  const { client, signal } = options;
  const config = options.config ?? AGENT_CONFIG;
  const logger = options.logger ?? defaultLogger;
  const cacheOptions = options.cache;
  const maxAttempts = config.maxRetries + 1;

  const cacheKey =
    cacheOptions && !cacheOptions.disableCache
      ? buildCacheKey({
          agentName,
          model: client.model,
          provider: client.provider,
          promptVersion: cacheOptions.promptVersion,
          schemaVersion: cacheOptions.schemaVersion,
          input: cacheOptions.input,
        })
      : null;

  if (cacheKey) {
    const hit = await readCache(cacheKey.key, schema, cacheOptions?.root);
    if (hit) {
      logger.info(`[${agentName}] Cache hit`);
      return hit.value;
    }
  }

  // zod-to-json-schema's types recurse without bound on the generic ZodType<T>
  const jsonSchema = JSON.stringify(zodToJsonSchema(schema as any, { target: 'openApi3' }));
  let lastError: z.ZodError | null = null;
  let lastParseFailed = false;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const startedAt = Date.now();
    try {
      logger.info(
        `[${agentName}] Attempt ${attempt}/${maxAttempts} (model: ${client.model}, maxOutputTokens: ${config.maxTokens}, timeoutMs: ${config.timeoutMs})`
      );

      let enhancedUserMessage = userMessage;
      if (lastParseFailed) {
        enhancedUserMessage = `${userMessage}\n\nPrevious response could not be parsed. Return one valid JSON object only.`;
      } else if (lastError) {
        enhancedUserMessage = `${userMessage}\n\nPrevious validation errors:\n${formatValidationErrors(lastError)}\n\nPlease fix these errors and return valid JSON.`;
      }

      const fullPrompt = `${systemPrompt}\n\nRespond with JSON matching this schema:\n${jsonSchema}\n\nUser input:\n${enhancedUserMessage}`;

      const response = await limit('gemini_llm', () =>
        withTimeout(
          client.generate({ prompt: fullPrompt, maxOutputTokens: config.maxTokens }, signal),
          config.timeoutMs,
          `Agent ${agentName}`,
          signal
        )
      );

      const responseText = response.text;
      if (!responseText) {
        throw new Error('No text content in API response');
      }
      logger.info(`[${agentName}] Response length: ${responseText.length} chars`);
      if (!looksLikeCompleteJson(responseText)) {
        logger.warn(`[${agentName}] Response appears truncated - does not end with } or ]`);
      }

      const jsonData = extractFirstJson(responseText);
      if (jsonData === undefined) {
        lastParseFailed = true;
        if (attempt === maxAttempts) {
          logger.warn(`[${agentName}] Raw response:`, {
            preview: responseText.length > 2000 ? `${responseText.substring(0, 2000)}...` : responseText,
          });
          throw new Error('Failed to parse JSON from response');
        }
        logger.warn(`[${agentName}] JSON parse error on attempt ${attempt} (will retry)`);
        continue;
      }
      lastParseFailed = false;

      const validationResult = schema.safeParse(jsonData);
      if (validationResult.success) {
        logger.info(`[${agentName}] Success on attempt ${attempt}`);
        if (cacheKey) {
          const entry = buildCacheEntry(
            {
              agentName,
              promptVersion: cacheOptions?.promptVersion ?? 'unversioned',
              schemaVersion: cacheOptions?.schemaVersion ?? 'unversioned',
              provider: client.provider,
              model: client.model,
              inputHash: cacheKey.inputHash,
              durationMs: Date.now() - startedAt,
              finishReason: response.finishReason,
            },
            validationResult.data
          );
          await writeCache(cacheKey.key, entry, cacheOptions?.root);
          logger.info(`[${agentName}] Cached result`);
        }
        return validationResult.data;
      }

      lastError = validationResult.error;
      logger.warn(`[${agentName}] Schema validation failed`, {
        attempt,
        errors: validationResult.error.issues,
      });
      if (attempt === maxAttempts) {
        throw new SchemaValidationError(agentName, validationResult.error, attempt, jsonData);
      }
    } catch (error) {
      if (
        error instanceof SchemaValidationError ||
        error instanceof TimeoutError ||
        error instanceof RunCancelledError
      ) {
        throw error;
      }
      if (attempt === maxAttempts) {
        throw new AgentExecutionError(
          agentName,
          error instanceof Error ? error : new Error(String(error))
        );
      }
      logger.warn(`[${agentName}] Error on attempt ${attempt}`, { error: errorMessage(error) });
    }
  }

  throw new Error(`Unexpected state in runAgent for ${agentName}`);
}
