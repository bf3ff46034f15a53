import { z } from 'zod';

export class SchemaValidationError extends Error {
  constructor(
    public readonly agent: string,
    public readonly validationErrors: z.ZodError,
    public readonly attempts: number,
    /** Last parsed JSON payload, kept so callers can salvage partial output. */
    public readonly rawJson: unknown
  ) {
    super(
      `Agent ${agent} failed schema validation after ${attempts} attempts: ${validationErrors.message}`
    );
    this.name = 'SchemaValidationError';
  }
}

export class AgentExecutionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error
  ) {
    super(`Agent ${agent} execution failed: ${originalError.message}`);
    this.name = 'AgentExecutionError';
    this.cause = originalError;
  }
}
