export type PipelineErrorCode =
  | 'EXTRACTOR_FAILURE'
  | 'ENRICHMENT_UNAVAILABLE'
  | 'UNRESOLVED_DOCUMENT'
  | 'DUPLICATE_DETECTED'
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT'
  | 'RUN_CANCELLED'
  | 'SINK_ERROR';

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ExtractorFailure extends PipelineError {
  constructor(
    public readonly extractor: string,
    public readonly documentPath: string,
    cause: unknown
  ) {
    super(
      'EXTRACTOR_FAILURE',
      `Extractor ${extractor} failed on ${documentPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
    this.name = 'ExtractorFailure';
  }
}

export class EnrichmentUnavailable extends PipelineError {
  constructor(
    public readonly registry: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      'ENRICHMENT_UNAVAILABLE',
      `Registry ${registry} unavailable after ${attempts} attempt(s)${
        cause instanceof Error ? `: ${cause.message}` : ''
      }`,
      cause
    );
    this.name = 'EnrichmentUnavailable';
  }
}

export class UnresolvedDocument extends PipelineError {
  constructor(
    public readonly documentPath: string,
    public readonly reason: string
  ) {
    super('UNRESOLVED_DOCUMENT', `Document ${documentPath} is unresolved: ${reason}`);
    this.name = 'UnresolvedDocument';
  }
}

export class DuplicateDetected extends PipelineError {
  constructor(
    public readonly documentPath: string,
    public readonly duplicateOf: string
  ) {
    super('DUPLICATE_DETECTED', `Document ${documentPath} duplicates ${duplicateOf}`);
    this.name = 'DuplicateDetected';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class RunCancelledError extends PipelineError {
  constructor(reason = 'Run cancelled') {
    super('RUN_CANCELLED', reason);
    this.name = 'RunCancelledError';
  }
}

export class SinkError extends PipelineError {
  constructor(operation: string, cause: unknown) {
    super(
      'SINK_ERROR',
      `Output sink failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
    this.name = 'SinkError';
  }
}
