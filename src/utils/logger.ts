export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  return {
    error: (msg, ctx) => console.error(`[${scope}] ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`[${scope}] ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`[${scope}] ${msg}`, ctx || ''),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
