import FormData from 'form-data';
import fetch from 'node-fetch';
import { limit } from '../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { withTimeout } from '../utils/timeout';

export class GrobidError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(`GROBID request failed: ${status} ${message}`);
    this.name = 'GrobidError';
  }
}

export interface GrobidClientOptions {
  url: string;
  timeoutMs: number;
  tries?: number;
  logger?: Logger;
}

/** Header-only TEI from a GROBID service. */
export class GrobidClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly options: GrobidClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.logger = options.logger ?? createLogger('GROBID');
  }

  async isAlive(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/isalive`, { timeout: 5_000 });
      return res.ok;
    } catch (error) {
      this.logger.warn(`Service at ${this.baseUrl} is not reachable: ${errorMessage(error)}`);
      return false;
    }
  }

  async processHeaderDocument(pdf: Buffer, fileName: string, signal?: AbortSignal): Promise<string> {
    const request = async (): Promise<string> => {
      const form = new FormData();
      form.append('input', pdf, { filename: fileName, contentType: 'application/pdf' });
      form.append('consolidateHeader', '0');
      const res = await fetch(`${this.baseUrl}/api/processHeaderDocument`, {
        method: 'POST',
        body: form,
        headers: { Accept: 'application/xml', ...form.getHeaders() },
        timeout: this.options.timeoutMs,
      });
      const body = await res.text();
      if (!res.ok) {
        throw new GrobidError(res.status, body.slice(0, 200));
      }
      return body;
    };

    return withRetry(
      () => limit('grobid', () => withTimeout(request(), this.options.timeoutMs, 'GROBID header', signal)),
      {
        tries: this.options.tries ?? 3,
        baseMs: 1_000,
        maxMs: 8_000,
        signal,
        onRetry: (error, attempt, delayMs) =>
          this.logger.warn(`Retrying ${fileName} in ${delayMs}ms (attempt ${attempt}): ${errorMessage(error)}`),
      }
    );
  }
}
