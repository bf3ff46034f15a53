import * as fs from 'fs/promises';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import type { PaperDocument } from '../pipeline/types';
import { sha256 } from '../utils/cache';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

export interface PdfDocumentSourceOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ParsedPdf {
  pageCount: number;
  pages: string[];
  info: Record<string, string>;
}

/**
 * pdf-parse renders pages in order and prefixes each with a blank line.
 * When the split does not line up with the page count the whole text is
 * kept as page 1.
 */
export function splitPages(text: string, pageCount: number): string[] {
  const whole = text.trim();
  if (!whole) return [];
  const parts = text.split('\n\n');
  if (parts[0] === '') parts.shift();
  if (pageCount > 0 && parts.length === pageCount) {
    return parts;
  }
  return [whole];
}

function stringInfo(info: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof info !== 'object' || info === null) return result;
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === 'string' && value.trim()) result[key] = value.trim();
  }
  return result;
}

export async function parsePdf(buffer: Buffer): Promise<ParsedPdf> {
  const data = await pdfParse(buffer);
  const info: unknown = data.info;
  return {
    pageCount: data.numpages,
    pages: splitPages(data.text, data.numpages),
    info: stringInfo(info),
  };
}

export async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Yields one document per PDF in `dir`, in file-name order. A file that
 * cannot be parsed is still yielded with no pages, so the filename
 * extractor can have its say.
 */
export async function* readPdfDocuments(
  dir: string,
  options: PdfDocumentSourceOptions = {}
): AsyncGenerator<PaperDocument> {
  const logger = options.logger ?? createLogger('Ingest');
  const files = await listPdfFiles(dir);
  logger.info(`Found ${files.length} PDF files in ${dir}`);

  for (const filePath of files) {
    if (options.signal?.aborted) return;
    const buffer = await fs.readFile(filePath);
    const fileName = path.basename(filePath);

    let parsed: ParsedPdf = { pageCount: 0, pages: [], info: {} };
    try {
      parsed = await parsePdf(buffer);
    } catch (error) {
      logger.warn(`Could not parse ${fileName}: ${errorMessage(error)}`);
    }

    const document: PaperDocument = {
      path: filePath,
      fileName,
      contentHash: sha256(buffer),
      pageCount: parsed.pageCount,
      pages: parsed.pages,
      embeddedMetadata: parsed.info,
    };
    yield document;
  }
}
