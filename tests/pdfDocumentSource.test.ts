import { describe, it, expect, jest, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pdfParse from 'pdf-parse';
import { readPdfDocuments, splitPages } from '../src/ingest/pdfDocumentSource';
import type { PaperDocument } from '../src/pipeline/types';
import { silentLogger } from '../src/utils/logger';

jest.mock('pdf-parse', () => jest.fn());

const mockedParse = jest.mocked(pdfParse);

describe('splitPages', () => {
  it('splits on the blank line before each page', () => {
    expect(splitPages('\n\nFirst page\n\nSecond page', 2)).toEqual(['First page', 'Second page']);
  });

  it('keeps the whole text when the split does not match the page count', () => {
    expect(splitPages('\n\nIntro\n\nBody\n\nEnd', 2)).toEqual(['Intro\n\nBody\n\nEnd']);
  });

  it('returns no pages for empty text', () => {
    expect(splitPages('\n\n', 1)).toEqual([]);
    expect(splitPages('  \n\n  ', 2)).toEqual([]);
  });
});

describe('readPdfDocuments', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-source-'));
    await fs.writeFile(path.join(dir, 'b.pdf'), 'abc');
    await fs.writeFile(path.join(dir, 'a.pdf'), 'broken');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a paper');
    mockedParse.mockImplementation(async (buffer: Buffer) => {
      if (buffer.toString() === 'broken') throw new Error('bad xref table');
      return {
        numpages: 2,
        numrender: 2,
        info: { Title: ' Graph Methods ', Author: '', PDFFormatVersion: 1.4 },
        metadata: null,
        version: 'default',
        text: '\n\nFirst page\n\nSecond page',
      };
    });
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function collect(source: AsyncIterable<PaperDocument>): Promise<PaperDocument[]> {
    const documents: PaperDocument[] = [];
    for await (const document of source) documents.push(document);
    return documents;
  }

  it('yields every PDF in name order, including unparseable ones', async () => {
    const documents = await collect(readPdfDocuments(dir, { logger: silentLogger }));

    expect(documents).toEqual([
      {
        path: path.join(dir, 'a.pdf'),
        fileName: 'a.pdf',
        contentHash: 'f526795c95399cea27c055c842c3d6ab018ed0fa4f66f701c28ab22dec28237b',
        pageCount: 0,
        pages: [],
        embeddedMetadata: {},
      },
      {
        path: path.join(dir, 'b.pdf'),
        fileName: 'b.pdf',
        contentHash: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
        pageCount: 2,
        pages: ['First page', 'Second page'],
        embeddedMetadata: { Title: 'Graph Methods' },
      },
    ]);
  });
});
