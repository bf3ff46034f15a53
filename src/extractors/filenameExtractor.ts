import type { CandidateField, PaperDocument } from '../pipeline/types';
import { makeCandidate, present, type Extractor } from './types';

// Confidence is on a 0–100 scale for this extractor.
const FULL_MATCH = 70;
const LOOSE_MATCH = 40;
const DOI_MATCH = 50;

const FULL_PATTERN = /^(.+?)\s*-\s*(\d{4})\s*-\s*(.+)\.pdf$/i;
const LOOSE_PATTERN = /^(.+?)\s*-\s*(\d{4})\s*-\s*(.+)$/i;
const DOI_PATTERN = /(10\.\d{4,9})[/_]([\w.\-/]+)/i;

/** Strips export noise such as "Copy of", "final" and version tags from an author prefix. */
export function cleanAuthorString(raw: string): string {
  let author = raw.replace(/^(copy of\s*|\s*final\s*|\s*v\d+\s*|\s*-+\s*)+/i, '');
  author = author.replace(/[_-]/g, ' ').trim();
  author = author.replace(/\.+$/, '').trim();
  return author.length > 2 && !/^\d+$/.test(author) ? author : '';
}

export interface FilenameFields {
  author?: string;
  year?: string;
  title?: string;
  doi?: string;
  match: 'full' | 'loose' | 'none';
}

export function parseFilename(fileName: string): FilenameFields {
  const full = fileName.match(FULL_PATTERN);
  const loose = full ? null : fileName.match(LOOSE_PATTERN);
  const match = full ?? loose;
  const fields: FilenameFields = { match: full ? 'full' : loose ? 'loose' : 'none' };

  if (match) {
    const [, rawAuthor = '', year, rawTitle = ''] = match;
    const author = cleanAuthorString(rawAuthor);
    if (author) fields.author = author;
    fields.year = year;
    const title = rawTitle.replace(/_/g, ' ').trim();
    if (title) fields.title = title;
  }

  const doi = fileName.replace(/\.pdf$/i, '').match(DOI_PATTERN);
  if (doi?.[1] && doi[2]) {
    fields.doi = `${doi[1]}/${doi[2]}`;
  }
  return fields;
}

export const filenameExtractor: Extractor = {
  name: 'filename',
  async extract(document: PaperDocument): Promise<CandidateField[]> {
    const parsed = parseFilename(document.fileName);
    const confidence = parsed.match === 'full' ? FULL_MATCH : LOOSE_MATCH;
    const evidence = document.fileName;
    const candidates: CandidateField[] = [];

    if (present(parsed.author)) {
      candidates.push(makeCandidate('filename', 'authors', parsed.author, confidence, evidence));
    }
    if (present(parsed.year)) {
      candidates.push(makeCandidate('filename', 'year', parsed.year, confidence, evidence));
    }
    if (present(parsed.title)) {
      candidates.push(makeCandidate('filename', 'title', parsed.title, confidence, evidence));
    }
    if (present(parsed.doi)) {
      candidates.push(makeCandidate('filename', 'doi', parsed.doi, DOI_MATCH, evidence));
    }
    return candidates;
  },
};
