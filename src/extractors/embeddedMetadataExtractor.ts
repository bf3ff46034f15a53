import type { CandidateField, PaperDocument } from '../pipeline/types';
import { collapseWhitespace } from '../utils/canonicalize';
import { makeCandidate, present, type Extractor } from './types';

const FIELD_CONFIDENCE = 0.6;
// Creation dates often reflect when the PDF was produced, not published.
const YEAR_CONFIDENCE = 0.4;

const PLACEHOLDER_TITLE = /^(untitled|microsoft word\s*-.*|.*\.(docx?|pdf|tex))$/i;

function infoValue(info: Readonly<Record<string, string>>, key: string): string | undefined {
  const value = info[key];
  return present(value) ? collapseWhitespace(value) : undefined;
}

/** `D:20190412...` style PDF dates, or any string carrying a four-digit year. */
export function yearFromPdfDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const match = raw.match(/^(?:D:)?(\d{4})/) ?? raw.match(/\b(\d{4})\b/);
  return match?.[1];
}

export const embeddedMetadataExtractor: Extractor = {
  name: 'embedded_metadata',
  async extract(document: PaperDocument): Promise<CandidateField[]> {
    const info = document.embeddedMetadata;
    const candidates: CandidateField[] = [];

    const title = infoValue(info, 'Title');
    if (title && !PLACEHOLDER_TITLE.test(title)) {
      candidates.push(makeCandidate('embedded_metadata', 'title', title, FIELD_CONFIDENCE, 'Info/Title'));
    }

    const author = infoValue(info, 'Author');
    if (author) {
      candidates.push(makeCandidate('embedded_metadata', 'authors', author, FIELD_CONFIDENCE, 'Info/Author'));
    }

    const keywords = infoValue(info, 'Keywords');
    if (keywords) {
      candidates.push(
        makeCandidate('embedded_metadata', 'keywords', keywords, FIELD_CONFIDENCE, 'Info/Keywords')
      );
    }

    const dateKey = infoValue(info, 'CreationDate') ? 'CreationDate' : 'ModDate';
    const year = yearFromPdfDate(infoValue(info, dateKey));
    if (year) {
      candidates.push(makeCandidate('embedded_metadata', 'year', year, YEAR_CONFIDENCE, `Info/${dateKey}`));
    }
    return candidates;
  },
};
