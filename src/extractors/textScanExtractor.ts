import type { CandidateField, PaperDocument } from '../pipeline/types';
import { makeCandidate, type Extractor } from './types';

const DOI_IN_TEXT = /10\.\d{4,9}\/[\w.\-;/():]+/;
const FIRST_PAGE_CONFIDENCE = 0.8;
const OTHER_PAGE_CONFIDENCE = 0.6;

/** First two pages, then the last one, without repeats. */
function pagesToScan(document: PaperDocument): number[] {
  const last = document.pages.length - 1;
  return [...new Set([0, 1, last])].filter((index) => index >= 0 && index <= last);
}

export const textScanExtractor: Extractor = {
  name: 'text_scan',
  async extract(document: PaperDocument): Promise<CandidateField[]> {
    for (const index of pagesToScan(document)) {
      const text = document.pages[index] ?? '';
      const match = DOI_IN_TEXT.exec(text);
      if (!match) continue;
      const start = Math.max(0, match.index - 40);
      const evidence = `p${index + 1}: ${text.slice(start, match.index + match[0].length + 20)}`;
      const confidence = index === 0 ? FIRST_PAGE_CONFIDENCE : OTHER_PAGE_CONFIDENCE;
      return [makeCandidate('text_scan', 'doi', match[0], confidence, evidence)];
    }
    return [];
  },
};
