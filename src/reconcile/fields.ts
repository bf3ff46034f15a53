import { canonicalize, collapseWhitespace } from '../utils/canonicalize';
import type { CanonicalMetadata, FieldName, FieldValue } from '../pipeline/types';

export interface NormalizedValue {
  /** Comparison key; equal keys mean the values agree. */
  key: string;
  /** Cleaned value carried into the canonical record. */
  display: FieldValue;
}

const COUNTRY_NAMES: Record<string, string> = {
  us: 'United States',
  usa: 'United States',
  'united states of america': 'United States',
  gb: 'United Kingdom',
  uk: 'United Kingdom',
  england: 'United Kingdom',
  au: 'Australia',
  nz: 'New Zealand',
  ca: 'Canada',
};

const NAME_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv']);

const MIN_YEAR = 1800;
const MAX_YEAR = 2100;

export function normalizeDoi(raw: string): string | null {
  let doi = raw.trim().toLowerCase();
  doi = doi.replace(/^(?:https?:\/\/)?(?:dx\.)?doi\.org\//, '');
  doi = doi.replace(/^doi:\s*/, '');
  doi = doi.replace(/\s+/g, '');
  doi = doi.replace(/[.,;:]+$/, '');
  while (doi.endsWith(')') && countOf(doi, '(') < countOf(doi, ')')) {
    doi = doi.slice(0, -1);
  }
  return /^10\.\d{4,9}\/\S+$/.test(doi) ? doi : null;
}

function countOf(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

export function normalizeYear(raw: FieldValue): number | null {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= MIN_YEAR && raw <= MAX_YEAR ? raw : null;
  }
  const match = raw.match(/(?<!\d)(1[89]\d{2}|20\d{2}|2100)(?!\d)/);
  if (!match?.[1]) return null;
  const year = Number(match[1]);
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
}

function cleanText(raw: string): string {
  return collapseWhitespace(raw).replace(/\s*[.;,]+$/, '');
}

function looksLikeGivenNames(part: string): boolean {
  return /^(?:[A-Z][a-z]*\.?[\s-]*){1,3}$/.test(part) || part.split(' ').length <= 2;
}

function splitCommaList(part: string): string[] {
  const pieces = part
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
  const [surname, given] = pieces;
  if (pieces.length === 2 && surname && given && !surname.includes(' ') && looksLikeGivenNames(given)) {
    return [`${surname}, ${given}`];
  }
  return pieces;
}

/**
 * Splits an author string into names. Accepts `;`, ` and ` and `&`
 * separators, `Surname, Given` pairs, and drops `et al.`.
 */
export function splitAuthors(raw: string): string[] {
  const text = collapseWhitespace(raw).replace(/,?\s*\bet\.?\s+al\b\.?/gi, '');
  const parts = text.includes(';')
    ? text.split(';')
    : text.split(/\s+and\s+|\s*&\s*/i).flatMap((part) => splitCommaList(part));

  const seen = new Set<string>();
  const names: string[] = [];
  for (const part of parts) {
    const name = collapseWhitespace(part).replace(/^[-\s]+/, '');
    const key = name.toLowerCase();
    if (!name || seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }
  return names;
}

// Vancouver style: `Smith J`, `Smith JQ`, `Van der Berg J.Q.`
const TRAILING_INITIALS = /^(.+?)\s+([A-Z]{1,3}|(?:[A-Z]\.){1,3})$/;

export function surnameOf(name: string): string {
  const commaIndex = name.indexOf(',');
  if (commaIndex > 0) {
    return canonicalize(name.slice(0, commaIndex));
  }
  const vancouver = name.trim().match(TRAILING_INITIALS);
  if (vancouver?.[1] && vancouver[2] && !NAME_SUFFIXES.has(vancouver[2].toLowerCase())) {
    return canonicalize(vancouver[1]);
  }
  const tokens = canonicalize(name)
    .split(' ')
    .filter((token) => token && !NAME_SUFFIXES.has(token));
  return tokens[tokens.length - 1] ?? '';
}

export function firstAuthorSurname(authors: readonly string[] | undefined): string {
  const first = authors?.[0];
  return first ? surnameOf(first) : '';
}

export function splitList(raw: string): string[] {
  const seen = new Set<string>();
  const items: string[] = [];
  for (const piece of raw.split(/[;,|/]/)) {
    const item = collapseWhitespace(piece);
    const key = canonicalize(item);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    items.push(item);
  }
  return items.sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
}

export function normalizeCountries(raw: string): string[] {
  const names = raw
    .split(/[;,|/]/)
    .map((value) => collapseWhitespace(value))
    .filter(Boolean)
    .map((value) => COUNTRY_NAMES[value.toLowerCase()] ?? value.replace(/[^\p{L} ]+/gu, '').trim())
    .filter(Boolean);
  return splitList(names.join(';'));
}

function listValue(items: string[]): NormalizedValue | null {
  if (items.length === 0) return null;
  return { key: items.map((item) => canonicalize(item)).join('|'), display: items.join('; ') };
}

/**
 * Maps a raw candidate value onto its comparison key and cleaned display
 * value. Returns null when nothing usable is left.
 */
export function normalizeField(field: FieldName, raw: FieldValue): NormalizedValue | null {
  switch (field) {
    case 'year': {
      const year = normalizeYear(raw);
      return year === null ? null : { key: String(year), display: year };
    }
    case 'doi': {
      const doi = normalizeDoi(String(raw));
      return doi ? { key: doi, display: doi } : null;
    }
    case 'authors': {
      const names = splitAuthors(String(raw));
      const surname = firstAuthorSurname(names);
      return surname ? { key: surname, display: names.join('; ') } : null;
    }
    case 'keywords':
      return listValue(splitList(String(raw)));
    case 'country':
      return listValue(normalizeCountries(String(raw)));
    case 'title':
    case 'venue':
    case 'studyType': {
      const display = cleanText(String(raw));
      const key = canonicalize(display);
      return key ? { key, display } : null;
    }
  }
}

/** Builds the typed metadata view from resolved display values. */
export function toMetadata(values: Partial<Record<FieldName, FieldValue>>): CanonicalMetadata {
  const metadata: CanonicalMetadata = {};
  for (const [field, value] of Object.entries(values)) {
    if (value === undefined) continue;
    switch (field) {
      case 'title':
      case 'venue':
      case 'doi':
      case 'country':
      case 'studyType':
        metadata[field] = String(value);
        break;
      case 'year':
        metadata.year = typeof value === 'number' ? value : normalizeYear(value) ?? undefined;
        break;
      case 'authors':
        metadata.authors = String(value).split('; ');
        break;
      case 'keywords':
        metadata.keywords = String(value).split('; ');
        break;
    }
  }
  return metadata;
}
