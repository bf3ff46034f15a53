import { XMLParser, XMLValidator } from 'fast-xml-parser';
import * as fs from 'fs/promises';
import type { GrobidClient } from '../ingest/grobidClient';
import type { CandidateField, PaperDocument } from '../pipeline/types';
import { collapseWhitespace } from '../utils/canonicalize';
import { makeCandidate, present, type Extractor, type ExtractorContext } from './types';

const TEI_CONFIDENCE = 0.9;

const ARRAY_TAGS = new Set([
  'title',
  'author',
  'persName',
  'forename',
  'surname',
  'idno',
  'date',
  'term',
  'affiliation',
  'country',
  'note',
  'biblStruct',
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: unknown, name: string): unknown[] {
  if (!isNode(node)) return [];
  const value = node[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Follows a child path, fanning out over repeated elements. */
function select(node: unknown, ...path: string[]): unknown[] {
  let current: unknown[] = Array.isArray(node) ? node : [node];
  for (const name of path) {
    current = current.flatMap((n) => children(n, name));
  }
  return current;
}

/** Every descendant element with the given name, in document order. */
function descendants(node: unknown, name: string): unknown[] {
  if (Array.isArray(node)) return node.flatMap((item) => descendants(item, name));
  if (!isNode(node)) return [];
  const found: unknown[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_')) continue;
    if (key === name) found.push(...(Array.isArray(value) ? value : [value]));
    found.push(...descendants(value, name));
  }
  return found;
}

function attr(node: unknown, name: string): string | undefined {
  if (!isNode(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function textOf(node: unknown): string {
  if (typeof node === 'string') return collapseWhitespace(node);
  if (typeof node === 'number') return String(node);
  if (Array.isArray(node)) return collapseWhitespace(node.map(textOf).join(' '));
  if (!isNode(node)) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_')) continue;
    parts.push(textOf(value));
  }
  return collapseWhitespace(parts.join(' '));
}

function firstText(nodes: unknown[]): string | undefined {
  return nodes.map(textOf).find(present);
}

function formatPerson(persName: unknown): string | undefined {
  const surname = firstText(select(persName, 'surname'));
  if (!surname) return undefined;
  const forenames = select(persName, 'forename').map(textOf).filter(present).join(' ');
  return forenames ? `${surname}, ${forenames}` : surname;
}

function yearFromDate(date: unknown): string | undefined {
  const when = attr(date, 'when');
  if (when && /^\d{4}/.test(when)) return when.slice(0, 4);
  const text = textOf(date);
  return /\b\d{4}\b/.test(text) ? text : undefined;
}

export interface TeiFields {
  title?: string;
  authors: string[];
  doi?: string;
  year?: string;
  venue?: string;
  keywords: string[];
  countries: string[];
  studyType?: string;
}

/** Parses a TEI header document. Throws on XML that does not validate. */
export function parseTeiHeader(xml: string): TeiFields {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(`Malformed TEI: ${validation.err.msg} (line ${validation.err.line})`);
  }
  const doc: unknown = parser.parse(xml);
  const header = select(doc, 'TEI', 'teiHeader')[0];
  if (!header) {
    throw new Error('Malformed TEI: missing teiHeader');
  }

  const fileDesc = select(header, 'fileDesc');
  const biblStruct = select(fileDesc, 'sourceDesc', 'biblStruct');
  const analytic = select(biblStruct, 'analytic');
  const monogr = select(biblStruct, 'monogr');

  const title =
    firstText(select(fileDesc, 'titleStmt', 'title')) ?? firstText(select(analytic, 'title'));

  const authorNodes = select(analytic, 'author');
  const authors = authorNodes
    .map((author) => formatPerson(select(author, 'persName')[0]))
    .filter(present);

  const doi = descendants(biblStruct, 'idno')
    .filter((idno) => attr(idno, 'type')?.toUpperCase() === 'DOI')
    .map(textOf)
    .find(present);

  const year = [
    ...select(fileDesc, 'publicationStmt', 'date'),
    ...select(monogr, 'imprint', 'date'),
  ]
    .map(yearFromDate)
    .find(present);

  const venueTitles = select(monogr, 'title');
  const venue =
    firstText(venueTitles.filter((t) => attr(t, 'level') === 'j')) ?? firstText(venueTitles);

  const keywords = select(header, 'profileDesc', 'textClass', 'keywords', 'term')
    .map(textOf)
    .filter(present);

  const countries = [
    ...new Set(
      descendants(authorNodes, 'country')
        .map((country) => attr(country, 'key') ?? textOf(country))
        .filter(present)
    ),
  ];

  const studyType = descendants(header, 'note')
    .filter((note) => attr(note, 'type') === 'studyType')
    .map(textOf)
    .find(present);

  return { title, authors, doi, year, venue, keywords, countries, studyType };
}

function teiCandidates(teiXml: string): CandidateField[] {
  const tei = parseTeiHeader(teiXml);
  const candidates: CandidateField[] = [];
  const add = (field: CandidateField['field'], value: string | undefined, evidence: string) => {
    if (present(value)) {
      candidates.push(makeCandidate('tei', field, value, TEI_CONFIDENCE, evidence));
    }
  };

  add('title', tei.title, 'titleStmt/title');
  add('authors', tei.authors.join('; '), 'analytic/author/persName');
  add('doi', tei.doi, 'idno[@type=DOI]');
  add('year', tei.year, 'date@when');
  add('venue', tei.venue, 'monogr/title');
  add('keywords', tei.keywords.join('; '), 'keywords/term');
  add('country', tei.countries.join('; '), 'affiliation/address/country');
  add('studyType', tei.studyType, 'note[@type=studyType]');
  return candidates;
}

/** Reads a TEI header already attached to the document; abstains without one. */
export const teiExtractor: Extractor = {
  name: 'tei',
  async extract(document: PaperDocument): Promise<CandidateField[]> {
    return document.teiXml ? teiCandidates(document.teiXml) : [];
  },
};

export type TeiHeaderService = Pick<GrobidClient, 'processHeaderDocument'>;

/**
 * Asks GROBID for the header of each document inside the extractor run, so
 * the requests share the document pool and the `grobid` lane.
 */
export function createTeiExtractor(grobid: TeiHeaderService): Extractor {
  return {
    name: 'tei',
    async extract(document: PaperDocument, context: ExtractorContext): Promise<CandidateField[]> {
      if (document.teiXml) return teiCandidates(document.teiXml);
      const pdf = await fs.readFile(document.path);
      const teiXml = await grobid.processHeaderDocument(pdf, document.fileName, context.signal);
      return teiCandidates(teiXml);
    },
  };
}
