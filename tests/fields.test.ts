import { describe, it, expect } from '@jest/globals';
import {
  normalizeCountries,
  normalizeDoi,
  normalizeField,
  normalizeYear,
  splitAuthors,
  splitList,
  surnameOf,
  toMetadata,
} from '../src/reconcile/fields';

describe('normalizeDoi', () => {
  it('strips resolver prefixes and trailing punctuation', () => {
    expect(normalizeDoi('https://doi.org/10.1234/ABC.5678.')).toBe('10.1234/abc.5678');
    expect(normalizeDoi('doi: 10.1000/xyz)')).toBe('10.1000/xyz');
  });

  it('keeps balanced parentheses', () => {
    expect(normalizeDoi('10.1002/(SICI)1097')).toBe('10.1002/(sici)1097');
  });

  it('rejects non-DOIs', () => {
    expect(normalizeDoi('not a doi')).toBeNull();
    expect(normalizeDoi('10.12/short')).toBeNull();
  });
});

describe('normalizeYear', () => {
  it('pulls a plausible year out of text', () => {
    expect(normalizeYear('Published 2019-05')).toBe(2019);
    expect(normalizeYear(1998)).toBe(1998);
  });

  it('rejects out-of-range and embedded numbers', () => {
    expect(normalizeYear(1750)).toBeNull();
    expect(normalizeYear('12019')).toBeNull();
    expect(normalizeYear('n.d.')).toBeNull();
  });
});

describe('splitAuthors', () => {
  it('splits semicolon lists and drops et al.', () => {
    expect(splitAuthors('Smith, J.; Doe, A. et al.')).toEqual(['Smith, J.', 'Doe, A.']);
  });

  it('splits on "and" and keeps surname-given pairs together', () => {
    expect(splitAuthors('Jane Smith and John Doe')).toEqual(['Jane Smith', 'John Doe']);
    expect(splitAuthors('Smith, John')).toEqual(['Smith, John']);
  });

  it('drops repeated names', () => {
    expect(splitAuthors('Ann Lee; ann lee; Bo Chen')).toEqual(['Ann Lee', 'Bo Chen']);
  });
});

describe('surnameOf', () => {
  it('reads inverted and natural order names', () => {
    expect(surnameOf('Smith, John')).toBe('smith');
    expect(surnameOf('Martin Luther King Jr.')).toBe('king');
    expect(surnameOf('José Núñez')).toBe('nunez');
  });

  it('reads surname-initials names', () => {
    expect(surnameOf('Smith J')).toBe('smith');
    expect(surnameOf('Smith JQ')).toBe('smith');
    expect(surnameOf('Van der Berg J.Q.')).toBe('van der berg');
    expect(surnameOf('Martin Luther King JR')).toBe('king');
  });
});

describe('splitList', () => {
  it('dedupes case-insensitively and sorts', () => {
    expect(splitList('Deep learning; NLP, deep Learning | Vision')).toEqual(['Deep learning', 'NLP', 'Vision']);
  });
});

describe('normalizeCountries', () => {
  it('expands country codes to full names', () => {
    expect(normalizeCountries('us; Canada; UK')).toEqual(['Canada', 'United Kingdom', 'United States']);
    expect(normalizeCountries('US, NZ')).toEqual(['New Zealand', 'United States']);
  });
});

describe('normalizeField', () => {
  it('keys authors by first-author surname', () => {
    expect(normalizeField('authors', 'Smith, J.; Doe, A.')).toEqual({ key: 'smith', display: 'Smith, J.; Doe, A.' });
  });

  it('keys Vancouver author lists on the surname', () => {
    expect(normalizeField('authors', 'Smith J, Doe A')).toEqual({ key: 'smith', display: 'Smith J; Doe A' });
    expect(normalizeField('authors', 'Smith J, Doe A')?.key).toBe(normalizeField('authors', 'Smith, John; Doe, Ann')?.key);
  });

  it('keys keyword lists by their sorted canonical items', () => {
    expect(normalizeField('keywords', 'Vision; NLP')).toEqual({ key: 'nlp|vision', display: 'NLP; Vision' });
  });

  it('cleans free text', () => {
    expect(normalizeField('title', '  A Study of X. ')).toEqual({ key: 'a study of x', display: 'A Study of X' });
  });

  it('returns null for unusable values', () => {
    expect(normalizeField('year', 'n.d.')).toBeNull();
    expect(normalizeField('title', '***')).toBeNull();
    expect(normalizeField('doi', 'pending')).toBeNull();
  });
});

describe('toMetadata', () => {
  it('types display values', () => {
    expect(toMetadata({ title: 'T', authors: 'A; B', year: 2020, keywords: 'x; y' })).toEqual({
      title: 'T',
      authors: ['A', 'B'],
      year: 2020,
      keywords: ['x', 'y'],
    });
  });
});
