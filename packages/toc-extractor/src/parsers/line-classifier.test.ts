import { describe, expect, test } from 'vitest';

import { NEW_YORKER_PROFILE } from '../profiles/brand-profiles';
import {
  DATE_PATTERN,
  SectionMatcher,
  classifyLine,
  isValidPage,
  joinWrappedLines,
} from './line-classifier';

const sections = new SectionMatcher(NEW_YORKER_PROFILE.sections);
const denylist = NEW_YORKER_PROFILE.denylist;

describe('DATE_PATTERN', () => {
  test('matches full and abbreviated datelines', () => {
    expect(DATE_PATTERN.test('MARCH 3, 2025')).toBe(true);
    expect(DATE_PATTERN.test('Jan. 6, 2025')).toBe(true);
  });

  test('requires day and year', () => {
    expect(DATE_PATTERN.test('MARCH 3')).toBe(false);
    expect(DATE_PATTERN.test('Marching Orders 12')).toBe(false);
  });
});

describe('isValidPage', () => {
  test('accepts 1..999 only', () => {
    expect(isValidPage(1)).toBe(true);
    expect(isValidPage(999)).toBe(true);
    expect(isValidPage(0)).toBe(false);
    expect(isValidPage(1000)).toBe(false);
  });
});

describe('SectionMatcher', () => {
  test('matches a heading with a trailing page', () => {
    expect(sections.match('PERSONAL HISTORY    20')).toEqual({
      name: 'PERSONAL HISTORY',
      page: 20,
    });
  });

  test('splits a trailing page set off by a single space', () => {
    expect(sections.match('THE MAIL 4')).toEqual({
      name: 'THE MAIL',
      page: 4,
    });
    expect(sections.match('PERSONAL  HISTORY 20')).toEqual({
      name: 'PERSONAL HISTORY',
      page: 20,
    });
  });

  test('keeps the name without a page when the number is out of range', () => {
    expect(sections.match('THE MAIL 0')).toEqual({ name: 'THE MAIL' });
  });

  test('matches a heading with a leading page', () => {
    expect(sections.match('15 THE TALK OF THE TOWN')).toEqual({
      name: 'THE TALK OF THE TOWN',
      page: 15,
    });
  });

  test('matches a bare heading that extends a vocabulary entry', () => {
    expect(sections.match('ANNALS OF MEDICINE')).toEqual({
      name: 'ANNALS OF MEDICINE',
    });
  });

  test('collapses inner whitespace in the name', () => {
    expect(sections.match('SHOUTS  &  MURMURS')).toEqual({
      name: 'SHOUTS & MURMURS',
    });
  });

  test('ignores lines with lower-case letters', () => {
    expect(sections.match('Fiction')).toBeNull();
    expect(sections.match('FICTION by Ann Smith')).toBeNull();
  });

  test('does not match a longer word that shares a prefix', () => {
    expect(sections.match('BOOKSHELF')).toBeNull();
  });

  test('isExactSectionName compares case-insensitively', () => {
    expect(sections.isExactSectionName('Books')).toBe(true);
    expect(sections.isExactSectionName('Books of the Year')).toBe(false);
  });
});

describe('classifyLine', () => {
  test('classifies datelines as noise', () => {
    expect(classifyLine('MARCH 3, 2025', denylist, sections)).toEqual({
      kind: 'noise',
    });
  });

  test('classifies denylisted lines', () => {
    expect(classifyLine('PRICE $8.99', denylist, sections)).toEqual({
      kind: 'denied',
    });
    expect(classifyLine('Love Books, Love Folio', denylist, sections)).toEqual(
      { kind: 'denied' },
    );
  });

  test('classifies section headings', () => {
    expect(classifyLine('FICTION  70', denylist, sections)).toEqual({
      kind: 'section',
      section: { name: 'FICTION', page: 70 },
    });
  });

  test('classifies lone page numbers', () => {
    expect(classifyLine('20', denylist, sections)).toEqual({
      kind: 'page-number',
    });
  });

  test('classifies everything else as a candidate', () => {
    expect(classifyLine('Transitions 20', denylist, sections)).toEqual({
      kind: 'candidate',
    });
  });
});

describe('joinWrappedLines', () => {
  test('fuses a title with the page-number line after it', () => {
    const result = joinWrappedLines([
      { pageNumber: 1, text: 'Transitions, by James Marcus' },
      { pageNumber: 1, text: '20' },
      { pageNumber: 1, text: 'FICTION' },
      { pageNumber: 2, text: '70' },
    ]);

    expect(result.lines).toEqual([
      { pageNumber: 1, text: 'Transitions, by James Marcus  20' },
      { pageNumber: 1, text: 'FICTION' },
      { pageNumber: 2, text: '70' },
    ]);
    expect(result.joins).toEqual([
      {
        kind: 'page-number',
        pageNumber: 1,
        line: 'Transitions, by James Marcus',
        continuation: '20',
      },
    ]);
  });

  test('does not join a line that already ends with a page', () => {
    const lines = [
      { pageNumber: 1, text: 'Notebook 11' },
      { pageNumber: 1, text: '12' },
    ];

    expect(joinWrappedLines(lines)).toEqual({ lines, joins: [] });
  });

  test('does not join a line without letters', () => {
    const lines = [
      { pageNumber: 1, text: '...' },
      { pageNumber: 1, text: '5' },
    ];

    expect(joinWrappedLines(lines)).toEqual({ lines, joins: [] });
  });

  test('joins after a four-digit year', () => {
    const result = joinWrappedLines([
      { pageNumber: 1, text: 'Looking Back at 1968' },
      { pageNumber: 1, text: '44' },
    ]);

    expect(result.lines).toEqual([
      { pageNumber: 1, text: 'Looking Back at 1968  44' },
    ]);
  });
});
