import type { LineJoin } from '@magtoc/model';

import type { SourceLine } from '../types';

import { LAYOUT_PARSER } from '../config/constants';
import { TextCleaner } from '../utils/text-cleaner';

/**
 * Dateline such as "MARCH 3, 2025" or "Jan. 6, 2025"
 */
export const DATE_PATTERN =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b\.?,?\s+\d{1,2},\s+\d{4}/i;

const PAGE_TOKEN = /^\d{1,3}$/;
export const TRAILING_PAGE = /\b\d{1,3}$/;
const LEADING_PAGE_SECTION = /^(\d{1,3})\s+(.+)$/;
const SECTION_TRAILING_PAGE = /^(.+?)\s+(\d{1,3})$/;

export function isValidPage(page: number): boolean {
  return (
    Number.isInteger(page) &&
    page >= LAYOUT_PARSER.MIN_PAGE &&
    page <= LAYOUT_PARSER.MAX_PAGE
  );
}

export interface SectionMatch {
  name: string;
  page?: number;
}

/**
 * Matches lines against a brand's section vocabulary
 */
export class SectionMatcher {
  constructor(private readonly sections: readonly string[]) {}

  /**
   * Whether a name is a vocabulary entry or starts with one
   * ("ANNALS OF MEDICINE" for "ANNALS OF")
   */
  isSectionName(name: string): boolean {
    const normalized = TextCleaner.collapseSpaces(name).toUpperCase();
    return this.sections.some(
      (key) => normalized === key || normalized.startsWith(`${key} `),
    );
  }

  /**
   * Whether a name is exactly a vocabulary entry
   */
  isExactSectionName(name: string): boolean {
    const normalized = TextCleaner.collapseSpaces(name).toUpperCase();
    return this.sections.includes(normalized);
  }

  /**
   * Match a heading line in one of three forms:
   * "15 THE TALK OF THE TOWN", "LETTERS    2" (or "THE MAIL 4") or
   * "FICTION". Lines with lower-case letters are never headings.
   */
  match(line: string): SectionMatch | null {
    const text = line.trim();
    if (!text || /\p{Ll}/u.test(text)) {
      return null;
    }

    const leading = LEADING_PAGE_SECTION.exec(text);
    if (leading && this.isSectionName(leading[2])) {
      const page = Number.parseInt(leading[1], 10);
      if (isValidPage(page)) {
        return { name: TextCleaner.collapseSpaces(leading[2]), page };
      }
    }

    const trailing = SECTION_TRAILING_PAGE.exec(text);
    if (trailing && this.isSectionName(trailing[1])) {
      const name = TextCleaner.collapseSpaces(trailing[1]);
      const page = Number.parseInt(trailing[2], 10);
      return isValidPage(page) ? { name, page } : { name };
    }

    if (this.isSectionName(text)) {
      return { name: TextCleaner.collapseSpaces(text) };
    }
    return null;
  }
}

/**
 * Classification of one logical line
 */
export type LineClass =
  | { kind: 'noise' }
  | { kind: 'denied' }
  | { kind: 'section'; section: SectionMatch }
  | { kind: 'page-number' }
  | { kind: 'candidate' };

/**
 * Classify a trimmed, non-empty line. Checks run in order: date noise,
 * denylist, section heading, lone page number, then item candidate.
 */
export function classifyLine(
  line: string,
  denylist: readonly string[],
  sections: SectionMatcher,
): LineClass {
  if (DATE_PATTERN.test(line)) {
    return { kind: 'noise' };
  }

  const upper = line.toUpperCase();
  if (denylist.some((entry) => upper.includes(entry))) {
    return { kind: 'denied' };
  }

  const section = sections.match(line);
  if (section) {
    return { kind: 'section', section };
  }

  if (PAGE_TOKEN.test(line)) {
    return { kind: 'page-number' };
  }
  return { kind: 'candidate' };
}

export interface JoinResult {
  lines: SourceLine[];
  joins: LineJoin[];
}

/**
 * Fuse a line that has no trailing page number with a following line on
 * the same page that is only a page number: "Transitions" + "20" becomes
 * "Transitions  20".
 */
export function joinWrappedLines(lines: readonly SourceLine[]): JoinResult {
  const joined: SourceLine[] = [];
  const joins: LineJoin[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const next = lines[i + 1];

    if (
      next !== undefined &&
      next.pageNumber === line.pageNumber &&
      PAGE_TOKEN.test(next.text) &&
      /\p{L}/u.test(line.text) &&
      !TRAILING_PAGE.test(line.text)
    ) {
      joined.push({
        pageNumber: line.pageNumber,
        text: `${line.text.trimEnd()}  ${next.text}`,
      });
      joins.push({
        kind: 'page-number',
        pageNumber: line.pageNumber,
        line: line.text,
        continuation: next.text,
      });
      i++;
      continue;
    }

    joined.push(line);
  }

  return { lines: joined, joins };
}
