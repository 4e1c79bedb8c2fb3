import type { PageRecord } from '@magtoc/model';

import type { SourceLine } from '../types';

import { HARPERS_TOC } from '../config/constants';

/**
 * Start of the ToC block ("table of contents" or "contents")
 */
export const TOC_KEYWORD_PATTERN = /(?:table of )?contents/i;

/**
 * Issue footer line such as "THE NEW YORKER, MARCH 3, 2025"
 */
export const FOOTER_PATTERN =
  /(the new yorker|the atlantic|harper'?s magazine).*,\s+\w+\s+\d{1,2},\s+\d{4}/i;

/**
 * Harper's Index and Findings pages, including letter-spaced headings
 */
export const HARPERS_END_PATTERN =
  /HARPER['\u2019]?S\s+INDEX|FINDINGS|H\s*A\s*R\s*P\s*E\s*R\s*['\u2019]\s*S\s*I\s*N\s*D\s*E\s*X|F\s*I\s*N\s*D\s*I\s*N\s*G\s*S/i;

const PAGE_TOKEN_PATTERN = /\b\d{1,3}\b/g;

/**
 * TocFinder options
 */
export interface TocFinderOptions {
  /**
   * Pages searched for a ToC page (default: 7)
   */
  searchPages?: number;

  /**
   * Page assumed when no page qualifies (default: 3)
   */
  fallbackPage?: number;

  /**
   * Minimum count of 1-3 digit numbers on a ToC page (default: 6)
   */
  minNumbers?: number;
}

/**
 * TocFinder
 *
 * Locates the ToC inside already cleaned page text:
 * - sliceRegion: the lines between the "contents" keyword and the issue footer
 * - findTocPage / selectTocPages: the ToC page of a Harper's issue
 */
export class TocFinder {
  private readonly searchPages: number;
  private readonly fallbackPage: number;
  private readonly minNumbers: number;

  constructor(options?: TocFinderOptions) {
    this.searchPages = options?.searchPages ?? HARPERS_TOC.SEARCH_PAGES;
    this.fallbackPage = options?.fallbackPage ?? HARPERS_TOC.FALLBACK_PAGE;
    this.minNumbers = options?.minNumbers ?? HARPERS_TOC.MIN_NUMBERS;
  }

  /**
   * Cut lines to the ToC block.
   *
   * The block starts right after the first "contents" keyword (text that
   * follows the keyword on its line is kept) and ends before the first
   * footer line. Without a keyword the block starts at the first line.
   */
  sliceRegion(lines: readonly SourceLine[]): SourceLine[] {
    const startIndex = lines.findIndex((line) =>
      TOC_KEYWORD_PATTERN.test(line.text),
    );

    let region: SourceLine[];
    if (startIndex === -1) {
      region = [...lines];
    } else {
      const keywordLine = lines[startIndex];
      const match = TOC_KEYWORD_PATTERN.exec(keywordLine.text);
      const rest = match
        ? keywordLine.text.slice(match.index + match[0].length)
        : keywordLine.text;
      region = [
        { pageNumber: keywordLine.pageNumber, text: rest },
        ...lines.slice(startIndex + 1),
      ];
    }

    const footerIndex = region.findIndex((line) =>
      FOOTER_PATTERN.test(line.text),
    );
    return footerIndex === -1 ? region : region.slice(0, footerIndex);
  }

  /**
   * Whether a page looks like a Harper's ToC page
   */
  isTocPage(text: string): boolean {
    if (!/contents/i.test(text) || HARPERS_END_PATTERN.test(text)) {
      return false;
    }
    const numbers = text.match(PAGE_TOKEN_PATTERN) ?? [];
    return numbers.length >= this.minNumbers;
  }

  /**
   * Number of the first qualifying page among 1..searchPages, or the
   * fallback page
   */
  findTocPage(pages: readonly PageRecord[]): number {
    const candidate = pages.find(
      (page) =>
        page.pageNumber <= this.searchPages && this.isTocPage(page.text),
    );
    return candidate?.pageNumber ?? this.fallbackPage;
  }

  /**
   * The ToC page and the page after it. Every page is returned when
   * neither is present.
   */
  selectTocPages(pages: readonly PageRecord[]): PageRecord[] {
    const tocPage = this.findTocPage(pages);
    const selected = pages.filter(
      (page) =>
        page.pageNumber === tocPage || page.pageNumber === tocPage + 1,
    );
    return selected.length > 0 ? selected : [...pages];
  }
}
