import type { LoggerMethods } from '@magtoc/logger';
import type {
  LineCounts,
  PageRecord,
  PageText,
  ParseResult,
  TocEntry,
} from '@magtoc/model';

import type {
  BrandParser,
  BrandProfile,
  ItemMatch,
  ParseOptions,
  PatternMatch,
  SourceLine,
} from '../types';

import { DEFAULT_SECTION } from '@magtoc/model';

import { LAYOUT_PARSER } from '../config/constants';
import { TocFinder } from '../finders/toc-finder';
import { TextCleaner } from '../utils/text-cleaner';
import {
  type JoinResult,
  SectionMatcher,
  type SectionMatch,
  TRAILING_PAGE,
  classifyLine,
  isValidPage,
  joinWrappedLines,
} from './line-classifier';

const ISSUE_TITLE_PATTERN =
  /(The New Yorker|The Atlantic|Harper'?s Magazine).+\d{4}/i;

/**
 * LayoutParser
 *
 * Turns page text into ordered ToC entries using one brand profile:
 * page selection, cleanup, issue title, region, line joining, line
 * classification, section cursor, ordered item patterns and deduplication.
 * Lines that no pattern accepts are counted and dropped. Brands that merge
 * both extraction modes read the raw text of the selected pages after
 * their layout text.
 */
export class LayoutParser implements BrandParser {
  private readonly sections: SectionMatcher;
  private readonly finder = new TocFinder();

  constructor(
    private readonly logger: LoggerMethods,
    private readonly profile: BrandProfile,
  ) {
    this.sections = new SectionMatcher(profile.sections);
  }

  get brand(): BrandProfile['brand'] {
    return this.profile.brand;
  }

  parse(pageText: PageText, options?: ParseOptions): ParseResult {
    const joinLines = options?.joinWrappedLines ?? true;
    const pages = this.profile.selectPages
      ? this.profile.selectPages(pageText.pages)
      : [...pageText.pages];

    const pageNumbers = pages.map((page) => page.pageNumber);
    const rawPages =
      this.profile.mergeRawText && options?.rawText
        ? options.rawText.pages.filter((page) =>
            pageNumbers.includes(page.pageNumber),
          )
        : [];

    this.logger.debug(
      `[LayoutParser] Parsing ${this.profile.displayName} pages ${pageNumbers.join(', ')}${rawPages.length > 0 ? ' (layout and raw)' : ''}`,
    );

    const cleaned = this.cleanPages([...pages, ...rawPages]);
    const issueTitle = this.findIssueTitle(cleaned);

    const region = (
      this.profile.sliceRegion ? this.finder.sliceRegion(cleaned) : cleaned
    )
      .map((line) => ({ pageNumber: line.pageNumber, text: line.text.trim() }))
      .filter((line) => line.text.length > 0);

    const { lines, joins }: JoinResult = joinLines
      ? joinWrappedLines(region)
      : { lines: region, joins: [] };

    const counts: LineCounts = {
      candidates: 0,
      matched: 0,
      unmatched: 0,
      denied: 0,
      noise: 0,
      joined: joins.length,
    };
    const patternHits: Record<string, number> = {};
    const entries: TocEntry[] = [];
    const sectionIndex = new Map<string, number>();
    const seenItems = new Set<string>();
    let cursor = DEFAULT_SECTION;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const lineClass = classifyLine(
        line.text,
        this.profile.denylist,
        this.sections,
      );

      switch (lineClass.kind) {
        case 'noise':
        case 'page-number':
          counts.noise++;
          continue;
        case 'denied':
          counts.denied++;
          continue;
        case 'section':
          cursor = this.applySection(lineClass.section, entries, sectionIndex);
          continue;
        case 'candidate':
          break;
      }

      counts.candidates++;
      const next = lines[i + 1];
      let match = this.matchItem(line.text, {
        section: cursor,
        next: next?.pageNumber === line.pageNumber ? next.text : undefined,
      });

      if (!match && joinLines) {
        match = this.matchWrappedTitle(line, next, lines[i + 2], cursor);
        if (match && next !== undefined) {
          joins.push({
            kind: 'title',
            pageNumber: line.pageNumber,
            line: line.text,
            continuation: next.text,
          });
          counts.joined++;
          i++;
        }
      }

      if (!match) {
        counts.unmatched++;
        this.logger.debug(`[LayoutParser] Unmatched: ${line.text}`);
        continue;
      }

      counts.matched++;
      patternHits[match.name] = (patternHits[match.name] ?? 0) + 1;
      for (const item of match.items) {
        const key = `${item.page}|${item.title.toLowerCase()}|${cursor}`;
        if (seenItems.has(key)) {
          continue;
        }
        seenItems.add(key);
        entries.push({
          kind: 'item',
          section: cursor,
          title: item.title,
          ...(item.author ? { author: item.author } : {}),
          page: item.page,
        });
      }
      if (match.consumedNext) {
        i++;
      }
    }

    return {
      brand: this.profile.brand,
      ...(issueTitle ? { issueTitle } : {}),
      entries,
      editorialSlots: {
        mail: [...this.profile.editorialSlots.mail],
        contributors: [...this.profile.editorialSlots.contributors],
      },
      diagnostics: {
        brand: this.profile.brand,
        brandSource: options?.brandSource ?? 'override',
        brandUnresolved: false,
        pageModes: pageText.pages.map((page) => ({
          pageNumber: page.pageNumber,
          mode: page.mode,
          source: page.source,
        })),
        pagesParsed: pageNumbers,
        lineCounts: counts,
        joins,
        patternHits,
        rawRetry: false,
        rawMerged: rawPages.length > 0,
      },
    };
  }

  /**
   * Clean every page and split it into lines
   */
  private cleanPages(pages: readonly PageRecord[]): SourceLine[] {
    return pages.flatMap((page) =>
      TextCleaner.clean(page.text)
        .split('\n')
        .map((text) => ({ pageNumber: page.pageNumber, text })),
    );
  }

  private findIssueTitle(lines: readonly SourceLine[]): string | undefined {
    const line = lines
      .slice(0, LAYOUT_PARSER.ISSUE_TITLE_SCAN_LINES)
      .find((candidate) => ISSUE_TITLE_PATTERN.test(candidate.text));
    return line?.text.trim();
  }

  /**
   * Emit a section entry the first time a name is seen; a later heading
   * with a page fills a missing page. Returns the new cursor.
   */
  private applySection(
    section: SectionMatch,
    entries: TocEntry[],
    sectionIndex: Map<string, number>,
  ): string {
    const index = sectionIndex.get(section.name);

    if (index === undefined) {
      sectionIndex.set(section.name, entries.length);
      entries.push({
        kind: 'section',
        section: section.name,
        ...(section.page !== undefined ? { page: section.page } : {}),
      });
      this.logger.debug(
        `[LayoutParser] Section: ${section.name}${section.page !== undefined ? ` (p. ${section.page})` : ''}`,
      );
    } else if (section.page !== undefined && entries[index].page === undefined) {
      entries[index] = { ...entries[index], page: section.page };
    }

    return section.name;
  }

  /**
   * Try the profile's patterns in order. The first pattern that matches
   * decides; its items are kept only when they pass validation.
   */
  private matchItem(
    line: string,
    context: { section: string; next?: string },
  ): (PatternMatch & { name: string }) | null {
    const patternContext = {
      section: context.section,
      ...(context.next !== undefined ? { next: context.next } : {}),
      isPoemSection: this.profile.poemSections.includes(context.section),
      isSectionLine: (candidate: string) =>
        this.sections.match(candidate) !== null,
    };

    for (const pattern of this.profile.patterns) {
      const result = pattern.match(line, patternContext);
      if (!result) {
        continue;
      }
      const items = result.items.filter((item) => this.isValidItem(item));
      return items.length > 0
        ? { name: pattern.name, items, consumedNext: result.consumedNext }
        : null;
    }
    return null;
  }

  /**
   * A title wrapped onto a second line: "The Long Road Home From" followed
   * by "The War in the East    40". The first line must start with a
   * capital and carry no page, and the second must match an item pattern
   * on its own; the two are then matched as one line.
   */
  private matchWrappedTitle(
    line: SourceLine,
    next: SourceLine | undefined,
    after: SourceLine | undefined,
    section: string,
  ): (PatternMatch & { name: string }) | null {
    if (
      next === undefined ||
      next.pageNumber !== line.pageNumber ||
      !/^\p{Lu}/u.test(line.text) ||
      /[.!?:;]$/.test(line.text) ||
      TRAILING_PAGE.test(line.text) ||
      classifyLine(next.text, this.profile.denylist, this.sections).kind !==
        'candidate' ||
      !this.matchItem(next.text, { section })
    ) {
      return null;
    }

    return this.matchItem(`${line.text} ${next.text}`, {
      section,
      next: after?.pageNumber === line.pageNumber ? after.text : undefined,
    });
  }

  private isValidItem(item: ItemMatch): boolean {
    return (
      isValidPage(item.page) &&
      /\p{L}/u.test(item.title) &&
      !this.sections.isExactSectionName(item.title) &&
      (item.author === undefined || /\p{L}/u.test(item.author))
    );
  }
}
