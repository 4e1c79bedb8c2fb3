import type {
  BrandDetection,
  BrandSource,
  EditorialSlots,
  KnownBrand,
  PageRecord,
  PageText,
  ParseResult,
  RenderedReport,
  SourceDocument,
} from '@magtoc/model';

/**
 * Options for BrandParser.parse
 */
export interface ParseOptions {
  /**
   * Fuse a title line with a following page-number line (default: true)
   */
  joinWrappedLines?: boolean;

  /**
   * Detection stage that chose the brand, copied into diagnostics
   * (default: 'override')
   */
  brandSource?: BrandSource;

  /**
   * Raw-mode text of the same document. Brands that merge both modes parse
   * the raw text of their selected pages after the layout text.
   */
  rawText?: PageText;
}

/**
 * One logical line of ToC text with the page it came from
 */
export interface SourceLine {
  pageNumber: number;
  text: string;
}

/**
 * A single item recognized by a pattern
 */
export interface ItemMatch {
  title: string;
  author?: string;
  page: number;
}

/**
 * Context a pattern sees for one candidate line
 */
export interface PatternContext {
  /**
   * Current section cursor
   */
  section: string;

  /**
   * Next logical line on the same page, if any
   */
  next?: string;

  /**
   * Whether the current section lists poems
   */
  isPoemSection: boolean;

  /**
   * Whether a line is a section heading of the current brand
   */
  isSectionLine(line: string): boolean;
}

export interface PatternMatch {
  items: ItemMatch[];

  /**
   * The next line was consumed (dek continuation) and must be skipped
   */
  consumedNext: boolean;
}

/**
 * Named line pattern. Returns null when the line does not fit.
 */
export interface ItemPattern {
  readonly name: string;
  match(line: string, context: PatternContext): PatternMatch | null;
}

/**
 * Selects the pages a brand parser reads
 */
export type PageSelector = (pages: readonly PageRecord[]) => PageRecord[];

/**
 * Layout rules of one magazine brand
 */
export interface BrandProfile {
  readonly brand: KnownBrand;

  /**
   * Masthead name, e.g. "The New Yorker"
   */
  readonly displayName: string;

  /**
   * Upper-case section vocabulary
   */
  readonly sections: readonly string[];

  /**
   * Upper-case substrings of lines that are never ToC content
   */
  readonly denylist: readonly string[];

  /**
   * Item patterns, most anchored first
   */
  readonly patterns: readonly ItemPattern[];

  readonly editorialSlots: EditorialSlots;

  /**
   * Sections whose lines may list several quoted poems
   */
  readonly poemSections: readonly string[];

  /**
   * Cut the text to the block between "contents" and the issue footer
   */
  readonly sliceRegion: boolean;

  /**
   * Re-parse raw-mode text when layout text gives too few items
   */
  readonly rawRetry: boolean;

  /**
   * Parse the selected pages in both layout and raw mode, one after the
   * other; duplicates collapse in deduplication
   */
  readonly mergeRawText: boolean;

  /**
   * Lower-case file name tokens
   */
  readonly filenameTokens: readonly string[];

  /**
   * Lower-case page-1 markers (masthead strings, section vocabulary)
   */
  readonly contentMarkers: readonly string[];

  /**
   * Page selection rule; every page when absent
   */
  readonly selectPages?: PageSelector;
}

export interface BrandParser {
  readonly brand: BrandDetection['brand'];
  parse(pageText: PageText, options?: ParseOptions): ParseResult;
}

/**
 * Source of page text for the pipeline
 */
export interface PageTextSource {
  getText(document: SourceDocument): Promise<PageText>;

  /**
   * Re-extract the same pages in raw reading order
   */
  getRawText(document: SourceDocument): Promise<PageText>;
}

/**
 * Destination of rendered reports
 */
export interface OutputSink {
  write(report: RenderedReport, document: SourceDocument): Promise<void>;
}
