/**
 * Parse result types
 *
 * Structured output of a brand parser together with the diagnostics that
 * describe how it was produced. Diagnostics are reported through the logger
 * and are never part of a rendered report.
 */
import type { Brand, BrandSource } from './brand';
import type { ExtractionMode, ExtractionSource } from './page-text';
import type { TocEntry } from './toc-entry';

/**
 * Sections gated by rendering toggles
 */
export interface EditorialSlots {
  /**
   * Letters-to-the-editor sections (include-mail)
   */
  mail: string[];

  /**
   * Contributor notes sections (include-contributors)
   */
  contributors: string[];
}

/**
 * Extraction mode used for one page
 */
export interface PageModeDiagnostic {
  pageNumber: number;
  mode: ExtractionMode;
  source: ExtractionSource;
}

/**
 * Two lines of one page fused into one logical line:
 * - `page-number`: a title and the lone page number after it
 * - `title`: the first half of a wrapped title and the line that ends it
 */
export interface LineJoin {
  kind: 'page-number' | 'title';

  pageNumber: number;

  /**
   * The line before fusion
   */
  line: string;

  /**
   * The following line that was appended
   */
  continuation: string;
}

/**
 * Line classification counters
 */
export interface LineCounts {
  /**
   * Item candidates tried against the patterns
   */
  candidates: number;

  /**
   * Candidates that produced at least one item
   */
  matched: number;

  /**
   * Candidates that no pattern accepted (dropped)
   */
  unmatched: number;

  /**
   * Lines rejected by the brand denylist
   */
  denied: number;

  /**
   * Date lines and lone page numbers
   */
  noise: number;

  /**
   * Logical lines produced by fusing two lines (see LineJoin)
   */
  joined: number;
}

export interface ParseDiagnostics {
  brand: Brand;

  brandSource: BrandSource;

  brandUnresolved: boolean;

  pageModes: PageModeDiagnostic[];

  /**
   * Page numbers the parser actually read
   */
  pagesParsed: number[];

  lineCounts: LineCounts;

  joins: LineJoin[];

  /**
   * Number of candidates accepted by each named pattern
   */
  patternHits: Record<string, number>;

  /**
   * Whether a raw-text re-parse replaced the layout parse
   */
  rawRetry: boolean;

  /**
   * Whether raw-mode text of the parsed pages was read after their layout
   * text (Harper's)
   */
  rawMerged: boolean;
}

/**
 * Ordered table of contents of one document
 *
 * Every item's section names a section entry at or before it, or
 * DEFAULT_SECTION.
 */
export interface ParseResult {
  brand: Brand;

  /**
   * Issue line such as "The New Yorker, March 3, 2025", when found
   */
  issueTitle?: string;

  entries: TocEntry[];

  editorialSlots: EditorialSlots;

  diagnostics: ParseDiagnostics;
}
