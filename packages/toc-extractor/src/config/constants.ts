/**
 * Page selection constants for Harper's Magazine
 */
export const HARPERS_TOC = {
  /**
   * Pages searched for the ToC page (1..SEARCH_PAGES)
   */
  SEARCH_PAGES: 7,

  /**
   * ToC page assumed when the search finds nothing
   */
  FALLBACK_PAGE: 3,

  /**
   * Minimum count of 1-3 digit numbers on a ToC page
   */
  MIN_NUMBERS: 6,
} as const;

/**
 * Layout parser constants
 */
export const LAYOUT_PARSER = {
  /**
   * Lines scanned for the issue title
   */
  ISSUE_TITLE_SCAN_LINES: 120,

  MIN_PAGE: 1,

  MAX_PAGE: 999,

  /**
   * Length bounds of a dek line appended to a title
   */
  DEK_MIN_LENGTH: 10,
  DEK_MAX_LENGTH: 200,
} as const;

/**
 * Pipeline constants
 */
export const TOC_PIPELINE = {
  /**
   * Leading pages scanned per document
   */
  DEFAULT_MAX_PAGES: 16,

  /**
   * Leading pages eligible for OCR
   */
  DEFAULT_OCR_FIRST_PAGES: 3,

  /**
   * Layout parses with fewer items trigger a raw-text retry
   */
  RAW_RETRY_MIN_ITEMS: 4,

  /**
   * Text reports shorter than this log a warning
   */
  SHORT_OUTPUT_CHARS: 60,
} as const;
