/**
 * Page text types
 *
 * Output of the page-text provider: the text of each scanned page together
 * with the extraction mode that produced it.
 */
import type { SourceDocument } from './source-document';

/**
 * How a page's text was obtained
 *
 * - native: the PDF's own text layer
 * - ocr: rasterized and recognized
 */
export type ExtractionMode = 'native' | 'ocr';

/**
 * Tool invocation that produced a page's text
 */
export type ExtractionSource =
  | 'pdftotext-layout'
  | 'pdftotext-raw'
  | 'tesseract';

/**
 * Text of a single page
 */
export interface PageRecord {
  /**
   * 1-based page number
   */
  readonly pageNumber: number;

  /**
   * Raw page text, line structure preserved
   */
  readonly text: string;

  readonly mode: ExtractionMode;

  readonly source: ExtractionSource;
}

/**
 * Ordered page texts of one document
 *
 * Produced once per document and never mutated.
 */
export interface PageText {
  readonly document: SourceDocument;

  /**
   * Page records ordered by page number
   */
  readonly pages: readonly PageRecord[];
}
