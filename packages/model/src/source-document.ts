/**
 * Source document types
 *
 * A PDF on disk plus the page bounds that limit how much of it is read.
 */

/**
 * A magazine PDF to extract a table of contents from
 *
 * Immutable for the duration of one run.
 */
export interface SourceDocument {
  /**
   * Path to the PDF file
   */
  readonly path: string;

  /**
   * Number of leading pages scanned for the table of contents
   */
  readonly maxPages: number;

  /**
   * Number of leading pages eligible for OCR fallback
   */
  readonly ocrFirstPages: number;
}
