/**
 * ExtractionFailureError
 *
 * Thrown when no extraction mode (layout, raw or OCR) yields any text for
 * the scanned pages of a document. Fatal for that document only.
 */
export class ExtractionFailureError extends Error {
  constructor(
    public readonly documentPath: string,
    message = `No text could be extracted from ${documentPath}`,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ExtractionFailureError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ExtractionFailureError from unknown error with context
   */
  static fromError(documentPath: string, error: unknown): ExtractionFailureError {
    return new ExtractionFailureError(
      documentPath,
      `Text extraction failed for ${documentPath}: ${ExtractionFailureError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
