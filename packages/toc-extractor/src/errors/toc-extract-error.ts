import type { TocEntry } from '@magtoc/model';

/**
 * Single issue found while checking a parse result before rendering
 */
export interface TocValidationIssue {
  /**
   * Issue code (R001, R002, etc.)
   */
  code: string;

  message: string;

  /**
   * Index of the entry (e.g., "[3]")
   */
  path: string;

  entry: TocEntry;
}

export interface TocValidationResult {
  valid: boolean;
  issues: TocValidationIssue[];
  errorCount: number;
}

/**
 * TocExtractError
 *
 * Base error class for table of contents extraction failures.
 */
export class TocExtractError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TocExtractError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TocExtractError from unknown error with context
   */
  static fromError(context: string, error: unknown): TocExtractError {
    return new TocExtractError(
      `${context}: ${TocExtractError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * DocumentNotFoundError
 *
 * Error thrown when the input path is missing or is not a file.
 */
export class DocumentNotFoundError extends TocExtractError {
  constructor(
    public readonly documentPath: string,
    options?: ErrorOptions,
  ) {
    super(`Document not found: ${documentPath}`, options);
    this.name = 'DocumentNotFoundError';
  }
}

/**
 * RenderingError
 *
 * Thrown when a parse result breaks the entry ordering invariants.
 * Indicates a parser defect and is always surfaced.
 */
export class RenderingError extends TocExtractError {
  readonly validationResult: TocValidationResult;

  constructor(message: string, validationResult: TocValidationResult) {
    super(message);
    this.name = 'RenderingError';
    this.validationResult = validationResult;
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const { errorCount, issues } = this.validationResult;
    const lines = [
      `ToC rendering failed: ${errorCount} error(s)`,
      '',
      'Issues:',
    ];

    for (const issue of issues) {
      lines.push(`  [${issue.code}] ${issue.message}`);
      lines.push(`    Path: ${issue.path}`);
      lines.push(
        `    Entry: ${issue.entry.kind} "${issue.entry.title ?? issue.entry.section}" (page ${issue.entry.page ?? '-'})`,
      );
    }

    return lines.join('\n');
  }
}
