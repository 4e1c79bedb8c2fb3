import type { TocEntry } from '@magtoc/model';

import type {
  TocValidationIssue,
  TocValidationResult,
} from '../errors/toc-extract-error';

import { DEFAULT_SECTION } from '@magtoc/model';

import { LAYOUT_PARSER } from '../config/constants';
import { RenderingError } from '../errors/toc-extract-error';

/**
 * TocValidator
 *
 * Checks the ordering invariants of parsed entries before rendering:
 * - R001: an item's section has a heading at or before it (or is CONTENTS)
 * - R002: pages lie in 1..999
 * - R003: items have a non-empty title
 * - R004: no item appears twice in the same section
 * - R005: no section heading appears twice
 */
export class TocValidator {
  private issues: TocValidationIssue[] = [];

  validate(entries: readonly TocEntry[]): TocValidationResult {
    this.issues = [];

    const seenSections = new Set<string>();
    const seenItems = new Set<string>();

    entries.forEach((entry, index) => {
      const path = `[${index}]`;

      this.validatePage(entry, path);

      if (entry.kind === 'section') {
        if (seenSections.has(entry.section)) {
          this.addIssue({
            code: 'R005',
            message: `Duplicate section "${entry.section}"`,
            path,
            entry,
          });
        }
        seenSections.add(entry.section);
        return;
      }

      if (
        entry.section !== DEFAULT_SECTION &&
        !seenSections.has(entry.section)
      ) {
        this.addIssue({
          code: 'R001',
          message: `Item section "${entry.section}" has no heading before it`,
          path,
          entry,
        });
      }

      const title = entry.title?.trim() ?? '';
      if (title === '') {
        this.addIssue({
          code: 'R003',
          message: 'Item title is empty or missing',
          path,
          entry,
        });
      }

      const key = `${entry.section}|${title.toLowerCase()}|${entry.page ?? ''}`;
      if (seenItems.has(key)) {
        this.addIssue({
          code: 'R004',
          message: `Duplicate item "${title}" in ${entry.section}`,
          path,
          entry,
        });
      }
      seenItems.add(key);
    });

    const errorCount = this.issues.length;
    return { valid: errorCount === 0, issues: [...this.issues], errorCount };
  }

  /**
   * Validate and throw if invalid
   *
   * @throws {RenderingError} When an invariant is broken
   */
  validateOrThrow(entries: readonly TocEntry[]): void {
    const result = this.validate(entries);

    if (!result.valid) {
      throw new RenderingError(
        `ToC entries are inconsistent: ${result.errorCount} error(s)`,
        result,
      );
    }
  }

  /**
   * R002: page range
   */
  private validatePage(entry: TocEntry, path: string): void {
    if (
      entry.page !== undefined &&
      (!Number.isInteger(entry.page) ||
        entry.page < LAYOUT_PARSER.MIN_PAGE ||
        entry.page > LAYOUT_PARSER.MAX_PAGE)
    ) {
      this.addIssue({
        code: 'R002',
        message: `Page must be within ${LAYOUT_PARSER.MIN_PAGE}..${LAYOUT_PARSER.MAX_PAGE}, got ${entry.page}`,
        path,
        entry,
      });
    }
  }

  private addIssue(issue: TocValidationIssue): void {
    this.issues.push(issue);
  }
}
