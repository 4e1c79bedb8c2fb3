/**
 * Table of contents entry types
 */

/**
 * Entry kind
 *
 * - section: a section heading such as "PERSONAL HISTORY"
 * - item: a single piece listed under a section
 */
export type TocEntryKind = 'section' | 'item';

/**
 * Section name used for items that appear before any section heading
 */
export const DEFAULT_SECTION = 'CONTENTS';

/**
 * One line of the extracted table of contents
 *
 * For section entries `section` is the heading itself and `title`/`author`
 * are absent. For items `section` names the heading they are listed under.
 */
export interface TocEntry {
  kind: TocEntryKind;

  section: string;

  title?: string;

  author?: string;

  /**
   * Printed page number (1-999)
   */
  page?: number;
}
