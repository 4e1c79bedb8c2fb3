/**
 * Rendering types
 */

export type ReportFormat = 'text' | 'structured';

/**
 * Options that decide what a rendered report contains
 */
export interface RenderOptions {
  format: ReportFormat;

  /**
   * Keep letters-to-the-editor sections
   */
  includeMail: boolean;

  /**
   * Keep contributor notes sections
   */
  includeContributors: boolean;

  /**
   * Drop section headings that keep no items after filtering
   */
  suppressEmpty: boolean;

  /**
   * Maximum items rendered per section (unlimited when absent)
   */
  maxItemsPerSection?: number;
}

/**
 * Final report text
 */
export interface RenderedReport {
  format: ReportFormat;
  content: string;
}
