import type {
  ParseResult,
  RenderOptions,
  RenderedReport,
  TocEntry,
} from '@magtoc/model';

import type { StructuredReport } from './structured-report-schema';

import { groupBy } from 'es-toolkit';

import { TocValidator } from '../validators/toc-validator';
import { StructuredReportSchema } from './structured-report-schema';

/**
 * Apply the rendering toggles to parsed entries, keeping source order:
 * excluded editorial slots, the per-section item cap, then empty headings.
 */
export function filterEntries(
  result: ParseResult,
  options: RenderOptions,
): TocEntry[] {
  const excluded = new Set([
    ...(options.includeMail ? [] : result.editorialSlots.mail),
    ...(options.includeContributors ? [] : result.editorialSlots.contributors),
  ]);

  const kept: TocEntry[] = [];
  const itemCounts = new Map<string, number>();
  for (const entry of result.entries) {
    if (excluded.has(entry.section)) {
      continue;
    }
    if (entry.kind === 'item') {
      const count = itemCounts.get(entry.section) ?? 0;
      if (
        options.maxItemsPerSection !== undefined &&
        count >= options.maxItemsPerSection
      ) {
        continue;
      }
      itemCounts.set(entry.section, count + 1);
    }
    kept.push(entry);
  }

  if (!options.suppressEmpty) {
    return kept;
  }
  return kept.filter(
    (entry) => entry.kind === 'item' || itemCounts.has(entry.section),
  );
}

/**
 * ReportRenderer
 *
 * Renders a ParseResult as plain text or structured JSON. Output is a pure
 * function of its inputs. Entries are checked by TocValidator first; a
 * broken invariant throws RenderingError.
 */
export class ReportRenderer {
  constructor(private readonly validator = new TocValidator()) {}

  render(result: ParseResult, options: RenderOptions): RenderedReport {
    this.validator.validateOrThrow(result.entries);

    const entries = filterEntries(result, options);
    const content =
      options.format === 'structured'
        ? this.renderStructured(result, entries)
        : this.renderText(result, entries);

    return { format: options.format, content };
  }

  /**
   * Every kept heading on its own line (with its page when known), a blank
   * line, then one block per section that has items: the heading again and
   * one bullet per item. Blocks are separated by a blank line.
   */
  private renderText(result: ParseResult, entries: TocEntry[]): string {
    const lines: string[] = [];
    if (result.issueTitle) {
      lines.push(result.issueTitle, '');
    }

    const headings = entries.filter((entry) => entry.kind === 'section');
    const pages = new Map(headings.map((entry) => [entry.section, entry.page]));
    for (const heading of headings) {
      lines.push(this.formatHeading(heading.section, heading.page));
    }
    if (headings.length > 0) {
      lines.push('');
    }

    const items = entries.filter((entry) => entry.kind === 'item');
    const itemsBySection = groupBy(items, (entry) => entry.section);
    for (const section of new Set(items.map((entry) => entry.section))) {
      lines.push(this.formatHeading(section, pages.get(section)));
      for (const item of itemsBySection[section]) {
        lines.push(this.formatItem(item));
      }
      lines.push('');
    }

    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
      lines.pop();
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  private formatHeading(section: string, page: number | undefined): string {
    return page !== undefined ? `${section} (p. ${page})` : section;
  }

  private formatItem(item: TocEntry): string {
    const page = item.page !== undefined ? ` (p. ${item.page})` : '';
    const author = item.author ? ` — ${item.author}` : '';
    return `• ${item.title ?? ''}${page}${author}`;
  }

  private renderStructured(result: ParseResult, entries: TocEntry[]): string {
    const report: StructuredReport = StructuredReportSchema.parse({
      issue: result.issueTitle ?? null,
      brand: result.brand,
      entries: entries.map((entry) => ({
        kind: entry.kind,
        section: entry.section,
        title: entry.title ?? null,
        author: entry.author ?? null,
        page: entry.page ?? null,
      })),
    });
    return `${JSON.stringify(report, null, 2)}\n`;
  }
}
