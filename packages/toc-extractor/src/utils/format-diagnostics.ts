import type { ParseDiagnostics } from '@magtoc/model';

/**
 * Single-line `key=value` summary of parse diagnostics
 */
export function formatDiagnostics(diagnostics: ParseDiagnostics): string {
  const { lineCounts } = diagnostics;
  const pages =
    diagnostics.pageModes
      .map((page) => `${page.pageNumber}:${page.mode}`)
      .join(',') || '-';
  const parsed = diagnostics.pagesParsed.join(',') || '-';

  return [
    `brand=${diagnostics.brand}`,
    `brand_source=${diagnostics.brandSource}`,
    `brand_unresolved=${diagnostics.brandUnresolved}`,
    `pages=${pages}`,
    `parsed=${parsed}`,
    `candidates=${lineCounts.candidates}`,
    `matched=${lineCounts.matched}`,
    `unmatched=${lineCounts.unmatched}`,
    `denied=${lineCounts.denied}`,
    `noise=${lineCounts.noise}`,
    `joined=${lineCounts.joined}`,
    `raw_retry=${diagnostics.rawRetry}`,
    `raw_merged=${diagnostics.rawMerged}`,
  ].join(' ');
}

/**
 * `name:count` pairs of pattern hits, sorted by name
 */
export function formatPatternHits(patternHits: Record<string, number>): string {
  return Object.keys(patternHits)
    .sort()
    .map((name) => `${name}:${patternHits[name]}`)
    .join(',');
}
