import type { PageText, ParseResult } from '@magtoc/model';

import type { BrandParser, ParseOptions } from '../types';

/**
 * Parser for documents whose brand could not be resolved.
 * Returns an empty result flagged with `brandUnresolved`.
 */
export class NullParser implements BrandParser {
  readonly brand = 'unknown' as const;

  parse(pageText: PageText, options?: ParseOptions): ParseResult {
    return {
      brand: 'unknown',
      entries: [],
      editorialSlots: { mail: [], contributors: [] },
      diagnostics: {
        brand: 'unknown',
        brandSource: options?.brandSource ?? 'none',
        brandUnresolved: true,
        pageModes: pageText.pages.map((page) => ({
          pageNumber: page.pageNumber,
          mode: page.mode,
          source: page.source,
        })),
        pagesParsed: [],
        lineCounts: {
          candidates: 0,
          matched: 0,
          unmatched: 0,
          denied: 0,
          noise: 0,
          joined: 0,
        },
        joins: [],
        patternHits: {},
        rawRetry: false,
        rawMerged: false,
      },
    };
  }
}
