import type { LoggerMethods } from '@magtoc/logger';
import type {
  BrandDetection,
  BrandHint,
  KnownBrand,
  PageText,
  SourceDocument,
} from '@magtoc/model';

import { KNOWN_BRANDS } from '@magtoc/model';
import { basename } from 'node:path';

import { BRAND_PROFILES } from '../profiles/brand-profiles';
import { TextCleaner } from '../utils/text-cleaner';

/**
 * Override stage: a non-auto hint is taken verbatim
 */
export function detectByOverride(hint: BrandHint): BrandDetection | null {
  if (hint === 'auto') {
    return null;
  }
  return { brand: hint, source: 'override', candidates: [hint] };
}

/**
 * Brands whose file name tokens occur in the document's base name
 */
export function filenameCandidates(documentPath: string): KnownBrand[] {
  const name = basename(documentPath).toLowerCase();
  return KNOWN_BRANDS.filter((brand) =>
    BRAND_PROFILES[brand].filenameTokens.some((token) => name.includes(token)),
  );
}

/**
 * Filename stage: a unique token match wins
 */
export function detectByFilename(documentPath: string): BrandDetection | null {
  const candidates = filenameCandidates(documentPath);
  if (candidates.length !== 1) {
    return null;
  }
  return { brand: candidates[0], source: 'filename', candidates };
}

/**
 * Number of distinct content markers of each brand found on page 1
 */
export function contentScores(pageText: PageText): Record<KnownBrand, number> {
  const firstPage =
    pageText.pages.find((page) => page.pageNumber === 1) ?? pageText.pages[0];
  const text = TextCleaner.collapseSpaces(
    TextCleaner.clean(firstPage?.text ?? ''),
  ).toLowerCase();

  const score = (brand: KnownBrand) =>
    BRAND_PROFILES[brand].contentMarkers.filter((marker) =>
      text.includes(marker),
    ).length;

  return {
    newyorker: score('newyorker'),
    atlantic: score('atlantic'),
    harpers: score('harpers'),
  };
}

/**
 * Brands sharing the best positive content score
 */
export function contentCandidates(pageText: PageText): KnownBrand[] {
  const scores = contentScores(pageText);
  const best = Math.max(...KNOWN_BRANDS.map((brand) => scores[brand]));
  if (best <= 0) {
    return [];
  }
  return KNOWN_BRANDS.filter((brand) => scores[brand] === best);
}

/**
 * Content stage: the unique best positive score wins
 */
export function detectByContent(pageText: PageText): BrandDetection | null {
  const candidates = contentCandidates(pageText);
  if (candidates.length !== 1) {
    return null;
  }
  return { brand: candidates[0], source: 'content', candidates };
}

/**
 * BrandDetector
 *
 * Resolves the brand of a document through the priority chain
 * override, filename, content. Without a unique signal the brand is
 * `unknown` with source `none`; candidates then lists the tied brands.
 */
export class BrandDetector {
  constructor(private readonly logger: LoggerMethods) {}

  detect(
    document: SourceDocument,
    pageText: PageText,
    hint: BrandHint,
  ): BrandDetection {
    const detection =
      detectByOverride(hint) ??
      detectByFilename(document.path) ??
      detectByContent(pageText) ??
      this.unresolved(document, pageText);

    if (detection.brand === 'unknown') {
      this.logger.warn(
        `[BrandDetector] Brand unresolved for ${document.path}` +
          (detection.candidates.length > 0
            ? ` (candidates: ${detection.candidates.join(', ')})`
            : ''),
      );
    } else {
      this.logger.info(
        `[BrandDetector] Brand: ${detection.brand} (${detection.source})`,
      );
    }
    return detection;
  }

  private unresolved(
    document: SourceDocument,
    pageText: PageText,
  ): BrandDetection {
    const tied = contentCandidates(pageText);
    return {
      brand: 'unknown',
      source: 'none',
      candidates: tied.length > 0 ? tied : filenameCandidates(document.path),
    };
  }
}
