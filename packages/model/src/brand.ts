/**
 * Magazine brand identifiers
 */

/**
 * Editorial layout that produced a document
 */
export type Brand = 'newyorker' | 'atlantic' | 'harpers' | 'unknown';

/**
 * Brand requested by the caller; `auto` asks for detection
 */
export type BrandHint = 'auto' | Exclude<Brand, 'unknown'>;

/**
 * Known brands, in detection priority order
 */
export const KNOWN_BRANDS = ['newyorker', 'atlantic', 'harpers'] as const;

export type KnownBrand = (typeof KNOWN_BRANDS)[number];

/**
 * Detection stage that decided the brand
 *
 * - override: explicit brand hint
 * - filename: brand token in the file name
 * - content: masthead or section vocabulary on page 1
 * - none: no unique signal, brand is unknown
 */
export type BrandSource = 'override' | 'filename' | 'content' | 'none';

/**
 * Result of brand detection
 */
export interface BrandDetection {
  brand: Brand;

  source: BrandSource;

  /**
   * Brands that produced a signal at the deciding (or last tried) stage
   */
  candidates: KnownBrand[];
}
