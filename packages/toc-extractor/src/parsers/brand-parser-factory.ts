import type { LoggerMethods } from '@magtoc/logger';
import type { Brand } from '@magtoc/model';

import type { BrandParser } from '../types';

import { getBrandProfile } from '../profiles/brand-profiles';
import { LayoutParser } from './layout-parser';
import { NullParser } from './null-parser';

/**
 * Parser for a detected brand; `unknown` gets the null parser
 */
export function createBrandParser(
  logger: LoggerMethods,
  brand: Brand,
): BrandParser {
  if (brand === 'unknown') {
    return new NullParser();
  }
  return new LayoutParser(logger, getBrandProfile(brand));
}
