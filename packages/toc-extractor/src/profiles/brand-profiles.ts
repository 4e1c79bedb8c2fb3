import type { KnownBrand } from '@magtoc/model';

import type { BrandProfile } from '../types';

import { TocFinder } from '../finders/toc-finder';
import { patternsByName } from '../patterns/item-patterns';

/**
 * Denylist entries shared by every brand
 */
const COMMON_DENYLIST = ['PRICE $', 'SUBSCRIBE', 'ILLUSTRATIONS BY'] as const;

export const NEW_YORKER_PROFILE: BrandProfile = {
  brand: 'newyorker',
  displayName: 'The New Yorker',
  sections: [
    'THE TALK OF THE TOWN',
    'PERSONAL HISTORY',
    'TAKES',
    'SHOUTS & MURMURS',
    'ANNALS OF',
    'A REPORTER AT LARGE',
    'PROFILES',
    'FICTION',
    'THE CRITICS',
    'BOOKS',
    'THE CURRENT CINEMA',
    'THE THEATRE',
    'POEMS',
    'GOINGS ON',
    'COVER',
    'CONTRIBUTORS',
    'TABLES FOR TWO',
    'MUSICAL EVENTS',
    'ON AND OFF THE MENU',
    'THE MAIL',
    'COMMENT',
    'LETTER FROM',
    'THE ART WORLD',
    'POP MUSIC',
    'DANCING',
    'ON TELEVISION',
    'THE SPORTING SCENE',
    'DEPT. OF',
    'LIFE AND LETTERS',
    'AMERICAN CHRONICLES',
    'THE POLITICAL SCENE',
    'ONWARD AND UPWARD WITH',
    'OUR LOCAL CORRESPONDENTS',
  ],
  denylist: [
    ...COMMON_DENYLIST,
    'WINTER PREVIEW',
    'THE WEEKEND ESSAY',
    'THE NEW YORKER,',
    'LOVE BOOKS, LOVE FOLIO',
  ],
  patterns: patternsByName([
    'title-by-author-page',
    'author-page-title',
    'title-leaders-page-author',
    'title-author-leaders-page',
    'author-title-page',
    'quoted-poems',
    'title-leaders-page',
    'title-spaces-page',
    'page-title',
    'title-trailing-page',
  ]),
  editorialSlots: { mail: ['THE MAIL'], contributors: ['CONTRIBUTORS'] },
  poemSections: ['POEMS'],
  sliceRegion: true,
  rawRetry: true,
  mergeRawText: false,
  filenameTokens: ['new yorker', 'new_yorker', 'new-yorker', 'newyorker'],
  contentMarkers: [
    'the new yorker',
    'the talk of the town',
    'shouts & murmurs',
    'goings on about town',
    'the current cinema',
  ],
};

export const ATLANTIC_PROFILE: BrandProfile = {
  brand: 'atlantic',
  displayName: 'The Atlantic',
  sections: [
    'FEATURES',
    'DISPATCHES',
    'IDEAS',
    'CULTURE',
    'POLITICS',
    'SCIENCE',
    'TECHNOLOGY',
    'BUSINESS',
    'BOOKS',
    'REVIEW',
    'ESSAYS',
    'ESSAY',
    'VOICES',
    'CORRESPONDENCE',
    'POETRY',
    'CONTRIBUTORS',
    'THE COMMONS',
  ],
  denylist: [...COMMON_DENYLIST, 'ON THE COVER'],
  patterns: patternsByName([
    'title-by-author-page',
    'title-leaders-page-author',
    'title-author-leaders-page',
    'author-title-page',
    'title-leaders-page',
    'title-spaces-page',
    'page-title',
    'title-trailing-page',
  ]),
  editorialSlots: {
    mail: ['THE COMMONS', 'CORRESPONDENCE'],
    contributors: ['CONTRIBUTORS'],
  },
  poemSections: [],
  sliceRegion: true,
  rawRetry: true,
  mergeRawText: false,
  filenameTokens: ['atlantic'],
  contentMarkers: ['the atlantic', 'theatlantic.com'],
};

const harpersFinder = new TocFinder();

export const HARPERS_PROFILE: BrandProfile = {
  brand: 'harpers',
  displayName: "Harper's Magazine",
  sections: [
    'READINGS',
    'ESSAY',
    'REPORT',
    'NOTEBOOK',
    'LETTER',
    'LETTERS',
    'REVIEWS',
    'REVIEW',
    'POEM',
    'POETRY',
    'FICTION',
    'ART',
    'ARTS & LETTERS',
    'ANNOTATIONS',
    'DEPARTMENTS',
    'EASY CHAIR',
    'CONTRIBUTORS',
    'STORY',
    'MEMOIR',
    'PUZZLE',
    'NEW BOOKS',
  ],
  denylist: [
    ...COMMON_DENYLIST,
    "HARPER'S INDEX",
    'HARPERS INDEX',
    'FINDINGS',
  ],
  patterns: patternsByName([
    'title-leaders-page-author',
    'title-author-leaders-page',
    'title-by-author-page',
    'author-title-page',
    'title-leaders-page',
    'title-spaces-page',
    'page-title',
    'title-trailing-page',
  ]),
  editorialSlots: { mail: ['LETTERS'], contributors: ['CONTRIBUTORS'] },
  poemSections: [],
  sliceRegion: false,
  rawRetry: false,
  mergeRawText: true,
  filenameTokens: ['harper'],
  contentMarkers: [
    "harper's magazine",
    'harpers magazine',
    "harper's index",
    'harpers.org',
    'easy chair',
  ],
  selectPages: (pages) => harpersFinder.selectTocPages(pages),
};

/**
 * Profiles of every known brand, in detection priority order
 */
export const BRAND_PROFILES: Record<KnownBrand, BrandProfile> = {
  newyorker: NEW_YORKER_PROFILE,
  atlantic: ATLANTIC_PROFILE,
  harpers: HARPERS_PROFILE,
};

export function getBrandProfile(brand: KnownBrand): BrandProfile {
  return BRAND_PROFILES[brand];
}
