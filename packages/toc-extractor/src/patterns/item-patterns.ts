import type { ItemMatch, ItemPattern, PatternMatch } from '../types';

import { LAYOUT_PARSER } from '../config/constants';
import { TextCleaner } from '../utils/text-cleaner';

/**
 * Leader between a title and its page: a spaced run of dots, ellipses,
 * middle dots, bullets or dashes, or an unspaced run of two or more dots
 */
const LEADER = String.raw`(?:\s[.…·•-]+\s|\s?[.…·•]{2,}\s?)`;

/**
 * Capitalized name such as "Jill Lepore" or "D. T. Max"
 */
const AUTHOR = String.raw`[A-Z][\w.'\-]+(?: [A-Z][\w.'\-]+)*`;

const PAGE = String.raw`(?<page>\d{1,3})`;

interface MatchGroups {
  title?: string;
  author?: string;
  page?: string;
}

function toItem(groups: MatchGroups): ItemMatch | null {
  if (groups.title === undefined || groups.page === undefined) {
    return null;
  }
  const title = TextCleaner.trimTrailingPunctuation(groups.title.trim());
  const author =
    groups.author === undefined
      ? undefined
      : TextCleaner.trimTrailingPunctuation(groups.author.trim());
  return {
    title,
    ...(author ? { author } : {}),
    page: Number.parseInt(groups.page, 10),
  };
}

/**
 * Pattern backed by anchored regexes tried in order; the first match wins
 */
function regexPattern(name: string, ...regexes: RegExp[]): ItemPattern {
  return {
    name,
    match(line): PatternMatch | null {
      for (const regex of regexes) {
        const match = regex.exec(line);
        if (!match?.groups) {
          continue;
        }
        const item = toItem(match.groups);
        return item ? { items: [item], consumedNext: false } : null;
      }
      return null;
    },
  };
}

const BY = String.raw`\s+(?:by|BY|By)\s+(?<author>[A-Z][^\d]*?)`;

/**
 * "Transitions, by James Marcus ... 20" or "Transitions by James Marcus ... 20"
 *
 * Without the comma a leader must precede the page, so a title such as
 * "Killed by Kindness    52" is not split at "by".
 */
export const titleByAuthorPage = regexPattern(
  'title-by-author-page',
  new RegExp(String.raw`^(?<title>.+?),${BY}(?:${LEADER}|\s+)${PAGE}$`),
  new RegExp(String.raw`^(?<title>.+?)${BY}${LEADER}${PAGE}$`),
);

/**
 * "Easy Chair .... 9 - Lewis Carroll"
 */
export const titleLeadersPageAuthor = regexPattern(
  'title-leaders-page-author',
  new RegExp(
    String.raw`^(?<title>.+?)${LEADER}${PAGE}\s*-+\s*(?<author>\D+)$`,
  ),
);

/**
 * "The Long Road - Ann Smith .... 40"
 */
export const titleAuthorLeadersPage = regexPattern(
  'title-author-leaders-page',
  new RegExp(
    String.raw`^(?<title>.+?)\s+-+\s+(?<author>.+?)${LEADER}${PAGE}$`,
  ),
);

const AUTHOR_PAGE_TITLE = new RegExp(
  String.raw`^(?<author>${AUTHOR})\s{2,}${PAGE}\s{2,}(?<title>\S.*)$`,
);

/**
 * "Jill Lepore   24   The Last Archive"
 *
 * The next line is appended to the title as a dek when it has no trailing
 * page number, is not a section heading and has a plausible length. Poem
 * sections never take a dek.
 */
export const authorPageTitle: ItemPattern = {
  name: 'author-page-title',
  match(line, context): PatternMatch | null {
    const match = AUTHOR_PAGE_TITLE.exec(line);
    if (!match?.groups) {
      return null;
    }
    const item = toItem(match.groups);
    if (!item) {
      return null;
    }

    const next = context.next?.trim();
    if (
      next !== undefined &&
      !context.isPoemSection &&
      !/\d{1,3}\s*$/.test(next) &&
      !context.isSectionLine(next) &&
      next.length >= LAYOUT_PARSER.DEK_MIN_LENGTH &&
      next.length <= LAYOUT_PARSER.DEK_MAX_LENGTH
    ) {
      return {
        items: [{ ...item, title: `${item.title} — ${next}` }],
        consumedNext: true,
      };
    }
    return { items: [item], consumedNext: false };
  },
};

/**
 * "Jill Lepore   The Last Archive   24"
 */
export const authorTitlePage = regexPattern(
  'author-title-page',
  new RegExp(
    String.raw`^(?<author>${AUTHOR})\s{2,}(?<title>\S.*?)\s{2,}${PAGE}$`,
  ),
);

const QUOTED_POEM = /("[^"]+")\s*(?:-\s*)?([^0-9"(]+)?\s*(?:\(p\.\s*)?(\d{1,3})\)?/g;

/**
 * Several quoted poems on one line:
 * `"Elegy" - Ann Smith 40  "Spring" Tom Reed 52`
 *
 * Only applies inside poem sections. Titles keep their quotes.
 */
export const quotedPoems: ItemPattern = {
  name: 'quoted-poems',
  match(line, context): PatternMatch | null {
    if (!context.isPoemSection || !line.includes('"')) {
      return null;
    }
    const items: ItemMatch[] = [];
    for (const [, title, author, page] of line.matchAll(QUOTED_POEM)) {
      const name = author?.trim();
      items.push({
        title: title.trim(),
        ...(name ? { author: name } : {}),
        page: Number.parseInt(page, 10),
      });
    }
    return items.length > 0 ? { items, consumedNext: false } : null;
  },
};

/**
 * "Notebook .... 11"
 */
export const titleLeadersPage = regexPattern(
  'title-leaders-page',
  new RegExp(String.raw`^(?<title>.+?)${LEADER}${PAGE}$`),
);

/**
 * "The Talk of the Town    15"
 */
export const titleSpacesPage = regexPattern(
  'title-spaces-page',
  new RegExp(String.raw`^(?<title>.+?)\s{2,}${PAGE}$`),
);

/**
 * "15 The Talk of the Town"
 */
export const pageTitle = regexPattern(
  'page-title',
  new RegExp(String.raw`^${PAGE}\s+(?<title>.+)$`),
);

/**
 * "The Talk of the Town 15"
 */
export const titleTrailingPage = regexPattern(
  'title-trailing-page',
  new RegExp(String.raw`^(?<title>.+?)\s${PAGE}$`),
);

/**
 * Every pattern by name
 */
export const ITEM_PATTERNS = {
  'title-by-author-page': titleByAuthorPage,
  'title-leaders-page-author': titleLeadersPageAuthor,
  'title-author-leaders-page': titleAuthorLeadersPage,
  'author-page-title': authorPageTitle,
  'author-title-page': authorTitlePage,
  'quoted-poems': quotedPoems,
  'title-leaders-page': titleLeadersPage,
  'title-spaces-page': titleSpacesPage,
  'page-title': pageTitle,
  'title-trailing-page': titleTrailingPage,
} as const satisfies Record<string, ItemPattern>;

export type ItemPatternName = keyof typeof ITEM_PATTERNS;

/**
 * Resolve pattern names to patterns, keeping their order
 */
export function patternsByName(
  names: readonly ItemPatternName[],
): ItemPattern[] {
  return names.map((name) => ITEM_PATTERNS[name]);
}
