import type { ParseResult, RenderOptions } from '@magtoc/model';

import { describe, expect, test, vi } from 'vitest';

import { RenderingError } from '../errors/toc-extract-error';
import { LayoutParser } from '../parsers/layout-parser';
import { NEW_YORKER_PROFILE } from '../profiles/brand-profiles';
import { ReportRenderer, filterEntries } from './report-renderer';

const result: ParseResult = {
  brand: 'newyorker',
  issueTitle: 'THE NEW YORKER, MARCH 3, 2025',
  entries: [
    { kind: 'item', section: 'CONTENTS', title: 'Opening', page: 2 },
    { kind: 'section', section: 'THE MAIL', page: 4 },
    {
      kind: 'item',
      section: 'THE MAIL',
      title: 'Letters on cats',
      author: 'Ann Smith',
      page: 4,
    },
    { kind: 'section', section: 'PERSONAL HISTORY', page: 20 },
    {
      kind: 'item',
      section: 'PERSONAL HISTORY',
      title: 'Transitions',
      author: 'James Marcus',
      page: 20,
    },
    { kind: 'section', section: 'FICTION' },
    { kind: 'item', section: 'FICTION', title: 'The Visit', page: 70 },
    {
      kind: 'item',
      section: 'FICTION',
      title: 'The Return',
      author: 'Tom Reed',
      page: 78,
    },
    { kind: 'section', section: 'CONTRIBUTORS', page: 6 },
  ],
  editorialSlots: { mail: ['THE MAIL'], contributors: ['CONTRIBUTORS'] },
  diagnostics: {
    brand: 'newyorker',
    brandSource: 'filename',
    brandUnresolved: false,
    pageModes: [],
    pagesParsed: [1],
    lineCounts: {
      candidates: 5,
      matched: 5,
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

const textOptions: RenderOptions = {
  format: 'text',
  includeMail: false,
  includeContributors: false,
  suppressEmpty: false,
};

describe('ReportRenderer', () => {
  const renderer = new ReportRenderer();

  describe('text format', () => {
    test('renders the issue title, the heading list and one block per section', () => {
      expect(renderer.render(result, textOptions)).toEqual({
        format: 'text',
        content: [
          'THE NEW YORKER, MARCH 3, 2025',
          '',
          'PERSONAL HISTORY (p. 20)',
          'FICTION',
          '',
          'CONTENTS',
          '• Opening (p. 2)',
          '',
          'PERSONAL HISTORY (p. 20)',
          '• Transitions (p. 20) — James Marcus',
          '',
          'FICTION',
          '• The Visit (p. 70)',
          '• The Return (p. 78) — Tom Reed',
          '',
        ].join('\n'),
      });
    });

    test('lists an empty heading unless suppressEmpty is set', () => {
      const options = { ...textOptions, includeContributors: true };

      expect(
        renderer.render(result, options).content.split('\n').slice(2, 6),
      ).toEqual(['PERSONAL HISTORY (p. 20)', 'FICTION', 'CONTRIBUTORS (p. 6)', '']);
      expect(
        renderer
          .render(result, { ...options, suppressEmpty: true })
          .content.split('\n')
          .slice(2, 5),
      ).toEqual(['PERSONAL HISTORY (p. 20)', 'FICTION', '']);
    });

    test('gives an empty heading no block of its own', () => {
      const content = renderer.render(result, {
        ...textOptions,
        includeContributors: true,
      }).content;

      expect(content.endsWith('• The Return (p. 78) — Tom Reed\n')).toBe(true);
    });

    test('includes mail sections on request', () => {
      const content = renderer.render(result, {
        ...textOptions,
        includeMail: true,
      }).content;
      const lines = content.split('\n');

      expect(lines[2]).toBe('THE MAIL (p. 4)');
      expect(lines.slice(9, 12)).toEqual([
        'THE MAIL (p. 4)',
        '• Letters on cats (p. 4) — Ann Smith',
        '',
      ]);
    });

    test('caps items per section', () => {
      const content = renderer.render(result, {
        ...textOptions,
        maxItemsPerSection: 1,
      }).content;

      expect(content.endsWith('FICTION\n• The Visit (p. 70)\n')).toBe(true);
    });

    test('renders an empty result as an empty string', () => {
      expect(
        renderer.render({ ...result, issueTitle: undefined, entries: [] }, textOptions)
          .content,
      ).toBe('');
    });

    test('omits page and author when absent', () => {
      const content = renderer.render(
        {
          ...result,
          issueTitle: undefined,
          entries: [{ kind: 'item', section: 'CONTENTS', title: 'Opening' }],
        },
        textOptions,
      ).content;

      expect(content).toBe('CONTENTS\n• Opening\n');
    });

    test('is idempotent', () => {
      expect(renderer.render(result, textOptions)).toEqual(
        renderer.render(result, textOptions),
      );
    });
  });

  describe('structured format', () => {
    test('renders filtered entries as pretty JSON with nulls', () => {
      const content = renderer.render(result, {
        ...textOptions,
        format: 'structured',
      }).content;

      expect(content).toBe(
        `${JSON.stringify(
          {
            issue: 'THE NEW YORKER, MARCH 3, 2025',
            brand: 'newyorker',
            entries: [
              {
                kind: 'item',
                section: 'CONTENTS',
                title: 'Opening',
                author: null,
                page: 2,
              },
              {
                kind: 'section',
                section: 'PERSONAL HISTORY',
                title: null,
                author: null,
                page: 20,
              },
              {
                kind: 'item',
                section: 'PERSONAL HISTORY',
                title: 'Transitions',
                author: 'James Marcus',
                page: 20,
              },
              {
                kind: 'section',
                section: 'FICTION',
                title: null,
                author: null,
                page: null,
              },
              {
                kind: 'item',
                section: 'FICTION',
                title: 'The Visit',
                author: null,
                page: 70,
              },
              {
                kind: 'item',
                section: 'FICTION',
                title: 'The Return',
                author: 'Tom Reed',
                page: 78,
              },
            ],
          },
          null,
          2,
        )}\n`,
      );
    });

    test('uses null for a missing issue title', () => {
      const content = renderer.render(
        { ...result, issueTitle: undefined, entries: [] },
        { ...textOptions, format: 'structured' },
      ).content;

      expect(JSON.parse(content)).toEqual({
        issue: null,
        brand: 'newyorker',
        entries: [],
      });
    });
  });

  test('drops a mail heading set off from its page by one space', () => {
    const parser = new LayoutParser(
      { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
      NEW_YORKER_PROFILE,
    );
    const parsed = parser.parse({
      document: { path: '/scans/issue.pdf', maxPages: 16, ocrFirstPages: 3 },
      pages: [
        {
          pageNumber: 1,
          text: [
            'CONTENTS',
            'THE MAIL 4',
            'Letters from readers ... 4',
            'PERSONAL HISTORY 20',
            'Transitions, by James Marcus ... 20',
          ].join('\n'),
          mode: 'native',
          source: 'pdftotext-raw',
        },
      ],
    });

    expect(renderer.render(parsed, textOptions).content).toBe(
      'PERSONAL HISTORY (p. 20)\n\nPERSONAL HISTORY (p. 20)\n• Transitions (p. 20) — James Marcus\n',
    );
    expect(
      renderer.render(parsed, { ...textOptions, includeMail: true }).content,
    ).toBe(
      [
        'THE MAIL (p. 4)',
        'PERSONAL HISTORY (p. 20)',
        '',
        'THE MAIL (p. 4)',
        '• Letters from readers (p. 4)',
        '',
        'PERSONAL HISTORY (p. 20)',
        '• Transitions (p. 20) — James Marcus',
        '',
      ].join('\n'),
    );
  });

  test('throws RenderingError when an item precedes its section', () => {
    const broken: ParseResult = {
      ...result,
      entries: [
        { kind: 'item', section: 'FICTION', title: 'The Visit', page: 70 },
        { kind: 'section', section: 'FICTION' },
      ],
    };

    expect(() => renderer.render(broken, textOptions)).toThrow(RenderingError);
  });
});

describe('filterEntries', () => {
  const toggles = [false, true];

  test('enabling a toggle never removes entries', () => {
    for (const includeMail of toggles) {
      for (const includeContributors of toggles) {
        const strict = filterEntries(result, {
          ...textOptions,
          includeMail,
          includeContributors,
          suppressEmpty: true,
        });
        const loose = filterEntries(result, {
          ...textOptions,
          includeMail: true,
          includeContributors: true,
          suppressEmpty: false,
        });

        for (const entry of strict) {
          expect(loose).toContain(entry);
        }
      }
    }
  });

  test('keeps source order', () => {
    const entries = filterEntries(result, {
      ...textOptions,
      includeMail: true,
      includeContributors: true,
    });

    expect(entries).toEqual(result.entries);
  });
});
