import { describe, expect, test } from 'vitest';

import { TextCleaner } from './text-cleaner';

describe('TextCleaner', () => {
  describe('normalizeLineBreaks', () => {
    test('converts CRLF, CR and form feeds', () => {
      expect(TextCleaner.normalizeLineBreaks('a\r\nb\rc\fd')).toBe(
        'a\nb\nc\nd',
      );
    });
  });

  describe('dehyphenate', () => {
    test('removes a line-end hyphen before a lowercase continuation', () => {
      expect(TextCleaner.dehyphenate('extra-\nordinary')).toBe('extraordinary');
    });

    test('keeps a hyphen before an uppercase line', () => {
      expect(TextCleaner.dehyphenate('Long-\nRange')).toBe('Long-\nRange');
    });

    test('joins a lowercase continuation with a space', () => {
      expect(TextCleaner.dehyphenate('The wind\nand the rain')).toBe(
        'The wind and the rain',
      );
    });

    test('does not join after a period, colon or semicolon', () => {
      expect(TextCleaner.dehyphenate('End.\nnext')).toBe('End.\nnext');
      expect(TextCleaner.dehyphenate('Note:\nnext')).toBe('Note:\nnext');
      expect(TextCleaner.dehyphenate('One;\nnext')).toBe('One;\nnext');
    });
  });

  describe('normalizeTypography', () => {
    test('folds dashes to hyphens', () => {
      expect(TextCleaner.normalizeTypography('A\u2014B\u2013C\u2212D')).toBe(
        'A-B-C-D',
      );
    });

    test('straightens curly quotes', () => {
      expect(
        TextCleaner.normalizeTypography('Harper\u2019s \u201CPoem\u201D'),
      ).toBe('Harper\'s "Poem"');
    });

    test('converts tabs and special spaces to regular spaces', () => {
      expect(TextCleaner.normalizeTypography('a\tb\u00A0c\u2009d')).toBe(
        'a b c d',
      );
    });

    test('keeps line breaks', () => {
      expect(TextCleaner.normalizeTypography('a\nb')).toBe('a\nb');
    });
  });

  describe('clean', () => {
    test('does not dehyphenate a wrapped em dash', () => {
      expect(TextCleaner.clean('word\u2014\nnext')).toBe('word- next');
    });

    test('returns empty string for empty input', () => {
      expect(TextCleaner.clean('')).toBe('');
    });

    test('splits pages joined by form feeds', () => {
      expect(TextCleaner.clean('PAGE ONE\fPAGE TWO')).toBe(
        'PAGE ONE\nPAGE TWO',
      );
    });
  });

  describe('collapseSpaces', () => {
    test('collapses whitespace runs and trims', () => {
      expect(TextCleaner.collapseSpaces('  THE   TALK  OF\tTHE TOWN ')).toBe(
        'THE TALK OF THE TOWN',
      );
    });
  });

  describe('trimTrailingPunctuation', () => {
    test('removes trailing commas and leader dots', () => {
      expect(TextCleaner.trimTrailingPunctuation('Transitions, ')).toBe(
        'Transitions',
      );
      expect(TextCleaner.trimTrailingPunctuation('James Marcus ...')).toBe(
        'James Marcus',
      );
    });

    test('keeps a single final dot', () => {
      expect(TextCleaner.trimTrailingPunctuation('Martin Luther King Jr.')).toBe(
        'Martin Luther King Jr.',
      );
    });

    test('removes trailing dashes', () => {
      expect(TextCleaner.trimTrailingPunctuation('The Title -')).toBe(
        'The Title',
      );
    });
  });
});
