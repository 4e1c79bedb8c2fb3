/**
 * TextCleaner - page text cleanup
 *
 * Prepares pdftotext / tesseract output for line matching while keeping the
 * line structure intact.
 * - Line break normalization (CRLF, form feeds between pages)
 * - Dehyphenation of words and sentences wrapped onto a lowercase line
 * - Typography normalization (dashes, curly quotes, special spaces)
 */
export class TextCleaner {
  /**
   * Full cleanup: line breaks, then dehyphenation, then typography.
   * Dehyphenation runs before dashes are folded so that a wrapped em dash
   * is not mistaken for a hyphen.
   */
  static clean(text: string): string {
    if (!text) return '';
    return this.normalizeTypography(
      this.dehyphenate(this.normalizeLineBreaks(text)),
    );
  }

  /**
   * Convert CRLF, CR and form feeds to `\n`
   */
  static normalizeLineBreaks(text: string): string {
    return text.replace(/\r\n?/g, '\n').replace(/\f/g, '\n');
  }

  /**
   * Rejoin lines that continue in lowercase
   * - `hyphen-\nated` becomes `hyphenated`
   * - `a line\ncontinued` becomes `a line continued`, unless the first
   *   line ends with `.`, `:` or `;`
   */
  static dehyphenate(text: string): string {
    return text
      .replace(/-\n(?=[a-z])/g, '')
      .replace(/(?<![.:;])\n(?=[a-z])/g, ' ');
  }

  /**
   * Fold typographic variants to ASCII
   * - Unicode normalization (NFC)
   * - Figure, en and em dashes and the minus sign to `-`
   * - Curly single and double quotes to straight quotes
   * - Tabs, non-breaking and other special spaces to a regular space
   */
  static normalizeTypography(text: string): string {
    return text
      .normalize('NFC')
      .replace(/[\u2012-\u2015\u2212]/g, '-')
      .replace(/[\u2018\u2019\u201B\u2032]/g, "'")
      .replace(/[\u201C\u201D\u201F\u2033]/g, '"')
      .replace(/[\t\u00A0\u2000-\u200B\u202F]/g, ' ');
  }

  /**
   * Collapse runs of whitespace to one space and trim
   */
  static collapseSpaces(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * Remove trailing separators and leaders (commas, colons, semicolons,
   * dashes, ellipses and runs of two or more dots). A single final dot is
   * kept so that initials and abbreviations survive.
   */
  static trimTrailingPunctuation(text: string): string {
    return text.replace(/(?:\s|[,;:\u2026-]|\.{2,})+$/, '').trim();
  }
}
