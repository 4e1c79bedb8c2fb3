import type { LoggerMethods } from '@magtoc/logger';

import { spawnAsync } from '@magtoc/shared';

import { PDF_TEXT_EXTRACTOR } from '../config/constants';

/**
 * Native text-layer extraction mode
 *
 * - layout: keeps column and line structure (`-layout`)
 * - raw: content-stream order (`-raw`)
 */
export type NativeTextMode = keyof typeof PDF_TEXT_EXTRACTOR.MODE_FLAGS;

/**
 * Reads the native text layer of PDF pages with pdftotext.
 *
 * A page range is read with one pdftotext call and split on the form feeds
 * pdftotext writes after every page. When that call fails the range is read
 * page by page, and a page that still fails yields an empty string.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Extract text from pages 1..lastPage.
   *
   * @returns 1-based page numbers mapped to their text
   */
  async extractText(
    pdfPath: string,
    lastPage: number,
    mode: NativeTextMode = 'layout',
  ): Promise<Map<number, string>> {
    if (lastPage < 1) {
      return new Map();
    }

    this.logger.info(
      `[PdfTextExtractor] Extracting ${mode} text from ${lastPage} pages...`,
    );

    const result = await spawnAsync(
      'pdftotext',
      pdftotextArgs(pdfPath, 1, lastPage, mode),
    );

    let pageTexts: Map<number, string>;
    if (result.code === 0) {
      pageTexts = splitPages(result.stdout, lastPage);
    } else {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for pages 1-${lastPage}, reading pages one by one: ${result.stderr || 'Unknown error'}`,
      );
      pageTexts = new Map();
      for (let page = 1; page <= lastPage; page++) {
        pageTexts.set(page, await this.extractPageText(pdfPath, page, mode));
      }
    }

    const nonEmptyCount = [...pageTexts.values()].filter(
      (text) => text.trim().length > 0,
    ).length;
    this.logger.info(
      `[PdfTextExtractor] Extracted ${mode} text from ${nonEmptyCount}/${lastPage} pages`,
    );

    return pageTexts;
  }

  /**
   * Extract text from a single page. Returns an empty string when pdftotext
   * exits with an error.
   */
  async extractPageText(
    pdfPath: string,
    page: number,
    mode: NativeTextMode = 'layout',
  ): Promise<string> {
    const result = await spawnAsync(
      'pdftotext',
      pdftotextArgs(pdfPath, page, page, mode),
    );

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout.replace(/\f$/, '');
  }

  /**
   * Page count reported by pdfinfo; 0 when unknown.
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await spawnAsync('pdfinfo', [pdfPath]);
    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdfinfo failed: ${result.stderr || 'Unknown error'}`,
      );
      return 0;
    }
    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    return match ? parseInt(match[1], 10) : 0;
  }
}

function pdftotextArgs(
  pdfPath: string,
  firstPage: number,
  lastPage: number,
  mode: NativeTextMode,
): string[] {
  return [
    '-f',
    String(firstPage),
    '-l',
    String(lastPage),
    PDF_TEXT_EXTRACTOR.MODE_FLAGS[mode],
    pdfPath,
    '-',
  ];
}

/**
 * Split range output on page-ending form feeds. Pages missing from the
 * output map to empty strings.
 */
function splitPages(output: string, lastPage: number): Map<number, string> {
  const chunks = output.split('\f');
  const pageTexts = new Map<number, string>();
  for (let page = 1; page <= lastPage; page++) {
    pageTexts.set(page, chunks[page - 1] ?? '');
  }
  return pageTexts;
}
