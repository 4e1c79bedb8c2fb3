import type { LoggerMethods } from '@magtoc/logger';
import type { PageRecord, PageText, SourceDocument } from '@magtoc/model';

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PAGE_RENDERER, PAGE_TEXT_PROVIDER } from '../config/constants';
import { ExtractionFailureError } from '../errors/extraction-failure-error';
import { OcrRecognizer } from '../processors/ocr-recognizer';
import {
  PageRenderer,
  type PageRendererOptions,
} from '../processors/page-renderer';
import {
  type NativeTextMode,
  PdfTextExtractor,
} from '../processors/pdf-text-extractor';
import { isSparseText } from '../utils/text-density';

export interface PageTextProviderOptions {
  /**
   * Minimum word characters the OCR-eligible pages must hold together
   * (default: 300)
   */
  minTextChars?: number;

  /**
   * Rasterization density of pages sent to OCR (default: 300)
   */
  renderDpi?: number;

  textExtractor?: PdfTextExtractor;
  pageRenderer?: PageRenderer;
  ocrRecognizer?: OcrRecognizer;
}

const SOURCE_BY_MODE = {
  layout: 'pdftotext-layout',
  raw: 'pdftotext-raw',
} as const;

/**
 * Obtains the text of a document's leading pages.
 *
 * ## Strategy
 * 1. `pdftotext -layout` for pages 1..maxPages (bounded by the page count)
 * 2. `pdftotext -raw` for the same pages when layout mode yields no text at all
 * 3. When pages 1..ocrFirstPages together are sparse, those pages (and only
 *    those) are rendered with pdftoppm and recognized with tesseract; a
 *    non-empty OCR result replaces the native text of its page
 *
 * Throws ExtractionFailureError when no page has any text afterwards.
 */
export class PageTextProvider {
  private readonly minTextChars: number;
  private readonly renderOptions: PageRendererOptions;
  private readonly textExtractor: PdfTextExtractor;
  private readonly pageRenderer: PageRenderer;
  private readonly ocrRecognizer: OcrRecognizer;

  constructor(
    private readonly logger: LoggerMethods,
    options?: PageTextProviderOptions,
  ) {
    this.minTextChars =
      options?.minTextChars ?? PAGE_TEXT_PROVIDER.MIN_TEXT_CHARS;
    this.renderOptions = { dpi: options?.renderDpi ?? PAGE_RENDERER.DPI };
    this.textExtractor =
      options?.textExtractor ?? new PdfTextExtractor(logger);
    this.pageRenderer = options?.pageRenderer ?? new PageRenderer(logger);
    this.ocrRecognizer = options?.ocrRecognizer ?? new OcrRecognizer(logger);
  }

  async getText(document: SourceDocument): Promise<PageText> {
    const lastPage = await this.resolveLastPage(document);

    let pages = await this.extractNative(document, lastPage, 'layout');

    if (!pages.some(hasText)) {
      this.logger.info(
        '[PageTextProvider] Layout extraction yielded no text, trying raw mode',
      );
      pages = await this.extractNative(document, lastPage, 'raw');
    }

    const ocrPages = pages.filter(
      (record) => record.pageNumber <= document.ocrFirstPages,
    );
    const eligibleText = ocrPages.map((record) => record.text).join('\n');

    if (ocrPages.length > 0 && isSparseText(eligibleText, this.minTextChars)) {
      this.logger.info(
        `[PageTextProvider] Sparse text; OCR first ${ocrPages.length} pages...`,
      );
      const ocrTexts = await this.recognizePages(
        document.path,
        ocrPages.map((record) => record.pageNumber),
      );
      pages = pages.map((record): PageRecord => {
        const text = ocrTexts.get(record.pageNumber);
        if (text === undefined || text.trim().length === 0) {
          return record;
        }
        return {
          pageNumber: record.pageNumber,
          text,
          mode: 'ocr',
          source: 'tesseract',
        };
      });
    }

    if (!pages.some(hasText)) {
      throw new ExtractionFailureError(document.path);
    }

    return { document, pages };
  }

  /**
   * Re-extract the scanned pages in raw mode, without OCR.
   *
   * @throws {ExtractionFailureError} When raw mode yields no text
   */
  async getRawText(document: SourceDocument): Promise<PageText> {
    const lastPage = await this.resolveLastPage(document);
    const pages = await this.extractNative(document, lastPage, 'raw');

    if (!pages.some(hasText)) {
      throw new ExtractionFailureError(
        document.path,
        `Raw extraction yielded no text for ${document.path}`,
      );
    }

    return { document, pages };
  }

  private async resolveLastPage(document: SourceDocument): Promise<number> {
    const pageCount = await this.wrap(document, () =>
      this.textExtractor.getPageCount(document.path),
    );
    return pageCount > 0
      ? Math.min(document.maxPages, pageCount)
      : document.maxPages;
  }

  private async extractNative(
    document: SourceDocument,
    lastPage: number,
    mode: NativeTextMode,
  ): Promise<PageRecord[]> {
    const texts = await this.wrap(document, () =>
      this.textExtractor.extractText(document.path, lastPage, mode),
    );

    return [...texts.entries()].map(([pageNumber, text]): PageRecord => ({
      pageNumber,
      text,
      mode: 'native',
      source: SOURCE_BY_MODE[mode],
    }));
  }

  private async recognizePages(
    pdfPath: string,
    pageNumbers: number[],
  ): Promise<Map<number, string>> {
    const results = new Map<number, string>();
    const workDir = await mkdtemp(
      join(tmpdir(), PAGE_TEXT_PROVIDER.OCR_TEMP_PREFIX),
    );

    try {
      for (const pageNumber of pageNumbers) {
        const text = await this.recognizePage(pdfPath, pageNumber, workDir);
        results.set(pageNumber, text);
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }

    return results;
  }

  private async recognizePage(
    pdfPath: string,
    pageNumber: number,
    workDir: string,
  ): Promise<string> {
    try {
      const imagePath = await this.pageRenderer.renderPage(
        pdfPath,
        pageNumber,
        workDir,
        this.renderOptions,
      );
      return await this.ocrRecognizer.recognize(imagePath);
    } catch (error) {
      this.logger.warn(
        `[PageTextProvider] OCR failed for page ${pageNumber}: ${ExtractionFailureError.getErrorMessage(error)}`,
      );
      return '';
    }
  }

  private async wrap<T>(
    document: SourceDocument,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw ExtractionFailureError.fromError(document.path, error);
    }
  }
}

function hasText(record: PageRecord): boolean {
  return record.text.trim().length > 0;
}
