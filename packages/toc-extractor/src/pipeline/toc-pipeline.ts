import type { LoggerMethods } from '@magtoc/logger';
import type {
  Brand,
  BrandHint,
  KnownBrand,
  PageText,
  ParseDiagnostics,
  ParseResult,
  RenderOptions,
  RenderedReport,
  SourceDocument,
} from '@magtoc/model';

import type {
  BrandParser,
  OutputSink,
  PageTextSource,
  ParseOptions,
} from '../types';

import { stat } from 'node:fs/promises';

import { TOC_PIPELINE } from '../config/constants';
import { BrandDetector } from '../detectors/brand-detector';
import {
  DocumentNotFoundError,
  RenderingError,
  TocExtractError,
} from '../errors/toc-extract-error';
import { createBrandParser } from '../parsers/brand-parser-factory';
import { getBrandProfile } from '../profiles/brand-profiles';
import { ReportRenderer } from '../renderers/report-renderer';
import {
  formatDiagnostics,
  formatPatternHits,
} from '../utils/format-diagnostics';

/**
 * TocPipeline Options
 */
export interface TocPipelineOptions {
  logger: LoggerMethods;

  /**
   * Page text provider (pdftotext / OCR)
   */
  textProvider: PageTextSource;

  /**
   * Destination of rendered reports
   */
  sink: OutputSink;

  /**
   * Brand override (default: 'auto')
   */
  brandHint?: BrandHint;

  /**
   * Leading pages scanned per document (default: 16)
   */
  maxPages?: number;

  /**
   * Leading pages eligible for OCR (default: 3)
   */
  ocrFirstPages?: number;

  parseOptions?: Pick<ParseOptions, 'joinWrappedLines'>;

  renderOptions?: Partial<RenderOptions>;

  detector?: BrandDetector;

  renderer?: ReportRenderer;
}

/**
 * Final state of one document
 *
 * - ok: a report was written
 * - unresolved: the brand could not be determined, no report
 * - failed: the document could not be processed
 */
export type DocumentStatus = 'ok' | 'unresolved' | 'failed';

export interface DocumentOutcome {
  path: string;
  status: DocumentStatus;
  brand?: Brand;
  report?: RenderedReport;
  diagnostics?: ParseDiagnostics;

  /**
   * Error message when status is failed
   */
  error?: string;
}

export interface BatchOutcome {
  outcomes: DocumentOutcome[];

  /**
   * 0 when every document succeeded, 1 otherwise
   */
  exitCode: 0 | 1;
}

const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  format: 'text',
  includeMail: false,
  includeContributors: false,
  suppressEmpty: false,
};

/**
 * TocPipeline
 *
 * Runs one document through file check, page text provider, brand
 * detection, brand parser (with raw text for brands that merge both modes),
 * raw-text retry, rendering and the output sink.
 * A failing document is logged and reported in its outcome; only a
 * RenderingError, which indicates a parser defect, propagates.
 */
export class TocPipeline {
  private readonly logger: LoggerMethods;
  private readonly textProvider: PageTextSource;
  private readonly sink: OutputSink;
  private readonly brandHint: BrandHint;
  private readonly maxPages: number;
  private readonly ocrFirstPages: number;
  private readonly parseOptions: Pick<ParseOptions, 'joinWrappedLines'>;
  private readonly renderOptions: RenderOptions;
  private readonly detector: BrandDetector;
  private readonly renderer: ReportRenderer;

  constructor(options: TocPipelineOptions) {
    this.logger = options.logger;
    this.textProvider = options.textProvider;
    this.sink = options.sink;
    this.brandHint = options.brandHint ?? 'auto';
    this.maxPages = options.maxPages ?? TOC_PIPELINE.DEFAULT_MAX_PAGES;
    this.ocrFirstPages =
      options.ocrFirstPages ?? TOC_PIPELINE.DEFAULT_OCR_FIRST_PAGES;
    this.parseOptions = options.parseOptions ?? {};
    this.renderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options.renderOptions };
    this.detector = options.detector ?? new BrandDetector(this.logger);
    this.renderer = options.renderer ?? new ReportRenderer();
  }

  /**
   * Process documents one after another. A failure never stops the batch.
   */
  async processAll(paths: readonly string[]): Promise<BatchOutcome> {
    const outcomes: DocumentOutcome[] = [];
    for (const path of paths) {
      outcomes.push(await this.process(path));
    }

    const succeeded = outcomes.filter((outcome) => outcome.status === 'ok');
    this.logger.info(
      `[TocPipeline] Processed ${outcomes.length} document(s): ${succeeded.length} ok, ${outcomes.length - succeeded.length} failed`,
    );

    return {
      outcomes,
      exitCode: succeeded.length === outcomes.length ? 0 : 1,
    };
  }

  /**
   * Process a single document
   *
   * @throws {RenderingError} When parsed entries break the ordering invariants
   */
  async process(path: string): Promise<DocumentOutcome> {
    const startTime = Date.now();
    this.logger.info(`[TocPipeline] Processing ${path}`);

    try {
      await this.ensureFile(path);

      const document: SourceDocument = {
        path,
        maxPages: this.maxPages,
        ocrFirstPages: this.ocrFirstPages,
      };
      const pageText = await this.textProvider.getText(document);
      this.logger.info(
        `[TocPipeline] Extracted ${pageText.pages.length} page(s) from ${path}`,
      );

      const detection = this.detector.detect(
        document,
        pageText,
        this.brandHint,
      );
      const brand = detection.brand;
      const parseOptions: ParseOptions = {
        ...this.parseOptions,
        brandSource: detection.source,
      };
      const parser = createBrandParser(this.logger, brand);

      if (brand === 'unknown') {
        const { diagnostics } = parser.parse(pageText, parseOptions);
        this.logDiagnostics(path, diagnostics);
        this.logger.warn(`[TocPipeline] No report for ${path}: brand unresolved`);
        return { path, status: 'unresolved', brand, diagnostics };
      }

      const firstParse = parser.parse(
        pageText,
        await this.withRawText(document, brand, parseOptions),
      );

      const result = await this.retryRaw(
        document,
        pageText,
        brand,
        parser,
        parseOptions,
        firstParse,
      );
      this.logDiagnostics(path, result.diagnostics);

      const report = this.renderer.render(result, this.renderOptions);
      if (
        report.format === 'text' &&
        report.content.length < TOC_PIPELINE.SHORT_OUTPUT_CHARS
      ) {
        this.logger.warn(
          `[TocPipeline] Short output for ${path}: ${report.content.length} characters`,
        );
      }

      await this.sink.write(report, document).catch((error: unknown) => {
        throw TocExtractError.fromError('Failed to write report', error);
      });
      this.logger.info(
        `[TocPipeline] Wrote ${result.entries.length} entries for ${path} in ${Date.now() - startTime}ms`,
      );

      return {
        path,
        status: 'ok',
        brand,
        report,
        diagnostics: result.diagnostics,
      };
    } catch (error) {
      if (error instanceof RenderingError) {
        this.logger.error(`[TocPipeline] ${error.getSummary()}`);
        throw error;
      }
      const message = TocExtractError.getErrorMessage(error);
      this.logger.error(`[TocPipeline] Failed ${path}: ${message}`);
      return { path, status: 'failed', error: message };
    }
  }

  private async ensureFile(path: string): Promise<void> {
    const stats = await stat(path).catch((error: unknown) => {
      throw new DocumentNotFoundError(path, { cause: error });
    });
    if (!stats.isFile()) {
      throw new DocumentNotFoundError(path);
    }
  }

  /**
   * Add raw-mode text to the parse options of brands that merge both modes.
   * Without raw text the layout text is parsed alone.
   */
  private async withRawText(
    document: SourceDocument,
    brand: KnownBrand,
    parseOptions: ParseOptions,
  ): Promise<ParseOptions> {
    if (!getBrandProfile(brand).mergeRawText) {
      return parseOptions;
    }

    try {
      const rawText = await this.textProvider.getRawText(document);
      return { ...parseOptions, rawText };
    } catch (error) {
      this.logger.warn(
        `[TocPipeline] Raw text unavailable for ${document.path}, parsing layout text only: ${TocExtractError.getErrorMessage(error)}`,
      );
      return parseOptions;
    }
  }

  /**
   * Re-parse raw-mode text when a layout parse found too few items.
   * The raw parse replaces the first one only when it finds more items.
   */
  private async retryRaw(
    document: SourceDocument,
    pageText: PageText,
    brand: KnownBrand,
    parser: BrandParser,
    parseOptions: ParseOptions,
    result: ParseResult,
  ): Promise<ParseResult> {
    const items = countItems(result);
    if (
      !getBrandProfile(brand).rawRetry ||
      items >= TOC_PIPELINE.RAW_RETRY_MIN_ITEMS ||
      !pageText.pages.every((page) => page.source === 'pdftotext-layout')
    ) {
      return result;
    }

    this.logger.info(
      `[TocPipeline] Only ${items} item(s) found; retrying ${document.path} with raw text`,
    );

    let rawText: PageText;
    try {
      rawText = await this.textProvider.getRawText(document);
    } catch (error) {
      this.logger.warn(
        `[TocPipeline] Raw retry failed for ${document.path}: ${TocExtractError.getErrorMessage(error)}`,
      );
      return result;
    }

    const retry = parser.parse(rawText, parseOptions);
    const retryItems = countItems(retry);
    if (retryItems <= items) {
      this.logger.info(
        `[TocPipeline] Raw retry found ${retryItems} item(s); keeping layout parse`,
      );
      return result;
    }

    this.logger.info(
      `[TocPipeline] Raw retry found ${retryItems} item(s); using raw parse`,
    );
    return { ...retry, diagnostics: { ...retry.diagnostics, rawRetry: true } };
  }

  private logDiagnostics(path: string, diagnostics: ParseDiagnostics): void {
    this.logger.info(
      `[TocPipeline] Diagnostics for ${path}: ${formatDiagnostics(diagnostics)}`,
    );
    const hits = formatPatternHits(diagnostics.patternHits);
    if (hits) {
      this.logger.debug(`[TocPipeline] Pattern hits: ${hits}`);
    }
    for (const join of diagnostics.joins) {
      this.logger.debug(
        `[TocPipeline] Joined ${join.kind} on page ${join.pageNumber}: "${join.line}" + "${join.continuation}"`,
      );
    }
  }
}

function countItems(result: ParseResult): number {
  return result.entries.filter((entry) => entry.kind === 'item').length;
}
