import type { LoggerMethods } from '@magtoc/logger';

import { spawnAsync } from '@magtoc/shared';
import { join } from 'node:path';

import { PAGE_RENDERER } from '../config/constants';

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for rendered images (default: 300) */
  dpi?: number;
}

/**
 * Renders single PDF pages to PNG images using pdftoppm.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render one page of a PDF to `<outputDir>/page_<n>.png`.
   *
   * @param pdfPath - Path to the source PDF file
   * @param page - 1-based page number
   * @param outputDir - Existing directory that receives the image
   * @returns Path of the rendered PNG file
   * @throws Error when pdftoppm exits with a non-zero code
   */
  async renderPage(
    pdfPath: string,
    page: number,
    outputDir: string,
    options?: PageRendererOptions,
  ): Promise<string> {
    const dpi = options?.dpi ?? PAGE_RENDERER.DPI;
    const outputBase = join(outputDir, `${PAGE_RENDERER.FILE_PREFIX}${page}`);

    this.logger.debug(`[PageRenderer] Rendering page ${page} at ${dpi} DPI`);

    const result = await spawnAsync('pdftoppm', [
      '-f',
      page.toString(),
      '-l',
      page.toString(),
      '-r',
      dpi.toString(),
      '-png',
      '-singlefile',
      pdfPath,
      outputBase,
    ]);

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render page ${page}: ${result.stderr || 'Unknown error'}`,
      );
    }

    return `${outputBase}.png`;
  }
}
