import type { LoggerMethods } from '@magtoc/logger';

import { spawnAsync } from '@magtoc/shared';

/**
 * Recognizes text in rendered page images using tesseract.
 *
 * Recognition failures are logged as warnings and produce empty strings.
 *
 * ## System Requirements
 * - Tesseract OCR (`apt install tesseract-ocr` / `brew install tesseract`)
 */
export class OcrRecognizer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Recognize the text of one image.
   *
   * @param imagePath - Path to a PNG page image
   * @returns Recognized text, or an empty string on failure
   */
  async recognize(imagePath: string): Promise<string> {
    this.logger.debug(`[OcrRecognizer] tesseract ${imagePath}`);

    const result = await spawnAsync('tesseract', [imagePath, 'stdout']);

    if (result.code !== 0) {
      this.logger.warn(
        `[OcrRecognizer] tesseract failed for ${imagePath}: ${result.stderr || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout;
  }
}
