/**
 * Configuration constants for PdfTextExtractor
 */
export const PDF_TEXT_EXTRACTOR = {
  /**
   * pdftotext flag per native extraction mode
   */
  MODE_FLAGS: {
    layout: '-layout',
    raw: '-raw',
  },
} as const;

/**
 * Configuration constants for PageRenderer
 */
export const PAGE_RENDERER = {
  /**
   * Rasterization density (DPI) used before OCR
   */
  DPI: 300,

  /**
   * File name prefix of rendered page images
   */
  FILE_PREFIX: 'page_',
} as const;

/**
 * Configuration constants for PageTextProvider
 */
export const PAGE_TEXT_PROVIDER = {
  /**
   * Minimum word characters (letters and digits) the OCR-eligible pages
   * must hold together before their native text is trusted
   */
  MIN_TEXT_CHARS: 300,

  /**
   * Prefix of the temporary directory holding rendered pages
   */
  OCR_TEMP_PREFIX: 'magtoc-ocr-',
} as const;
