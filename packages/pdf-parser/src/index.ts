export { PageTextProvider } from './core/page-text-provider';
export type { PageTextProviderOptions } from './core/page-text-provider';
export { ExtractionFailureError } from './errors/extraction-failure-error';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export type { NativeTextMode } from './processors/pdf-text-extractor';
export { PageRenderer } from './processors/page-renderer';
export type { PageRendererOptions } from './processors/page-renderer';
export { OcrRecognizer } from './processors/ocr-recognizer';
export { countWordCharacters, isSparseText } from './utils/text-density';
export {
  PAGE_RENDERER,
  PAGE_TEXT_PROVIDER,
  PDF_TEXT_EXTRACTOR,
} from './config/constants';
