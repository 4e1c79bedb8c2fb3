export type { SourceDocument } from './source-document';
export type {
  ExtractionMode,
  ExtractionSource,
  PageRecord,
  PageText,
} from './page-text';
export { KNOWN_BRANDS } from './brand';
export type {
  Brand,
  BrandDetection,
  BrandHint,
  BrandSource,
  KnownBrand,
} from './brand';
export { DEFAULT_SECTION } from './toc-entry';
export type { TocEntry, TocEntryKind } from './toc-entry';
export type {
  EditorialSlots,
  LineCounts,
  LineJoin,
  PageModeDiagnostic,
  ParseDiagnostics,
  ParseResult,
} from './parse-result';
export type {
  RenderOptions,
  RenderedReport,
  ReportFormat,
} from './render-options';
