export type {
  BrandParser,
  BrandProfile,
  ItemMatch,
  ItemPattern,
  OutputSink,
  PageSelector,
  PageTextSource,
  ParseOptions,
  PatternContext,
  PatternMatch,
  SourceLine,
} from './types';
export { HARPERS_TOC, LAYOUT_PARSER, TOC_PIPELINE } from './config/constants';
export {
  DocumentNotFoundError,
  RenderingError,
  TocExtractError,
} from './errors/toc-extract-error';
export type {
  TocValidationIssue,
  TocValidationResult,
} from './errors/toc-extract-error';
export {
  BrandDetector,
  contentCandidates,
  contentScores,
  detectByContent,
  detectByFilename,
  detectByOverride,
  filenameCandidates,
} from './detectors/brand-detector';
export { TocFinder } from './finders/toc-finder';
export type { TocFinderOptions } from './finders/toc-finder';
export {
  ATLANTIC_PROFILE,
  BRAND_PROFILES,
  HARPERS_PROFILE,
  NEW_YORKER_PROFILE,
  getBrandProfile,
} from './profiles/brand-profiles';
export { ITEM_PATTERNS, patternsByName } from './patterns/item-patterns';
export type { ItemPatternName } from './patterns/item-patterns';
export { LayoutParser } from './parsers/layout-parser';
export { NullParser } from './parsers/null-parser';
export { createBrandParser } from './parsers/brand-parser-factory';
export { ReportRenderer, filterEntries } from './renderers/report-renderer';
export {
  StructuredEntrySchema,
  StructuredReportSchema,
} from './renderers/structured-report-schema';
export type {
  StructuredEntry,
  StructuredReport,
} from './renderers/structured-report-schema';
export { TocValidator } from './validators/toc-validator';
export { TocPipeline } from './pipeline/toc-pipeline';
export type {
  BatchOutcome,
  DocumentOutcome,
  DocumentStatus,
  TocPipelineOptions,
} from './pipeline/toc-pipeline';
export { formatDiagnostics } from './utils/format-diagnostics';
export { TextCleaner } from './utils/text-cleaner';
