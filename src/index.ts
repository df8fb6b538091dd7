export { ResultAggregator } from "./aggregator/aggregator.js";
export type { ResolvedEngineConfig, SearchEngineConfig } from "./config/engine-config.js";
export { resolveEngineConfig } from "./config/engine-config.js";
export type { SearchConfig } from "./config/search-config.js";
export {
  defaultConfigPath,
  loadSearchConfig,
  parseSearchConfig,
} from "./config/search-config.js";
export type {
  ContentMatchResult,
  FileClassification,
  PdfTextExtractor,
  PdftotextExtractorOptions,
} from "./content/index.js";
export {
  classifyFile,
  ContentMatcher,
  PdftotextExtractor,
} from "./content/index.js";
export type {
  ProgressListener,
  SearchEngineOptions,
  SearchRequestInput,
  SubmitOptions,
} from "./engine/index.js";
export {
  formatProgressLine,
  SearchEngine,
  SearchExecution,
} from "./engine/index.js";
export type { SearchErrorCode } from "./errors.js";
export {
  ConfigError,
  InvalidPatternError,
  InvalidRequestError,
  PdfExtractionError,
  RootDirectoryError,
  SearchCancelledError,
  SearchError,
  UnexpectedSearchError,
} from "./errors.js";
export { matchesFilename } from "./filename/filename-matcher.js";
export type { PathFilter, PathFilterOptions } from "./filter/path-filter.js";
export { createPathFilter } from "./filter/path-filter.js";
export type { DirentEntry, FsStat, SearchFileSystem } from "./fs/interface.js";
export { NodeFs } from "./fs/node-fs.js";
export type { SearchLogger } from "./logger.js";
export type { CompiledPattern, LineMatcher } from "./pattern/index.js";
export { compilePattern, createMatcher } from "./pattern/index.js";
export type { ResultsReport } from "./report/markdown.js";
export { formatResultsMarkdown, toFileUri } from "./report/markdown.js";
export type {
  ContentDetail,
  ContentFormat,
  Diagnostic,
  DiagnosticKind,
  ExecutionStatus,
  HitOrigin,
  ProgressEvent,
  ProgressSink,
  ResultEntry,
  ResultSet,
  SearchHit,
  SearchMode,
  SearchOutcome,
  SearchRequest,
  SearchStats,
} from "./types.js";
export { SEARCH_MODE_LABELS, SEARCH_MODES } from "./types.js";
export type { WalkEntry, WalkOptions } from "./walker/walker.js";
export { walk } from "./walker/walker.js";
