export { classifyFile, type FileClassification, hasPdfExtension } from "./classify.js";
export {
  ContentMatcher,
  type ContentMatcherOptions,
  type ContentMatchResult,
  PDF_INSTALL_HINT,
  type SkipReason,
} from "./content-matcher.js";
export { findMatchingLines, makeSnippet } from "./line-search.js";
export {
  type PdfTextExtractor,
  PdftotextExtractor,
  type PdftotextExtractorOptions,
} from "./pdf-extractor.js";
