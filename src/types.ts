import type { SearchError } from "./errors.js";

/**
 * How the search term is interpreted for content search.
 * - literal: exact substring (every regex metacharacter escaped)
 * - basic: POSIX basic regular expression
 * - extended: POSIX extended regular expression
 *
 * Filename search ignores the mode and always uses a literal substring test.
 */
export type SearchMode = "literal" | "basic" | "extended";

export const SEARCH_MODES: readonly SearchMode[] = [
  "literal",
  "basic",
  "extended",
];

/** Display names used in progress lines and reports */
export const SEARCH_MODE_LABELS: Readonly<Record<SearchMode, string>> = {
  literal: "Literal",
  basic: "Basic Regex",
  extended: "Extended Regex",
};

export interface SearchRequest {
  /** Directory to search, resolved to an absolute path by the engine */
  readonly rootDir: string;
  /** Search term; must not be empty */
  readonly term: string;
  readonly mode: SearchMode;
  /** Globs matched against full paths; matching directories are pruned */
  readonly excludePatterns: readonly string[];
  /** Globs gating content search only; empty means every file */
  readonly includePatterns: readonly string[];
}

export type HitOrigin = "content" | "filename";

/** How a file's content was read for a content hit */
export type ContentFormat = "text" | "pdf";

export interface ContentDetail {
  /** 1-based line number */
  line: number;
  /** The matching line, trimmed and shortened for display */
  snippet: string;
}

export interface SearchHit {
  /** Absolute filesystem path */
  path: string;
  origin: HitOrigin;
  /** Present on content hits */
  detail?: ContentDetail;
  /** Present on content hits */
  format?: ContentFormat;
}

export interface ResultEntry {
  path: string;
  /** "content" whenever any content hit was seen for the path */
  origin: HitOrigin;
  /** First content match in file order */
  detail?: ContentDetail;
  format?: ContentFormat;
  /** Number of matching lines seen for the path (0 for filename-only entries) */
  contentMatches: number;
}

export type DiagnosticKind =
  | "unreadable"
  | "read-failed"
  | "too-large"
  | "pdf-unavailable"
  | "pdf-failed"
  | "invalid-pattern";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  path?: string;
}

export interface SearchStats {
  directoriesScanned: number;
  filesScanned: number;
  contentFilesSearched: number;
  pdfFilesSearched: number;
  contentMatches: number;
  filenameMatches: number;
  durationMs: number;
}

export interface ResultSet {
  /** Unique by path, sorted lexicographically by path */
  readonly entries: readonly ResultEntry[];
  readonly diagnostics: readonly Diagnostic[];
  readonly stats: SearchStats;
}

export type ExecutionStatus = "running" | "completed" | "failed";

export type SearchOutcome =
  | { status: "completed"; result: ResultSet }
  | { status: "failed"; error: SearchError };

export type ProgressEvent =
  | { type: "started"; rootDir: string; term: string; mode: SearchMode }
  | { type: "scanning"; path: string }
  | { type: "match"; path: string; origin: HitOrigin }
  | { type: "diagnostic"; diagnostic: Diagnostic }
  | { type: "completed"; stats: SearchStats }
  | { type: "failed"; message: string };

/**
 * Write side of the live progress channel.
 */
export interface ProgressSink {
  write(event: ProgressEvent): void;
}
