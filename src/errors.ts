/**
 * Search Errors
 *
 * Error classes for the search engine:
 * - request validation (thrown by submit, before a run exists)
 * - fatal run failures (root directory, cancellation)
 * - per-file failures that are absorbed into diagnostics
 * - configuration loading
 * - anything else that escapes a run
 */

export type SearchErrorCode =
  | "EINVALIDREQUEST"
  | "EROOT"
  | "ECANCELLED"
  | "EPATTERN"
  | "EPDF"
  | "ECONFIG"
  | "EUNEXPECTED";

/**
 * Base class for all search errors.
 */
export abstract class SearchError extends Error {
  abstract readonly code: SearchErrorCode;
}

/**
 * Error thrown when a search request fails validation.
 */
export class InvalidRequestError extends SearchError {
  readonly code = "EINVALIDREQUEST";

  constructor(public readonly issues: string[]) {
    super(`Invalid search request: ${issues.join("; ")}`);
    this.name = "InvalidRequestError";
  }
}

/**
 * Error thrown when the root directory is missing, not a directory,
 * or cannot be read at all.
 */
export class RootDirectoryError extends SearchError {
  readonly code = "EROOT";

  constructor(
    public readonly rootDir: string,
    reason: string,
  ) {
    super(`Cannot search '${rootDir}': ${reason}`);
    this.name = "RootDirectoryError";
  }
}

/**
 * Error thrown when a run is cancelled before it completes.
 */
export class SearchCancelledError extends SearchError {
  readonly code = "ECANCELLED";

  constructor() {
    super("Search cancelled");
    this.name = "SearchCancelledError";
  }
}

/**
 * Error thrown when a Basic or Extended pattern cannot be compiled
 * into a line matcher.
 */
export class InvalidPatternError extends SearchError {
  readonly code = "EPATTERN";

  constructor(
    public readonly term: string,
    reason: string,
  ) {
    super(`Invalid pattern '${term}': ${reason}`);
    this.name = "InvalidPatternError";
  }
}

/**
 * Error thrown when text cannot be extracted from a PDF file.
 */
export class PdfExtractionError extends SearchError {
  readonly code = "EPDF";

  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Could not extract text from '${path}': ${reason}`);
    this.name = "PdfExtractionError";
  }
}

/**
 * Error thrown when the search configuration file cannot be parsed.
 */
export class ConfigError extends SearchError {
  readonly code = "ECONFIG";

  constructor(
    public readonly file: string,
    reason: string,
  ) {
    super(`Invalid config file '${file}': ${reason}`);
    this.name = "ConfigError";
  }
}

/**
 * Error a run fails with when something other than a SearchError escapes
 * it. The thrown value is kept as the cause.
 */
export class UnexpectedSearchError extends SearchError {
  readonly code = "EUNEXPECTED";

  constructor(cause: unknown) {
    super(`Search failed unexpectedly: ${getErrorMessage(cause)}`, { cause });
    this.name = "UnexpectedSearchError";
  }
}

/**
 * Narrow an unknown thrown value to a Node.js errno exception.
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Get a printable message from an unknown thrown value.
 */
export function getErrorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
