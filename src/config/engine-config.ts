/**
 * Engine Configuration
 *
 * Constants the engine needs at run time (tool names, size limits,
 * concurrency). Resolved once and frozen when a SearchEngine is created.
 */

/**
 * Configuration for the search engine.
 * All fields are optional - undefined values use defaults.
 */
export interface SearchEngineConfig {
  /** Command used to extract text from PDF files (default: "pdftotext") */
  pdfToTextCommand?: string;

  /** Files larger than this are skipped for content search (default: 50 MiB) */
  maxFileSizeBytes?: number;

  /** Number of files whose content is searched in parallel (default: 32) */
  maxConcurrentFiles?: number;

  /** Maximum length of a result snippet (default: 200) */
  snippetMaxLength?: number;

  /** Follow symbolic links while walking (default: false) */
  followSymlinks?: boolean;

  /** Bytes read from the start of a file to sniff its type (default: 8192) */
  sniffBytes?: number;

  /** Time allowed for one PDF text extraction, in ms (default: 30000) */
  pdfTimeoutMs?: number;
}

export type ResolvedEngineConfig = Readonly<Required<SearchEngineConfig>>;

/**
 * Default engine configuration.
 */
const DEFAULT_CONFIG: ResolvedEngineConfig = Object.freeze({
  pdfToTextCommand: "pdftotext",
  maxFileSizeBytes: 50 * 1024 * 1024,
  maxConcurrentFiles: 32,
  snippetMaxLength: 200,
  followSymlinks: false,
  sniffBytes: 8192,
  pdfTimeoutMs: 30000,
});

/**
 * Resolve engine configuration by merging user-provided values with defaults.
 */
export function resolveEngineConfig(
  userConfig?: SearchEngineConfig,
): ResolvedEngineConfig {
  if (!userConfig) {
    return DEFAULT_CONFIG;
  }
  return Object.freeze({
    pdfToTextCommand:
      userConfig.pdfToTextCommand ?? DEFAULT_CONFIG.pdfToTextCommand,
    maxFileSizeBytes:
      userConfig.maxFileSizeBytes ?? DEFAULT_CONFIG.maxFileSizeBytes,
    maxConcurrentFiles: Math.max(
      1,
      userConfig.maxConcurrentFiles ?? DEFAULT_CONFIG.maxConcurrentFiles,
    ),
    snippetMaxLength:
      userConfig.snippetMaxLength ?? DEFAULT_CONFIG.snippetMaxLength,
    followSymlinks: userConfig.followSymlinks ?? DEFAULT_CONFIG.followSymlinks,
    sniffBytes: userConfig.sniffBytes ?? DEFAULT_CONFIG.sniffBytes,
    pdfTimeoutMs: userConfig.pdfTimeoutMs ?? DEFAULT_CONFIG.pdfTimeoutMs,
  });
}
