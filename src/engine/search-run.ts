/**
 * One search run: walk the tree, feed both matchers, aggregate.
 */

import { ResultAggregator } from "../aggregator/aggregator.js";
import type { ResolvedEngineConfig } from "../config/engine-config.js";
import {
  ContentMatcher,
  type ContentMatchResult,
} from "../content/content-matcher.js";
import type { PdfTextExtractor } from "../content/pdf-extractor.js";
import { getErrorMessage, SearchCancelledError } from "../errors.js";
import { matchesFilename } from "../filename/filename-matcher.js";
import type { PathFilter } from "../filter/path-filter.js";
import type { SearchFileSystem } from "../fs/interface.js";
import { sanitizeErrorMessage } from "../fs/sanitize-error.js";
import type { SearchLogger } from "../logger.js";
import { compilePattern } from "../pattern/index.js";
import type {
  Diagnostic,
  ProgressSink,
  ResultSet,
  SearchRequest,
  SearchStats,
} from "../types.js";
import { walk } from "../walker/walker.js";

export interface SearchRunContext {
  request: SearchRequest;
  /** Compiled from the request's globs */
  filter: PathFilter;
  config: ResolvedEngineConfig;
  fs: SearchFileSystem;
  pdfExtractor: PdfTextExtractor;
  progress: ProgressSink;
  signal: AbortSignal;
  logger?: SearchLogger;
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new SearchCancelledError();
  }
}

/**
 * @throws RootDirectoryError if the root cannot be searched at all
 * @throws SearchCancelledError if the signal aborts the run
 */
export async function runSearch(ctx: SearchRunContext): Promise<ResultSet> {
  const { request, filter, config, fs, progress, signal, logger } = ctx;
  const startTime = performance.now();
  throwIfAborted(signal);

  const diagnostics: Diagnostic[] = [];
  const stats: SearchStats = {
    directoriesScanned: 1,
    filesScanned: 0,
    contentFilesSearched: 0,
    pdfFilesSearched: 0,
    contentMatches: 0,
    filenameMatches: 0,
    durationMs: 0,
  };

  const report = (diagnostic: Diagnostic): void => {
    diagnostics.push(diagnostic);
    logger?.debug("search:diagnostic", { ...diagnostic });
    progress.write({ type: "diagnostic", diagnostic });
  };

  const contentMatcher = new ContentMatcher({
    fs,
    pattern: compilePattern(request.mode, request.term),
    pdfExtractor: ctx.pdfExtractor,
    config,
    report,
    logger,
  });

  const aggregator = new ResultAggregator();
  const consumer = aggregator.run();

  const matchName = (path: string, name: string): void => {
    if (matchesFilename(name, request.term)) {
      stats.filenameMatches++;
      aggregator.push({ path, origin: "filename" });
      progress.write({ type: "match", path, origin: "filename" });
    }
  };

  const searchContent = async (path: string): Promise<void> => {
    let result: ContentMatchResult;
    try {
      result = await contentMatcher.matchFile(path);
    } catch (e) {
      report({
        kind: "read-failed",
        path,
        message: `${path}: ${sanitizeErrorMessage(getErrorMessage(e))}`,
      });
      return;
    }
    if (result.status === "skipped") {
      return;
    }
    stats.contentFilesSearched++;
    if (result.format === "pdf") {
      stats.pdfFilesSearched++;
    }
    if (result.matches.length === 0) {
      return;
    }
    stats.contentMatches++;
    for (const detail of result.matches) {
      aggregator.push({
        path,
        origin: "content",
        detail,
        format: result.format,
      });
    }
    progress.write({ type: "match", path, origin: "content" });
  };

  // Files whose content is searched together; each one is awaited on
  // its own so a slow file only holds back its batch.
  let batch: string[] = [];
  const flush = async (): Promise<void> => {
    const files = batch;
    batch = [];
    await Promise.all(files.map(searchContent));
    throwIfAborted(signal);
  };

  try {
    progress.write({ type: "scanning", path: request.rootDir });
    for await (const entry of walk(request.rootDir, {
      fs,
      filter,
      followSymlinks: config.followSymlinks,
      signal,
    })) {
      switch (entry.type) {
        case "error":
          report({
            kind: "unreadable",
            path: entry.path,
            message: `${entry.path}: ${sanitizeErrorMessage(getErrorMessage(entry.error))}`,
          });
          break;
        case "directory":
          stats.directoriesScanned++;
          progress.write({ type: "scanning", path: entry.path });
          matchName(entry.path, entry.name);
          break;
        case "file":
          stats.filesScanned++;
          matchName(entry.path, entry.name);
          if (filter.isContentEligible(entry.path)) {
            batch.push(entry.path);
            if (batch.length >= config.maxConcurrentFiles) {
              await flush();
            }
          }
          break;
      }
    }
    await flush();
  } finally {
    aggregator.close();
    await consumer;
  }

  const entries = await aggregator.result();
  stats.durationMs = Math.round(performance.now() - startTime);
  return { entries, diagnostics, stats };
}
