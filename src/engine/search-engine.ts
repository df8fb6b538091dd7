/**
 * SearchEngine - Execution Orchestrator
 *
 * Accepts search requests and runs each one in the background, handing
 * the caller a SearchExecution to follow it.
 */

import { randomUUID } from "node:crypto";
import {
  type ResolvedEngineConfig,
  resolveEngineConfig,
  type SearchEngineConfig,
} from "../config/engine-config.js";
import {
  type PdfTextExtractor,
  PdftotextExtractor,
} from "../content/pdf-extractor.js";
import {
  getErrorMessage,
  SearchError,
  UnexpectedSearchError,
} from "../errors.js";
import { createPathFilter } from "../filter/path-filter.js";
import type { SearchFileSystem } from "../fs/interface.js";
import { NodeFs } from "../fs/node-fs.js";
import type { SearchLogger } from "../logger.js";
import type {
  ExecutionStatus,
  ProgressEvent,
  ResultSet,
  SearchOutcome,
  SearchRequest,
} from "../types.js";
import { ProgressChannel, type ProgressListener } from "./progress.js";
import { type SearchRequestInput, validateRequest } from "./request.js";
import { runSearch } from "./search-run.js";

export interface SearchEngineOptions {
  /** Engine constants; undefined fields use defaults */
  config?: SearchEngineConfig;
  /** File system to search (default: the real one) */
  fs?: SearchFileSystem;
  /** PDF text extractor (default: pdftotext from the config) */
  pdfExtractor?: PdfTextExtractor;
  /** Optional logger for run lifecycle and per-file skips */
  logger?: SearchLogger;
}

export interface SubmitOptions {
  /** Aborting cancels the run */
  signal?: AbortSignal;
  /** Called synchronously for every progress event */
  onProgress?: ProgressListener;
}

type RunFunction = (
  signal: AbortSignal,
  progress: ProgressChannel,
) => Promise<ResultSet>;

/**
 * Handle on one search run.
 *
 * The run starts on a later tick than the one that created the handle,
 * and settles exactly once.
 */
export class SearchExecution {
  readonly id: string;
  readonly request: SearchRequest;
  readonly startedAt: Date;

  private _status: ExecutionStatus = "running";
  private readonly controller = new AbortController();
  private readonly channel: ProgressChannel;
  private readonly logger?: SearchLogger;
  private readonly outcome: Promise<SearchOutcome>;

  constructor(
    request: SearchRequest,
    run: RunFunction,
    options: SubmitOptions & { logger?: SearchLogger } = {},
  ) {
    this.id = randomUUID();
    this.request = request;
    this.startedAt = new Date();
    this.channel = new ProgressChannel(options.onProgress);
    this.logger = options.logger;

    // Start execution immediately
    this.outcome = this.execute(run, options.signal);
  }

  get status(): ExecutionStatus {
    return this._status;
  }

  /**
   * Progress events of this run: those already emitted, then live ones
   * until the run settles.
   */
  progress(): AsyncGenerator<ProgressEvent, void, undefined> {
    return this.channel.read();
  }

  /**
   * Resolves with the outcome once the run settles. Never rejects; a
   * failure is in the outcome, as an UnexpectedSearchError when the
   * thrown value was not a SearchError.
   */
  wait(): Promise<SearchOutcome> {
    return this.outcome;
  }

  /** Stop the run. No effect once it has settled. */
  cancel(): void {
    this.controller.abort();
  }

  private async execute(
    run: RunFunction,
    signal?: AbortSignal,
  ): Promise<SearchOutcome> {
    const onAbort = () => this.controller.abort();
    if (signal?.aborted) {
      this.controller.abort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    await new Promise<void>((resolve) => setImmediate(resolve));

    const { rootDir, term, mode } = this.request;
    this.logger?.info("search:start", { id: this.id, rootDir, term, mode });

    try {
      this.channel.write({ type: "started", rootDir, term, mode });
      const result = await run(this.controller.signal, this.channel);
      this._status = "completed";
      this.channel.write({ type: "completed", stats: result.stats });
      this.logger?.info("search:complete", {
        id: this.id,
        entries: result.entries.length,
        diagnostics: result.diagnostics.length,
        ...result.stats,
      });
      return { status: "completed", result };
    } catch (e) {
      const error = e instanceof SearchError ? e : new UnexpectedSearchError(e);
      this._status = "failed";
      this.logger?.info("search:failed", {
        id: this.id,
        error: error.message,
      });
      this.channel.write({ type: "failed", message: error.message });
      return { status: "failed", error };
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.channel.close();
    }
  }
}

export class SearchEngine {
  readonly config: ResolvedEngineConfig;
  private readonly fs: SearchFileSystem;
  private readonly pdfExtractor: PdfTextExtractor;
  private readonly logger?: SearchLogger;

  constructor(options: SearchEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.fs = options.fs ?? new NodeFs();
    this.pdfExtractor =
      options.pdfExtractor ??
      new PdftotextExtractor({
        command: this.config.pdfToTextCommand,
        timeoutMs: this.config.pdfTimeoutMs,
      });
    this.logger = options.logger;
  }

  /**
   * Validate a request and start searching in the background.
   *
   * @throws InvalidRequestError if the request or one of its globs is
   * invalid; no run starts
   */
  submit(
    input: SearchRequestInput,
    options: SubmitOptions = {},
  ): SearchExecution {
    const request = validateRequest(input);
    const filter = createPathFilter(request);
    return new SearchExecution(
      request,
      (signal, progress) =>
        runSearch({
          request,
          filter,
          config: this.config,
          fs: this.fs,
          pdfExtractor: this.pdfExtractor,
          progress,
          signal,
          logger: this.logger,
        }),
      { ...options, logger: this.logger },
    );
  }

  /**
   * Submit and wait in one step.
   */
  search(
    input: SearchRequestInput,
    options: SubmitOptions = {},
  ): Promise<SearchOutcome> {
    return this.submit(input, options).wait();
  }
}
