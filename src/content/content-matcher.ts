/**
 * Content Matcher
 *
 * Searches one file's content for the run's pattern. One instance serves
 * one run: the line matcher, the invalid-pattern state and the PDF tool
 * availability are decided once and shared by every file of the run.
 */

import type { ResolvedEngineConfig } from "../config/engine-config.js";
import { getErrorMessage } from "../errors.js";
import type { SearchFileSystem } from "../fs/interface.js";
import { sanitizeErrorMessage } from "../fs/sanitize-error.js";
import type { SearchLogger } from "../logger.js";
import {
  type CompiledPattern,
  createMatcher,
  type LineMatcher,
} from "../pattern/index.js";
import type { ContentDetail, ContentFormat, Diagnostic } from "../types.js";
import { classifyFile, hasPdfExtension } from "./classify.js";
import { findMatchingLines } from "./line-search.js";
import type { PdfTextExtractor } from "./pdf-extractor.js";

export const PDF_INSTALL_HINT = "sudo apt install poppler-utils";

export type SkipReason =
  | "invalid-pattern"
  | "pdf-unavailable"
  | "pdf-failed"
  | "too-large"
  | "read-failed"
  | "unsupported";

export type ContentMatchResult =
  | { status: "searched"; format: ContentFormat; matches: ContentDetail[] }
  | { status: "skipped"; reason: SkipReason };

export interface ContentMatcherOptions {
  fs: SearchFileSystem;
  pattern: CompiledPattern;
  pdfExtractor: PdfTextExtractor;
  config: Pick<
    ResolvedEngineConfig,
    "maxFileSizeBytes" | "sniffBytes" | "snippetMaxLength" | "pdfToTextCommand"
  >;
  /** Receives every diagnostic the matcher produces */
  report: (diagnostic: Diagnostic) => void;
  logger?: SearchLogger;
}

const decoder = new TextDecoder("utf-8");

function skipped(reason: SkipReason): ContentMatchResult {
  return { status: "skipped", reason };
}

export class ContentMatcher {
  /** null when the pattern failed to compile */
  private readonly matcher: LineMatcher | null;
  private pdfAvailability?: Promise<boolean>;

  /**
   * Compiles the pattern at once; a pattern that does not compile is
   * reported here, whether or not any file is searched later.
   */
  constructor(private readonly options: ContentMatcherOptions) {
    this.matcher = this.buildMatcher();
  }

  async matchFile(filePath: string): Promise<ContentMatchResult> {
    const matcher = this.matcher;
    if (matcher === null) {
      return skipped("invalid-pattern");
    }

    if (hasPdfExtension(filePath)) {
      return this.matchPdf(filePath, matcher);
    }

    const { fs, config } = this.options;
    let content: Uint8Array;
    try {
      const stat = await fs.stat(filePath);
      if (stat.size > config.maxFileSizeBytes) {
        this.options.report({
          kind: "too-large",
          path: filePath,
          message: `${filePath}: skipped, ${stat.size} bytes exceeds the ${config.maxFileSizeBytes} byte limit`,
        });
        return skipped("too-large");
      }
      content = await fs.readFileBuffer(filePath);
    } catch (e) {
      this.options.report({
        kind: "read-failed",
        path: filePath,
        message: `${filePath}: ${sanitizeErrorMessage(getErrorMessage(e))}`,
      });
      return skipped("read-failed");
    }

    const classification = await classifyFile(
      filePath,
      content.subarray(0, config.sniffBytes),
    );
    switch (classification.kind) {
      case "pdf":
        return this.matchPdf(filePath, matcher);
      case "unsupported":
        this.options.logger?.debug("content:skip", {
          path: filePath,
          reason: classification.reason,
        });
        return skipped("unsupported");
      case "text":
        return {
          status: "searched",
          format: "text",
          matches: findMatchingLines(
            decoder.decode(content),
            matcher,
            config.snippetMaxLength,
          ),
        };
    }
  }

  private buildMatcher(): LineMatcher | null {
    try {
      return createMatcher(this.options.pattern);
    } catch (e) {
      this.options.report({
        kind: "invalid-pattern",
        message: `${sanitizeErrorMessage(getErrorMessage(e))}. Content search disabled.`,
      });
      return null;
    }
  }

  private isPdfSearchAvailable(): Promise<boolean> {
    this.pdfAvailability ??= this.options.pdfExtractor.isAvailable().then(
      (available) => {
        if (!available) {
          this.reportPdfUnavailable();
        }
        return available;
      },
      (e: unknown) => {
        this.options.logger?.debug("pdf:check-failed", {
          error: getErrorMessage(e),
        });
        this.reportPdfUnavailable();
        return false;
      },
    );
    return this.pdfAvailability;
  }

  private reportPdfUnavailable(): void {
    const command = this.options.config.pdfToTextCommand;
    this.options.report({
      kind: "pdf-unavailable",
      message: `${command} not found. PDF files will not be searched. To install ${command}, run: ${PDF_INSTALL_HINT}`,
    });
  }

  private async matchPdf(
    filePath: string,
    matcher: LineMatcher,
  ): Promise<ContentMatchResult> {
    if (!(await this.isPdfSearchAvailable())) {
      return skipped("pdf-unavailable");
    }

    let text: string;
    try {
      text = await this.options.pdfExtractor.extract(filePath);
    } catch (e) {
      this.options.report({
        kind: "pdf-failed",
        path: filePath,
        message: sanitizeErrorMessage(getErrorMessage(e)),
      });
      return skipped("pdf-failed");
    }

    return {
      status: "searched",
      format: "pdf",
      matches: findMatchingLines(
        text,
        matcher,
        this.options.config.snippetMaxLength,
      ),
    };
  }
}
