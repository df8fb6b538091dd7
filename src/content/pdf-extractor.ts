/**
 * PDF text extraction through an external command-line tool
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { isErrnoException, PdfExtractionError } from "../errors.js";
import { sanitizeErrorMessage } from "../fs/sanitize-error.js";

const execFileAsync = promisify(execFile);

const MAX_EXTRACTED_TEXT = 64 * 1024 * 1024;

export interface PdfTextExtractor {
  /** Resolves false when the extraction tool is not installed */
  isAvailable(): Promise<boolean>;
  /**
   * Extract the text of a PDF file.
   * @throws PdfExtractionError if the tool fails on this file
   */
  extract(pdfPath: string): Promise<string>;
}

export interface PdftotextExtractorOptions {
  /** Command to run (default: "pdftotext") */
  command?: string;
  /** Time allowed for one extraction in ms (default: 30000) */
  timeoutMs?: number;
}

function stderrOf(e: unknown): string {
  if (
    typeof e === "object" &&
    e !== null &&
    "stderr" in e &&
    typeof e.stderr === "string"
  ) {
    return e.stderr;
  }
  return "";
}

/**
 * Runs `pdftotext <file> -` and returns what it writes to stdout.
 */
export class PdftotextExtractor implements PdfTextExtractor {
  private readonly command: string;
  private readonly timeoutMs: number;
  private availability?: Promise<boolean>;

  constructor(options: PdftotextExtractorOptions = {}) {
    this.command = options.command ?? "pdftotext";
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  isAvailable(): Promise<boolean> {
    this.availability ??= this.checkAvailability();
    return this.availability;
  }

  private async checkAvailability(): Promise<boolean> {
    try {
      await execFileAsync(this.command, ["-v"], { timeout: this.timeoutMs });
      return true;
    } catch (e) {
      // Older poppler releases exit non-zero on -v; only a missing or
      // non-executable binary counts as unavailable.
      if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "EACCES")) {
        return false;
      }
      return true;
    }
  }

  async extract(pdfPath: string): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.command, [pdfPath, "-"], {
        encoding: "utf8",
        maxBuffer: MAX_EXTRACTED_TEXT,
        timeout: this.timeoutMs,
      });
      return stdout;
    } catch (e) {
      const stderr = stderrOf(e).trim();
      const reason =
        stderr.length > 0
          ? stderr
          : e instanceof Error
            ? e.message
            : String(e);
      throw new PdfExtractionError(pdfPath, sanitizeErrorMessage(reason));
    }
  }
}
