/**
 * Test fixtures: temporary directory trees and filesystem/extractor doubles.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { PdfTextExtractor } from "../content/pdf-extractor.js";
import { PdfExtractionError } from "../errors.js";
import type { DirentEntry, FsStat, SearchFileSystem } from "../fs/interface.js";
import { NodeFs } from "../fs/node-fs.js";

/**
 * Create a temporary directory populated with the given files.
 * Keys are paths relative to the directory; parent directories are created.
 */
export function createTree(files: Record<string, string | Uint8Array>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "folder-search-test-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

function errnoError(code: string, syscall: string, target: string): Error {
  return Object.assign(new Error(`${code}: ${syscall} '${target}'`), {
    code,
    syscall,
    path: target,
  });
}

/**
 * NodeFs that fails with EACCES for chosen paths.
 * Running tests as root makes chmod useless for this.
 */
export class FaultyFs implements SearchFileSystem {
  private readonly inner = new NodeFs();

  constructor(
    private readonly unreadableDirs: ReadonlySet<string> = new Set(),
    private readonly unreadableFiles: ReadonlySet<string> = new Set(),
  ) {}

  async readdirWithFileTypes(dirPath: string): Promise<DirentEntry[]> {
    if (this.unreadableDirs.has(dirPath)) {
      throw errnoError("EACCES", "scandir", dirPath);
    }
    return this.inner.readdirWithFileTypes(dirPath);
  }

  stat(target: string): Promise<FsStat> {
    return this.inner.stat(target);
  }

  realpath(target: string): Promise<string> {
    return this.inner.realpath(target);
  }

  async readFileBuffer(filePath: string): Promise<Uint8Array> {
    if (this.unreadableFiles.has(filePath)) {
      throw errnoError("EACCES", "open", filePath);
    }
    return this.inner.readFileBuffer(filePath);
  }
}

/**
 * PDF extractor double returning canned text per file name.
 */
export class FakePdfExtractor implements PdfTextExtractor {
  availabilityChecks = 0;
  extractions: string[] = [];

  constructor(
    private readonly texts: Record<string, string>,
    private readonly available = true,
  ) {}

  async isAvailable(): Promise<boolean> {
    this.availabilityChecks++;
    return this.available;
  }

  async extract(pdfPath: string): Promise<string> {
    this.extractions.push(pdfPath);
    const text = this.texts[path.basename(pdfPath)];
    if (text === undefined) {
      throw new PdfExtractionError(pdfPath, "Syntax Error: broken xref");
    }
    return text;
  }
}

/** Minimal bytes recognised as a PDF by magic number */
export const PDF_BYTES: Uint8Array = new TextEncoder().encode(
  "%PDF-1.4\n%fake\n",
);

/** PNG magic followed by an IHDR chunk */
export const PNG_BYTES: Uint8Array = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d,
  0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x01,
  0x08, 0x02, 0x00, 0x00, 0x00, 0x90, 0x77, 0x53, 0xde,
]);
