import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveEngineConfig } from "../config/engine-config.js";
import type { SearchFileSystem } from "../fs/interface.js";
import { NodeFs } from "../fs/node-fs.js";
import { compilePattern } from "../pattern/index.js";
import {
  createTree,
  FakePdfExtractor,
  FaultyFs,
  PDF_BYTES,
  PNG_BYTES,
  removeTree,
} from "../test-utils/search-fixtures.js";
import type { Diagnostic, SearchMode } from "../types.js";
import { ContentMatcher } from "./content-matcher.js";

describe("ContentMatcher", () => {
  let root: string;
  let diagnostics: Diagnostic[];

  beforeEach(() => {
    root = createTree({
      "notes.txt": "first\nTODO one\nnone\n  todo two  \n",
      "picture.png": PNG_BYTES,
      "report.pdf": PDF_BYTES,
      "manual.pdf": PDF_BYTES,
      "scan.bin": PDF_BYTES,
      "big.log": "todo todo todo todo\n",
    });
    diagnostics = [];
  });

  afterEach(() => {
    removeTree(root);
  });

  function createContentMatcher(
    options: {
      term?: string;
      mode?: SearchMode;
      pdf?: FakePdfExtractor;
      fs?: SearchFileSystem;
      maxFileSizeBytes?: number;
    } = {},
  ): ContentMatcher {
    return new ContentMatcher({
      fs: options.fs ?? new NodeFs(),
      pattern: compilePattern(options.mode ?? "literal", options.term ?? "todo"),
      pdfExtractor: options.pdf ?? new FakePdfExtractor({}),
      config: resolveEngineConfig({
        maxFileSizeBytes: options.maxFileSizeBytes,
      }),
      report: (d) => diagnostics.push(d),
    });
  }

  it("should return every matching line of a text file", async () => {
    const result = await createContentMatcher().matchFile(
      path.join(root, "notes.txt"),
    );
    expect(result).toEqual({
      status: "searched",
      format: "text",
      matches: [
        { line: 2, snippet: "TODO one" },
        { line: 4, snippet: "todo two" },
      ],
    });
    expect(diagnostics).toEqual([]);
  });

  it("should return no matches for a text file without the term", async () => {
    const result = await createContentMatcher({ term: "absent" }).matchFile(
      path.join(root, "notes.txt"),
    );
    expect(result).toEqual({ status: "searched", format: "text", matches: [] });
  });

  it("should skip binary files silently", async () => {
    const result = await createContentMatcher().matchFile(
      path.join(root, "picture.png"),
    );
    expect(result).toEqual({ status: "skipped", reason: "unsupported" });
    expect(diagnostics).toEqual([]);
  });

  it("should search extracted PDF text", async () => {
    const pdf = new FakePdfExtractor({
      "report.pdf": "Quarterly report\nbudget TODO\n",
    });
    const result = await createContentMatcher({ pdf }).matchFile(
      path.join(root, "report.pdf"),
    );
    expect(result).toEqual({
      status: "searched",
      format: "pdf",
      matches: [{ line: 2, snippet: "budget TODO" }],
    });
  });

  it("should detect a PDF by its magic bytes", async () => {
    const pdf = new FakePdfExtractor({ "scan.bin": "todo from scan" });
    const scanPath = path.join(root, "scan.bin");
    const result = await createContentMatcher({ pdf }).matchFile(scanPath);
    expect(result).toEqual({
      status: "searched",
      format: "pdf",
      matches: [{ line: 1, snippet: "todo from scan" }],
    });
    expect(pdf.extractions).toEqual([scanPath]);
  });

  it("should warn once when the PDF tool is unavailable", async () => {
    const pdf = new FakePdfExtractor({}, false);
    const matcher = createContentMatcher({ pdf });
    const results = await Promise.all([
      matcher.matchFile(path.join(root, "report.pdf")),
      matcher.matchFile(path.join(root, "manual.pdf")),
    ]);
    const later = await matcher.matchFile(path.join(root, "scan.bin"));

    expect(results).toEqual([
      { status: "skipped", reason: "pdf-unavailable" },
      { status: "skipped", reason: "pdf-unavailable" },
    ]);
    expect(later).toEqual({ status: "skipped", reason: "pdf-unavailable" });
    expect(pdf.availabilityChecks).toBe(1);
    expect(pdf.extractions).toEqual([]);
    expect(diagnostics).toEqual([
      {
        kind: "pdf-unavailable",
        message:
          "pdftotext not found. PDF files will not be searched. To install pdftotext, run: sudo apt install poppler-utils",
      },
    ]);
  });

  it("should keep text search working when the PDF tool is unavailable", async () => {
    const matcher = createContentMatcher({
      pdf: new FakePdfExtractor({}, false),
    });
    await matcher.matchFile(path.join(root, "report.pdf"));
    const result = await matcher.matchFile(path.join(root, "notes.txt"));
    expect(result.status).toBe("searched");
  });

  it("should report a per-file extraction failure", async () => {
    const reportPath = path.join(root, "report.pdf");
    const result = await createContentMatcher().matchFile(reportPath);
    expect(result).toEqual({ status: "skipped", reason: "pdf-failed" });
    expect(diagnostics).toEqual([
      {
        kind: "pdf-failed",
        path: reportPath,
        message: `Could not extract text from '${reportPath}': Syntax Error: broken xref`,
      },
    ]);
  });

  it("should skip files over the size limit", async () => {
    const bigPath = path.join(root, "big.log");
    const result = await createContentMatcher({
      maxFileSizeBytes: 4,
    }).matchFile(bigPath);
    expect(result).toEqual({ status: "skipped", reason: "too-large" });
    expect(diagnostics).toEqual([
      {
        kind: "too-large",
        path: bigPath,
        message: `${bigPath}: skipped, 20 bytes exceeds the 4 byte limit`,
      },
    ]);
  });

  it("should report files that cannot be read", async () => {
    const notesPath = path.join(root, "notes.txt");
    const result = await createContentMatcher({
      fs: new FaultyFs(new Set(), new Set([notesPath])),
    }).matchFile(notesPath);
    expect(result).toEqual({ status: "skipped", reason: "read-failed" });
    expect(diagnostics).toEqual([
      {
        kind: "read-failed",
        path: notesPath,
        message: `${notesPath}: EACCES: open '${notesPath}'`,
      },
    ]);
  });

  it("should report an invalid pattern once and stop content search", async () => {
    const matcher = createContentMatcher({
      mode: "extended",
      term: "(unclosed",
    });
    const first = await matcher.matchFile(path.join(root, "notes.txt"));
    const second = await matcher.matchFile(path.join(root, "big.log"));

    expect(first).toEqual({ status: "skipped", reason: "invalid-pattern" });
    expect(second).toEqual({ status: "skipped", reason: "invalid-pattern" });
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("invalid-pattern");
    expect(diagnostics[0].message).toMatch(
      /^Invalid pattern '\(unclosed': .*Content search disabled\.$/,
    );
  });

  it("should report an invalid pattern before any file is searched", () => {
    createContentMatcher({ mode: "extended", term: "(unclosed" });
    expect(diagnostics.map((d) => d.kind)).toEqual(["invalid-pattern"]);
  });

  it("should report nothing on construction for a valid pattern", () => {
    createContentMatcher({ mode: "extended", term: "to+do" });
    expect(diagnostics).toEqual([]);
  });
});
