import { describe, expect, it } from "vitest";
import type { ResultSet, SearchRequest } from "../types.js";
import { formatResultsMarkdown, toFileUri } from "./markdown.js";

const request: SearchRequest = {
  rootDir: "/srv/docs",
  term: "budget",
  mode: "basic",
  excludePatterns: [],
  includePatterns: [],
};

const stats = {
  directoriesScanned: 1,
  filesScanned: 3,
  contentFilesSearched: 2,
  pdfFilesSearched: 1,
  contentMatches: 2,
  filenameMatches: 1,
  durationMs: 5,
};

const date = new Date("2026-01-02T03:04:05.000Z");

describe("toFileUri", () => {
  it("should keep slashes and encode everything else", () => {
    expect(toFileUri("/home/me/My Docs/(draft) résumé.txt")).toBe(
      "file:///home/me/My%20Docs/%28draft%29%20r%C3%A9sum%C3%A9.txt",
    );
  });

  it("should leave unreserved characters alone", () => {
    expect(toFileUri("/a/b-c_d.e~f")).toBe("file:///a/b-c_d.e~f");
  });

  it("should encode reserved characters in names", () => {
    expect(toFileUri("/a/#1?x=y&z")).toBe("file:///a/%231%3Fx%3Dy%26z");
  });
});

describe("formatResultsMarkdown", () => {
  it("should list results by section", () => {
    const result: ResultSet = {
      entries: [
        {
          path: "/srv/docs/budget.xlsx",
          origin: "filename",
          contentMatches: 0,
        },
        {
          path: "/srv/docs/plan.md",
          origin: "content",
          detail: { line: 4, snippet: "budget" },
          format: "text",
          contentMatches: 1,
        },
        {
          path: "/srv/docs/q1 report.pdf",
          origin: "content",
          detail: { line: 1, snippet: "Budget" },
          format: "pdf",
          contentMatches: 1,
        },
      ],
      diagnostics: [],
      stats,
    };

    expect(formatResultsMarkdown({ request, result, date })).toBe(
      [
        "# Search Results",
        "",
        "**Search term:** budget",
        "",
        "**Search type:** Basic Regex",
        "",
        "**Search location:** /srv/docs",
        "",
        "**Date:** 2026-01-02T03:04:05.000Z",
        "",
        "---",
        "",
        "## Regular Files",
        "",
        "- file:///srv/docs/plan.md",
        "",
        "## PDF Files",
        "",
        "- file:///srv/docs/q1%20report.pdf",
        "",
        "## Filename Matches",
        "",
        "- file:///srv/docs/budget.xlsx",
        "",
      ].join("\n"),
    );
  });

  it("should add a note when PDF search was unavailable", () => {
    const result: ResultSet = {
      entries: [],
      diagnostics: [{ kind: "pdf-unavailable", message: "pdftotext not found" }],
      stats,
    };

    expect(
      formatResultsMarkdown({
        request: { ...request, mode: "literal" },
        result,
        date,
      }),
    ).toBe(
      [
        "# Search Results",
        "",
        "**Search term:** budget",
        "",
        "**Search type:** Literal",
        "",
        "**Search location:** /srv/docs",
        "",
        "**Date:** 2026-01-02T03:04:05.000Z",
        "",
        "---",
        "",
        "## Note",
        "pdftotext is not installed. PDF files were not searched.",
        "To enable PDF searching, run: `sudo apt install poppler-utils`",
        "",
        "## Regular Files",
        "",
        "## PDF Files",
        "",
        "## Filename Matches",
        "",
      ].join("\n"),
    );
  });
});
