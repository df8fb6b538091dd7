/**
 * Markdown results report
 */

import {
  type ResultSet,
  SEARCH_MODE_LABELS,
  type SearchRequest,
} from "../types.js";

export interface ResultsReport {
  request: SearchRequest;
  result: ResultSet;
  /** When the search ran (default: now) */
  date?: Date;
}

function encodeSegment(segment: string): string {
  // encodeURIComponent leaves !'()* alone; a file URI should not
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Absolute path to a `file://` URI, percent-encoding everything but `/`
 * and the unreserved characters.
 */
export function toFileUri(absolutePath: string): string {
  return `file://${absolutePath.split("/").map(encodeSegment).join("/")}`;
}

/**
 * Render a finished search as a markdown document with one
 * `- file://...` line per result.
 */
export function formatResultsMarkdown(report: ResultsReport): string {
  const { request, result } = report;
  const date = report.date ?? new Date();

  const lines = [
    "# Search Results",
    "",
    `**Search term:** ${request.term}`,
    "",
    `**Search type:** ${SEARCH_MODE_LABELS[request.mode]}`,
    "",
    `**Search location:** ${request.rootDir}`,
    "",
    `**Date:** ${date.toISOString()}`,
    "",
    "---",
    "",
  ];

  if (result.diagnostics.some((d) => d.kind === "pdf-unavailable")) {
    lines.push(
      "## Note",
      "pdftotext is not installed. PDF files were not searched.",
      "To enable PDF searching, run: `sudo apt install poppler-utils`",
      "",
    );
  }

  const sections: Array<[string, string[]]> = [
    ["Regular Files", []],
    ["PDF Files", []],
    ["Filename Matches", []],
  ];
  for (const entry of result.entries) {
    const index =
      entry.origin === "filename" ? 2 : entry.format === "pdf" ? 1 : 0;
    sections[index][1].push(toFileUri(entry.path));
  }

  for (const [title, uris] of sections) {
    lines.push(`## ${title}`, "");
    for (const uri of uris) {
      lines.push(`- ${uri}`);
    }
    if (uris.length > 0) {
      lines.push("");
    }
  }

  return lines.join("\n");
}
