/**
 * Line-based content matching
 */

import type { LineMatcher } from "../pattern/index.js";
import type { ContentDetail } from "../types.js";

/**
 * Cut a matching line down to maxLength characters around the match.
 * An ellipsis marks each side that was cut.
 */
export function makeSnippet(
  line: string,
  matcher: LineMatcher,
  maxLength: number,
): string {
  const text = line.trim();
  if (text.length <= maxLength) {
    return text;
  }

  const index = Math.max(0, matcher.search(text));
  const start = Math.min(
    Math.max(0, index - Math.floor(maxLength / 2)),
    text.length - maxLength,
  );
  const prefix = start > 0 ? "…" : "";
  const suffix = start + maxLength < text.length ? "…" : "";
  return prefix + text.slice(start, start + maxLength) + suffix;
}

/**
 * Find every matching line of the content, in file order.
 */
export function findMatchingLines(
  content: string,
  matcher: LineMatcher,
  snippetMaxLength: number,
): ContentDetail[] {
  const lines = content.split("\n");
  // Handle trailing empty line from split if content ended with newline
  const lastIdx =
    lines.length > 0 && lines[lines.length - 1] === ""
      ? lines.length - 1
      : lines.length;

  const matches: ContentDetail[] = [];
  for (let i = 0; i < lastIdx; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    if (matcher.test(line)) {
      matches.push({
        line: i + 1,
        snippet: makeSnippet(line, matcher, snippetMaxLength),
      });
    }
  }
  return matches;
}
