/**
 * Pattern Compiler
 *
 * Turns (mode, raw term) into the regex source used for content matching.
 * Case-insensitivity is a property of the matcher, never of the pattern
 * text: the term is not case-folded here.
 */

import { InvalidPatternError } from "../errors.js";
import { createUserRegex } from "../regex/index.js";
import type { SearchMode } from "../types.js";
import { transformPosixCharacterClasses, translateBasicRegex } from "./posix.js";

export interface CompiledPattern {
  readonly mode: SearchMode;
  /** The term as the user typed it */
  readonly term: string;
  /** Regex source in the RE2 dialect */
  readonly source: string;
}

export interface LineMatcher {
  /** True if the line contains a match (case-insensitive) */
  test(line: string): boolean;
  /** Index of the first match in the line, or -1 */
  search(line: string): number;
}

const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\]/g;

/**
 * Escape every regex metacharacter so the term matches as plain text.
 */
export function escapeRegex(term: string): string {
  return term.replace(REGEX_METACHARACTERS, "\\$&");
}

/**
 * Compile a search term for the given mode.
 *
 * Invalid Basic/Extended syntax is not detected here; it surfaces when
 * a matcher is created from the pattern.
 *
 * @throws RangeError if the term is empty (callers must reject empty terms)
 */
export function compilePattern(
  mode: SearchMode,
  term: string,
): CompiledPattern {
  if (term.length === 0) {
    throw new RangeError("Search term must not be empty");
  }

  let source: string;
  switch (mode) {
    case "literal":
      source = escapeRegex(term);
      break;
    case "basic":
      source = translateBasicRegex(transformPosixCharacterClasses(term));
      break;
    case "extended":
      source = transformPosixCharacterClasses(term);
      break;
  }

  return Object.freeze({ mode, term, source });
}

/**
 * Create the case-insensitive line matcher for a compiled pattern.
 *
 * @throws InvalidPatternError if the pattern is not a valid regex
 */
export function createMatcher(pattern: CompiledPattern): LineMatcher {
  try {
    return createUserRegex(pattern.source, "i");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InvalidPatternError(pattern.term, reason);
  }
}
