/**
 * Glob pattern compilation for exclude/include filters.
 *
 * Patterns follow `find -path` semantics: they are matched against the
 * full path, and `*` also matches `/`.
 */

import { transformPosixCharacterClasses } from "../pattern/posix.js";
import { createUserRegex, type RegexLike } from "../regex/index.js";

/**
 * Compile a glob pattern into a case-sensitive matcher.
 *
 * Supports:
 * - `*` matches any sequence of characters, including `/`
 * - `?` matches any single character
 * - `[...]` and `[!...]` character classes, with `[:alpha:]` style
 *   POSIX classes inside them
 *
 * @throws SyntaxError if the pattern does not form a valid matcher,
 * such as a reversed range in `[z-a]`
 */
export function compileGlob(pattern: string): RegexLike {
  return createUserRegex(globToRegexSource(pattern));
}

/**
 * Convert a glob pattern to an anchored regex source.
 */
export function globToRegexSource(pattern: string): string {
  let regex = "^";

  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (c === "*") {
      regex += ".*";
    } else if (c === "?") {
      regex += ".";
    } else if (c === "[") {
      const close = findBracketEnd(pattern, i);
      if (close === -1) {
        // Unterminated class: the [ is an ordinary character
        regex += "\\[";
        continue;
      }
      let body = pattern.slice(i + 1, close);
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`;
      }
      regex += transformPosixCharacterClasses(`[${body}]`);
      i = close;
    } else if ("\\.+^${}()|]".includes(c)) {
      regex += `\\${c}`;
    } else {
      regex += c;
    }
  }

  return `${regex}$`;
}

/**
 * Index of the `]` closing the bracket expression opened at `open`,
 * or -1. A `]` first in the expression and the `]` of a `[:class:]`
 * do not close it.
 */
function findBracketEnd(pattern: string, open: number): number {
  let i = open + 1;
  if (pattern[i] === "!" || pattern[i] === "^") {
    i++;
  }
  if (pattern[i] === "]") {
    i++;
  }
  while (i < pattern.length) {
    if (pattern[i] === "[" && pattern[i + 1] === ":") {
      const classEnd = pattern.indexOf(":]", i + 2);
      if (classEnd !== -1) {
        i = classEnd + 2;
        continue;
      }
    }
    if (pattern[i] === "]") {
      return i;
    }
    i++;
  }
  return -1;
}
