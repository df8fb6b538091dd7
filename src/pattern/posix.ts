/**
 * POSIX regex dialect translation (BRE / ERE to the RE2 dialect)
 */

/** POSIX character class to regex character range mapping (Map prevents prototype pollution) */
const POSIX_CLASS_MAP = new Map<string, string>([
  ["alpha", "a-zA-Z"],
  ["digit", "0-9"],
  ["alnum", "a-zA-Z0-9"],
  ["lower", "a-z"],
  ["upper", "A-Z"],
  ["xdigit", "0-9A-Fa-f"],
  ["space", " \\t\\n\\r\\f\\v"],
  ["blank", " \\t"],
  ["punct", "!-/:-@\\[-`{-~"],
  ["graph", "!-~"],
  ["print", " -~"],
  ["cntrl", "\\x00-\\x1F\\x7F"],
]);

/**
 * Transform POSIX character classes in bracket expressions and the GNU
 * word-boundary escapes into their RE2 equivalents.
 *
 * Examples:
 * - [[:alpha:]] → [a-zA-Z]
 * - [^[:digit:]_] → [^0-9_]
 * - \< and \> → \b
 */
export function transformPosixCharacterClasses(pattern: string): string {
  let result = "";
  let i = 0;

  while (i < pattern.length) {
    if (pattern[i] === "[") {
      let bracketExpr = "[";
      i++;

      if (i < pattern.length && pattern[i] === "^") {
        bracketExpr += "^";
        i++;
      }

      // ] as first char is a literal ]
      if (i < pattern.length && pattern[i] === "]") {
        bracketExpr += "\\]";
        i++;
      }

      while (i < pattern.length && pattern[i] !== "]") {
        if (pattern[i] === "[" && pattern[i + 1] === ":") {
          const closeIdx = pattern.indexOf(":]", i + 2);
          if (closeIdx !== -1) {
            const replacement = POSIX_CLASS_MAP.get(
              pattern.slice(i + 2, closeIdx),
            );
            if (replacement) {
              bracketExpr += replacement;
              i = closeIdx + 2;
              continue;
            }
          }
        }

        // Backslash is literal inside POSIX brackets
        if (pattern[i] === "\\") {
          bracketExpr += "\\\\";
          i++;
          continue;
        }

        bracketExpr += pattern[i];
        i++;
      }

      if (i < pattern.length) {
        bracketExpr += "]";
        i++;
      }

      result += bracketExpr;
      continue;
    }

    if (pattern[i] === "\\" && i + 1 < pattern.length) {
      const next = pattern[i + 1];
      result += next === "<" || next === ">" ? "\\b" : pattern[i] + next;
      i += 2;
      continue;
    }

    result += pattern[i];
    i++;
  }

  return result;
}

/**
 * Convert a Basic Regular Expression (BRE) to the RE2 dialect.
 *
 * In BRE:
 * - \| is alternation, \( \) are groups, \{n,m\} are intervals
 * - \+ and \? are the GNU one-or-more and optional quantifiers
 * - + ? | ( ) { } are literal
 * - * at pattern start, group start, or after ^ is literal
 * - ^ is an anchor only at the start of the pattern or of a group
 * - $ is an anchor only at the end of the pattern or of a group
 *
 * Bracket expressions must already have been through
 * transformPosixCharacterClasses.
 */
export function translateBasicRegex(str: string): string {
  let result = "";
  let i = 0;
  let atPatternStart = true;

  while (i < str.length) {
    const char = str[i];

    if (char === "[") {
      // Copy bracket expressions through unchanged
      result += char;
      i++;
      if (i < str.length && str[i] === "^") {
        result += str[i];
        i++;
      }
      while (i < str.length && str[i] !== "]") {
        if (str[i] === "\\" && i + 1 < str.length) {
          result += str[i] + str[i + 1];
          i += 2;
        } else {
          result += str[i];
          i++;
        }
      }
      if (i < str.length) {
        result += str[i];
        i++;
      }
      atPatternStart = false;
      continue;
    }

    if (char === "\\" && i + 1 < str.length) {
      const nextChar = str[i + 1];
      if (nextChar === "|") {
        result += "|";
        i += 2;
        atPatternStart = true;
        continue;
      }
      if (nextChar === "(") {
        result += "(";
        i += 2;
        atPatternStart = true;
        continue;
      }
      if (nextChar === ")") {
        result += ")";
        i += 2;
        atPatternStart = false;
        continue;
      }
      if (nextChar === "{") {
        const intervalMatch = str.slice(i).match(/^\\\{(\d+)(,(\d*))?\\\}/);
        if (intervalMatch) {
          const min = intervalMatch[1];
          const max = intervalMatch[3] ?? "";
          result +=
            intervalMatch[2] !== undefined ? `{${min},${max}}` : `{${min}}`;
          i += intervalMatch[0].length;
          atPatternStart = false;
          continue;
        }
        result += "\\{";
        i += 2;
        atPatternStart = false;
        continue;
      }
      if (nextChar === "}") {
        result += "\\}";
        i += 2;
        atPatternStart = false;
        continue;
      }
      if (nextChar === "+" || nextChar === "?") {
        // GNU quantifiers; with nothing to repeat they stay literal
        result += atPatternStart ? char + nextChar : nextChar;
        i += 2;
        atPatternStart = false;
        continue;
      }
      result += char + nextChar;
      i += 2;
      atPatternStart = false;
      continue;
    }

    if (char === "*" && atPatternStart) {
      result += "\\*";
      i++;
      continue;
    }

    if (char === "^") {
      result += atPatternStart ? "^" : "\\^";
      i++;
      continue;
    }

    if (char === "$") {
      const isAtEnd = i === str.length - 1;
      const isBeforeGroupEnd = str[i + 1] === "\\" && str[i + 2] === ")";
      result += isAtEnd || isBeforeGroupEnd ? "$" : "\\$";
      i++;
      atPatternStart = false;
      continue;
    }

    if ("+?|(){}".includes(char)) {
      result += `\\${char}`;
    } else {
      result += char;
    }
    i++;
    atPatternStart = false;
  }

  return result;
}
