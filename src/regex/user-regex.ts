/**
 * UserRegex - Centralized regex handling for user-provided patterns
 *
 * Search terms and glob patterns come from users and config files, so they
 * run on RE2JS: linear-time matching with no catastrophic backtracking.
 */

import { RE2JS, RE2JSSyntaxException } from "re2js";

/**
 * The subset of the RegExp interface the search engine relies on.
 */
export interface RegexLike {
  test(input: string): boolean;
  /** Index of the first match, or -1 */
  search(input: string): number;
  readonly source: string;
  readonly flags: string;
  readonly ignoreCase: boolean;
}

/**
 * Convert string flags to RE2JS numeric flags.
 * Only `i`, `m` and `s` have an RE2 equivalent; `g` is meaningless for
 * the line-at-a-time matching done here and is ignored.
 */
function convertFlags(flags: string): number {
  let re2Flags = 0;
  if (flags.includes("i")) {
    re2Flags |= RE2JS.CASE_INSENSITIVE;
  }
  if (flags.includes("m")) {
    re2Flags |= RE2JS.MULTILINE;
  }
  if (flags.includes("s")) {
    re2Flags |= RE2JS.DOTALL;
  }
  return re2Flags;
}

/**
 * Explain RE2 limitations that users hit with POSIX and Perl habits.
 */
function explainUnsupported(pattern: string): string {
  if (/\(\?<?[=!]/.test(pattern)) {
    return " Lookahead and lookbehind assertions are not supported.";
  }
  if (/\\[1-9]/.test(pattern)) {
    return " Backreferences (\\1, \\2, etc.) are not supported.";
  }
  return "";
}

/**
 * A wrapper around RE2JS that provides a RegExp-like interface.
 */
export class UserRegex implements RegexLike {
  private readonly _re2: RE2JS;
  private readonly _pattern: string;
  private readonly _flags: string;

  /**
   * @throws SyntaxError if the pattern is not a valid regular expression
   */
  constructor(pattern: string, flags = "") {
    this._pattern = pattern;
    this._flags = flags;

    try {
      this._re2 = RE2JS.compile(
        RE2JS.translateRegExp(pattern),
        convertFlags(flags),
      );
    } catch (e) {
      if (e instanceof RE2JSSyntaxException) {
        throw new SyntaxError(
          `Invalid regular expression: /${pattern}/: ${e.message}${explainUnsupported(pattern)}`,
        );
      }
      throw e;
    }
  }

  test(input: string): boolean {
    return this._re2.matcher(input).find();
  }

  search(input: string): number {
    const matcher = this._re2.matcher(input);
    return matcher.find() ? matcher.start(0) : -1;
  }

  get source(): string {
    return this._pattern;
  }

  get flags(): string {
    return this._flags;
  }

  get ignoreCase(): boolean {
    return this._flags.includes("i");
  }
}

/**
 * Create a regex for a user-provided pattern.
 *
 * @throws SyntaxError if the pattern is not a valid regular expression
 */
export function createUserRegex(pattern: string, flags = ""): UserRegex {
  return new UserRegex(pattern, flags);
}
