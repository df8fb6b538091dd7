/**
 * Path Filter
 *
 * Exclude globs prune directories and skip files for both content and
 * filename search. Include globs gate content search only.
 */

import * as nodePath from "node:path";
import { getErrorMessage, InvalidRequestError } from "../errors.js";
import type { RegexLike } from "../regex/index.js";
import { compileGlob } from "../utils/glob.js";

export interface PathFilterOptions {
  excludePatterns: readonly string[];
  includePatterns: readonly string[];
}

export interface PathFilter {
  /** True if the directory and everything beneath it must not be visited */
  shouldPrune(dirPath: string): boolean;
  /** True if a file must be skipped by every matcher */
  isExcluded(filePath: string): boolean;
  /** True if the file may be searched for content */
  isContentEligible(filePath: string): boolean;
}

class GlobPathFilter implements PathFilter {
  constructor(
    private readonly exclude: readonly RegexLike[],
    private readonly include: readonly RegexLike[],
  ) {}

  shouldPrune(dirPath: string): boolean {
    return this.isExcluded(dirPath);
  }

  isExcluded(filePath: string): boolean {
    return this.exclude.some((glob) => glob.test(filePath));
  }

  isContentEligible(filePath: string): boolean {
    if (this.include.length === 0) {
      return true;
    }
    // Bare patterns like "*.md" are checked against the base name too
    const baseName = nodePath.basename(filePath);
    return this.include.some(
      (glob) => glob.test(filePath) || glob.test(baseName),
    );
  }
}

function compileGlobs(
  field: keyof PathFilterOptions,
  patterns: readonly string[],
  issues: string[],
): RegexLike[] {
  const compiled: RegexLike[] = [];
  for (const pattern of patterns) {
    if (pattern.length === 0) {
      continue;
    }
    try {
      compiled.push(compileGlob(pattern));
    } catch (e) {
      issues.push(`${field}: invalid glob '${pattern}': ${getErrorMessage(e)}`);
    }
  }
  return compiled;
}

/**
 * Compile every exclude and include glob once, up front.
 *
 * @throws InvalidRequestError naming every glob that does not compile
 */
export function createPathFilter(options: PathFilterOptions): PathFilter {
  const issues: string[] = [];
  const exclude = compileGlobs(
    "excludePatterns",
    options.excludePatterns,
    issues,
  );
  const include = compileGlobs(
    "includePatterns",
    options.includePatterns,
    issues,
  );
  if (issues.length > 0) {
    throw new InvalidRequestError(issues);
  }
  return new GlobPathFilter(Object.freeze(exclude), Object.freeze(include));
}
