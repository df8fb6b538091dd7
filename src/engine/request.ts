/**
 * Search request validation
 */

import * as nodePath from "node:path";
import { z } from "zod";
import { InvalidRequestError } from "../errors.js";
import type { SearchMode, SearchRequest } from "../types.js";

const requestSchema = z.object({
  rootDir: z.string().min(1, "must not be empty"),
  term: z.string().min(1, "must not be empty"),
  mode: z.enum(["literal", "basic", "extended"]).default("literal"),
  excludePatterns: z.array(z.string()).default([]),
  includePatterns: z.array(z.string()).default([]),
});

/**
 * What callers pass to submit. Mode defaults to literal and pattern
 * lists default to empty.
 */
export interface SearchRequestInput {
  rootDir: string;
  term: string;
  mode?: SearchMode;
  excludePatterns?: readonly string[];
  includePatterns?: readonly string[];
}

/**
 * Validate a request and return the engine's own frozen copy, with
 * rootDir resolved to an absolute path.
 *
 * @throws InvalidRequestError listing every problem found
 */
export function validateRequest(input: unknown): SearchRequest {
  const parsed = requestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const { rootDir, term, mode, excludePatterns, includePatterns } =
    parsed.data;
  return Object.freeze({
    rootDir: nodePath.resolve(rootDir),
    term,
    mode,
    excludePatterns: Object.freeze([...excludePatterns]),
    includePatterns: Object.freeze([...includePatterns]),
  });
}
