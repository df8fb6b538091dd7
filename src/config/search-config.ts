/**
 * Search configuration file
 *
 * ```yaml
 * search:
 *   excluded:
 *     - "*.log"
 *   included:
 *     - "*.md"
 * ```
 *
 * A missing file, a missing section or a value that is not a list all
 * read as empty lists. Only a file that is not valid YAML is an error.
 */

import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as nodePath from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, getErrorMessage, isErrnoException } from "../errors.js";
import { sanitizeErrorMessage } from "../fs/sanitize-error.js";

export interface SearchConfig {
  /** Exclude globs (prune directories, skip files) */
  excluded: string[];
  /** Include globs (gate content search) */
  included: string[];
}

const patternList = z
  .array(z.unknown())
  .transform((items) =>
    items.filter((item): item is string => typeof item === "string"),
  )
  .catch([]);

const configSchema = z
  .object({
    search: z
      .object({ excluded: patternList, included: patternList })
      .catch({ excluded: [], included: [] }),
  })
  .catch({ search: { excluded: [], included: [] } });

export function defaultConfigPath(): string {
  return nodePath.join(os.homedir(), ".config", "folder-search", "config.yaml");
}

/**
 * Parse the text of a configuration file.
 *
 * @throws ConfigError if the text is not valid YAML
 */
export function parseSearchConfig(text: string, file: string): SearchConfig {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(file, sanitizeErrorMessage(getErrorMessage(e)));
  }
  const { search } = configSchema.parse(document);
  return { excluded: [...search.excluded], included: [...search.included] };
}

/**
 * Load the configuration file, or empty lists if it does not exist.
 *
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadSearchConfig(
  file: string = defaultConfigPath(),
): Promise<SearchConfig> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return { excluded: [], included: [] };
    }
    throw new ConfigError(file, sanitizeErrorMessage(getErrorMessage(e)));
  }
  return parseSearchConfig(text, file);
}
