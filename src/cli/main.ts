/**
 * folder-search command line
 *
 * Usage:
 *   folder-search [options] <term> [dir]
 *
 * Progress goes to stderr, one file:// URI per result to stdout.
 * Exit status: 0 when something matched, 1 when nothing did, 2 on error.
 */

import { writeFile } from "node:fs/promises";
import {
  defaultConfigPath,
  loadSearchConfig,
  type SearchConfig,
} from "../config/search-config.js";
import { formatProgressLine } from "../engine/progress.js";
import {
  SearchEngine,
  type SearchEngineOptions,
  type SearchExecution,
} from "../engine/search-engine.js";
import { getErrorMessage, SearchError } from "../errors.js";
import type { SearchLogger } from "../logger.js";
import { formatResultsMarkdown, toFileUri } from "../report/markdown.js";
import type { ProgressEvent, SearchMode } from "../types.js";
import { type ArgDef, parseArgs } from "../utils/args.js";

const CMD = "folder-search";

const HELP = `Usage: ${CMD} [options] <term> [dir]

Search file names and file contents (including PDFs) under dir
(default: the current directory). Matching ignores case.

Options:
  -F, --fixed-strings     match the term literally (default)
  -G, --basic-regexp      term is a POSIX basic regular expression
  -E, --extended-regexp   term is a POSIX extended regular expression
      --exclude GLOB      skip paths matching GLOB (repeatable)
      --include GLOB      only search contents of files matching GLOB (repeatable)
      --config FILE       configuration file
                          (default: ~/.config/folder-search/config.yaml)
  -o, --output FILE       also write a markdown report to FILE
  -q, --quiet             no progress output
  -v, --verbose           show every directory scanned and engine logs
  -h, --help              display this help and exit
`;

const argDefs = {
  fixed: { short: "F", long: "fixed-strings", type: "boolean" },
  basic: { short: "G", long: "basic-regexp", type: "boolean" },
  extended: { short: "E", long: "extended-regexp", type: "boolean" },
  exclude: { long: "exclude", type: "list" },
  include: { long: "include", type: "list" },
  config: { long: "config", type: "string" },
  output: { short: "o", long: "output", type: "string" },
  quiet: { short: "q", long: "quiet", type: "boolean" },
  verbose: { short: "v", long: "verbose", type: "boolean" },
  help: { short: "h", long: "help", type: "boolean" },
} satisfies Record<string, ArgDef>;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Aborting cancels the search */
  signal?: AbortSignal;
  /** Engine overrides (file system, PDF extractor) */
  engine?: SearchEngineOptions;
}

function usageError(io: CliIo, message: string): number {
  io.stderr(`${message}\nTry '${CMD} --help' for more information.\n`);
  return 2;
}

function createStderrLogger(io: CliIo): SearchLogger {
  const write = (level: string, message: string, data?: Record<string, unknown>) =>
    io.stderr(
      data
        ? `[${level}] ${message} ${JSON.stringify(data)}\n`
        : `[${level}] ${message}\n`,
    );
  return {
    info: (message, data) => write("info", message, data),
    debug: (message, data) => write("debug", message, data),
  };
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(CMD, argv, argDefs);
  if (!parsed.ok) {
    return usageError(io, parsed.error);
  }
  const args = parsed.result;

  if (args.flag("help")) {
    io.stdout(HELP);
    return 0;
  }

  const [term, rootDir = ".", ...extra] = args.positional;
  if (term === undefined) {
    return usageError(io, `${CMD}: missing search term`);
  }
  if (extra.length > 0) {
    return usageError(io, `${CMD}: unexpected argument '${extra[0]}'`);
  }

  const mode: SearchMode = args.flag("extended")
    ? "extended"
    : args.flag("basic")
      ? "basic"
      : "literal";

  let config: SearchConfig;
  try {
    config = await loadSearchConfig(args.value("config") ?? defaultConfigPath());
  } catch (e) {
    io.stderr(`${CMD}: ${getErrorMessage(e)}\n`);
    return 2;
  }

  const quiet = args.flag("quiet");
  const verbose = args.flag("verbose");
  const engine = new SearchEngine({
    ...io.engine,
    logger: verbose ? createStderrLogger(io) : io.engine?.logger,
  });

  const onProgress = (event: ProgressEvent): void => {
    if (quiet || (event.type === "scanning" && !verbose)) {
      return;
    }
    io.stderr(`${formatProgressLine(event)}\n`);
  };

  let execution: SearchExecution;
  try {
    execution = engine.submit(
      {
        rootDir,
        term,
        mode,
        excludePatterns: [...config.excluded, ...args.list("exclude")],
        includePatterns: [...config.included, ...args.list("include")],
      },
      { signal: io.signal, onProgress },
    );
  } catch (e) {
    if (!(e instanceof SearchError)) {
      throw e;
    }
    io.stderr(`${CMD}: ${e.message}\n`);
    return 2;
  }

  const outcome = await execution.wait();
  if (outcome.status === "failed") {
    io.stderr(`${CMD}: ${outcome.error.message}\n`);
    return 2;
  }

  const { result } = outcome;
  for (const entry of result.entries) {
    io.stdout(`${toFileUri(entry.path)}\n`);
  }

  const output = args.value("output");
  if (output !== undefined) {
    try {
      await writeFile(
        output,
        formatResultsMarkdown({ request: execution.request, result }),
      );
    } catch (e) {
      io.stderr(`${CMD}: cannot write '${output}': ${getErrorMessage(e)}\n`);
      return 2;
    }
    if (!quiet) {
      io.stderr(`Results written to: ${output}\n`);
    }
  }

  return result.entries.length > 0 ? 0 : 1;
}
