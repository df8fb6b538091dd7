/**
 * Walker
 *
 * Depth-first traversal of the search root, gated by the Path Filter.
 * Holds no search logic: it only enumerates what the matchers may see.
 */

import * as nodePath from "node:path";
import {
  getErrorMessage,
  isErrnoException,
  RootDirectoryError,
  SearchCancelledError,
} from "../errors.js";
import type { PathFilter } from "../filter/path-filter.js";
import type { DirentEntry, SearchFileSystem } from "../fs/interface.js";

export type WalkEntry =
  | { type: "directory"; path: string; name: string }
  | { type: "file"; path: string; name: string }
  | { type: "error"; path: string; error: unknown };

export interface WalkOptions {
  fs: SearchFileSystem;
  filter: PathFilter;
  /** Follow symbolic links (default: false, links are skipped) */
  followSymlinks?: boolean;
  signal?: AbortSignal;
}

interface WalkContext extends WalkOptions {
  /** Canonical paths of directories already entered (symlink cycles) */
  visited: Set<string>;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new SearchCancelledError();
  }
}

function describeRootError(e: unknown): string {
  if (isErrnoException(e)) {
    switch (e.code) {
      case "ENOENT":
        return "no such file or directory";
      case "EACCES":
      case "EPERM":
        return "permission denied";
      case "ENOTDIR":
        return "not a directory";
    }
  }
  return getErrorMessage(e);
}

/**
 * Walk the tree under rootDir. The root itself is not yielded.
 *
 * @throws RootDirectoryError if the root is missing, not a directory or unreadable
 * @throws SearchCancelledError if the signal is aborted during the walk
 */
export async function* walk(
  rootDir: string,
  options: WalkOptions,
): AsyncGenerator<WalkEntry, void, undefined> {
  const { fs } = options;
  throwIfAborted(options.signal);

  const ctx: WalkContext = { ...options, visited: new Set() };
  let entries: DirentEntry[];
  try {
    const stat = await fs.stat(rootDir);
    if (!stat.isDirectory) {
      throw new RootDirectoryError(rootDir, "not a directory");
    }
    entries = await fs.readdirWithFileTypes(rootDir);
    if (options.followSymlinks) {
      ctx.visited.add(await fs.realpath(rootDir));
    }
  } catch (e) {
    if (e instanceof RootDirectoryError) throw e;
    throw new RootDirectoryError(rootDir, describeRootError(e));
  }

  yield* walkDirectory(rootDir, entries, ctx);
}

async function* walkDirectory(
  dirPath: string,
  entries: DirentEntry[],
  ctx: WalkContext,
): AsyncGenerator<WalkEntry, void, undefined> {
  for (const entry of entries) {
    throwIfAborted(ctx.signal);

    const entryPath = nodePath.join(dirPath, entry.name);
    let isDirectory = entry.isDirectory;
    let isFile = entry.isFile;

    if (entry.isSymbolicLink) {
      if (!ctx.followSymlinks) {
        continue;
      }
      try {
        const stat = await ctx.fs.stat(entryPath);
        isDirectory = stat.isDirectory;
        isFile = stat.isFile;
      } catch (e) {
        // Dangling link
        yield { type: "error", path: entryPath, error: e };
        continue;
      }
    }

    if (isDirectory) {
      if (ctx.filter.shouldPrune(entryPath)) {
        continue;
      }

      if (ctx.followSymlinks) {
        let canonical: string;
        try {
          canonical = await ctx.fs.realpath(entryPath);
        } catch (e) {
          yield { type: "error", path: entryPath, error: e };
          continue;
        }
        if (ctx.visited.has(canonical)) {
          continue;
        }
        ctx.visited.add(canonical);
      }

      yield { type: "directory", path: entryPath, name: entry.name };

      let children: DirentEntry[];
      try {
        children = await ctx.fs.readdirWithFileTypes(entryPath);
      } catch (e) {
        yield { type: "error", path: entryPath, error: e };
        continue;
      }
      yield* walkDirectory(entryPath, children, ctx);
    } else if (isFile) {
      if (ctx.filter.isExcluded(entryPath)) {
        continue;
      }
      yield { type: "file", path: entryPath, name: entry.name };
    }
  }
}
