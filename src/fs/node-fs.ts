/**
 * NodeFs - Read-only wrapper around the real filesystem
 *
 * Errors from node:fs are passed through unchanged so callers can
 * inspect their errno `code`.
 */

import * as fs from "node:fs";
import type { DirentEntry, FsStat, SearchFileSystem } from "./interface.js";

function toFsStat(stat: fs.Stats): FsStat {
  return {
    isFile: stat.isFile(),
    isDirectory: stat.isDirectory(),
    isSymbolicLink: stat.isSymbolicLink(),
    size: stat.size,
  };
}

export class NodeFs implements SearchFileSystem {
  async readdirWithFileTypes(path: string): Promise<DirentEntry[]> {
    const entries = await fs.promises.readdir(path, { withFileTypes: true });
    return entries
      .map((dirent) => ({
        name: dirent.name,
        isFile: dirent.isFile(),
        isDirectory: dirent.isDirectory(),
        isSymbolicLink: dirent.isSymbolicLink(),
      }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async stat(path: string): Promise<FsStat> {
    return toFsStat(await fs.promises.stat(path));
  }

  async realpath(path: string): Promise<string> {
    return fs.promises.realpath(path);
  }

  async readFileBuffer(path: string): Promise<Uint8Array> {
    const content = await fs.promises.readFile(path);
    return new Uint8Array(content.buffer, content.byteOffset, content.length);
  }
}
