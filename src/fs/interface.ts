/**
 * Directory entry with type information (similar to Node's Dirent)
 * Used by readdirWithFileTypes for directory listing without stat calls
 */
export interface DirentEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
}

/**
 * Stat result from the filesystem
 */
export interface FsStat {
  isFile: boolean;
  isDirectory: boolean;
  isSymbolicLink: boolean;
  size: number;
}

/**
 * Read-only filesystem interface used by the search engine.
 * This allows the engine to work with:
 * - The real filesystem (NodeFs, the default)
 * - Test doubles that inject failures (unreadable directories, etc.)
 *
 * All paths are absolute. Errors are thrown as Node.js errno exceptions
 * (with `code` set to ENOENT, EACCES, ENOTDIR, ...).
 */
export interface SearchFileSystem {
  /**
   * List a directory, sorted by name
   * @throws Error if the directory doesn't exist or can't be read
   */
  readdirWithFileTypes(path: string): Promise<DirentEntry[]>;

  /**
   * Get file/directory information, following symlinks
   */
  stat(path: string): Promise<FsStat>;

  /**
   * Resolve all symlinks to get the canonical path
   */
  realpath(path: string): Promise<string>;

  /**
   * Read the contents of a file as a Uint8Array (binary)
   * @throws Error if file doesn't exist or is a directory
   */
  readFileBuffer(path: string): Promise<Uint8Array>;
}
