/**
 * Error message sanitization utility.
 *
 * Diagnostics end up on a single progress line, so messages coming from
 * the file system or from child processes are reduced to one line:
 * - Stack trace lines (`\n    at ...`) are removed.
 * - Remaining line breaks are collapsed into "; ".
 * - Error codes (ENOENT, EACCES, etc.) and paths are preserved.
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message) return message;

  // Strip stack trace lines (lines starting with whitespace + "at ")
  const withoutStack = message.replace(/\n\s+at\s.*/g, "");

  return withoutStack
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("; ");
}
