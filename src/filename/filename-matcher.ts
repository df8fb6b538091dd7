/**
 * Filename Matcher
 *
 * Case-insensitive substring test of the raw term against a base name.
 * The search mode never applies here: `file*.txt` only matches names that
 * contain those exact characters.
 */

export function matchesFilename(name: string, term: string): boolean {
  if (term.length === 0) {
    return false;
  }
  return name.toLowerCase().includes(term.toLowerCase());
}
