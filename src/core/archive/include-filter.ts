/**
 * Include-folder filtering for archive walks.
 *
 * Terms and relative paths are compared as raw forward-slash strings, so the
 * term "data" also admits a sibling named "data-old".
 */

export function normalizeIncludeTerm(term: string): string {
  let normalized = term.replace(/\\/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }
  return normalized.replace(/\/+$/, "");
}

export function normalizeIncludeTerms(terms: readonly string[]): string[] {
  return terms.map(normalizeIncludeTerm);
}

/**
 * Whether the walk should visit `relativePath`: the root, anything under an
 * include term, and every parent directory leading to one.
 */
export function shouldInclude(relativePath: string, includeFolders: readonly string[]): boolean {
  if (relativePath === "." || includeFolders.length === 0) return true;

  return includeFolders.some(
    (term) => relativePath.startsWith(term) || term.startsWith(relativePath),
  );
}

/**
 * Whether a visited entry is written to the archive. Parents that are only on
 * the way to an include term are walked but not stored.
 */
export function shouldEmit(relativePath: string, includeFolders: readonly string[]): boolean {
  if (relativePath === ".") return false;
  if (includeFolders.length === 0) return true;

  return includeFolders.some((term) => relativePath.startsWith(term));
}
