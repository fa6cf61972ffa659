/**
 * Simple glob matching for tool path patterns.
 * Supports '*' wildcards only (not full glob syntax); '.' is literal.
 */

export function matchesGlob(name: string, pattern: string): boolean {
  // Convert glob pattern to regex: escape special chars, replace * with .*
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
  const regex = new RegExp(`^${escaped.replace(/\*/g, ".*")}$`);
  return regex.test(name);
}

/** First pattern that matches `name`, if any. */
export function findMatchingGlob(
  name: string,
  patterns: readonly string[],
): string | undefined {
  return patterns.find(pattern => pattern.length > 0 && matchesGlob(name, pattern));
}
