/**
 * Glob pattern matching for repository paths
 *
 * Restricts which files the history pipeline tracks. Uses picomatch for
 * full glob support.
 */

import picomatch from "picomatch";

/**
 * Creates a matcher function for a glob pattern
 *
 * @param pattern - Glob pattern (e.g., "src/**\/*.ts", "{lib,bin}/**")
 * @returns Matcher function that tests if a path matches the pattern
 *
 * @example
 * const isMatch = createGlobMatcher("src/**\/*.ts");
 * isMatch("src/code/ledger/ownership-table.ts"); // true
 * isMatch("docs/guide.md"); // false
 */
export function createGlobMatcher(pattern: string): (path: string) => boolean {
  return picomatch(pattern, { bash: true });
}

/**
 * Matcher that accepts every path when no pattern is given
 */
export function createPathFilter(pattern?: string): (path: string) => boolean {
  return pattern ? createGlobMatcher(pattern) : () => true;
}
