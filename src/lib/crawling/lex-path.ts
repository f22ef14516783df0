/**
 * Lexicographic Paths
 * Positional identity of nodes in the site hierarchy
 */

import { LexPath } from './crawling.types';

export const ROOT_PATH: LexPath = [];

export function childPath(parent: LexPath, siblingIndex: number): LexPath {
  return [...parent, siblingIndex];
}

/**
 * Element-wise comparison; a strict prefix sorts first
 */
export function compareLexPaths(a: LexPath, b: LexPath): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

export function lexPathsEqual(a: LexPath, b: LexPath): boolean {
  return compareLexPaths(a, b) === 0;
}

/**
 * True when the node at `path` and its whole subtree sort strictly before the
 * cursor. Ancestors of the cursor sort first too but still have to be descended.
 */
export function isBeforeCursor(path: LexPath, cursor: LexPath): boolean {
  return compareLexPaths(path, cursor) < 0 && !isPrefixOf(path, cursor);
}

/**
 * `prefix` is a (not necessarily strict) prefix of `path`
 */
export function isPrefixOf(prefix: LexPath, path: LexPath): boolean {
  if (prefix.length > path.length) {
    return false;
  }
  return prefix.every((value, i) => path[i] === value);
}

export function isStrictPrefixOf(prefix: LexPath, path: LexPath): boolean {
  return prefix.length < path.length && isPrefixOf(prefix, path);
}

/**
 * Parse a persisted lex_path value; null when it is not a list of non-negative integers
 */
export function parseLexPath(value: unknown): LexPath | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const path: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isInteger(item) || item < 0) {
      return null;
    }
    path.push(item);
  }
  return path;
}

export function formatLexPath(path: LexPath): string {
  return `[${path.join(',')}]`;
}
