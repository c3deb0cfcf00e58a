/**
 * Path Utilities
 */

import { relative, isAbsolute, resolve } from 'node:path';

/**
 * Path of `target` relative to `base` for log output.
 * Paths outside `base` are returned unchanged.
 */
export function relativePath(base: string, target: string): string {
  const rel = relative(base, target);
  if (rel === '') {
    return '.';
  }
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return target;
  }
  return rel;
}

/**
 * Resolve `p` against `base` unless it is already absolute
 */
export function resolveFrom(base: string, p: string): string {
  return isAbsolute(p) ? p : resolve(base, p);
}

/**
 * Remove every whitespace character, e.g. "My Prog" -> "MyProg"
 */
export function stripWhitespace(name: string): string {
  return name.replace(/\s+/g, '');
}
