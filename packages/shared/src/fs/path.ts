import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes, the form buildprof records and reports.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * Orders paths by UTF-16 code unit, independent of locale.
 * `'B.txt'` sorts before `'a.txt'`.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}
