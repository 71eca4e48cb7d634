import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, which is the form copyhead uses
 * for every path it compares or reports.
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
 * A platform-agnostic version of `path.dirname`.
 */
export function dirname(p: string): string {
  return normalizePath(path.dirname(p));
}

/**
 * A platform-agnostic version of `path.resolve`.
 */
export function resolve(...pathSegments: string[]): string {
  return normalizePath(path.resolve(...pathSegments));
}

/**
 * Whether `target` is `root` itself or lies below it.
 */
export function isWithin(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === '' || (!rel.startsWith('../') && rel !== '..' && !path.isAbsolute(rel));
}

/**
 * Last segment of a path, whichever separator it uses.
 */
export function basenameOf(p: string): string {
  const normalized = normalizePath(p).replace(/\/+$/, '');
  return normalized.slice(normalized.lastIndexOf('/') + 1);
}
