/**
 * Path Utilities
 */

import { extname, sep } from 'node:path';

/**
 * Convert platform separators to forward slashes
 */
export function toPosixPath(path: string): string {
  return sep === '\\' ? path.replace(/\\/g, '/') : path;
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Drop the last extension of a path, keeping its directories
 */
export function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}
