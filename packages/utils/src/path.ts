/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get the filename stem: the last path component without its extension.
 *
 * Returns null when the path has no usable final component
 * ("", "/", ".", ".." or a path ending in one of those).
 */
export function getFileStem(filePath: string): string | null {
  const base = basename(filePath);
  if (base === '' || base === '.' || base === '..') {
    return null;
  }

  // A leading dot starts the name, not an extension (".bashrc")
  const ext = extname(base);
  const stem = ext.length > 0 ? base.slice(0, -ext.length) : base;
  return stem.length > 0 ? stem : null;
}
