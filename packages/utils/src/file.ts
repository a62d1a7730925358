/**
 * File Operations
 */

import { stat, rm } from 'node:fs/promises';

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * True when the path exists and is a regular file (symlinks are followed).
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Remove a file or directory tree; missing paths are not an error.
 */
export async function removePath(targetPath: string): Promise<void> {
  await rm(targetPath, { recursive: true, force: true });
}

/**
 * Format a byte count as megabytes with two decimals ("1.50")
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(2);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
