/**
 * Concat Manifest
 * 
 * Writes the list file read by ffmpeg's concat demuxer:
 * 
 *   file '/abs/path/one.mp4'
 *   file '/abs/path/two.mp4'
 * 
 * Line order is concatenation order. The file lives in its own temporary
 * directory and is gone once the handle is released.
 */

import { mkdtemp, realpath, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ManifestIoError,
  PathResolutionError,
  err,
  ok,
  type ManifestError,
  type Result,
} from '@vmerger/core';
import { createLogger, removePath, type Logger } from '@vmerger/utils';
import type { ManifestHandle } from './types.js';

export const MANIFEST_FILENAME = 'concat.txt';

export interface ManifestOptions {
  tempDir?: string;
  logger?: Logger;
}

/**
 * `file '<path>'`, with embedded single quotes closed, escaped and reopened
 */
export function formatManifestLine(absolutePath: string): string {
  return `file '${absolutePath.replace(/'/g, "'\\''")}'`;
}

export async function buildManifest(
  paths: readonly string[],
  options: ManifestOptions = {}
): Promise<Result<ManifestHandle, ManifestError>> {
  const log = options.logger ?? createLogger({ module: 'manifest' });

  // Resolve everything first so a vanished input leaves nothing on disk
  const entries: string[] = [];
  for (const path of paths) {
    try {
      entries.push(await realpath(path));
    } catch (error) {
      return err(new PathResolutionError(path, error));
    }
  }

  let dir: string;
  try {
    dir = await mkdtemp(join(options.tempDir ?? tmpdir(), 'vmerger-'));
  } catch (error) {
    return err(new ManifestIoError('Failed to create temporary file', error));
  }

  const manifestPath = join(dir, MANIFEST_FILENAME);
  let released = false;
  const release = async (): Promise<void> => {
    if (released) return;
    released = true;
    try {
      await removePath(dir);
      log.debug({ manifestPath }, 'Removed concat manifest');
    } catch (error) {
      log.warn({ manifestPath, error }, 'Failed to remove concat manifest');
    }
  };

  const content = entries.map((entry) => `${formatManifestLine(entry)}\n`).join('');
  try {
    await writeFile(manifestPath, content, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    await release();
    return err(new ManifestIoError('Failed to write to temporary file', error));
  }

  log.debug({ manifestPath, entries: entries.length }, 'Created concat manifest');

  return ok({
    path: manifestPath,
    entries,
    release,
  });
}

/**
 * Build a manifest, hand it to `fn`, and release it however `fn` finishes.
 */
export async function withManifest<T, E>(
  paths: readonly string[],
  fn: (manifest: ManifestHandle) => Promise<Result<T, E>>,
  options: ManifestOptions = {}
): Promise<Result<T, E | ManifestError>> {
  const built = await buildManifest(paths, options);
  if (!built.success) {
    return built;
  }

  try {
    return await fn(built.data);
  } finally {
    await built.data.release();
  }
}
