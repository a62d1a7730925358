import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatMegabytes, getFileSizeBytes, isRegularFile, removePath } from './file.js';

describe('file operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vmerger-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports the size of a file', async () => {
    const file = join(dir, 'a.bin');
    await writeFile(file, Buffer.alloc(2048));

    expect(await getFileSizeBytes(file)).toBe(2048);
  });

  it('distinguishes regular files from directories and missing paths', async () => {
    const file = join(dir, 'a.mp4');
    const sub = join(dir, 'sub');
    await writeFile(file, 'x');
    await mkdir(sub);

    expect(await isRegularFile(file)).toBe(true);
    expect(await isRegularFile(sub)).toBe(false);
    expect(await isRegularFile(join(dir, 'missing.mp4'))).toBe(false);
  });

  it('removes directory trees and ignores missing paths', async () => {
    const sub = join(dir, 'tree');
    await mkdir(sub);
    await writeFile(join(sub, 'x.txt'), 'x');

    await removePath(sub);
    await removePath(sub);

    expect(existsSync(sub)).toBe(false);
  });

  it('formats megabytes with two decimals', () => {
    expect(formatMegabytes(0)).toBe('0.00');
    expect(formatMegabytes(1572864)).toBe('1.50');
  });
});
