import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, mkdir, readdir, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import {
  ExecutionFailedError,
  ToolNotFoundError,
  err,
  ok,
  type Result,
} from '@vmerger/core';
import type { CapturedOutput, ProcessRunner } from '@vmerger/processing';
import { createBaseLogger } from '@vmerger/utils';
import type { CliConfig } from '../config/index.js';
import { mergeCommand } from './merge.js';

class StubRunner implements ProcessRunner {
  readonly binary = 'ffmpeg';

  constructor(
    private readonly behaviour: 'ok' | 'missing' | 'fail' | 'silent-noop'
  ) {}

  async checkAvailability(): Promise<Result<void, ToolNotFoundError>> {
    return this.behaviour === 'missing'
      ? err(new ToolNotFoundError(this.binary, new Error('spawn ffmpeg ENOENT')))
      : ok(undefined);
  }

  async execute(args: readonly string[]): Promise<Result<CapturedOutput, ExecutionFailedError>> {
    if (this.behaviour === 'fail') {
      return err(new ExecutionFailedError('Invalid data found when processing input', 1));
    }
    const outputPath = args[args.length - 1];
    if (this.behaviour === 'ok' && outputPath !== undefined) {
      await writeFile(outputPath, Buffer.alloc(1572864));
    }
    return ok({ stdout: '', stderr: 'muxing overhead: 0.1%', exitCode: 0, durationMs: 1 });
  }
}

describe('mergeCommand', () => {
  let dir: string;
  let manifestDir: string;
  let a: string;
  let b: string;
  let config: CliConfig;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  const logger = createBaseLogger({ level: 'silent' });

  const context = (behaviour: ConstructorParameters<typeof StubRunner>[0]) => ({
    config,
    logger,
    createRunner: () => new StubRunner(behaviour),
  });

  const printed = (spy: MockInstance<typeof console.log>): string[] =>
    spy.mock.calls.map((call) => call.map(String).join(' '));

  beforeEach(async () => {
    chalk.level = 0;
    dir = await realpath(await mkdtemp(join(tmpdir(), 'vmerger-cli-')));
    manifestDir = join(dir, 'manifests');
    await mkdir(manifestDir);
    a = join(dir, 'a.mp4');
    b = join(dir, 'b.mp4');
    await writeFile(a, 'a');
    await writeFile(b, 'b');
    config = {
      nodeEnv: 'test',
      logLevel: 'silent',
      ffmpegPath: 'ffmpeg',
      tempDir: manifestDir,
    };
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('reports the output path and size on success', async () => {
    const output = join(dir, 'joined.mp4');

    const code = await mergeCommand([a, b], { output }, context('ok'));

    expect(code).toBe(0);
    expect(printed(log)).toEqual([
      '✓ Video merge completed successfully!',
      `  Output file: ${output}`,
      '  Output file size: 1.50 MB',
    ]);
    expect(error).not.toHaveBeenCalled();
  });

  it('echoes each step in verbose mode', async () => {
    const output = join(dir, 'joined.mkv');

    const code = await mergeCommand([a, b], { output, format: 'mkv', verbose: true }, context('ok'));

    expect(code).toBe(0);
    const lines = printed(log);
    expect(lines).toContain(`i Input files: ${a}, ${b}`);
    expect(lines).toContain('✓ FFmpeg is available');
    expect(lines).toContain('  Video codec: libx264');
    expect(lines).toContain('  Audio codec: aac');
    expect(lines).toContain('i Starting video merge process...');
    expect(lines).toContain('FFmpeg stderr:');
    expect(lines).toContain('muxing overhead: 0.1%');
    expect(lines.some((line) => line.startsWith('✓ FFmpeg command: ffmpeg -f concat -safe 0 -i '))).toBe(true);
  });

  it('prints the error chain and exits 1 when ffmpeg is missing', async () => {
    const code = await mergeCommand([a, b], {}, context('missing'));

    expect(code).toBe(1);
    expect(printed(error)).toEqual([
      'Error: FFmpeg not found (tried "ffmpeg"). Please install FFmpeg and ensure it\'s in your PATH',
      '  Caused by: spawn ffmpeg ENOENT',
    ]);
    expect(await readdir(manifestDir)).toEqual([]);
  });

  it('exits 1 naming the missing input', async () => {
    const missing = join(dir, 'nope.mp4');

    const code = await mergeCommand([a, missing], {}, context('ok'));

    expect(code).toBe(1);
    expect(printed(error)[0]).toBe(`Error: Input file does not exist: ${missing}`);
  });

  it('surfaces ffmpeg stderr when the merge fails', async () => {
    const code = await mergeCommand([a, b], { output: join(dir, 'x.mp4') }, context('fail'));

    expect(code).toBe(1);
    expect(printed(error)).toEqual(['Error: FFmpeg execution failed: Invalid data found when processing input']);
    expect(await readdir(manifestDir)).toEqual([]);
  });

  it('reports a missing output separately from a failed execution', async () => {
    const output = join(dir, 'ghost.mp4');

    const code = await mergeCommand([a, b], { output }, context('silent-noop'));

    expect(code).toBe(1);
    expect(printed(error)).toEqual([`Error: Output file was not created: ${output}`]);
  });

  it('rejects empty option values', async () => {
    const code = await mergeCommand([a], { format: '' }, context('ok'));

    expect(code).toBe(1);
    expect(printed(error)[0]).toBe('Error: Invalid command-line options');
  });
});
