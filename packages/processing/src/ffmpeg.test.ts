import { describe, it, expect } from 'vitest';
import { FFmpegRunner } from './ffmpeg.js';

// The Node executable stands in for ffmpeg: `-e` runs a script with a
// chosen exit code and output.
const node = process.execPath;

describe('FFmpegRunner.checkAvailability', () => {
  it('reports ToolNotFound when the binary is missing', async () => {
    const runner = new FFmpegRunner('/nonexistent/bin/ffmpeg');

    const result = await runner.checkAvailability();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('TOOL_NOT_FOUND');
      expect(result.error.message).toContain('FFmpeg not found');
      expect(result.error.cause).toMatchObject({ code: 'ENOENT' });
    }
  });

  it('reports ToolNotFound when the version probe exits non-zero', async () => {
    // node rejects the unknown `-version` option
    const runner = new FFmpegRunner(node);

    const result = await runner.checkAvailability();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('TOOL_NOT_FOUND');
      expect(result.error.binary).toBe(node);
    }
  });
});

describe('FFmpegRunner.execute', () => {
  it('returns the captured streams on success', async () => {
    const runner = new FFmpegRunner(node);

    const result = await runner.execute([
      '-e',
      'process.stdout.write("muxed"); process.stderr.write("frame=10");',
    ]);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.stdout).toBe('muxed');
      expect(result.data.stderr).toBe('frame=10');
      expect(result.data.exitCode).toBe(0);
    }
  });

  it('fails with ExecutionFailed carrying the whole stderr', async () => {
    const runner = new FFmpegRunner(node);

    const result = await runner.execute([
      '-e',
      'process.stderr.write("concat.txt: Impossible to open\\nConversion failed!\\n"); process.exit(1);',
    ]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('EXECUTION_FAILED');
      expect(result.error.stderr).toBe('concat.txt: Impossible to open\nConversion failed!\n');
      expect(result.error.exitCode).toBe(1);
    }
  });

  it('fails with ExecutionFailed when the process cannot be spawned', async () => {
    const runner = new FFmpegRunner('/nonexistent/bin/ffmpeg');

    const result = await runner.execute(['-version']);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('EXECUTION_FAILED');
      expect(result.error.exitCode).toBeNull();
      expect(result.error.cause).toMatchObject({ code: 'ENOENT' });
    }
  });
});
