/**
 * FFmpeg Runner
 * 
 * Spawns ffmpeg and maps what happened to a typed result. The merge itself
 * runs without a timeout: a hung ffmpeg hangs the caller.
 */

import { ExecutionFailedError, ToolNotFoundError, err, ok, type Result } from '@vmerger/core';
import { createLogger, executeCommand, type CommandResult, type Logger } from '@vmerger/utils';
import type { CapturedOutput, ProcessRunner } from './types.js';

export const VERSION_FLAG = '-version';
export const AVAILABILITY_TIMEOUT_MS = 5000;

export interface FFmpegRunnerOptions {
  cwd?: string;
  logger?: Logger;
}

export class FFmpegRunner implements ProcessRunner {
  readonly binary: string;
  private readonly cwd?: string;
  private readonly logger: Logger;

  constructor(ffmpegPath: string = 'ffmpeg', options: FFmpegRunnerOptions = {}) {
    this.binary = ffmpegPath;
    this.cwd = options.cwd;
    this.logger = options.logger ?? createLogger({ module: 'ffmpeg' });
  }

  /**
   * Probe `<binary> -version`. Missing, broken and hung binaries all count
   * as not found.
   */
  async checkAvailability(): Promise<Result<void, ToolNotFoundError>> {
    try {
      const result = await executeCommand(this.binary, [VERSION_FLAG], {
        timeout: AVAILABILITY_TIMEOUT_MS,
        cwd: this.cwd,
      });

      if (result.exitCode !== 0) {
        this.logger.debug(
          { binary: this.binary, exitCode: result.exitCode, timedOut: result.timedOut },
          'FFmpeg version probe failed'
        );
        return err(new ToolNotFoundError(this.binary));
      }

      this.logger.debug({ binary: this.binary, version: result.stdout.split('\n')[0] }, 'FFmpeg is available');
      return ok(undefined);
    } catch (error) {
      return err(new ToolNotFoundError(this.binary, error));
    }
  }

  /**
   * Run ffmpeg with the given arguments and wait for it to exit
   */
  async execute(args: readonly string[]): Promise<Result<CapturedOutput, ExecutionFailedError>> {
    this.logger.debug({ binary: this.binary, args }, 'Executing FFmpeg');

    let result: CommandResult;
    try {
      result = await executeCommand(this.binary, [...args], { cwd: this.cwd });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new ExecutionFailedError(message, null, error));
    }

    if (result.exitCode !== 0) {
      this.logger.debug({ exitCode: result.exitCode, duration: result.duration }, 'FFmpeg exited with failure');
      return err(new ExecutionFailedError(result.stderr, result.exitCode));
    }

    this.logger.debug({ duration: result.duration }, 'FFmpeg finished');

    return ok({
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
      durationMs: result.duration,
    });
  }
}
