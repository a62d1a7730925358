/**
 * Merge Command
 * 
 * Concatenate the given videos into one file through ffmpeg.
 */

import ora from 'ora';
import { ZodError } from 'zod';
import {
  FFmpegRunner,
  VideoMerger,
  createMergeRequest,
  formatCommandLine,
  type MergeRequest,
  type MergeStep,
  type ProcessRunner,
} from '@vmerger/processing';
import { ConfigurationError } from '@vmerger/core';
import { createBaseLogger, createLogger, formatDuration, formatMegabytes, type Logger } from '@vmerger/utils';
import type { CliConfig } from '../config/index.js';
import { printBlock, printErrorChain, printInfo, printKeyValue, printSuccess } from '../lib/output.js';

export interface MergeCommandOptions {
  format?: string;
  output?: string;
  verbose?: boolean;
  videoCodec?: string;
  audioCodec?: string;
  quality?: string;
}

export interface MergeCommandContext {
  config: CliConfig;
  logger?: Logger;
  createRunner?: (ffmpegPath: string, logger: Logger) => ProcessRunner;
}

/**
 * Returns the process exit code: 0 on success, 1 on any failure.
 */
export async function mergeCommand(
  inputFiles: string[],
  options: MergeCommandOptions,
  context: MergeCommandContext
): Promise<number> {
  const { config } = context;
  const rootLogger = context.logger ?? createBaseLogger({ level: config.logLevel, env: config.nodeEnv });
  const logger = createLogger({ module: 'merge-command' }, rootLogger);

  let request: MergeRequest;
  try {
    request = createMergeRequest({
      inputFiles,
      outputFormat: options.format,
      outputPath: options.output,
      videoCodec: options.videoCodec,
      audioCodec: options.audioCodec,
      videoQuality: options.quality,
      verbose: options.verbose ?? false,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      printErrorChain(new ConfigurationError('Invalid command-line options', error));
      return 1;
    }
    throw error;
  }

  const runner = context.createRunner?.(config.ffmpegPath, rootLogger)
    ?? new FFmpegRunner(config.ffmpegPath, { logger: createLogger({ module: 'ffmpeg' }, rootLogger) });

  const merger = new VideoMerger({
    runner,
    tempDir: config.tempDir,
    logger: createLogger({ module: 'merger' }, rootLogger),
  });

  // Spinner for quiet runs, step-by-step echo for verbose ones
  const spinner = request.verbose ? null : ora('Merging videos...').start();
  if (request.verbose) {
    merger.onStep(printStep);
  }

  logger.debug({ inputFiles: request.inputFiles }, 'Starting merge');
  const result = await merger.merge(request);
  spinner?.stop();

  if (!result.success) {
    printErrorChain(result.error);
    return 1;
  }

  const report = result.data;
  printSuccess('Video merge completed successfully!');
  printKeyValue('Output file', report.outputPath);
  if (report.sizeBytes !== undefined) {
    printKeyValue('Output file size', `${formatMegabytes(report.sizeBytes)} MB`);
  }
  if (request.verbose) {
    printKeyValue('Elapsed', formatDuration(report.durationMs));
  }

  return 0;
}

export function printStep(event: MergeStep): void {
  switch (event.step) {
    case 'validated':
      printInfo(`Input files: ${event.inputFiles.join(', ')}`);
      break;
    case 'tool-available':
      printSuccess('FFmpeg is available');
      break;
    case 'output-resolved':
      printKeyValue('Output file', event.outputPath);
      printKeyValue('Video codec', event.videoCodec);
      printKeyValue('Audio codec', event.audioCodec);
      break;
    case 'manifest-created':
      printSuccess(`Created temporary concat file: ${event.manifestPath}`);
      break;
    case 'command-built':
      printSuccess(`FFmpeg command: ${formatCommandLine(event.binary, event.args)}`);
      printInfo('Starting video merge process...');
      break;
    case 'executed':
      if (event.output.stdout.length > 0) {
        printBlock('FFmpeg stdout:', event.output.stdout);
      }
      if (event.output.stderr.length > 0) {
        printBlock('FFmpeg stderr:', event.output.stderr);
      }
      break;
    case 'verified':
      break;
  }
}
