/**
 * Program Definition
 * 
 * Commander setup for the vmerger CLI. Kept apart from the entry point so
 * the argument surface can be exercised without spawning a process.
 */

import { Command } from 'commander';
import { CLI_NAME, CLI_VERSION } from './config/index.js';
import type { MergeCommandOptions } from './commands/merge.js';

export type MergeAction = (inputFiles: string[], options: MergeCommandOptions) => Promise<void>;

export function createProgram(action: MergeAction): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(
      'Merge multiple video files into a single file with optional format conversion.\n' +
      'All media work is done by an external FFmpeg executable.'
    )
    .version(CLI_VERSION)
    .argument('<inputs...>', 'Input video files to merge')
    .option('-F, --format <format>', 'Output format (e.g., mp4, avi, mov, mkv)')
    .option('-O, --output <path>', 'Output file path')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--video-codec <codec>', 'Video codec to use (e.g., libx264, libx265, copy)')
    .option('--audio-codec <codec>', 'Audio codec to use (e.g., aac, mp3, copy)')
    .option('-q, --quality <bitrate>', 'Video quality/bitrate (e.g., 1M, 2000k)')
    .action(async (inputFiles: string[], options: MergeCommandOptions) => {
      await action(inputFiles, options);
    });

  return program;
}
