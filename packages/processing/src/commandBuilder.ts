/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building FFmpeg argument vectors, and the concat command
 * the merger runs. Pure construction: nothing is executed here.
 */

import type { MergeRequest } from './types.js';
import { resolveCodecs } from './request.js';

export interface InputOptions {
  format?: string;        // -f format
  extraArgs?: string[];   // Additional input args, placed before -i
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private videoCodec: string | null = null;
  private audioCodec: string | null = null;
  private videoBitrate: string | null = null;
  private overwriteOutput = false;
  private outputFile = '';

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add a concat-demuxer list file as input. `-safe 0` allows the
   * absolute paths the list contains.
   */
  addConcatInput(listFile: string): this {
    return this.addInput(listFile, { format: 'concat', extraArgs: ['-safe', '0'] });
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(codec: string): this {
    this.videoCodec = codec;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(codec: string): this {
    this.audioCodec = codec;
    return this;
  }

  /**
   * Target video bitrate, e.g. 1M or 2000k
   */
  setVideoBitrate(bitrate: string): this {
    this.videoBitrate = bitrate;
    return this;
  }

  /**
   * Overwrite the output without asking (-y)
   */
  overwrite(): this {
    this.overwriteOutput = true;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    if (this.videoCodec !== null) {
      args.push('-c:v', this.videoCodec);
    }
    if (this.audioCodec !== null) {
      args.push('-c:a', this.audioCodec);
    }
    if (this.videoBitrate !== null) {
      args.push('-b:v', this.videoBitrate);
    }

    if (this.overwriteOutput) {
      args.push('-y');
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Render a command line for display. Arguments containing whitespace,
 * quotes or shell metacharacters are single-quoted.
 */
export function formatCommandLine(binary: string, args: readonly string[]): string {
  return [binary, ...args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * `-f concat -safe 0 -i <manifest> -c:v <v> -c:a <a> [-b:v <q>] -y <output>`
 */
export function buildConcatCommand(
  request: MergeRequest,
  manifestPath: string,
  outputPath: string
): string[] {
  const { videoCodec, audioCodec } = resolveCodecs(request);

  const builder = new FFmpegCommandBuilder()
    .addConcatInput(manifestPath)
    .setVideoCodec(videoCodec)
    .setAudioCodec(audioCodec);

  if (request.videoQuality !== undefined) {
    builder.setVideoBitrate(request.videoQuality);
  }

  return builder
    .overwrite()
    .setOutput(outputPath)
    .build();
}
