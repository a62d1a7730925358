/**
 * Merge Request
 * 
 * Immutable argument model for a merge, plus the defaults derived from it:
 * output path and codec selection.
 */

import { z } from 'zod';
import {
  InvalidFilenameError,
  NoInputFilesError,
  err,
  ok,
  type OutputPathError,
  type Result,
} from '@vmerger/core';
import { getFileStem } from '@vmerger/utils';
import type { CodecSelection, MergeRequest } from './types.js';

export const DEFAULT_OUTPUT_FORMAT = 'mp4';

/**
 * Codecs applied per output format when no override is given.
 * Lookup is case-insensitive; anything else stream-copies.
 */
export const FORMAT_CODECS: ReadonlyMap<string, CodecSelection> = new Map([
  ['mp4', { videoCodec: 'libx264', audioCodec: 'aac' }],
  ['mkv', { videoCodec: 'libx264', audioCodec: 'aac' }],
  ['avi', { videoCodec: 'libxvid', audioCodec: 'mp3' }],
  ['mov', { videoCodec: 'libx264', audioCodec: 'aac' }],
]);

export const COPY_CODECS: CodecSelection = { videoCodec: 'copy', audioCodec: 'copy' };

const optionalText = z.string().min(1).optional();

export const mergeOptionsSchema = z.object({
  inputFiles: z.array(z.string()),
  outputFormat: optionalText,
  outputPath: optionalText,
  videoCodec: optionalText,
  audioCodec: optionalText,
  videoQuality: optionalText,
  verbose: z.boolean().default(false),
});

export type MergeOptions = z.input<typeof mergeOptionsSchema>;

/**
 * Build the frozen request. Throws a ZodError when an option has the wrong
 * shape; the filesystem is not consulted here.
 */
export function createMergeRequest(options: MergeOptions): MergeRequest {
  const parsed = mergeOptionsSchema.parse(options);

  return Object.freeze({
    ...parsed,
    inputFiles: Object.freeze([...parsed.inputFiles]),
  });
}

/**
 * Explicit output path verbatim, else `<first input stem>_merged.<format>`
 */
export function resolveOutputPath(request: MergeRequest): Result<string, OutputPathError> {
  if (request.outputPath !== undefined) {
    return ok(request.outputPath);
  }

  const firstInput = request.inputFiles[0];
  if (firstInput === undefined) {
    return err(new NoInputFilesError());
  }

  const stem = getFileStem(firstInput);
  if (stem === null) {
    return err(new InvalidFilenameError(firstInput));
  }

  const format = request.outputFormat ?? DEFAULT_OUTPUT_FORMAT;
  return ok(`${stem}_merged.${format}`);
}

function codecsForFormat(format: string | undefined): CodecSelection {
  if (format === undefined) {
    return COPY_CODECS;
  }
  return FORMAT_CODECS.get(format.toLowerCase()) ?? COPY_CODECS;
}

export function resolveVideoCodec(request: MergeRequest): string {
  return request.videoCodec ?? codecsForFormat(request.outputFormat).videoCodec;
}

export function resolveAudioCodec(request: MergeRequest): string {
  return request.audioCodec ?? codecsForFormat(request.outputFormat).audioCodec;
}

export function resolveCodecs(request: MergeRequest): CodecSelection {
  return {
    videoCodec: resolveVideoCodec(request),
    audioCodec: resolveAudioCodec(request),
  };
}
