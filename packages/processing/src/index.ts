/**
 * @vmerger/processing
 * 
 * Video concatenation through ffmpeg's concat demuxer.
 * 
 * RULES:
 * - Never decode, encode or parse media here; ffmpeg does all of it
 * - Inputs are stat'ed, never read
 * - The concat manifest never outlives the merge
 */

// Request model
export {
  createMergeRequest,
  resolveOutputPath,
  resolveVideoCodec,
  resolveAudioCodec,
  resolveCodecs,
  mergeOptionsSchema,
  DEFAULT_OUTPUT_FORMAT,
  FORMAT_CODECS,
  COPY_CODECS,
  type MergeOptions,
} from './request.js';

// Validation
export { validateInputs } from './validator.js';

// Manifest
export {
  buildManifest,
  withManifest,
  formatManifestLine,
  MANIFEST_FILENAME,
  type ManifestOptions,
} from './manifest.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  buildConcatCommand,
  formatCommandLine,
  type InputOptions,
} from './commandBuilder.js';

// Runner
export {
  FFmpegRunner,
  VERSION_FLAG,
  AVAILABILITY_TIMEOUT_MS,
  type FFmpegRunnerOptions,
} from './ffmpeg.js';

// Orchestrator
export {
  VideoMerger,
  type VideoMergerOptions,
  type MergeStep,
} from './merger.js';

// Types
export type {
  MergeRequest,
  MergeReport,
  CodecSelection,
  ManifestHandle,
  CapturedOutput,
  ProcessRunner,
} from './types.js';
