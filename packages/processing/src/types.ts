/**
 * Processing Types
 */

import type { ExecutionFailedError, Result, ToolNotFoundError } from '@vmerger/core';

/**
 * Parsed user intent for one merge invocation. Frozen once created.
 */
export interface MergeRequest {
  readonly inputFiles: readonly string[];
  readonly outputFormat?: string;   // e.g. mp4, mkv, avi, mov
  readonly outputPath?: string;     // used verbatim when set
  readonly videoCodec?: string;     // -c:v override
  readonly audioCodec?: string;     // -c:a override
  readonly videoQuality?: string;   // -b:v, e.g. 1M, 2000k
  readonly verbose: boolean;
}

export interface CodecSelection {
  videoCodec: string;
  audioCodec: string;
}

/**
 * Concat manifest on disk. `release()` deletes it and may be called
 * more than once.
 */
export interface ManifestHandle {
  readonly path: string;
  readonly entries: readonly string[];
  release(): Promise<void>;
}

export interface CapturedOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}

/**
 * Seam between the orchestrator and the external tool
 */
export interface ProcessRunner {
  readonly binary: string;
  checkAvailability(): Promise<Result<void, ToolNotFoundError>>;
  execute(args: readonly string[]): Promise<Result<CapturedOutput, ExecutionFailedError>>;
}

export interface MergeReport {
  outputPath: string;
  sizeBytes?: number;
  inputFiles: readonly string[];
  videoCodec: string;
  audioCodec: string;
  stdout: string;
  stderr: string;
  durationMs: number;
}
