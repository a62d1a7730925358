/**
 * Video Merger
 * 
 * Runs one merge from start to finish:
 * 
 *   validate inputs -> probe ffmpeg -> resolve output -> write manifest
 *   -> build command -> run ffmpeg -> verify output -> report
 * 
 * Steps run strictly in order and the first failure ends the run. The
 * manifest only exists while ffmpeg runs.
 */

import { EventEmitter } from 'node:events';
import {
  OutputNotCreatedError,
  type ExecutionFailedError,
  err,
  ok,
  type MergeError,
  type Result,
} from '@vmerger/core';
import { createLogger, getFileSizeBytes, isRegularFile, type Logger } from '@vmerger/utils';
import { buildConcatCommand } from './commandBuilder.js';
import { withManifest } from './manifest.js';
import { resolveCodecs, resolveOutputPath } from './request.js';
import { validateInputs } from './validator.js';
import type { CapturedOutput, MergeReport, MergeRequest, ProcessRunner } from './types.js';

export type MergeStep =
  | { step: 'validated'; inputFiles: readonly string[] }
  | { step: 'tool-available'; binary: string }
  | { step: 'output-resolved'; outputPath: string; videoCodec: string; audioCodec: string }
  | { step: 'manifest-created'; manifestPath: string; entries: readonly string[] }
  | { step: 'command-built'; binary: string; args: readonly string[] }
  | { step: 'executed'; output: CapturedOutput }
  | { step: 'verified'; outputPath: string; sizeBytes?: number };

export interface VideoMergerOptions {
  runner: ProcessRunner;
  tempDir?: string;
  logger?: Logger;
}

export class VideoMerger extends EventEmitter {
  private readonly runner: ProcessRunner;
  private readonly tempDir?: string;
  private readonly logger: Logger;

  constructor(options: VideoMergerOptions) {
    super();
    this.runner = options.runner;
    this.tempDir = options.tempDir;
    this.logger = options.logger ?? createLogger({ module: 'merger' });
  }

  onStep(listener: (event: MergeStep) => void): this {
    return this.on('step', listener);
  }

  private report(event: MergeStep): void {
    this.logger.debug(event, `Merge step: ${event.step}`);
    this.emit('step', event);
  }

  async merge(request: MergeRequest): Promise<Result<MergeReport, MergeError>> {
    const startTime = Date.now();

    // 1. Inputs
    const validation = await validateInputs(request.inputFiles);
    if (!validation.success) {
      return this.fail(validation.error);
    }
    this.report({ step: 'validated', inputFiles: request.inputFiles });

    // 2. External tool
    const availability = await this.runner.checkAvailability();
    if (!availability.success) {
      return this.fail(availability.error);
    }
    this.report({ step: 'tool-available', binary: this.runner.binary });

    // 3. Output path and codecs
    const resolved = resolveOutputPath(request);
    if (!resolved.success) {
      return this.fail(resolved.error);
    }
    const outputPath = resolved.data;
    const { videoCodec, audioCodec } = resolveCodecs(request);
    this.report({ step: 'output-resolved', outputPath, videoCodec, audioCodec });

    // 4-6. Manifest, command, execution; the manifest is released on exit
    const executed = await withManifest<CapturedOutput, ExecutionFailedError>(
      request.inputFiles,
      async (manifest) => {
        this.report({ step: 'manifest-created', manifestPath: manifest.path, entries: manifest.entries });

        const args = buildConcatCommand(request, manifest.path, outputPath);
        this.report({ step: 'command-built', binary: this.runner.binary, args });

        return this.runner.execute(args);
      },
      { tempDir: this.tempDir, logger: this.logger }
    );
    if (!executed.success) {
      return this.fail(executed.error);
    }
    this.report({ step: 'executed', output: executed.data });

    // 7. The tool may exit 0 without writing anything
    let created: boolean;
    try {
      created = await isRegularFile(outputPath);
    } catch (error) {
      return this.fail(new OutputNotCreatedError(outputPath, error));
    }
    if (!created) {
      return this.fail(new OutputNotCreatedError(outputPath));
    }

    // 8. Size is informational only
    let sizeBytes: number | undefined;
    try {
      sizeBytes = await getFileSizeBytes(outputPath);
    } catch (error) {
      this.logger.warn({ outputPath, error }, 'Could not read output file size');
    }
    this.report({ step: 'verified', outputPath, sizeBytes });

    const report: MergeReport = {
      outputPath,
      sizeBytes,
      inputFiles: request.inputFiles,
      videoCodec,
      audioCodec,
      stdout: executed.data.stdout,
      stderr: executed.data.stderr,
      durationMs: Date.now() - startTime,
    };

    this.logger.info({ outputPath, sizeBytes, durationMs: report.durationMs }, 'Merge completed');
    return ok(report);
  }

  private fail(error: MergeError): Result<never, MergeError> {
    this.logger.debug({ code: error.code, err: error }, 'Merge failed');
    return err(error);
  }
}
