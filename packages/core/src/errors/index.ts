/**
 * Custom Error Classes
 */

/**
 * Base error class for all vmerger errors
 */
export class VmergerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VmergerError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * No input files were supplied
 */
export class NoInputFilesError extends VmergerError {
  constructor() {
    super('No input files provided', 'NO_INPUT_FILES');
    this.name = 'NoInputFilesError';
  }
}

/**
 * Declared input path does not exist
 */
export class MissingInputError extends VmergerError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      `Input file does not exist: ${path}`,
      'MISSING_INPUT',
      { path },
      { cause }
    );
    this.name = 'MissingInputError';
    this.path = path;
  }
}

/**
 * Declared input path exists but is not a regular file
 */
export class NotAFileError extends VmergerError {
  public readonly path: string;

  constructor(path: string) {
    super(`Input path is not a file: ${path}`, 'NOT_A_FILE', { path });
    this.name = 'NotAFileError';
    this.path = path;
  }
}

/**
 * First input has no filename stem to derive the output name from
 */
export class InvalidFilenameError extends VmergerError {
  public readonly path: string;

  constructor(path: string) {
    super(`Invalid input filename: ${path}`, 'INVALID_FILENAME', { path });
    this.name = 'InvalidFilenameError';
    this.path = path;
  }
}

/**
 * External tool is missing or unusable
 */
export class ToolNotFoundError extends VmergerError {
  public readonly binary: string;

  constructor(binary: string, cause?: unknown) {
    super(
      `FFmpeg not found (tried "${binary}"). Please install FFmpeg and ensure it's in your PATH`,
      'TOOL_NOT_FOUND',
      { binary },
      { cause }
    );
    this.name = 'ToolNotFoundError';
    this.binary = binary;
  }
}

/**
 * Input path could not be canonicalised while writing the manifest
 */
export class PathResolutionError extends VmergerError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      `Failed to get absolute path for: ${path}`,
      'PATH_RESOLUTION_ERROR',
      { path },
      { cause }
    );
    this.name = 'PathResolutionError';
    this.path = path;
  }
}

/**
 * Filesystem failure creating or writing the manifest
 */
export class ManifestIoError extends VmergerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'IO_ERROR', undefined, { cause });
    this.name = 'ManifestIoError';
  }
}

/**
 * External tool ran and exited with a failure status.
 * `stderr` holds its complete diagnostic output.
 */
export class ExecutionFailedError extends VmergerError {
  public readonly stderr: string;
  public readonly exitCode: number | null;

  constructor(stderr: string, exitCode: number | null, cause?: unknown) {
    super(
      `FFmpeg execution failed: ${stderr}`,
      'EXECUTION_FAILED',
      { exitCode },
      { cause }
    );
    this.name = 'ExecutionFailedError';
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

/**
 * Tool reported success but the output file is missing
 */
export class OutputNotCreatedError extends VmergerError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      `Output file was not created: ${path}`,
      'OUTPUT_NOT_CREATED',
      { path },
      { cause }
    );
    this.name = 'OutputNotCreatedError';
    this.path = path;
  }
}

/**
 * Invalid environment or file configuration
 */
export class ConfigurationError extends VmergerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', undefined, { cause });
    this.name = 'ConfigurationError';
  }
}

export type ValidationError = NoInputFilesError | MissingInputError | NotAFileError;

export type OutputPathError = NoInputFilesError | InvalidFilenameError;

export type ManifestError = PathResolutionError | ManifestIoError;

export type MergeError =
  | ValidationError
  | OutputPathError
  | ToolNotFoundError
  | ManifestError
  | ExecutionFailedError
  | OutputNotCreatedError;

/**
 * Type guard for VmergerError.
 */
export function isVmergerError(error: unknown): error is VmergerError {
  return error instanceof VmergerError;
}

/**
 * Message of the error followed by the message of every cause beneath it.
 */
export function getErrorChain(error: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }

  return messages;
}

/**
 * Render an error chain as printable lines:
 * `Error: <top>` then `  Caused by: <cause>` per level.
 */
export function formatErrorChain(error: unknown): string[] {
  const [top, ...causes] = getErrorChain(error);
  return [
    `Error: ${top ?? 'Unknown error'}`,
    ...causes.map((message) => `  Caused by: ${message}`),
  ];
}
