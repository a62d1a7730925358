/**
 * @vmerger/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  getFileSizeBytes,
  isRegularFile,
  removePath,
  formatMegabytes,
  isErrnoException,
} from './file.js';

// Path utilities
export { getFileStem } from './path.js';

// Time utilities
export { formatDuration } from './time.js';

// Logger
export {
  logger,
  createLogger,
  createBaseLogger,
  type Logger,
  type LogLevel,
  type BaseLoggerOptions,
} from './logger.js';
