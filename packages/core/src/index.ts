/**
 * @vmerger/core
 * 
 * Errors, result type and binary configuration shared by all workspaces.
 */

export * from './errors/index.js';
export { ok, err, type Result } from './result.js';
export {
  resolveBinaryPath,
  resolveFFmpegPath,
  type BinaryConfig,
} from './config/binaries.js';
