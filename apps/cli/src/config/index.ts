/**
 * CLI Configuration
 * 
 * Read once from the environment at startup and passed explicitly to the
 * merge command. `.env` loading happens in the entry point.
 */

import { z } from 'zod';
import { ConfigurationError, err, ok, resolveFFmpegPath, type Result } from '@vmerger/core';

export const CLI_NAME = 'vmerger';
export const CLI_VERSION = '0.1.0';

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  FFMPEG_PATH: z.string().optional(),
  VMERGER_TEMP_DIR: z.string().min(1).optional(),
});

export interface CliConfig {
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  readonly ffmpegPath: string;
  readonly tempDir?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<CliConfig, ConfigurationError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(new ConfigurationError(`Invalid environment configuration: ${issues}`, parsed.error));
  }

  const data = parsed.data;

  return ok(Object.freeze({
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    ffmpegPath: resolveFFmpegPath(env),
    tempDir: data.VMERGER_TEMP_DIR,
  }));
}
