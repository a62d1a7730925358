/**
 * Binary Configuration
 * 
 * Resolves the path of an external binary.
 * 
 * Priority order:
 * 1. Environment variable (e.g., FFMPEG_PATH)
 * 2. System PATH
 */

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'path';
}

/**
 * Get executable extension for current OS
 */
function getExeExt(platform: NodeJS.Platform): string {
  return platform === 'win32' ? '.exe' : '';
}

/**
 * Resolve binary path. Existence is not checked here: callers probe the
 * binary before use.
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): BinaryConfig {
  const envPath = env[envVar]?.trim();
  if (envPath) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // Let the system PATH resolve the name
  return {
    name,
    envVar,
    resolvedPath: name + getExeExt(platform),
    source: 'path',
  };
}

export function resolveFFmpegPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env).resolvedPath;
}
