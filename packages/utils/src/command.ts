/**
 * Command Execution Wrapper
 * 
 * Wrapper for executing external commands with:
 * - Optional timeout
 * - Full output capture
 * - Spawn error propagation
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds, unset = wait forever
}

/**
 * Execute an external command and capture everything it writes.
 *
 * Resolves once the process closes, whatever its exit code. Rejects only
 * when the process cannot be spawned (e.g. ENOENT for a missing binary).
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { cwd = process.cwd(), timeout } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = timeout !== undefined && timeout > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          // Force kill after 10 seconds
          killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
        }, timeout)
      : undefined;

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
    };

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('close', (code, exitSignal) => {
      cleanup();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
