import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;

  /**
   * Signal that terminated the process (e.g. after a timeout), or null
   */
  signal: NodeJS.Signals | null;
}

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;
}

/**
 * Execute a command asynchronously and return the result
 *
 * A process killed by a signal (including the `timeout` spawn option)
 * reports exit code 1 together with the signal name.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('magick', ['-version']);
 * console.log(result.stdout); // "Version: ImageMagick 7.1.1-29 ..."
 *
 * const rendered = await spawnAsync('magick', args, { timeout: 60_000 });
 * if (rendered.code !== 0) throw new Error(rendered.stderr);
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code, signal) => {
      resolve({
        stdout,
        stderr,
        code: code ?? (signal ? 1 : 0),
        signal: signal ?? null,
      });
    });

    proc.on('error', reject);
  });
}
