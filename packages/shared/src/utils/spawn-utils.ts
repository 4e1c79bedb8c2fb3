import type { SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

import { spawn } from 'node:child_process';

/**
 * Outcome of a finished child process
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;

  /**
   * Exit code; 1 when the process was killed by a signal
   */
  code: number;

  /**
   * Signal that terminated the process, if any
   */
  signal: NodeJS.Signals | null;
}

export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Collect stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Collect stderr (default: true)
   */
  captureStderr?: boolean;

  /**
   * Encoding of the collected output (default: utf8)
   */
  encoding?: BufferEncoding;
}

/**
 * Run a command and collect its output.
 *
 * Output is buffered as raw bytes and decoded once the process closes, so
 * a multi-byte character split across chunks survives. A non-zero exit
 * resolves normally; only a failure to start the process (e.g. ENOENT)
 * rejects.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['issue.pdf']);
 * const pages = result.stdout.match(/^Pages:\s+(\d+)/m);
 *
 * // Bound a slow OCR run and ignore its progress output
 * await spawnAsync('tesseract', ['page_1.png', 'stdout'], {
 *   captureStderr: false,
 *   timeout: 60_000,
 * });
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
    encoding = 'utf8',
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdout = collect(captureStdout ? proc.stdout : null);
    const stderr = collect(captureStderr ? proc.stderr : null);

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        stdout: Buffer.concat(stdout).toString(encoding),
        stderr: Buffer.concat(stderr).toString(encoding),
        code: code ?? (signal ? 1 : 0),
        signal,
      });
    });

    proc.on('error', reject);
  });
}

function collect(stream: Readable | null): Buffer[] {
  const chunks: Buffer[] = [];
  stream?.on('data', (chunk: Buffer) => {
    chunks.push(chunk);
  });
  return chunks;
}
