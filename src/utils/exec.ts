/**
 * Shared command execution helper.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { errorMessage } from './errors.js';

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Run `command` through the platform shell; `args` must then be empty */
  shell?: boolean;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** Exit code; 1 when the process could not be started or was killed by a signal */
  code: number;
}

/**
 * Execute a command and collect its output. Never rejects: spawn failures are
 * reported through `code` and `stderr`. No timeout is applied.
 */
export function execCommand(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve) => {
    let proc: ChildProcessByStdio<null, Readable, Readable>;
    try {
      proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        shell: options.shell ?? false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      // spawn throws synchronously on invalid arguments such as an empty command
      resolve({ stdout: '', stderr: errorMessage(error), code: 1 });
      return;
    }

    let stdout = '';
    let stderr = '';
    let settled = false;

    // Decode across chunk boundaries so split multi-byte characters survive.
    proc.stdout.setEncoding('utf8');
    proc.stderr.setEncoding('utf8');

    proc.stdout.on('data', (data: string) => {
      stdout += data;
    });

    proc.stderr.on('data', (data: string) => {
      stderr += data;
    });

    proc.on('close', (code) => {
      if (settled) return;
      settled = true;
      resolve({ stdout, stderr, code: code ?? 1 });
    });

    proc.on('error', (err) => {
      if (settled) return;
      settled = true;
      resolve({ stdout, stderr: stderr || err.message, code: 1 });
    });
  });
}
