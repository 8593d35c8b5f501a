import { spawn } from 'node:child_process';
import { EncoderLaunchError } from '../errors.js';

export interface CapturedRun {
  code: number | null;
  stdout: Buffer;
  stderr: string;
}

/**
 * Runs a short-lived helper (ffprobe, a single-frame decode) to completion,
 * buffering stdout. Spawn failures reject with EncoderLaunchError; a non-zero
 * exit is returned for the caller to judge.
 */
export function runCaptured(
  cmd: string,
  args: readonly string[],
  opts?: { cwd?: string; signal?: AbortSignal }
): Promise<CapturedRun> {
  return new Promise<CapturedRun>((resolve, reject) => {
    const child = spawn(cmd, [...args], {
      cwd: opts?.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: opts?.signal,
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    let stderr = '';
    child.stdout.on('data', (d: Buffer) => stdout.push(d));
    child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));
    child.on('error', (err) => {
      if (child.pid === undefined) {
        reject(new EncoderLaunchError(`Failed to start ${cmd}: ${err.message}`, { cause: err }));
      } else {
        reject(err);
      }
    });
    child.on('close', (code) => {
      resolve({ code, stdout: Buffer.concat(stdout), stderr });
    });
  });
}
