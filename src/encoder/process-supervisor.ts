import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { EncoderLaunchError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ProgressParser, isProgressLine } from './progress-parser.js';

export type LogStream = 'stdout' | 'stderr';

export interface LaunchSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Total media duration; without it no progress is reported. */
  durationSeconds?: number;
  onProgress?: (progress: number) => void;
  onLog?: (line: string, stream: LogStream) => void;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  /** Last diagnostic lines; progress key=value lines are left out. */
  logTail: string[];
}

export interface CancelOutcome {
  alreadyExited: boolean;
  /** The process ignored SIGTERM for the whole grace period and was killed. */
  forced: boolean;
}

export interface SupervisedProcess {
  readonly pid: number | undefined;
  readonly exited: boolean;
  /** Resolves on exit; rejects with EncoderLaunchError when the spawn failed. */
  readonly result: Promise<ProcessResult>;
}

export interface EncoderSupervisor {
  start(spec: LaunchSpec): SupervisedProcess;
  /** Idempotent; a no-op on a process that already exited. */
  cancel(handle: SupervisedProcess): Promise<CancelOutcome>;
}

export interface SupervisorOptions {
  graceMs: number;
  failureContextLines: number;
  logger?: Logger;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

class ChildProcessHandle implements SupervisedProcess {
  readonly result: Promise<ProcessResult>;
  private readonly exit: Promise<void>;
  private readonly tail: string[] = [];
  private readonly startedAt = performance.now();
  private exitedFlag = false;
  private cancelling?: Promise<CancelOutcome>;
  private markExited: () => void = () => undefined;

  constructor(
    private readonly child: ChildProcess,
    private readonly spec: LaunchSpec,
    private readonly options: SupervisorOptions,
    private readonly ownsGroup: boolean,
    private readonly log: Logger
  ) {
    const parser = new ProgressParser(spec.durationSeconds);
    if (child.stdout) this.pipeLines(child.stdout, 'stdout', parser);
    if (child.stderr) this.pipeLines(child.stderr, 'stderr', parser);

    this.exit = new Promise<void>((resolve) => {
      this.markExited = resolve;
    });

    this.result = new Promise<ProcessResult>((resolve, reject) => {
      let settled = false;

      child.on('error', (err) => {
        // Errors after a successful spawn come from signalling; exit still follows.
        if (settled || child.pid !== undefined) {
          this.log.warn({ err, pid: child.pid }, 'encoder process error');
          return;
        }
        settled = true;
        this.exitedFlag = true;
        this.markExited();
        reject(new EncoderLaunchError(`Failed to start ${spec.command}: ${err.message}`, { cause: err }));
      });

      child.once('close', (code, signal) => {
        if (settled) return;
        settled = true;
        this.exitedFlag = true;
        this.markExited();
        resolve({
          exitCode: code,
          signal,
          durationMs: Math.round(performance.now() - this.startedAt),
          logTail: [...this.tail],
        });
      });
    });
    // Launch failures reach the owner through `result`; this only marks the rejection observed.
    void this.result.catch(() => undefined);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exitedFlag;
  }

  cancel(): Promise<CancelOutcome> {
    if (this.exitedFlag) {
      return Promise.resolve({ alreadyExited: true, forced: false });
    }
    this.cancelling ??= this.terminate();
    return this.cancelling;
  }

  private async terminate(): Promise<CancelOutcome> {
    this.signal('SIGTERM');

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.options.graceMs);
    });
    const first = await Promise.race([this.exit.then(() => 'exited' as const), grace]);
    clearTimeout(timer);

    if (first === 'exited') {
      return { alreadyExited: false, forced: false };
    }

    this.log.warn({ pid: this.child.pid, graceMs: this.options.graceMs }, 'encoder ignored SIGTERM, killing');
    this.signal('SIGKILL');
    await this.exit;
    return { alreadyExited: false, forced: true };
  }

  // Signals the whole process group so helper processes go down with the encoder.
  private signal(sig: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (pid === undefined) return;
    try {
      if (this.ownsGroup) process.kill(-pid, sig);
      else this.child.kill(sig);
    } catch (err) {
      if (!isErrnoCode(err, 'ESRCH')) throw err;
    }
  }

  private pipeLines(stream: Readable, name: LogStream, parser: ProgressParser): void {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('line', (line) => {
      if (!isProgressLine(line)) {
        this.tail.push(line);
        if (this.tail.length > this.options.failureContextLines) this.tail.shift();
      }

      this.spec.onLog?.(line, name);
      const progress = parser.feed(line);
      if (progress !== undefined) this.spec.onProgress?.(progress);
    });
  }
}

/**
 * Runs the encoder binary as a child process: one process per start(),
 * output read line by line, progress parsed as it arrives, cancellation by
 * SIGTERM with a bounded grace period before SIGKILL. Never retries.
 */
export class ProcessSupervisor implements EncoderSupervisor {
  private readonly log: Logger;

  constructor(private readonly options: SupervisorOptions) {
    this.log = (options.logger ?? silentLogger).child({ component: 'supervisor' });
  }

  start(spec: LaunchSpec): SupervisedProcess {
    const ownsGroup = process.platform !== 'win32';
    const child = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: ownsGroup,
      windowsHide: true,
    });

    this.log.debug({ pid: child.pid, command: spec.command, args: spec.args }, 'encoder spawned');
    return new ChildProcessHandle(child, spec, this.options, ownsGroup, this.log);
  }

  cancel(handle: SupervisedProcess): Promise<CancelOutcome> {
    if (!(handle instanceof ChildProcessHandle)) {
      throw new TypeError('Handle was not created by this supervisor');
    }
    return handle.cancel();
  }
}
