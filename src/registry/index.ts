import { createWriteStream, statSync, type WriteStream } from 'node:fs';
import { readFile, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import {
  buildCommand,
  validateKeying,
  validateVideoOptions,
  type CommandRequest,
} from '../encoder/command-builder.js';
import type { EncoderSupervisor, ProcessResult, SupervisedProcess } from '../encoder/process-supervisor.js';
import {
  CancellationError,
  EncoderRuntimeError,
  JobNotFoundError,
  JobNotReadyError,
  OutputMissingError,
  describeError,
} from '../errors.js';
import { estimateKeyColor } from '../keying/key-estimator.js';
import { sampleBackground, type FrameSource } from '../keying/frame-grabber.js';
import { fmt } from '../lib/error-messages.js';
import { silentLogger, type Logger } from '../logger.js';
import type { JobRepository } from '../repositories/base.js';
import { generateId } from '../storage/ids.js';
import type { OutputStore } from '../storage/output-store.js';
import type { Asset, AssetStore } from '../types/asset.js';
import { isTerminal, type Job, type JobOutput, type JobParams, type JobQuery, type JobStats, type JobStatus, type JobUpdate } from '../types/job.js';
import type { KeyEstimate, PreviewParameters, RenderParameters } from '../types/keying.js';
import { SerialLane } from '../utils/serial-lane.js';

export interface RegistryConfig {
  ffmpegPath: string;
  /** 0 admits every job as soon as it is queued. */
  maxConcurrentJobs: number;
  previewMaxWidth: number;
}

export interface RegistryDeps {
  repo: JobRepository;
  assets: AssetStore;
  outputs: OutputStore;
  supervisor: EncoderSupervisor;
  frames: FrameSource;
  logger?: Logger;
}

export interface RegistryStats extends JobStats {
  active: number;
  pending: number;
  maxConcurrentJobs: number;
}

interface JobEntry {
  lane: SerialLane;
  asset: Asset;
  handle: SupervisedProcess | null;
  outputPath: string | null;
  logFile: WriteStream | null;
  pendingLines: string[];
  flushScheduled: boolean;
  settled: Promise<void>;
  markSettled: () => void;
}

type RunOutcome = { result: ProcessResult } | { launchError: unknown };

const OUTPUT_FORMATS = {
  video: { extension: 'webm', mediaType: 'video/webm' },
  image: { extension: 'png', mediaType: 'image/png' },
} as const;

export function describeExit(result: ProcessResult): string {
  const head = result.exitCode !== null
    ? fmt('ENCODER_EXIT', { code: result.exitCode })
    : fmt('ENCODER_SIGNAL', { signal: result.signal ?? 'unknown' });
  return result.logTail.length > 0 ? `${head}\n${result.logTail.join('\n')}` : head;
}

/**
 * Owns every render job: creates records, admits queued jobs to the encoder
 * supervisor, folds progress and log lines back in, and drives each job to a
 * terminal state. All mutations of one job run on that job's serial lane;
 * status reads go straight to the repository and never wait on a lane.
 */
export class JobRegistry {
  private readonly entries = new Map<string, JobEntry>();
  private readonly pending: string[] = [];
  private active = 0;
  private readonly log: Logger;

  constructor(private readonly deps: RegistryDeps, private readonly config: RegistryConfig) {
    this.log = (deps.logger ?? silentLogger).child({ component: 'registry' });
  }

  async estimateKey(assetId: string): Promise<KeyEstimate> {
    const asset = await this.deps.assets.resolve(assetId);
    const samples = await sampleBackground(this.deps.frames, asset);
    const { color, sampleCount } = estimateKeyColor(samples);

    this.log.info({ assetId, hex: color.hex, samples: sampleCount }, 'key color estimated');
    return { hex: color.hex, rgb: color.rgb, samples: sampleCount };
  }

  /** Renders one keyed, downscaled PNG frame and returns its bytes. */
  async preview(assetId: string, params: PreviewParameters): Promise<Buffer> {
    const asset = await this.deps.assets.resolve(assetId);
    validateKeying(params);

    const outputPath = await this.deps.outputs.allocatePreview(generateId());
    const request: CommandRequest = {
      mode: 'preview',
      inputPath: asset.path,
      outputPath,
      keying: params,
      metadata: asset.metadata,
      isVideo: asset.kind === 'video',
      time: params.time,
      maxWidth: params.maxWidth ?? this.config.previewMaxWidth,
    };

    try {
      const args = buildCommand(request);
      const handle = this.deps.supervisor.start({
        command: this.config.ffmpegPath,
        args,
        onLog: (line) => this.log.trace({ assetId, line }, 'preview encoder output'),
      });
      const result = await handle.result;
      if (result.exitCode !== 0) {
        throw new EncoderRuntimeError(describeExit(result), result.exitCode, result.logTail);
      }
      return await readFile(outputPath);
    } finally {
      await this.removeQuietly(path.dirname(outputPath));
    }
  }

  /**
   * Validates the request against the asset and queues a render. Parameter
   * and lookup errors throw here, before any job exists.
   */
  async startRender(assetId: string, params: RenderParameters): Promise<string> {
    const asset = await this.deps.assets.resolve(assetId);
    const jobParams = this.resolveParams(asset, params);

    const job = await this.deps.repo.create({ assetId, assetKind: asset.kind, params: jobParams });

    let markSettled: () => void = () => undefined;
    const settled = new Promise<void>((resolve) => {
      markSettled = resolve;
    });
    this.entries.set(job.id, {
      lane: new SerialLane(),
      asset,
      handle: null,
      outputPath: null,
      logFile: null,
      pendingLines: [],
      flushScheduled: false,
      settled,
      markSettled,
    });
    this.pending.push(job.id);

    this.log.info({ jobId: job.id, assetId, kind: asset.kind }, 'job created');
    setImmediate(() => this.pump());
    return job.id;
  }

  getStatus(jobId: string): Promise<Job | null> {
    return this.deps.repo.get(jobId);
  }

  listJobs(query: JobQuery): Promise<{ jobs: Job[]; nextCursor?: string }> {
    return this.deps.repo.find(query);
  }

  /** Resolves with the job once it reaches a terminal state. */
  async waitFor(jobId: string): Promise<Job> {
    const entry = this.entries.get(jobId);
    if (entry) await entry.settled;
    const job = await this.deps.repo.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /**
   * Requests cancellation. A queued job is dropped without ever starting a
   * process; a running job resolves only after its process has exited. On a
   * terminal job this reports the existing status and changes nothing.
   */
  async cancel(jobId: string): Promise<JobStatus> {
    const entry = this.entries.get(jobId);
    if (!entry) {
      const job = await this.deps.repo.get(jobId);
      if (!job) throw new JobNotFoundError(jobId);
      return job.status;
    }

    return entry.lane.run<JobStatus>(async () => {
      const job = await this.deps.repo.get(jobId);
      if (!job) throw new JobNotFoundError(jobId);
      if (isTerminal(job.status)) return job.status;

      if (job.status === 'queued') {
        const index = this.pending.indexOf(jobId);
        if (index >= 0) this.pending.splice(index, 1);
        await this.settle(jobId, entry, { status: 'canceled' });
        this.log.info({ jobId }, 'queued job canceled');
        return 'canceled';
      }

      let forced = false;
      if (entry.handle) {
        const outcome = await this.deps.supervisor.cancel(entry.handle);
        forced = outcome.forced;
      }
      if (forced) {
        const err = new CancellationError('Encoder did not exit within the grace period and was killed', {
          details: { jobId },
        });
        this.log.warn({ err, jobId }, 'forced kill during cancel');
      }

      await this.settle(jobId, entry, { status: 'canceled', forcedKill: forced });
      if (entry.outputPath) await this.removeQuietly(entry.outputPath);
      this.log.info({ jobId, forced }, 'running job canceled');
      return 'canceled';
    });
  }

  async download(jobId: string): Promise<JobOutput> {
    const job = await this.deps.repo.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (job.status !== 'done' || !job.output) throw new JobNotReadyError(jobId, job.status);

    try {
      await stat(job.output.path);
    } catch (error) {
      throw new OutputMissingError(jobId, { cause: error });
    }
    return job.output;
  }

  async getStats(): Promise<RegistryStats> {
    const stats = await this.deps.repo.getStats();
    return {
      ...stats,
      active: this.active,
      pending: this.pending.length,
      maxConcurrentJobs: this.config.maxConcurrentJobs,
    };
  }

  /** Cancels every job that has not finished and waits for all of them. */
  async shutdown(): Promise<void> {
    const ids = [...this.entries.keys()];
    const results = await Promise.allSettled(ids.map((id) => this.cancel(id)));
    results.forEach((r, i) => {
      if (r.status === 'rejected') this.log.error({ err: r.reason, jobId: ids[i] }, 'cancel during shutdown failed');
    });
  }

  private resolveParams(asset: Asset, params: RenderParameters): JobParams {
    const keying = validateKeying(params);
    if (asset.kind === 'video') {
      const video = validateVideoOptions(params, asset.metadata);
      return { keyColor: keying.hex, similarity: keying.similarity, blend: keying.blend, ...video };
    }
    return { keyColor: keying.hex, similarity: keying.similarity, blend: keying.blend, crf: null, includeAudio: false };
  }

  private pump(): void {
    const limit = this.config.maxConcurrentJobs;
    while (this.pending.length > 0 && (limit === 0 || this.active < limit)) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;
      const entry = this.entries.get(jobId);
      if (!entry) continue;

      this.active++;
      void this.runJob(jobId, entry)
        .catch((err: unknown) => this.log.error({ err, jobId }, 'job runner crashed'))
        .finally(() => {
          this.active--;
          this.pump();
        });
    }
  }

  private async runJob(jobId: string, entry: JobEntry): Promise<void> {
    const handle = await entry.lane.run(() => this.launch(jobId, entry));
    if (!handle) return;

    let outcome: RunOutcome;
    try {
      outcome = { result: await handle.result };
    } catch (launchError) {
      outcome = { launchError };
    }
    await entry.lane.run(() => this.finish(jobId, entry, outcome));
  }

  private async launch(jobId: string, entry: JobEntry): Promise<SupervisedProcess | null> {
    const job = await this.deps.repo.get(jobId);
    if (!job || job.status !== 'queued') return null;

    const { asset } = entry;
    let args: string[];
    try {
      const format = OUTPUT_FORMATS[asset.kind];
      const outputPath = await this.deps.outputs.allocateOutput(jobId, format.extension);
      const logPath = await this.deps.outputs.allocateLog(jobId);
      args = buildCommand(this.commandFor(asset, job.params, outputPath));

      entry.outputPath = outputPath;
      entry.logFile = createWriteStream(logPath, { flags: 'w' });
      entry.logFile.on('error', (err) => this.log.warn({ err, jobId }, 'job log file write failed'));
    } catch (error) {
      await this.settle(jobId, entry, { status: 'error', failureMessage: `Failed to prepare render: ${describeError(error)}` });
      this.log.error({ err: error, jobId }, 'job preparation failed');
      return null;
    }

    const commandLine = `Command: ${[this.config.ffmpegPath, ...args].join(' ')}`;
    entry.logFile.write(`${commandLine}\n`);
    await this.deps.repo.appendLog(jobId, [commandLine]);

    let handle: SupervisedProcess;
    try {
      handle = this.deps.supervisor.start({
        command: this.config.ffmpegPath,
        args,
        durationSeconds: asset.kind === 'video' ? asset.metadata.durationSeconds : undefined,
        onProgress: (progress) => this.recordProgress(jobId, entry, progress),
        onLog: (line) => this.recordLine(jobId, entry, line),
      });
    } catch (error) {
      await this.settle(jobId, entry, { status: 'error', failureMessage: describeError(error) });
      this.log.error({ err: error, jobId }, 'encoder launch failed');
      return null;
    }

    entry.handle = handle;
    await this.deps.repo.updatePartial(jobId, { status: 'running', startedAt: new Date(), pid: handle.pid ?? null });
    this.log.info({ jobId, pid: handle.pid }, 'job started');
    return handle;
  }

  private commandFor(asset: Asset, params: JobParams, outputPath: string): CommandRequest {
    const keying = { keyColor: params.keyColor, similarity: params.similarity, blend: params.blend };
    if (asset.kind === 'video') {
      return {
        mode: 'render-video',
        inputPath: asset.path,
        outputPath,
        keying,
        metadata: asset.metadata,
        video: { crf: params.crf ?? undefined, includeAudio: params.includeAudio },
      };
    }
    return { mode: 'render-image', inputPath: asset.path, outputPath, keying, metadata: asset.metadata };
  }

  private async finish(jobId: string, entry: JobEntry, outcome: RunOutcome): Promise<void> {
    const job = await this.deps.repo.get(jobId);
    // A cancel already settled it.
    if (!job || isTerminal(job.status)) return;

    if ('launchError' in outcome) {
      await this.settle(jobId, entry, { status: 'error', failureMessage: describeError(outcome.launchError) });
      this.log.error({ err: outcome.launchError, jobId }, 'encoder launch failed');
      return;
    }

    const { result } = outcome;
    if (result.exitCode !== 0) {
      await this.settle(jobId, entry, { status: 'error', failureMessage: describeExit(result) });
      this.log.error({ jobId, exitCode: result.exitCode, signal: result.signal }, 'job failed');
      return;
    }

    // No await between the exit and the terminal transition.
    const output = this.describeOutput(entry);
    if (!output) {
      await this.settle(jobId, entry, { status: 'error', failureMessage: 'Encoder exited successfully but produced no output' });
      this.log.error({ jobId }, 'job produced no output');
      return;
    }

    await this.settle(jobId, entry, { status: 'done', progress: 1, output });
    this.log.info({ jobId, sizeBytes: output.sizeBytes, durationMs: result.durationMs }, 'job completed');
  }

  private describeOutput(entry: JobEntry): JobOutput | null {
    if (!entry.outputPath) return null;
    const format = OUTPUT_FORMATS[entry.asset.kind];
    try {
      const { size } = statSync(entry.outputPath);
      if (size <= 0) return null;
      return { path: entry.outputPath, filename: `output.${format.extension}`, mediaType: format.mediaType, sizeBytes: size };
    } catch {
      return null;
    }
  }

  private recordProgress(jobId: string, entry: JobEntry, progress: number): void {
    this.enqueue(jobId, entry, async () => {
      const job = await this.deps.repo.get(jobId);
      if (!job || job.status !== 'running' || progress <= job.progress) return;
      await this.deps.repo.updatePartial(jobId, { progress });
    });
  }

  private recordLine(jobId: string, entry: JobEntry, line: string): void {
    entry.logFile?.write(`${line}\n`);
    entry.pendingLines.push(line);
    if (entry.flushScheduled) return;

    entry.flushScheduled = true;
    this.enqueue(jobId, entry, async () => {
      entry.flushScheduled = false;
      const lines = entry.pendingLines.splice(0);
      const job = await this.deps.repo.get(jobId);
      if (job?.status === 'running') await this.deps.repo.appendLog(jobId, lines);
    });
  }

  private enqueue(jobId: string, entry: JobEntry, task: () => Promise<void>): void {
    entry.lane.run(task).catch((err: unknown) => this.log.error({ err, jobId }, 'job update failed'));
  }

  private async settle(jobId: string, entry: JobEntry, update: JobUpdate & { status: JobStatus }): Promise<void> {
    const lines = entry.pendingLines.splice(0);
    if (lines.length > 0) await this.deps.repo.appendLog(jobId, lines);

    await this.deps.repo.updatePartial(jobId, { ...update, pid: null, finishedAt: new Date() });
    entry.handle = null;
    entry.logFile?.end();
    entry.logFile = null;
    this.entries.delete(jobId);
    entry.markSettled();
  }

  private async removeQuietly(target: string): Promise<void> {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (err) {
      this.log.warn({ err, target }, 'cleanup failed');
    }
  }
}
