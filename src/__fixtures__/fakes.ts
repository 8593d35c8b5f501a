import type {
  CancelOutcome,
  EncoderSupervisor,
  LaunchSpec,
  ProcessResult,
  SupervisedProcess,
} from '../encoder/process-supervisor.js';
import { isProgressLine } from '../encoder/progress-parser.js';
import { AssetNotFoundError } from '../errors.js';
import type { FrameSource } from '../keying/frame-grabber.js';
import type { FrameSize } from '../keying/frame-samples.js';
import type { Asset, AssetStore } from '../types/asset.js';
import type { RGB } from '../types/keying.js';

export const VIDEO_ASSET_ID = '01J9ZV3Q5W8X2Y4Z6A7B8C9D0E';
export const SILENT_VIDEO_ASSET_ID = '01J9ZV3Q5W8X2Y4Z6A7B8C9D0F';
export const IMAGE_ASSET_ID = '01J9ZV3Q5W8X2Y4Z6A7B8C9D0G';
export const TINY_IMAGE_ASSET_ID = '01J9ZV3Q5W8X2Y4Z6A7B8C9D0H';
export const UNKNOWN_ASSET_ID = '01J9ZV3Q5W8X2Y4Z6A7B8C9D0J';

export function testAssets(): Asset[] {
  return [
    {
      id: VIDEO_ASSET_ID,
      kind: 'video',
      path: `/media/${VIDEO_ASSET_ID}/input.mp4`,
      metadata: { width: 1920, height: 1080, durationSeconds: 10, fps: 30, hasAudio: true },
    },
    {
      id: SILENT_VIDEO_ASSET_ID,
      kind: 'video',
      path: `/media/${SILENT_VIDEO_ASSET_ID}/input.mov`,
      metadata: { width: 1280, height: 720, durationSeconds: 4, fps: 25, hasAudio: false },
    },
    {
      id: IMAGE_ASSET_ID,
      kind: 'image',
      path: `/media/${IMAGE_ASSET_ID}/input.png`,
      metadata: { width: 800, height: 600 },
    },
    {
      id: TINY_IMAGE_ASSET_ID,
      kind: 'image',
      path: `/media/${TINY_IMAGE_ASSET_ID}/input.png`,
      metadata: { width: 1, height: 1 },
    },
  ];
}

export class FakeAssetStore implements AssetStore {
  private readonly assets: Map<string, Asset>;

  constructor(assets: Asset[] = testAssets()) {
    this.assets = new Map(assets.map((asset) => [asset.id, asset]));
  }

  async resolve(assetId: string): Promise<Asset> {
    const asset = this.assets.get(assetId);
    if (!asset) throw new AssetNotFoundError(assetId);
    return asset;
  }
}

/** Serves a frame filled with one color at whatever size is asked for. */
export class SolidFrameSource implements FrameSource {
  readonly requests: FrameSize[] = [];

  constructor(private readonly color: RGB) {}

  async grabFrame(_asset: Asset, size: FrameSize): Promise<Uint8Array> {
    this.requests.push(size);
    const frame = new Uint8Array(size.width * size.height * 3);
    for (let i = 0; i < frame.length; i += 3) {
      frame[i] = this.color.r;
      frame[i + 1] = this.color.g;
      frame[i + 2] = this.color.b;
    }
    return frame;
  }
}

/** A scripted encoder process; the test decides what it prints and how it ends. */
export class FakeProcess implements SupervisedProcess {
  readonly result: Promise<ProcessResult>;
  readonly tail: string[] = [];
  /** When set, SIGTERM is ignored and cancel has to force a kill. */
  ignoreTerm = false;
  cancelCalls = 0;
  private exitedFlag = false;
  private resolveResult: (result: ProcessResult) => void = () => undefined;
  private rejectResult: (err: unknown) => void = () => undefined;

  constructor(readonly spec: LaunchSpec, readonly pid: number | undefined) {
    this.result = new Promise<ProcessResult>((resolve, reject) => {
      this.resolveResult = resolve;
      this.rejectResult = reject;
    });
    void this.result.catch(() => undefined);
  }

  get exited(): boolean {
    return this.exitedFlag;
  }

  /** Last argument of every encoder command is the output path. */
  get outputPath(): string {
    return this.spec.args[this.spec.args.length - 1] ?? '';
  }

  log(line: string): void {
    if (!isProgressLine(line)) this.tail.push(line);
    this.spec.onLog?.(line, 'stderr');
  }

  progress(value: number): void {
    this.spec.onProgress?.(value);
  }

  exit(exitCode: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitedFlag) return;
    this.exitedFlag = true;
    this.resolveResult({ exitCode, signal, durationMs: 5, logTail: [...this.tail] });
  }

  failLaunch(err: Error): void {
    this.exitedFlag = true;
    this.rejectResult(err);
  }
}

export class FakeSupervisor implements EncoderSupervisor {
  readonly processes: FakeProcess[] = [];
  private nextPid = 4242;

  /** Runs right after each start; lets a test script the process up front. */
  constructor(private readonly onStart?: (proc: FakeProcess) => void) {}

  start(spec: LaunchSpec): SupervisedProcess {
    const proc = new FakeProcess(spec, this.nextPid++);
    this.processes.push(proc);
    this.onStart?.(proc);
    return proc;
  }

  async cancel(handle: SupervisedProcess): Promise<CancelOutcome> {
    const proc = this.processes.find((p) => p === handle);
    if (!proc) throw new TypeError('Handle was not created by this supervisor');
    proc.cancelCalls++;
    if (proc.exited) return { alreadyExited: true, forced: false };
    if (proc.ignoreTerm) {
      proc.exit(null, 'SIGKILL');
      return { alreadyExited: false, forced: true };
    }
    proc.exit(null, 'SIGTERM');
    return { alreadyExited: false, forced: false };
  }
}
