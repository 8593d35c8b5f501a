import { buildFrameGrabArgs, SEEK_EPSILON } from '../encoder/command-builder.js';
import { runCaptured } from '../encoder/exec.js';
import { EncoderRuntimeError } from '../errors.js';
import type { Asset } from '../types/asset.js';
import type { RGB } from '../types/keying.js';
import { collectEdgeSamples, sampleFrameSize, type FrameSize } from './frame-samples.js';

/** Fraction of a video's duration at which the sampling frame is taken. */
export const SAMPLE_AT_FRACTION = 0.1;

export interface FrameSource {
  /** Packed rgb24 pixels of one representative frame, decoded at `size`. */
  grabFrame(asset: Asset, size: FrameSize): Promise<Uint8Array>;
}

export function sampleTimestamp(durationSeconds: number): number {
  const latest = Math.max(0, durationSeconds - SEEK_EPSILON);
  return Math.min(Math.max(0, durationSeconds * SAMPLE_AT_FRACTION), latest);
}

export class FfmpegFrameSource implements FrameSource {
  constructor(private readonly ffmpegPath: string) {}

  async grabFrame(asset: Asset, size: FrameSize): Promise<Uint8Array> {
    const args = buildFrameGrabArgs({
      inputPath: asset.path,
      width: size.width,
      height: size.height,
      seekSeconds: asset.kind === 'video' ? sampleTimestamp(asset.metadata.durationSeconds) : undefined,
    });
    const run = await runCaptured(this.ffmpegPath, args);
    if (run.code !== 0) {
      const tail = run.stderr.trim().split('\n').slice(-10);
      throw new EncoderRuntimeError(`Frame decode failed with code ${run.code}`, run.code, tail);
    }
    return run.stdout;
  }
}

/** Decodes the representative frame and returns its edge samples. */
export async function sampleBackground(source: FrameSource, asset: Asset): Promise<RGB[]> {
  const size = sampleFrameSize(asset.metadata);
  const frame = await source.grabFrame(asset, size);
  if (frame.length < size.width * size.height * 3) {
    throw new EncoderRuntimeError(`Decoded frame is truncated (${frame.length} bytes for ${size.width}x${size.height})`, 0);
  }
  return collectEdgeSamples(frame, size);
}
