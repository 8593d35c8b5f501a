import type { RGB } from '../types/keying.js';

/** Longest edge, in pixels, a sampling frame is decoded at. */
export const SAMPLE_FRAME_MAX_WIDTH = 256;
export const PATCH_RADIUS = 1;

export interface FrameSize {
  width: number;
  height: number;
}

/** Size the frame is decoded at: at most SAMPLE_FRAME_MAX_WIDTH wide, aspect kept. */
export function sampleFrameSize(source: FrameSize): FrameSize {
  const width = Math.max(1, Math.min(SAMPLE_FRAME_MAX_WIDTH, source.width));
  const height = Math.max(1, Math.round((source.height * width) / Math.max(1, source.width)));
  return { width, height };
}

/** Four corners followed by the four edge midpoints. */
export function sampleAnchors({ width, height }: FrameSize): Array<[number, number]> {
  const right = width - 1;
  const bottom = height - 1;
  const midX = Math.floor(right / 2);
  const midY = Math.floor(bottom / 2);
  return [
    [0, 0],
    [right, 0],
    [0, bottom],
    [right, bottom],
    [midX, 0],
    [midX, bottom],
    [0, midY],
    [right, midY],
  ];
}

/**
 * Reads background samples out of a packed rgb24 frame: a patch around every
 * anchor, clipped to the frame, each pixel coordinate used once.
 */
export function collectEdgeSamples(frame: Uint8Array, size: FrameSize): RGB[] {
  const expected = size.width * size.height * 3;
  if (frame.length < expected) {
    throw new RangeError(`Frame holds ${frame.length} bytes, expected ${expected} for ${size.width}x${size.height}`);
  }

  const seen = new Set<number>();
  const samples: RGB[] = [];

  for (const [ax, ay] of sampleAnchors(size)) {
    for (let dy = -PATCH_RADIUS; dy <= PATCH_RADIUS; dy++) {
      for (let dx = -PATCH_RADIUS; dx <= PATCH_RADIUS; dx++) {
        const x = ax + dx;
        const y = ay + dy;
        if (x < 0 || y < 0 || x >= size.width || y >= size.height) continue;

        const index = y * size.width + x;
        if (seen.has(index)) continue;
        seen.add(index);

        const offset = index * 3;
        samples.push({ r: frame[offset], g: frame[offset + 1], b: frame[offset + 2] });
      }
    }
  }

  return samples;
}
