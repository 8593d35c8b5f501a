import { InsufficientSampleError } from '../errors.js';
import type { KeyColor, RGB } from '../types/keying.js';
import { keyColorFromRgb } from './color.js';

export const MIN_SAMPLES = 4;
export const QUANTUM = 8;

export interface KeyColorEstimate {
  color: KeyColor;
  sampleCount: number;
}

const quantize = (channel: number) => Math.min(255, Math.round(channel / QUANTUM) * QUANTUM);

const bucketOf = (px: RGB) => `${quantize(px.r)},${quantize(px.g)},${quantize(px.b)}`;

/**
 * Picks the dominant background color from edge samples.
 *
 * Samples are bucketed by channel values rounded to the nearest multiple of 8,
 * the most populated bucket wins (ties go to the bucket seen first), and the
 * result is the rounded mean of the raw samples in that bucket.
 */
export function estimateKeyColor(samples: readonly RGB[], minSamples = MIN_SAMPLES): KeyColorEstimate {
  if (samples.length < minSamples) {
    throw new InsufficientSampleError(samples.length, minSamples);
  }

  // Map iteration order is insertion order, which gives first-seen tie breaking.
  const buckets = new Map<string, RGB[]>();
  for (const px of samples) {
    const key = bucketOf(px);
    const members = buckets.get(key);
    if (members) members.push(px);
    else buckets.set(key, [px]);
  }

  let winner: RGB[] = [];
  for (const members of buckets.values()) {
    if (members.length > winner.length) winner = members;
  }

  const mean = (pick: (px: RGB) => number) =>
    Math.round(winner.reduce((sum, px) => sum + pick(px), 0) / winner.length);

  return {
    color: keyColorFromRgb({ r: mean((p) => p.r), g: mean((p) => p.g), b: mean((p) => p.b) }),
    sampleCount: samples.length,
  };
}
