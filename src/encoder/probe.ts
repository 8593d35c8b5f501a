import type { AssetKind, ImageMetadata, VideoMetadata } from '../types/asset.js';
import { EncoderRuntimeError } from '../errors.js';
import { runCaptured } from './exec.js';

type FfprobeStream = {
  codec_type?: string;
  width?: number;
  height?: number;
  duration?: string;
  r_frame_rate?: string;
  avg_frame_rate?: string;
};

type FfprobeFormat = {
  duration?: string;
};

type FfprobeResult = {
  streams?: FfprobeStream[];
  format?: FfprobeFormat;
};

const DEFAULT_FPS = 30;

const parseRate = (rate?: string) => {
  if (!rate || rate === '0/0') {
    return undefined;
  }

  const [num, den] = rate.split('/').map(Number);
  if (den === undefined) {
    return Number.isFinite(num) ? num : undefined;
  }
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) {
    return undefined;
  }

  return num / den;
};

const parseNumber = (value?: string) => {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

function isFfprobeResult(value: unknown): value is FfprobeResult {
  return typeof value === 'object' && value !== null;
}

export function parseProbeJson(raw: string): FfprobeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new EncoderRuntimeError('Unable to parse ffprobe output', null, [raw.slice(-500)]);
  }
  if (!isFfprobeResult(parsed)) {
    throw new EncoderRuntimeError('Unexpected ffprobe output', null, [raw.slice(-500)]);
  }
  return parsed;
}

export function extractVideoMetadata(payload: FfprobeResult): VideoMetadata {
  const streams = payload.streams ?? [];
  const video = streams.find((s) => s.codec_type === 'video');
  if (!video) {
    throw new EncoderRuntimeError('No video stream found in file', null);
  }

  const durationSeconds = parseNumber(payload.format?.duration) ?? parseNumber(video.duration) ?? 0;
  const fps = parseRate(video.r_frame_rate) ?? parseRate(video.avg_frame_rate) ?? DEFAULT_FPS;

  return {
    width: video.width ?? 0,
    height: video.height ?? 0,
    durationSeconds,
    fps: Math.round(fps * 100) / 100,
    hasAudio: streams.some((s) => s.codec_type === 'audio'),
  };
}

export function extractImageMetadata(payload: FfprobeResult): ImageMetadata {
  const image = (payload.streams ?? []).find((s) => s.codec_type === 'video');
  if (!image) {
    throw new EncoderRuntimeError('No image stream found in file', null);
  }
  return { width: image.width ?? 0, height: image.height ?? 0 };
}

export async function probeFile(ffprobePath: string, filePath: string): Promise<FfprobeResult> {
  const args = ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', '--', filePath];
  const run = await runCaptured(ffprobePath, args);
  if (run.code !== 0) {
    throw new EncoderRuntimeError(`ffprobe failed with code ${run.code}`, run.code, run.stderr.trim().split('\n').slice(-10));
  }
  return parseProbeJson(run.stdout.toString('utf8'));
}

export async function probeMetadata(ffprobePath: string, filePath: string, kind: 'video'): Promise<VideoMetadata>;
export async function probeMetadata(ffprobePath: string, filePath: string, kind: 'image'): Promise<ImageMetadata>;
export async function probeMetadata(ffprobePath: string, filePath: string, kind: AssetKind): Promise<VideoMetadata | ImageMetadata> {
  const payload = await probeFile(ffprobePath, filePath);
  return kind === 'video' ? extractVideoMetadata(payload) : extractImageMetadata(payload);
}

export interface EncoderProbe {
  ok: boolean;
  ffmpeg?: string;
  ffprobe?: string;
}

async function firstVersionLine(binary: string): Promise<string | undefined> {
  try {
    const run = await runCaptured(binary, ['-version']);
    if (run.code !== 0) return undefined;
    return run.stdout.toString('utf8').split('\n')[0]?.trim() || undefined;
  } catch {
    return undefined;
  }
}

/** Reports whether both binaries start, with their version banners. */
export async function checkEncoder(paths: { ffmpegPath: string; ffprobePath: string }): Promise<EncoderProbe> {
  const [ffmpeg, ffprobe] = await Promise.all([
    firstVersionLine(paths.ffmpegPath),
    firstVersionLine(paths.ffprobePath),
  ]);
  if (!ffmpeg || !ffprobe) {
    return { ok: false };
  }
  return { ok: true, ffmpeg, ffprobe };
}
