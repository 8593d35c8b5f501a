import { InvalidParameterError } from '../errors.js';
import { parseHexColor } from '../keying/color.js';
import type { ImageMetadata, VideoMetadata } from '../types/asset.js';
import type { KeyingParameters, VideoRenderOptions } from '../types/keying.js';

export const SIMILARITY_RANGE = [0, 0.5] as const;
export const BLEND_RANGE = [0, 0.5] as const;
export const CRF_RANGE = [10, 63] as const;
export const DEFAULT_CRF = 24;
export const DEFAULT_PREVIEW_TIME = 0.5;
/** Keeps seeks strictly inside the stream so a frame is always decoded. */
export const SEEK_EPSILON = 0.1;
/** The chromakey filter refuses similarity below this value. */
export const MIN_FILTER_SIMILARITY = 0.00001;

export type CommandMode = 'preview' | 'render-image' | 'render-video';

interface BaseRequest {
  inputPath: string;
  outputPath: string;
  keying: KeyingParameters;
}

/** Video options as requested; defaults are applied by validateVideoOptions. */
export type VideoOptionsInput = Partial<VideoRenderOptions>;

export type CommandRequest =
  | (BaseRequest & {
      mode: 'preview';
      metadata: ImageMetadata | VideoMetadata;
      isVideo: boolean;
      time?: number;
      maxWidth: number;
    })
  | (BaseRequest & { mode: 'render-image'; metadata: ImageMetadata })
  | (BaseRequest & { mode: 'render-video'; metadata: VideoMetadata; video: VideoOptionsInput });

export interface ValidatedKeying {
  hex: string;
  similarity: number;
  blend: number;
}

function checkRange(name: string, value: number, [min, max]: readonly [number, number]): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
    throw new InvalidParameterError(
      `Invalid ${name} value: ${value}. Must be between ${min} and ${max}`,
      { details: { [name]: value } }
    );
  }
  return value;
}

export function validateKeying(params: KeyingParameters): ValidatedKeying {
  return {
    hex: parseHexColor(params.keyColor).hex,
    similarity: checkRange('similarity', params.similarity, SIMILARITY_RANGE),
    blend: checkRange('blend', params.blend, BLEND_RANGE),
  };
}

/**
 * Resolves the video-only options against what the asset actually carries.
 * Asking for audio on a silent asset is an error, not a silent downgrade.
 */
export function validateVideoOptions(
  options: VideoOptionsInput,
  metadata: VideoMetadata
): VideoRenderOptions {
  const crf = options.crf ?? DEFAULT_CRF;
  if (!Number.isInteger(crf) || crf < CRF_RANGE[0] || crf > CRF_RANGE[1]) {
    throw new InvalidParameterError(
      `Invalid crf value: ${crf}. Must be an integer between ${CRF_RANGE[0]} and ${CRF_RANGE[1]}`,
      { details: { crf } }
    );
  }
  const includeAudio = options.includeAudio ?? metadata.hasAudio;
  if (includeAudio && !metadata.hasAudio) {
    throw new InvalidParameterError('Audio was requested but the asset has no audio track', {
      details: { includeAudio },
    });
  }
  return { crf, includeAudio };
}

// Shortest round-trip decimal form, so the filter sees exactly the caller's value.
export const formatNumber = (value: number) => String(value);

export function chromakeyFilter(keying: ValidatedKeying): string {
  const similarity = Math.max(keying.similarity, MIN_FILTER_SIMILARITY);
  return `chromakey=0x${keying.hex}:${formatNumber(similarity)}:${formatNumber(keying.blend)}`;
}

export function clampSeek(time: number, durationSeconds: number): number {
  const latest = Math.max(0, durationSeconds - SEEK_EPSILON);
  return Math.min(Math.max(0, time), latest);
}

export function previewWidth(maxWidth: number, sourceWidth: number): number {
  if (!Number.isInteger(maxWidth) || maxWidth <= 0) {
    throw new InvalidParameterError(`Invalid preview width: ${maxWidth}. Must be a positive integer`, {
      details: { maxWidth },
    });
  }
  return sourceWidth > 0 ? Math.min(maxWidth, sourceWidth) : maxWidth;
}

function isVideoMetadata(metadata: ImageMetadata | VideoMetadata): metadata is VideoMetadata {
  return 'durationSeconds' in metadata;
}

function buildPreview(request: Extract<CommandRequest, { mode: 'preview' }>, keying: ValidatedKeying): string[] {
  const width = previewWidth(request.maxWidth, request.metadata.width);
  const args = ['-y', '-hide_banner'];

  if (request.isVideo) {
    const duration = isVideoMetadata(request.metadata) ? request.metadata.durationSeconds : 0;
    const seek = clampSeek(request.time ?? DEFAULT_PREVIEW_TIME, duration);
    args.push('-ss', formatNumber(seek));
  }

  args.push(
    '-i', request.inputPath,
    '-vf', `${chromakeyFilter(keying)},format=rgba,scale=${width}:-1`,
    '-frames:v', '1',
    '-c:v', 'png',
    '-f', 'image2',
    request.outputPath
  );
  return args;
}

function buildImageRender(request: Extract<CommandRequest, { mode: 'render-image' }>, keying: ValidatedKeying): string[] {
  return [
    '-y', '-hide_banner',
    '-i', request.inputPath,
    '-vf', `${chromakeyFilter(keying)},format=rgba`,
    '-frames:v', '1',
    '-c:v', 'png',
    '-f', 'image2',
    request.outputPath,
  ];
}

function buildVideoRender(request: Extract<CommandRequest, { mode: 'render-video' }>, keying: ValidatedKeying): string[] {
  const video = validateVideoOptions(request.video, request.metadata);
  const args = [
    '-y', '-hide_banner',
    '-i', request.inputPath,
    '-map', '0:v:0',
  ];
  if (video.includeAudio) {
    args.push('-map', '0:a:0');
  }

  args.push(
    '-vf', `${chromakeyFilter(keying)},format=yuva420p`,
    '-c:v', 'libvpx-vp9',
    '-b:v', '0',
    '-crf', String(video.crf),
    '-auto-alt-ref', '0',
    '-pix_fmt', 'yuva420p'
  );

  if (video.includeAudio) {
    args.push('-c:a', 'libopus', '-b:a', '128k');
  } else {
    args.push('-an');
  }

  args.push('-progress', 'pipe:1', '-nostats', '-f', 'webm', request.outputPath);
  return args;
}

/**
 * Builds the encoder argument list (without the binary itself) for one of
 * the three keying modes. Pure: validates and formats, touches nothing.
 */
export function buildCommand(request: CommandRequest): string[] {
  const keying = validateKeying(request.keying);
  switch (request.mode) {
    case 'preview':
      return buildPreview(request, keying);
    case 'render-image':
      return buildImageRender(request, keying);
    case 'render-video':
      return buildVideoRender(request, keying);
  }
}

/** Decodes one frame, resized, as packed rgb24 on stdout. */
export function buildFrameGrabArgs(options: {
  inputPath: string;
  width: number;
  height: number;
  seekSeconds?: number;
}): string[] {
  const args = ['-hide_banner', '-v', 'error'];
  if (options.seekSeconds !== undefined) {
    args.push('-ss', formatNumber(options.seekSeconds));
  }
  args.push(
    '-i', options.inputPath,
    '-frames:v', '1',
    '-vf', `scale=${options.width}:${options.height}`,
    '-f', 'rawvideo',
    '-pix_fmt', 'rgb24',
    'pipe:1'
  );
  return args;
}
