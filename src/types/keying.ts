export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface KeyColor {
  rgb: RGB;
  /** Uppercase, six digits, no leading '#'. */
  hex: string;
}

export interface KeyEstimate {
  hex: string;
  rgb: RGB;
  samples: number;
}

export interface KeyingParameters {
  keyColor: string;
  similarity: number;
  blend: number;
}

export interface VideoRenderOptions {
  crf: number;
  includeAudio: boolean;
}

export interface RenderParameters extends KeyingParameters {
  /** Ignored for images. */
  crf?: number;
  /** Ignored for images; defaults to whether the asset has audio. */
  includeAudio?: boolean;
}

export interface PreviewParameters extends KeyingParameters {
  /** Seconds into a video; ignored for images. */
  time?: number;
  maxWidth?: number;
}
