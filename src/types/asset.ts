export type AssetKind = 'video' | 'image';

export interface ImageMetadata {
  width: number;
  height: number;
}

export interface VideoMetadata extends ImageMetadata {
  durationSeconds: number;
  fps: number;
  hasAudio: boolean;
}

export type Asset =
  | { id: string; kind: 'video'; path: string; metadata: VideoMetadata }
  | { id: string; kind: 'image'; path: string; metadata: ImageMetadata };

export interface AssetStore {
  /** Throws AssetNotFoundError when the id is unknown or malformed. */
  resolve(assetId: string): Promise<Asset>;
}
