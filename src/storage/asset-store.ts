import { copyFile, mkdir, readdir, rm } from 'node:fs/promises';
import path from 'node:path';
import { AssetNotFoundError, InvalidParameterError, describeError } from '../errors.js';
import { probeMetadata } from '../encoder/probe.js';
import type { Asset, AssetKind, AssetStore, ImageMetadata, VideoMetadata } from '../types/asset.js';
import { generateId, isValidId } from './ids.js';

export const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.avi', '.mkv', '.webm', '.m4v']);
export const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.bmp', '.webp', '.gif']);

export function kindForExtension(extension: string): AssetKind | null {
  const ext = extension.toLowerCase();
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  return null;
}

export interface MetadataProbe {
  video(filePath: string): Promise<VideoMetadata>;
  image(filePath: string): Promise<ImageMetadata>;
}

export function ffprobeMetadata(ffprobePath: string): MetadataProbe {
  return {
    video: (filePath) => probeMetadata(ffprobePath, filePath, 'video'),
    image: (filePath) => probeMetadata(ffprobePath, filePath, 'image'),
  };
}

/**
 * Assets on disk, one directory per id holding `input.<ext>`. Metadata is
 * probed on first resolve and cached; assets never change once stored.
 */
export class FileAssetStore implements AssetStore {
  private readonly root: string;
  private readonly cache = new Map<string, Asset>();

  constructor(dataDir: string, private readonly probe: MetadataProbe) {
    this.root = path.resolve(dataDir, 'assets');
  }

  async resolve(assetId: string): Promise<Asset> {
    if (!isValidId(assetId)) {
      throw new AssetNotFoundError(assetId);
    }
    const cached = this.cache.get(assetId);
    if (cached) return cached;

    const dir = path.join(this.root, assetId);
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch {
      throw new AssetNotFoundError(assetId);
    }

    const input = entries.find((name) => name.startsWith('input.') && kindForExtension(path.extname(name)) !== null);
    if (!input) {
      throw new AssetNotFoundError(assetId);
    }

    const asset = await this.describe(assetId, path.join(dir, input));
    this.cache.set(assetId, asset);
    return asset;
  }

  /** Copies a local media file into the store and probes it. */
  async importFile(sourcePath: string): Promise<Asset> {
    const extension = path.extname(sourcePath).toLowerCase();
    if (kindForExtension(extension) === null) {
      const supported = [...VIDEO_EXTENSIONS, ...IMAGE_EXTENSIONS].sort().join(', ');
      throw new InvalidParameterError(`Invalid file type. Supported formats: ${supported}`, {
        details: { extension },
      });
    }

    const assetId = generateId();
    const dir = path.join(this.root, assetId);
    const target = path.join(dir, `input${extension}`);
    await mkdir(dir, { recursive: true });

    try {
      await copyFile(sourcePath, target);
      const asset = await this.describe(assetId, target);
      this.cache.set(assetId, asset);
      return asset;
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      if (error instanceof InvalidParameterError) throw error;
      throw new InvalidParameterError(`Failed to read file metadata: ${describeError(error)}`, { cause: error });
    }
  }

  private async describe(id: string, filePath: string): Promise<Asset> {
    const kind = kindForExtension(path.extname(filePath));
    if (kind === 'video') {
      return { id, kind, path: filePath, metadata: await this.probe.video(filePath) };
    }
    return { id, kind: 'image', path: filePath, metadata: await this.probe.image(filePath) };
  }
}
