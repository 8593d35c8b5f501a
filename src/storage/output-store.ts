import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { isValidId } from './ids.js';

export interface OutputStore {
  /** Writable path for a job's single output file; unique per job id. */
  allocateOutput(jobId: string, extension: string): Promise<string>;
  allocateLog(jobId: string): Promise<string>;
  allocatePreview(previewId: string): Promise<string>;
}

function assertId(id: string): void {
  if (!isValidId(id)) {
    throw new RangeError(`Invalid id format: ${id}`);
  }
}

export class FileOutputStore implements OutputStore {
  readonly outputsDir: string;
  readonly logsDir: string;
  readonly previewsDir: string;

  constructor(dataDir: string) {
    const root = path.resolve(dataDir);
    this.outputsDir = path.join(root, 'outputs');
    this.logsDir = path.join(root, 'logs');
    this.previewsDir = path.join(root, 'previews');
  }

  async allocateOutput(jobId: string, extension: string): Promise<string> {
    assertId(jobId);
    const dir = path.join(this.outputsDir, jobId);
    await mkdir(dir, { recursive: true });
    return path.join(dir, `out.${extension}`);
  }

  async allocateLog(jobId: string): Promise<string> {
    assertId(jobId);
    await mkdir(this.logsDir, { recursive: true });
    return path.join(this.logsDir, `${jobId}.log`);
  }

  async allocatePreview(previewId: string): Promise<string> {
    assertId(previewId);
    const dir = path.join(this.previewsDir, previewId);
    await mkdir(dir, { recursive: true });
    return path.join(dir, 'preview.png');
  }
}
