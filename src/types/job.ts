import type { AssetKind } from './asset.js';

export type JobStatus = 'queued' | 'running' | 'done' | 'error' | 'canceled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['done', 'error', 'canceled'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export interface JobParams {
  keyColor: string;
  similarity: number;
  blend: number;
  crf: number | null; // video only
  includeAudio: boolean;
}

export interface JobOutput {
  path: string;
  filename: string;
  mediaType: string;
  sizeBytes: number;
}

export interface Job {
  id: string; // ULID
  assetId: string;
  assetKind: AssetKind;
  status: JobStatus;
  progress: number; // 0..1
  logTail: string[];
  params: JobParams;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  updatedAt: Date;
  output: JobOutput | null;
  failureMessage: string | null;
  pid: number | null;
  forcedKill: boolean;
}

export interface CreateJobData {
  id?: string;
  assetId: string;
  assetKind: AssetKind;
  params: JobParams;
}

export interface JobQuery {
  assetId?: string;
  status?: JobStatus;
  cursor?: string;
  limit?: number;
}

export interface JobUpdate {
  status?: JobStatus;
  progress?: number;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  output?: JobOutput | null;
  failureMessage?: string | null;
  pid?: number | null;
  forcedKill?: boolean;
}

export interface JobStats {
  queueDepth: number;
  running: number;
  done: number;
  error: number;
  canceled: number;
}
