import type { Job, CreateJobData, JobQuery, JobUpdate, JobStats } from '../types/job.js';

export interface JobRepository {
  create(data: CreateJobData): Promise<Job>;
  /** Returns a copy; later mutations never show through a snapshot. */
  get(id: string): Promise<Job | null>;
  updatePartial(id: string, update: JobUpdate): Promise<Job | null>;
  /** Appends to the bounded log tail, evicting the oldest lines. */
  appendLog(id: string, lines: readonly string[]): Promise<void>;
  find(query: JobQuery): Promise<{jobs: Job[], nextCursor?: string}>;
  getStats(): Promise<JobStats>;
}
