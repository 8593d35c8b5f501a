import { generateId } from '../storage/ids.js';
import type { Job, CreateJobData, JobQuery, JobUpdate, JobStats } from '../types/job.js';
import type { JobRepository } from './base.js';

export const DEFAULT_LOG_TAIL_LINES = 50;

function snapshot(job: Job): Job {
  return {
    ...job,
    logTail: [...job.logTail],
    params: { ...job.params },
    output: job.output ? { ...job.output } : null,
  };
}

export class InMemoryJobRepository implements JobRepository {
  private jobs = new Map<string, Job>();
  private readonly logTailLines: number;

  constructor(options: { logTailLines?: number } = {}) {
    this.logTailLines = options.logTailLines ?? DEFAULT_LOG_TAIL_LINES;
  }

  async create(data: CreateJobData): Promise<Job> {
    const now = new Date();
    const job: Job = {
      id: data.id ?? generateId(),
      assetId: data.assetId,
      assetKind: data.assetKind,
      status: 'queued',
      progress: 0,
      logTail: [],
      params: { ...data.params },
      createdAt: now,
      startedAt: null,
      finishedAt: null,
      updatedAt: now,
      output: null,
      failureMessage: null,
      pid: null,
      forcedKill: false,
    };

    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    this.jobs.set(job.id, job);
    return snapshot(job);
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : null;
  }

  async updatePartial(id: string, update: JobUpdate): Promise<Job | null> {
    const job = this.jobs.get(id);
    if (!job) return null;

    const updatedJob: Job = {
      ...job,
      ...update,
      updatedAt: new Date(),
    };

    this.jobs.set(id, updatedJob);
    return snapshot(updatedJob);
  }

  async appendLog(id: string, lines: readonly string[]): Promise<void> {
    const job = this.jobs.get(id);
    if (!job || lines.length === 0) return;

    const logTail = [...job.logTail, ...lines].slice(-this.logTailLines);
    this.jobs.set(id, { ...job, logTail, updatedAt: new Date() });
  }

  async find(query: JobQuery): Promise<{jobs: Job[], nextCursor?: string}> {
    let jobs = Array.from(this.jobs.values());

    // Apply filters
    if (query.assetId) {
      jobs = jobs.filter(job => job.assetId === query.assetId);
    }
    if (query.status) {
      jobs = jobs.filter(job => job.status === query.status);
    }

    // Newest first; ULIDs sort by creation time within the same millisecond too
    jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0));

    // Handle cursor pagination
    if (query.cursor) {
      const cursorIndex = jobs.findIndex(job => job.id === query.cursor);
      if (cursorIndex >= 0) {
        jobs = jobs.slice(cursorIndex + 1);
      }
    }

    // Apply limit
    const limit = query.limit ?? 50;
    const hasMore = jobs.length > limit;
    if (hasMore) {
      jobs = jobs.slice(0, limit);
    }

    return {
      jobs: jobs.map(snapshot),
      nextCursor: hasMore ? jobs[jobs.length - 1]?.id : undefined,
    };
  }

  async getStats(): Promise<JobStats> {
    const allJobs = Array.from(this.jobs.values());
    const count = (status: Job['status']) => allJobs.filter(job => job.status === status).length;

    return {
      queueDepth: count('queued'),
      running: count('running'),
      done: count('done'),
      error: count('error'),
      canceled: count('canceled'),
    };
  }
}
