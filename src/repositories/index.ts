import type { JobRepository } from './base.js';
import { InMemoryJobRepository } from './memory.js';

export * from './base.js';
export * from './memory.js';

export function createJobRepository(options: { logTailLines: number }): JobRepository {
  return new InMemoryJobRepository(options);
}
