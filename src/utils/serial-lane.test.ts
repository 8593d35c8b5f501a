import { describe, it, expect } from 'vitest';
import { SerialLane } from './serial-lane.js';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('SerialLane', () => {
  it('runs tasks one at a time in submission order', async () => {
    const lane = new SerialLane();
    const events: string[] = [];

    const slow = lane.run(async () => {
      events.push('slow:start');
      await sleep(20);
      events.push('slow:end');
      return 'slow';
    });
    const fast = lane.run(() => {
      events.push('fast');
      return 'fast';
    });

    expect(lane.size).toBe(2);
    await expect(Promise.all([slow, fast])).resolves.toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
    expect(lane.size).toBe(0);
  });

  it('keeps going after a task fails', async () => {
    const lane = new SerialLane();

    const failed = lane.run(async () => {
      throw new Error('task failed');
    });
    const next = lane.run(async () => 42);

    await expect(failed).rejects.toThrow('task failed');
    await expect(next).resolves.toBe(42);
  });
});
