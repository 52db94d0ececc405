import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../queue.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];

    const slow = queue.run(async () => {
      log.push('slow:start');
      await delay(20);
      log.push('slow:end');
      return 'slow';
    });
    const fast = queue.run(async () => {
      log.push('fast');
      return 'fast';
    });

    expect(await Promise.all([slow, fast])).toEqual(['slow', 'fast']);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a task rejects', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 42);

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe(42);
  });
});
