import { describe, expect, it } from 'vitest';
import { Mutex } from '../utils/mutex';

describe('Mutex', () => {
  it('runs sections one at a time in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const slow = mutex.runExclusive(async () => {
      events.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      events.push('slow:end');
    });
    const fast = mutex.runExclusive(() => {
      events.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});
