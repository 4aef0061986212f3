import { describe, expect, it } from 'vitest';
import { serialize } from './arbiter.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('serialize', () => {
  it('runs tasks under the same key one after another', async () => {
    const key = {};
    const order: string[] = [];

    const slow = serialize(key, async () => {
      await delay(20);
      order.push('slow');
      return 'slow';
    });
    const fast = serialize(key, async () => {
      order.push('fast');
      return 'fast';
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual(['slow', 'fast']);
    expect(order).toEqual(['slow', 'fast']);
  });

  it('does not hold back other keys', async () => {
    const order: string[] = [];

    const slow = serialize({}, async () => {
      await delay(20);
      order.push('slow');
    });
    const fast = serialize({}, async () => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['fast', 'slow']);
  });

  it('continues with the queue after a task rejects', async () => {
    const key = {};

    const failing = serialize(key, async () => {
      throw new Error('boom');
    });
    const next = serialize(key, async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });
});
