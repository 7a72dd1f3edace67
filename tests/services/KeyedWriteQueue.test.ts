import { describe, it, expect } from 'vitest';
import { KeyedWriteQueue } from '../../src/services/KeyedWriteQueue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedWriteQueue', () => {
  it('should run tasks under one key one at a time, in order', async () => {
    const queue = new KeyedWriteQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('policy', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = queue.run('policy', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should run tasks under different keys concurrently', async () => {
    const queue = new KeyedWriteQueue();
    const gate = deferred();
    const order: string[] = [];

    const blocked = queue.run('policy', async () => {
      await gate.promise;
      order.push('policy');
    });
    await queue.run('semantic', async () => {
      order.push('semantic');
    });

    expect(order).toEqual(['semantic']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['semantic', 'policy']);
  });

  it('should not let a failed task block the next one', async () => {
    const queue = new KeyedWriteQueue();

    const failed = queue.run('policy', async () => {
      throw new Error('insert failed');
    });
    const next = queue.run('policy', async () => 'ok');

    await expect(failed).rejects.toThrow('insert failed');
    await expect(next).resolves.toBe('ok');
  });

  it('should forget keys once their work drains', async () => {
    const queue = new KeyedWriteQueue();

    await queue.run('policy', async () => undefined);
    await new Promise((r) => setTimeout(r, 0));

    expect(queue.activeKeys).toBe(0);
  });
});
