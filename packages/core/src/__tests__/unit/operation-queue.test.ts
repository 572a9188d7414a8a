import { describe, it, expect, beforeEach } from 'vitest';
import { OperationQueue } from '../../utils/operation-queue.js';

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

describe('OperationQueue', () => {
  let queue: OperationQueue;

  beforeEach(() => {
    queue = new OperationQueue();
  });

  it('should return the operation result', async () => {
    await expect(queue.run(async () => 42)).resolves.toBe(42);
  });

  it('should run operations one at a time in arrival order', async () => {
    const order: string[] = [];
    const first = deferred<void>();

    const a = queue.run(async () => {
      order.push('a:start');
      await first.promise;
      order.push('a:end');
    });
    const b = queue.run(async () => {
      order.push('b:start');
    });

    await Promise.resolve();
    expect(order).toEqual(['a:start']);
    expect(queue.busy).toBe(true);
    expect(queue.pending).toBe(1);

    first.resolve();
    await Promise.all([a, b]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start']);
    expect(queue.busy).toBe(false);
  });

  it('should keep draining after an operation rejects', async () => {
    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'after');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('after');
  });

  it('should accept new work once idle', async () => {
    await queue.run(async () => undefined);
    await expect(queue.run(async () => 'again')).resolves.toBe('again');
    expect(queue.pending).toBe(0);
  });
});
