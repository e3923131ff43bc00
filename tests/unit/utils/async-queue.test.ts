import { describe, it, expect } from 'vitest';
import { AsyncQueue, QueueAbortedError } from '../../../src/utils/async-queue.js';
import { Deferred } from '../../../src/utils/deferred.js';

describe('AsyncQueue', () => {
  it('returns buffered items in order', async () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.push('b');

    expect(queue.size).toBe(2);
    expect(await queue.take()).toBe('a');
    expect(await queue.take()).toBe('b');
  });

  it('hands pushed items to waiting takers', async () => {
    const queue = new AsyncQueue<number>();
    const taken = queue.take();
    queue.push(7);

    expect(await taken).toBe(7);
    expect(queue.size).toBe(0);
  });

  it('rejects a waiting take on abort and forgets the waiter', async () => {
    const queue = new AsyncQueue<number>();
    const controller = new AbortController();
    const taken = queue.take(controller.signal);

    controller.abort();

    await expect(taken).rejects.toBeInstanceOf(QueueAbortedError);
    queue.push(1);
    expect(queue.size).toBe(1);
  });

  it('rejects immediately when already aborted and empty', async () => {
    const queue = new AsyncQueue<number>();

    await expect(queue.take(AbortSignal.abort())).rejects.toBeInstanceOf(QueueAbortedError);
  });

  it('drains buffered items', () => {
    const queue = new AsyncQueue<string>();
    queue.push('x');
    queue.push('y');

    expect(queue.drain()).toEqual(['x', 'y']);
    expect(queue.size).toBe(0);
  });
});

describe('Deferred', () => {
  it('keeps the first resolution', async () => {
    const deferred = new Deferred<string>();

    expect(deferred.resolve('first')).toBe(true);
    expect(deferred.resolve('second')).toBe(false);
    expect(deferred.reject(new Error('late'))).toBe(false);
    expect(deferred.settled).toBe(true);
    expect(await deferred.promise).toBe('first');
  });

  it('rejects once', async () => {
    const deferred = new Deferred<string>();
    deferred.reject(new Error('boom'));

    await expect(deferred.promise).rejects.toThrow('boom');
  });
});
