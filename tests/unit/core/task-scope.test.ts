import { describe, it, expect } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { TaskScope, describeReason } from '../../../src/core/task-scope.js';

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

describe('TaskScope', () => {
  it('collects outcomes without rejecting', async () => {
    const scope = new TaskScope('test');

    const ok = await scope.spawn('ok', async () => 42);
    const failed = await scope.spawn('failed', async () => {
      throw new Error('boom');
    });

    expect(ok).toEqual({ name: 'ok', status: 'fulfilled', value: 42 });
    expect(failed.status).toBe('rejected');
    if (failed.status === 'rejected') {
      expect(describeReason(failed.reason)).toBe('boom');
    }
  });

  it('a failing task does not cancel its siblings', async () => {
    const scope = new TaskScope('test');
    const slow = scope.spawn('slow', async () => {
      await delay(20);
      return 'done';
    });
    await scope.spawn('failing', async () => {
      throw new Error('boom');
    });

    expect(scope.cancelled).toBe(false);
    expect(await slow).toEqual({ name: 'slow', status: 'fulfilled', value: 'done' });
  });

  it('cancel aborts the signal of running tasks', async () => {
    const scope = new TaskScope('test');
    const task = scope.spawn('waiter', async (signal) => {
      await untilAborted(signal);
      return describeReason(signal.reason);
    });

    scope.cancel('stop');
    scope.cancel('again');

    expect(await task).toEqual({ name: 'waiter', status: 'fulfilled', value: 'stop' });
  });

  it('follows the parent signal', async () => {
    const parent = new AbortController();
    const scope = new TaskScope('child', { parent: parent.signal });

    parent.abort('parent gone');

    expect(scope.cancelled).toBe(true);
    expect(scope.signal.reason).toBe('parent gone');
  });

  it('starts cancelled under an aborted parent', () => {
    const scope = new TaskScope('child', { parent: AbortSignal.abort('early') });

    expect(scope.cancelled).toBe(true);
  });

  it('close waits for every task', async () => {
    const scope = new TaskScope('test');
    let finished = false;
    void scope.spawn('cleanup', async (signal) => {
      await untilAborted(signal);
      await delay(10);
      finished = true;
    });

    const result = await scope.close('done');

    expect(finished).toBe(true);
    expect(result.pending).toEqual([]);
    expect(result.outcomes.map((outcome) => outcome.name)).toEqual(['cleanup']);
    expect(scope.size).toBe(0);
  });

  it('close gives up on tasks ignoring cancellation after the grace period', async () => {
    const scope = new TaskScope('test');
    void scope.spawn('stubborn', () => delay(500));

    const startedAt = Date.now();
    const result = await scope.close('done', 30);

    expect(result.pending).toEqual(['stubborn']);
    expect(Date.now() - startedAt).toBeLessThan(400);
  });
});
