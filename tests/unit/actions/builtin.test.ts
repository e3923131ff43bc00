import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createDefaultRegistry,
  emitAction,
  logAction,
  waitAction,
  writeTrigger
} from '../../../src/actions/builtin.js';
import { SocketListener } from '../../../src/listener/socket-listener.js';
import { AsyncQueue } from '../../../src/utils/async-queue.js';
import { createLogger, setLogSinks, consoleSink, type LogEntry } from '../../../src/logging/logger.js';
import type { ActionRuntime } from '../../../src/types/action.js';
import type { TriggerEvent } from '../../../src/types/event.js';

function fileRuntime(destination: string, signal: AbortSignal = new AbortController().signal): ActionRuntime {
  return { signal, trigger: { kind: 'file', destination } };
}

describe('createDefaultRegistry', () => {
  it('registers the built-in actions with aliases', () => {
    expect(createDefaultRegistry().names()).toEqual(['emit', 'emit_trigger', 'log', 'sleep', 'wait']);
  });
});

describe('built-in actions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pc-act-'));
  });

  afterEach(async () => {
    setLogSinks([consoleSink]);
    await rm(dir, { recursive: true, force: true });
  });

  describe('emit', () => {
    it('validates its parameters', () => {
      expect(() => emitAction.validate?.({ attribute: 'Two words', value: 'x' }, 'p')).toThrow(
        'p.attribute: must be a non-empty string without whitespace'
      );
      expect(() => emitAction.validate?.({ attribute: 'Status' }, 'p')).toThrow('p.value: must be a string');
      expect(() => emitAction.validate?.({ attribute: 'Status', value: 'OK', delay: -1 }, 'p')).toThrow(/^p\.delay:/);
      expect(() => emitAction.validate?.({ attribute: 'Status', value: 200 }, 'p')).not.toThrow();
    });

    it('appends a trigger line to a file listener', async () => {
      const destination = join(dir, 'triggers.txt');
      await writeFile(destination, '');

      await emitAction.run({ attribute: 'Status', value: 'OK' }, {}, fileRuntime(destination));
      await emitAction.run({ attribute: 'Code', value: 200 }, {}, fileRuntime(destination));

      expect(await readFile(destination, 'utf-8')).toBe('Status OK\nCode 200\n');
    });

    it('writes a trigger line to a socket listener', async () => {
      const queue = new AsyncQueue<TriggerEvent>();
      const listener = new SocketListener(join(dir, 'emit.sock'), queue);
      await listener.start();
      try {
        await emitAction.run(
          { attribute: 'Status', value: 'READY' },
          {},
          { signal: new AbortController().signal, trigger: { kind: 'socket', destination: listener.destination } }
        );

        expect(await queue.take(AbortSignal.timeout(2000))).toEqual({ attribute: 'Status', value: 'READY' });
      } finally {
        await listener.stop();
      }
    });
  });

  describe('writeTrigger', () => {
    it('does nothing once cancelled', async () => {
      const destination = join(dir, 'triggers.txt');
      await writeFile(destination, '');

      await expect(writeTrigger(fileRuntime(destination, AbortSignal.abort()), 'Status OK\n')).rejects.toThrow();
      expect(await readFile(destination, 'utf-8')).toBe('');
    });
  });

  describe('wait', () => {
    it('accepts seconds or a duration string', () => {
      expect(() => waitAction.validate?.({ seconds: 2 }, 'p')).not.toThrow();
      expect(() => waitAction.validate?.({ seconds: '250ms' }, 'p')).not.toThrow();
      expect(() => waitAction.validate?.({}, 'p')).toThrow(/^p\.seconds:/);
      expect(() => waitAction.validate?.({ seconds: 3_000_000 }, 'p')).toThrow(
        'p.seconds: must not exceed 2147483647ms, got 3000000000ms'
      );
    });

    it('completes after the delay', async () => {
      await expect(waitAction.run({ seconds: '10ms' }, {}, fileRuntime(join(dir, 'x')))).resolves.toBeUndefined();
    });

    it('stops when cancelled', async () => {
      const controller = new AbortController();
      const waiting = waitAction.run({ seconds: 30 }, {}, fileRuntime(join(dir, 'x'), controller.signal));
      controller.abort();

      await expect(waiting).rejects.toThrow();
    });
  });

  describe('log', () => {
    it('logs through the injected logger with the host source', async () => {
      const entries: LogEntry[] = [];
      setLogSinks([{ write: (entry) => entries.push(entry) }]);

      await logAction.run(
        { message: 'hello', level: 'warn' },
        { logger: createLogger('Test.t.client'), source: 't-client-1' },
        fileRuntime(join(dir, 'x'))
      );

      expect(entries).toHaveLength(1);
      expect(entries[0]?.level).toBe('warn');
      expect(entries[0]?.name).toBe('Test.t.client');
      expect(entries[0]?.message).toBe('hello');
      expect(entries[0]?.meta).toEqual({ source: 't-client-1' });
    });

    it('rejects an unknown level', () => {
      expect(() => logAction.validate?.({ message: 'x', level: 'loud' }, 'p')).toThrow(
        'p.level: must be one of debug, info, warn, error'
      );
    });
  });
});
