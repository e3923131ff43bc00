import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  addLogSink,
  consoleSink,
  createFileSink,
  createLogger,
  getLogLevel,
  setLogLevel,
  setLogSinks,
  setNameFilter,
  type LogEntry,
  type LogSink
} from '../../../src/logging/logger.js';

function captureSink(filtered: boolean): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    filtered,
    entries,
    write(entry) {
      entries.push(entry);
    }
  };
}

describe('logger', () => {
  let captured: ReturnType<typeof captureSink>;

  beforeEach(() => {
    captured = captureSink(true);
    setLogSinks([captured]);
    setLogLevel('info');
    setNameFilter(null);
  });

  afterEach(() => {
    setLogSinks([consoleSink]);
    setLogLevel('info');
    setNameFilter(null);
  });

  it('drops entries below the minimum level', () => {
    const logger = createLogger('Test.a');

    logger.debug('hidden');
    logger.info('shown', { state: 'login' });

    expect(captured.entries).toHaveLength(1);
    expect(captured.entries[0]).toMatchObject({
      level: 'info',
      name: 'Test.a',
      message: 'shown',
      meta: { state: 'login' }
    });
  });

  it('changes the level', () => {
    setLogLevel('error');
    createLogger('x').warn('hidden');

    expect(getLogLevel()).toBe('error');
    expect(captured.entries).toEqual([]);
  });

  it('names children after their parent', () => {
    createLogger('Test.a').child('login').info('hi');

    expect(captured.entries[0]?.name).toBe('Test.a.login');
  });

  it('applies the name filter to filtered sinks only', () => {
    const file = captureSink(false);
    const remove = addLogSink(file);
    setNameFilter(['Test.a']);

    createLogger('Test.a').info('one');
    createLogger('Test.a.login').info('two');
    createLogger('Test.ab').info('three');
    createLogger('protocheck').info('four');

    expect(captured.entries.map((entry) => entry.message)).toEqual(['one', 'two']);
    expect(file.entries.map((entry) => entry.message)).toEqual(['one', 'two', 'three', 'four']);

    remove();
    createLogger('Test.a').info('five');
    expect(file.entries).toHaveLength(4);
  });

  it('treats an empty filter as no filter', () => {
    setNameFilter([]);
    createLogger('anything').info('visible');

    expect(captured.entries).toHaveLength(1);
  });

  it('keeps logging when a sink throws', () => {
    const broken: LogSink = {
      write() {
        throw new Error('disk full');
      }
    };
    const originalError = console.error;
    console.error = () => {};
    try {
      setLogSinks([broken, captured]);
      createLogger('x').info('still here');
    } finally {
      console.error = originalError;
    }

    expect(captured.entries.map((entry) => entry.message)).toEqual(['still here']);
  });

  describe('createFileSink', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'pc-log-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('appends plain lines', async () => {
      const path = join(dir, 'run.log');
      const sink = createFileSink(path);
      setLogSinks([sink]);

      createLogger('Test.a').warn('late', { state: 's' });
      await sink.close();

      const content = await readFile(path, 'utf-8');
      expect(content).toMatch(/^\[[^\]]+\] \[WARN\] \[Test\.a\] late \{"state":"s"\}\n$/);
    });
  });
});
