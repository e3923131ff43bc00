import { describe, it, expect } from 'vitest';
import { LineSplitter, parseTriggerLine } from '../../../src/listener/framing.js';
import type { Logger } from '../../../src/logging/logger.js';

describe('parseTriggerLine', () => {
  it('splits on the first space and trims', () => {
    expect(parseTriggerLine('  Status   OK then more \r')).toEqual({ attribute: 'Status', value: 'OK then more' });
  });

  it('returns null for blank lines', () => {
    expect(parseTriggerLine('   ')).toBeNull();
  });

  it('drops lines without a value separator', () => {
    const warnings: string[] = [];
    const logger: Logger = {
      name: 'test',
      debug: () => {},
      info: () => {},
      warn: (message: string) => warnings.push(message),
      error: () => {},
      child: () => logger
    };

    expect(parseTriggerLine('Status', logger)).toBeNull();
    expect(warnings).toEqual(['Dropping malformed trigger line: "Status"']);
  });
});

describe('LineSplitter', () => {
  it('buffers partial lines across chunks', () => {
    const splitter = new LineSplitter();

    expect(splitter.push(Buffer.from('Status O'))).toEqual([]);
    expect(splitter.pending).toBe('Status O');
    expect(splitter.push(Buffer.from('K\nCode 2'))).toEqual(['Status OK']);
    expect(splitter.push(Buffer.from('00\n\n'))).toEqual(['Code 200', '']);
  });

  it('keeps multi-byte characters split between chunks', () => {
    const splitter = new LineSplitter();
    const bytes = Buffer.from('Name Žluť\n');

    expect(splitter.push(bytes.subarray(0, 6))).toEqual([]);
    expect(splitter.push(bytes.subarray(6))).toEqual(['Name Žluť']);
  });

  it('end returns the unterminated tail', () => {
    const splitter = new LineSplitter();
    splitter.push('Status OK\nLate 1');

    expect(splitter.end()).toBe('Late 1');
    expect(splitter.pending).toBe('');
  });
});
