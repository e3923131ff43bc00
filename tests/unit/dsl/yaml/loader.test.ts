import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadTestFromYAML, loadTestFromFile, YamlLoadError } from '../../../../src/dsl/yaml/loader.js';
import { YamlValidationError } from '../../../../src/dsl/yaml/schema.js';

// ---------------------------------------------------------------------------
// loadTestFromYAML
// ---------------------------------------------------------------------------

describe('loadTestFromYAML', () => {
  it('loads a test with defaults', () => {
    const config = loadTestFromYAML(`
      states:
        ready:
          verify:
            triggers:
              - Status:
                  pattern: ^OK
    `);

    expect(config.timeoutMs).toBe(40_000);
    expect(config.order).toBe('sequence');
    expect(config.seed).toBeUndefined();
    expect(config.states).toEqual([
      {
        name: 'ready',
        description: '',
        hosts: [],
        timeoutMs: 15_000,
        triggers: [{ Status: { pattern: '^OK' } }]
      }
    ]);
  });

  it('reads hosts, timeouts, order and seed', () => {
    const config = loadTestFromYAML(`
      timeout: 2m
      state_order: shuffle
      seed: 42
      states:
        login:
          description: Client logs in
          host:
            client:
              actions:
                - emit: { attribute: Status, value: OK }
                - wait:
                    seconds: 0.5
            idle:
          verify:
            timeout: 500ms
    `);

    expect(config.timeoutMs).toBe(120_000);
    expect(config.order).toBe('random');
    expect(config.seed).toBe(42);

    const [state] = config.states;
    expect(state?.description).toBe('Client logs in');
    expect(state?.timeoutMs).toBe(500);
    expect(state?.triggers).toBeUndefined();
    expect(state?.hosts).toEqual([
      {
        name: 'client',
        actions: [
          { name: 'emit', params: { attribute: 'Status', value: 'OK' } },
          { name: 'wait', params: { seconds: 0.5 } }
        ]
      },
      { name: 'idle', actions: [] }
    ]);
  });

  it('keeps states in file order', () => {
    const config = loadTestFromYAML(`
      states:
        zeta: {}
        alpha: {}
        mid: {}
    `);

    expect(config.states.map((state) => state.name)).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('accepts seed 0', () => {
    expect(loadTestFromYAML('seed: 0\nstates:\n  a: {}\n').seed).toBe(0);
  });

  it('throws YamlLoadError on invalid syntax', () => {
    expect(() => loadTestFromYAML('states: [unclosed')).toThrow(YamlLoadError);
  });

  it('rejects duplicate state names', () => {
    expect(() => loadTestFromYAML('states:\n  a: {}\n  a: {}\n')).toThrow(YamlLoadError);
  });

  it('rejects several documents in one file', () => {
    expect(() => loadTestFromYAML('states:\n  a: {}\n---\nstates:\n  b: {}\n')).toThrow(YamlLoadError);
  });

  it('throws YamlLoadError on empty content', () => {
    expect(() => loadTestFromYAML('')).toThrow('YAML content is empty');
  });

  describe('validation errors', () => {
    it('requires states', () => {
      expect(() => loadTestFromYAML('timeout: 10')).toThrow('test.states: must be an object, got undefined');
    });

    it('requires at least one state', () => {
      expect(() => loadTestFromYAML('states: {}')).toThrow('test.states: must define at least one state');
    });

    it('rejects an unknown state order', () => {
      expect(() => loadTestFromYAML('state_order: chaos\nstates:\n  a: {}\n')).toThrow(YamlValidationError);
    });

    it('rejects an invalid seed', () => {
      expect(() => loadTestFromYAML('seed: -1\nstates:\n  a: {}\n')).toThrow(
        'test.seed: must be an integer between 0 and 4294967295'
      );
    });

    it('rejects an invalid timeout', () => {
      expect(() => loadTestFromYAML('states:\n  a:\n    verify:\n      timeout: soon\n')).toThrow(
        /^test\.states\.a\.verify\.timeout: must be a positive number of seconds/
      );
    });

    it('rejects timeouts longer than a timer can wait', () => {
      expect(() => loadTestFromYAML('states:\n  a:\n    verify:\n      timeout: 2200000\n')).toThrow(
        'test.states.a.verify.timeout: must not exceed 2147483647ms, got 2200000000ms'
      );
      expect(() => loadTestFromYAML('timeout: 2200000\nstates:\n  a: {}\n')).toThrow(YamlValidationError);
      expect(loadTestFromYAML('timeout: 86400\nstates:\n  a: {}\n').timeoutMs).toBe(86_400_000);
    });

    it('rejects actions that are not single-key mappings', () => {
      expect(() =>
        loadTestFromYAML('states:\n  a:\n    host:\n      c:\n        actions:\n          - { emit: {}, wait: {} }\n')
      ).toThrow('test.states.a.host.c.actions[0]: must be a mapping with exactly one key, got 2');
    });
  });
});

// ---------------------------------------------------------------------------
// loadTestFromFile
// ---------------------------------------------------------------------------

describe('loadTestFromFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pc-yaml-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a file', async () => {
    const file = join(dir, 'ready.yml');
    await writeFile(file, 'states:\n  ready: {}\n');

    const config = await loadTestFromFile(file);

    expect(config.states.map((state) => state.name)).toEqual(['ready']);
  });

  it('reports a missing file with its path', async () => {
    const file = join(dir, 'missing.yml');

    await expect(loadTestFromFile(file)).rejects.toMatchObject({ name: 'YamlLoadError', filePath: file });
  });

  it('prefixes validation errors with the file path', async () => {
    const file = join(dir, 'broken.yml');
    await writeFile(file, 'states: {}\n');

    await expect(loadTestFromFile(file)).rejects.toThrow(`${file}: test.states: must define at least one state`);
  });
});
