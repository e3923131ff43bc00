import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CLI_CONFIG, type CliConfig, type GlobalOptions } from '../../../../src/cli/types.js';

export const PASSING = `
states:
  ready:
    host:
      server:
        actions:
          - emit: { attribute: Status, value: OK }
    verify:
      timeout: 5
      triggers:
        - Status:
            pattern: ^OK
`;

export const SILENT = `
states:
  waiting:
    verify:
      timeout: 100ms
      triggers:
        - Status:
            pattern: never
`;

export const INVALID = `
states:
  broken:
    verify:
      triggers:
        - Status:
            bogus: 1
`;

export const TEST_CONFIG: CliConfig = {
  ...DEFAULT_CLI_CONFIG,
  listener: { ...DEFAULT_CLI_CONFIG.listener, watch: 'polling', pollIntervalMs: 25 },
  actionGraceMs: 100
};

export function globalOptions(overrides: Partial<GlobalOptions> = {}): GlobalOptions {
  return { format: 'json', quiet: true, noColor: true, config: undefined, ...overrides };
}

export async function createWorkspace(files: Record<string, string>): Promise<{ root: string; tests: string }> {
  const root = await mkdtemp(join(tmpdir(), 'pc-cli-'));
  const tests = join(root, 'tests');
  await mkdir(tests);
  for (const [file, content] of Object.entries(files)) {
    await writeFile(join(tests, file), content);
  }
  return { root, tests };
}
