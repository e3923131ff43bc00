/**
 * CLI verze - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

function loadVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Ze src/cli i dist/cli je package.json o 2 úrovně výš
  const packagePath = resolve(here, '../../package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      const { version } = packageJson;
      if (typeof version === 'string') return version;
    }
  } catch (err) {
    process.emitWarning(`Cannot read ${packagePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return '0.0.0';
}

export const version = loadVersion();
