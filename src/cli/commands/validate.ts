/**
 * Příkaz validate pro CLI.
 * Sestaví testy bez spuštění a ohlásí chyby konfigurace.
 */

import type { CliConfig, GlobalOptions, ValidationReport } from '../types.js';
import { buildTests } from '../../core/orchestrator.js';
import { InvalidArgumentsError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { toBuildOptions, type BuildOverrides } from './shared.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions, BuildOverrides {}

/**
 * @throws {ValidationError} Některý test má neplatnou konfiguraci
 */
export async function validateCommand(
  source: string,
  options: ValidateOptions,
  config: CliConfig
): Promise<ValidationReport> {
  const { tests, skipped } = await buildTests(source, toBuildOptions(config, options));

  if (tests.length === 0 && skipped.length === 0) {
    throw new InvalidArgumentsError(`No test files found in ${source}`);
  }

  const report: ValidationReport = {
    tests: tests.map((test) => ({
      name: test.name,
      ...(test.descriptor.source !== undefined && { source: test.descriptor.source }),
      states: test.descriptor.states.map((state) => state.name)
    })),
    skipped
  };

  printData({ type: 'validation', data: report });

  if (skipped.length > 0) {
    throw new ValidationError(`${skipped.length} invalid test configuration(s)`);
  }

  return report;
}
