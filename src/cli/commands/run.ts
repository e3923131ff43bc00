/**
 * Příkaz run pro CLI.
 * Sestaví testy a spustí je souběžně.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import { buildTests, installSignalHandlers, Orchestrator, type RunSummary } from '../../core/orchestrator.js';
import {
  addLogSink,
  createFileSink,
  rootLogger,
  setLogLevel,
  setLogSinks,
  setNameFilter
} from '../../logging/logger.js';
import { InterruptedError, InvalidArgumentsError, TestFailedError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';
import { toBuildOptions, type BuildOverrides } from './shared.js';

/** Options pro příkaz run */
export interface RunCommandOptions extends GlobalOptions, BuildOverrides {
  /** Názvy testů, jejichž log jde na konzoli */
  filter: string[];
  /** Log soubor */
  output: string | undefined;
  debug: boolean;
}

export interface RunCommandContext {
  /** Externí zrušení (testy); bez něj se instalují handlery SIGINT/SIGTERM */
  signal?: AbortSignal | undefined;
}

/**
 * @throws {TestFailedError} Některý test neprošel nebo byl přeskočen
 * @throws {InterruptedError} Běh byl přerušen
 */
export async function runCommand(
  source: string,
  options: RunCommandOptions,
  config: CliConfig,
  context: RunCommandContext = {}
): Promise<RunSummary> {
  setLogLevel(options.debug ? 'debug' : config.log.level);
  setNameFilter(options.filter.length > 0 ? options.filter.map((name) => `Test.${name}`) : null);
  if (options.quiet) {
    setLogSinks([]);
  }

  const logPath = options.output ?? config.log.file;
  const fileSink = logPath ? createFileSink(logPath) : null;
  const removeFileSink = fileSink ? addLogSink(fileSink) : () => {};

  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort(context.signal?.reason);
  context.signal?.addEventListener('abort', onExternalAbort, { once: true });
  const removeSignalHandlers = context.signal
    ? () => {}
    : installSignalHandlers(() => controller.abort(new InterruptedError()));

  try {
    const { tests, skipped } = await buildTests(source, toBuildOptions(config, options));

    if (tests.length === 0) {
      if (skipped.length > 0) {
        throw new ValidationError('No valid tests to run', skipped);
      }
      throw new InvalidArgumentsError(`No test files found in ${source}`);
    }

    rootLogger.info(`Running ${tests.length} test(s)`);
    const summary = await new Orchestrator({ signal: controller.signal }).run(tests);

    printData({ type: 'run', data: { summary, skipped } });

    if (summary.cancelled) {
      throw new InterruptedError();
    }
    if (!summary.passed || skipped.length > 0) {
      const failed = [
        ...summary.results.filter((test) => !test.passed).map((test) => test.name),
        ...summary.failures.map((failure) => failure.name),
        ...skipped.map((test) => test.name)
      ];
      throw new TestFailedError(`${failed.length} test(s) did not pass`, failed);
    }

    return summary;
  } finally {
    removeSignalHandlers();
    context.signal?.removeEventListener('abort', onExternalAbort);
    removeFileSink();
    await fileSink?.close();
  }
}
