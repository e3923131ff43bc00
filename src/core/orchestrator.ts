import type { Stats } from 'node:fs';
import { mkdir, readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { ListenerKind } from '../types/event.js';
import type { RuleBuildOptions } from '../types/rule.js';
import type { StateDescriptor } from '../types/state.js';
import type { SkippedTest, TestDescriptor, TestResult } from '../types/test.js';
import { bindActions, type ActionRegistry } from '../actions/registry.js';
import { createDefaultRegistry } from '../actions/builtin.js';
import { buildRuleMap } from '../evaluation/rule-compiler.js';
import { ConfigurationError } from '../dsl/helpers/errors.js';
import { loadTestFromFile, YamlLoadError } from '../dsl/yaml/loader.js';
import { validateTest, type TestConfig } from '../dsl/yaml/schema.js';
import { LISTENER_EXTENSIONS } from '../listener/index.js';
import { DEFAULT_POLL_INTERVAL_MS, type WatchMode } from '../listener/watch-strategy.js';
import type { Logger } from '../logging/logger.js';
import { createLogger, rootLogger } from '../logging/logger.js';
import { formatDuration } from '../utils/duration-parser.js';
import { ConformanceTest } from './test.js';
import { TaskScope, describeReason } from './task-scope.js';

export const DEFAULT_LISTENER_DIR = '/var/run/protocheck';
export const IN_MEMORY_TEST_NAME = 'custom_test';

const TEST_FILE_EXTENSIONS: ReadonlySet<string> = new Set(['.yml', '.yaml']);

export interface BuildOptions {
  listenerDir?: string | undefined;
  listenerKind?: ListenerKind | undefined;
  watch?: WatchMode | undefined;
  pollIntervalMs?: number | undefined;
  /** Připojí se k názvu testu (`<stem>-<suffix>`) */
  suffix?: string | undefined;
  /** Přebije `seed` z konfigurace */
  seed?: number | undefined;
  registry?: ActionRegistry | undefined;
  hostTemplate?: string | undefined;
  rules?: RuleBuildOptions | undefined;
  detailed?: boolean | undefined;
  actionGraceMs?: number | undefined;
  logger?: Logger | undefined;
}

export interface BuildResult {
  tests: ConformanceTest[];
  skipped: SkippedTest[];
}

interface TestSource {
  name: string;
  file?: string;
  load(): Promise<TestConfig>;
}

/**
 * Sestaví testy ze souboru, adresáře `*.yml`/`*.yaml` nebo objektu.
 *
 * Chyba konfigurace jednoho testu ho přeskočí (vrátí v `skipped`), ostatní
 * testy se sestaví normálně.
 *
 * @throws {YamlLoadError} Zdroj neexistuje
 */
export async function buildTests(
  source: string | Record<string, unknown>,
  options: BuildOptions = {},
): Promise<BuildResult> {
  const logger = options.logger ?? rootLogger;
  const registry = options.registry ?? createDefaultRegistry();
  const suffix = options.suffix ? `-${options.suffix}` : '';
  const usedNames = new Set<string>();

  const uniqueName = (base: string): string => {
    let name = base;
    for (let i = 2; usedNames.has(name); i++) {
      name = `${base}-${i}`;
    }
    usedNames.add(name);
    return name;
  };

  const sources: TestSource[] =
    typeof source === 'string'
      ? (await findTestFiles(source)).map((file) => ({
          name: uniqueName(`${basename(file, extname(file))}${suffix}`),
          file,
          load: () => loadTestFromFile(file),
        }))
      : [
          {
            name: uniqueName(`${IN_MEMORY_TEST_NAME}${suffix}`),
            load: async () => validateTest(source),
          },
        ];

  const tests: ConformanceTest[] = [];
  const skipped: SkippedTest[] = [];

  for (const entry of sources) {
    const testLogger = createLogger(`Test.${entry.name}`);
    try {
      const config = await entry.load();
      const descriptor = describeTest(entry, config, registry, testLogger, options);
      tests.push(
        new ConformanceTest(descriptor, {
          logger: testLogger,
          rules: options.rules,
          detailed: options.detailed,
          actionGraceMs: options.actionGraceMs,
        }),
      );
      logger.debug(`Built test ${entry.name} with ${descriptor.states.length} state(s)`);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      logger.error(`Invalid configuration in ${entry.file ?? entry.name}: ${error.message}`);
      skipped.push({
        name: entry.name,
        ...(entry.file !== undefined && { source: entry.file }),
        error: error.message,
      });
    }
  }

  return { tests, skipped };
}

function describeTest(
  entry: TestSource,
  config: TestConfig,
  registry: ActionRegistry,
  logger: Logger,
  options: BuildOptions,
): TestDescriptor {
  const kind = options.listenerKind ?? 'socket';

  const states: StateDescriptor[] = config.states.map((state) => {
    const path = `states.${state.name}`;
    // Pravidla se zkompilují už tady, aby chyba přeskočila test před během
    buildRuleMap(state.triggers, { ...options.rules, path: `${path}.verify.triggers` });

    return {
      name: state.name,
      description: state.description,
      actions: bindActions(state.hosts, registry, entry.name, {
        hostTemplate: options.hostTemplate,
        logger,
        path: `${path}.host`,
      }),
      triggers: state.triggers,
      timeoutMs: state.timeoutMs,
    };
  });

  const seed = options.seed ?? config.seed;

  return {
    name: entry.name,
    ...(entry.file !== undefined && { source: entry.file }),
    states,
    timeoutMs: config.timeoutMs,
    order: config.order,
    ...(seed !== undefined && { seed }),
    listener: {
      kind,
      destination: join(options.listenerDir ?? DEFAULT_LISTENER_DIR, `${entry.name}${LISTENER_EXTENSIONS[kind]}`),
      watch: options.watch ?? 'auto',
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    },
  };
}

/** Soubor → [soubor], adresář → seřazené `*.yml`/`*.yaml` soubory */
export async function findTestFiles(source: string): Promise<string[]> {
  let info: Stats;
  try {
    info = await stat(source);
  } catch (error) {
    throw new YamlLoadError(`Test source not found: ${describeReason(error)}`, source);
  }

  if (!info.isDirectory()) {
    return [source];
  }

  const entries = await readdir(source, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && TEST_FILE_EXTENSIONS.has(extname(entry.name).toLowerCase()))
    .map((entry) => join(source, entry.name))
    .sort();
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export interface TestFailure {
  name: string;
  error: string;
}

export interface RunSummary {
  results: TestResult[];
  /** Testy, jejichž běh skončil výjimkou */
  failures: TestFailure[];
  passed: boolean;
  cancelled: boolean;
  durationMs: number;
}

export interface OrchestratorOptions {
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
}

/**
 * Spouští testy souběžně ve společném {@link TaskScope}.
 *
 * Selhání jednoho testu neruší ostatní; po doběhnutí (nebo zrušení) se scope
 * vždy uzavře.
 */
export class Orchestrator {
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;

  constructor(options: OrchestratorOptions = {}) {
    this.logger = options.logger ?? rootLogger;
    this.signal = options.signal;
  }

  async run(tests: readonly ConformanceTest[]): Promise<RunSummary> {
    const startedAt = Date.now();
    await prepareListenerDirs(tests);

    const scope = new TaskScope('orchestrator', { parent: this.signal, logger: this.logger });
    const results: TestResult[] = [];
    const failures: TestFailure[] = [];

    try {
      const outcomes = await Promise.all(tests.map((test) => scope.spawn(test.name, (signal) => test.run(signal))));

      for (const outcome of outcomes) {
        if (outcome.status === 'fulfilled') {
          results.push(outcome.value);
        } else {
          const error = describeReason(outcome.reason);
          this.logger.error(`An error occurred while running test ${outcome.name}: ${error}`);
          failures.push({ name: outcome.name, error });
        }
      }
    } finally {
      this.logger.debug('Shutting down test scope');
      await scope.close('orchestrator finished');
    }

    const durationMs = Date.now() - startedAt;
    const cancelled = this.signal?.aborted ?? false;
    const passed = !cancelled && failures.length === 0 && results.every((result) => result.passed);

    this.logger.info(`All tests completed in ${formatDuration(durationMs)}`);
    return { results, failures, passed, cancelled, durationMs };
  }
}

async function prepareListenerDirs(tests: readonly ConformanceTest[]): Promise<void> {
  const dirs = new Set(tests.map((test) => dirname(test.descriptor.listener.destination)));
  for (const dir of dirs) {
    await mkdir(dir, { recursive: true });
  }
}

/**
 * Zaregistruje handlery SIGINT/SIGTERM. Vrací funkci, která je odebere.
 */
export function installSignalHandlers(
  onSignal: (signal: NodeJS.Signals) => void,
  signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    rootLogger.info(`Received ${signal}, shutting down the tests...`);
    onSignal(signal);
  };
  for (const signal of signals) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, handler);
    }
  };
}
