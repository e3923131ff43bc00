import type { StateDescriptor, StateResult } from '../types/state.js';
import type { StateOrder, TestDescriptor, TestResult, TestStatus } from '../types/test.js';
import type { RuleBuildOptions } from '../types/rule.js';
import { createListener } from '../listener/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { generateSeed, seededShuffle } from '../utils/random.js';
import { formatDuration } from '../utils/duration-parser.js';
import { ProtocheckError } from '../dsl/helpers/errors.js';
import { State } from './state.js';
import { TaskScope } from './task-scope.js';

export class TestTimeoutError extends ProtocheckError {
  constructor(testName: string, timeoutMs: number) {
    super(`Test ${testName} exceeded its timeout of ${formatDuration(timeoutMs)}`);
    this.name = 'TestTimeoutError';
  }
}

export interface OrderedStates {
  states: StateDescriptor[];
  /** Použitý seed, jen pro `random` */
  seed?: number;
}

/**
 * Určí pořadí stavů. `random` míchá seedovaným Fisher–Yates, takže stejný
 * seed dá vždy stejné pořadí.
 */
export function orderStates(states: readonly StateDescriptor[], order: StateOrder, seed?: number): OrderedStates {
  if (order === 'sequence') {
    return { states: [...states] };
  }
  const effectiveSeed = seed ?? generateSeed();
  return { states: seededShuffle(states, effectiveSeed), seed: effectiveSeed };
}

export interface TestOptions {
  logger?: Logger | undefined;
  rules?: RuleBuildOptions | undefined;
  detailed?: boolean | undefined;
  actionGraceMs?: number | undefined;
}

/**
 * Konformní test - stavy běží jeden po druhém nad jedním listener cílem.
 *
 * Běh končí prvním stavem, který neprošel, nebo vypršením celkového timeoutu,
 * který zruší právě běžící stav.
 */
export class ConformanceTest {
  readonly descriptor: TestDescriptor;
  readonly logger: Logger;
  private readonly options: TestOptions;

  constructor(descriptor: TestDescriptor, options: TestOptions = {}) {
    this.descriptor = descriptor;
    this.options = options;
    this.logger = options.logger ?? createLogger(`Test.${descriptor.name}`);
  }

  get name(): string {
    return this.descriptor.name;
  }

  async run(signal?: AbortSignal): Promise<TestResult> {
    const { name, timeoutMs, listener } = this.descriptor;
    const startedAt = Date.now();
    const ordered = orderStates(this.descriptor.states, this.descriptor.order, this.descriptor.seed);
    if (ordered.seed !== undefined) {
      this.logger.info(`Shuffling states with seed: ${ordered.seed}`);
    }

    const scope = new TaskScope(`test:${name}`, { parent: signal, logger: this.logger });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      this.logger.error(`Test ${name} timed out after ${formatDuration(timeoutMs)}`);
      scope.cancel(new TestTimeoutError(name, timeoutMs));
    }, timeoutMs);

    const results: StateResult[] = [];
    this.logger.info(`Running test ${name} with ${ordered.states.length} state(s)`);

    try {
      for (const descriptor of ordered.states) {
        if (scope.cancelled) break;

        const state = new State(descriptor, {
          logger: this.logger.child(descriptor.name),
          rules: this.options.rules,
          detailed: this.options.detailed,
          actionGraceMs: this.options.actionGraceMs,
        });
        const result = await state.run({
          signal: scope.signal,
          createListener: (queue) =>
            createListener(listener.kind, listener.destination, queue, {
              logger: this.logger,
              watch: listener.watch,
              pollIntervalMs: listener.pollIntervalMs,
            }),
        });
        results.push(result);

        if (!result.passed) {
          this.logger.warn(`State ${descriptor.name} did not pass (${result.status}), stopping test`);
          break;
        }
      }
    } finally {
      clearTimeout(timer);
      await scope.close(`test ${name} finished`);
    }

    const allPassed = results.length === ordered.states.length && results.every((result) => result.passed);
    const status: TestStatus = timedOut
      ? 'timed_out'
      : signal?.aborted
        ? 'cancelled'
        : allPassed
          ? 'passed'
          : 'failed';
    const durationMs = Date.now() - startedAt;

    this.logger.info(`Test ${name} ${status} in ${formatDuration(durationMs)}`);

    return {
      name,
      passed: status === 'passed',
      status,
      states: results,
      ...(ordered.seed !== undefined && { seed: ordered.seed }),
      durationMs,
    };
  }
}
