import type { TriggerEvent } from '../types/event.js';
import type { RuleBuildOptions } from '../types/rule.js';
import type { StateDescriptor, StateResult, StateStatus } from '../types/state.js';
import type { Listener } from '../listener/listener.js';
import { buildRuleMap } from '../evaluation/rule-compiler.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { Deferred } from '../utils/deferred.js';
import { formatDuration } from '../utils/duration-parser.js';
import { Validator } from './validator.js';
import { TaskScope, describeReason } from './task-scope.js';

export const DEFAULT_ACTION_GRACE_MS = 1_000;

export type ListenerFactory = (queue: AsyncQueue<TriggerEvent>) => Listener;

export interface StateOptions {
  logger?: Logger | undefined;
  rules?: RuleBuildOptions | undefined;
  /** Report s výpisem jednotlivých pravidel */
  detailed?: boolean | undefined;
  /** Jak dlouho po skončení stavu čekat na akce, které ignorují zrušení */
  actionGraceMs?: number | undefined;
}

export interface StateRunContext {
  createListener: ListenerFactory;
  /** Zrušení zvenku (timeout testu, SIGINT) */
  signal?: AbortSignal | undefined;
}

/**
 * Jedna fáze testu.
 *
 * `run()` spustí listener, validační smyčku a všechny akce souběžně a skončí
 * prvním z: splnění všech required pravidel, timeout, zrušení zvenku.
 * Listener, validator i fronta jsou pro každý běh nové.
 */
export class State {
  readonly descriptor: StateDescriptor;
  private readonly logger: Logger;
  private readonly options: StateOptions;
  private currentStatus: StateStatus = 'pending';

  constructor(descriptor: StateDescriptor, options: StateOptions = {}) {
    this.descriptor = descriptor;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.descriptor.name;
  }

  get status(): StateStatus {
    return this.currentStatus;
  }

  async run(context: StateRunContext): Promise<StateResult> {
    if (this.currentStatus !== 'pending') {
      throw new Error(`State "${this.name}" has already been run`);
    }

    const { name, description, timeoutMs } = this.descriptor;
    const startedAt = Date.now();
    this.currentStatus = 'running';
    this.logger.info(`Starting state ${name}${description ? `: ${description}` : ''}`);

    const ruleMap = buildRuleMap(this.descriptor.triggers, {
      ...this.options.rules,
      logger: this.logger,
      path: `states.${name}.verify.triggers`,
    });
    const validator = new Validator(ruleMap, { logger: this.logger });
    const queue = new AsyncQueue<TriggerEvent>();
    const listener = context.createListener(queue);
    const outcome = new Deferred<StateStatus>();
    const scope = new TaskScope(`state:${name}`, { parent: context.signal, logger: this.logger });
    let failure: unknown;

    const onCancel = (): void => {
      outcome.resolve('cancelled');
    };
    context.signal?.addEventListener('abort', onCancel, { once: true });
    let timer: NodeJS.Timeout | undefined;

    try {
      if (context.signal?.aborted) {
        outcome.resolve('cancelled');
      } else {
        try {
          await listener.start();
        } catch (error) {
          failure = error;
          this.logger.error(describeReason(error));
          outcome.resolve('error');
        }
      }

      if (!outcome.settled) {
        timer = setTimeout(() => {
          if (outcome.resolve('timed_out')) {
            this.logger.warn(`State ${name} timed out after ${formatDuration(timeoutMs)}`);
          }
        }, timeoutMs);

        this.startValidation(validator, queue, scope, outcome, (error) => {
          failure = error;
        });
        this.startActions(listener, scope);
      }

      this.currentStatus = await outcome.promise;
    } finally {
      clearTimeout(timer);
      context.signal?.removeEventListener('abort', onCancel);
      await scope.close(`state ${name} finished`, this.options.actionGraceMs ?? DEFAULT_ACTION_GRACE_MS);
      await listener.stop().catch((error: unknown) => {
        this.logger.warn(`Listener cleanup failed: ${describeReason(error)}`);
      });
    }

    const summary = validator.getResults();
    const status = this.currentStatus;
    const passed = summary.failures === 0 && status !== 'error' && status !== 'cancelled';
    const report = validator.getResultsStr(this.options.detailed ?? false);

    this.logger.info(`State ${name} finished: ${status}\n${report}`);

    return {
      name,
      description,
      status,
      passed,
      summary,
      report,
      durationMs: Date.now() - startedAt,
      ...(failure !== undefined && { error: describeReason(failure) }),
    };
  }

  private startValidation(
    validator: Validator,
    queue: AsyncQueue<TriggerEvent>,
    scope: TaskScope,
    outcome: Deferred<StateStatus>,
    onFailure: (error: unknown) => void,
  ): void {
    // Bez required pravidel stav běží do timeoutu
    const autoComplete = validator.requiredCount > 0;

    void scope
      .spawn('validator', (signal) =>
        validator.startValidating(queue, signal, () => {
          if (autoComplete && validator.isSatisfied() && outcome.resolve('completed')) {
            this.logger.info(`All required triggers matched in state ${this.name}`);
          }
        }),
      )
      .then((result) => {
        if (result.status === 'rejected' && !outcome.settled) {
          this.logger.error(`Validation loop failed: ${describeReason(result.reason)}`);
          onFailure(result.reason);
          outcome.resolve('error');
        }
      });
  }

  private startActions(listener: Listener, scope: TaskScope): void {
    const trigger = { kind: listener.kind, destination: listener.destination };

    for (const action of this.descriptor.actions) {
      const label = `${action.host}:${action.name}`;
      void scope
        .spawn(`action:${label}`, (signal) => action.execute({ signal, trigger }))
        .then((result) => {
          if (result.status === 'rejected' && !scope.cancelled) {
            this.logger.error(`Action ${label} failed: ${describeReason(result.reason)}`);
          }
        });
    }
  }
}
