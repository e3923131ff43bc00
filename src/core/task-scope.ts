/**
 * Structured concurrency scope.
 *
 * Every task spawned in a scope receives the scope's `AbortSignal`. Cancelling
 * the scope (or its parent) aborts them all, and `close()` waits until they
 * have observed it. Task failures are collected as outcomes, so one failing
 * task never rejects the scope or its siblings.
 */

import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

export type TaskOutcome<T> =
  | { name: string; status: 'fulfilled'; value: T }
  | { name: string; status: 'rejected'; reason: unknown };

export interface JoinResult {
  outcomes: TaskOutcome<unknown>[];
  /** Úlohy, které nedoběhly do vypršení grace periody */
  pending: string[];
}

export interface TaskScopeOptions {
  parent?: AbortSignal | undefined;
  logger?: Logger | undefined;
}

export class TaskScope {
  readonly name: string;
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private readonly running = new Map<number, { name: string; promise: Promise<TaskOutcome<unknown>> }>();
  private readonly finished: TaskOutcome<unknown>[] = [];
  private readonly unlinkParent: () => void;
  private nextId = 0;

  constructor(name: string, options: TaskScopeOptions = {}) {
    this.name = name;
    this.logger = options.logger ?? silentLogger;

    const parent = options.parent;
    if (parent) {
      const onParentAbort = (): void => this.cancel(parent.reason);
      if (parent.aborted) {
        this.cancel(parent.reason);
      } else {
        parent.addEventListener('abort', onParentAbort, { once: true });
      }
      this.unlinkParent = () => parent.removeEventListener('abort', onParentAbort);
    } else {
      this.unlinkParent = () => {};
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Počet právě běžících úloh */
  get size(): number {
    return this.running.size;
  }

  /**
   * Spustí úlohu ve scope. Vrácená promise nikdy nerejectuje - chyba je
   * součástí výsledku.
   */
  spawn<T>(name: string, fn: (signal: AbortSignal) => Promise<T>): Promise<TaskOutcome<T>> {
    const id = this.nextId++;
    const signal = this.controller.signal;

    const promise = Promise.resolve()
      .then(() => fn(signal))
      .then(
        (value): TaskOutcome<T> => ({ name, status: 'fulfilled', value }),
        (reason: unknown): TaskOutcome<T> => {
          if (!signal.aborted) {
            this.logger.debug(`Task "${name}" in scope "${this.name}" failed: ${describeReason(reason)}`);
          }
          return { name, status: 'rejected', reason };
        },
      )
      .then((outcome) => {
        this.running.delete(id);
        this.finished.push(outcome);
        return outcome;
      });

    this.running.set(id, { name, promise });
    return promise;
  }

  /** Zruší všechny úlohy scope (idempotentní) */
  cancel(reason?: unknown): void {
    if (!this.controller.signal.aborted) {
      this.logger.debug(`Cancelling scope "${this.name}" with ${this.running.size} running task(s)`);
      this.controller.abort(reason);
    }
  }

  /**
   * Počká na doběhnutí všech úloh, včetně těch spuštěných během čekání.
   * S `graceMs` čeká nejdéle tuto dobu a zbylé úlohy vrátí v `pending`.
   */
  async join(graceMs?: number): Promise<JoinResult> {
    const deadline = graceMs !== undefined ? Date.now() + graceMs : undefined;

    while (this.running.size > 0) {
      const waiting = Promise.all([...this.running.values()].map((task) => task.promise));

      if (deadline === undefined) {
        await waiting;
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;

      let timer: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        waiting.then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), remaining);
        }),
      ]);
      clearTimeout(timer);
      if (timedOut) break;
    }

    const pending = [...this.running.values()].map((task) => task.name);
    if (pending.length > 0) {
      this.logger.warn(`Scope "${this.name}" closed with unfinished task(s): ${pending.join(', ')}`);
    }

    return { outcomes: [...this.finished], pending };
  }

  /** Zruší scope, počká na úlohy a odpojí se od rodiče */
  async close(reason?: unknown, graceMs?: number): Promise<JoinResult> {
    this.cancel(reason);
    try {
      return await this.join(graceMs);
    } finally {
      this.unlinkParent();
    }
  }
}

export function describeReason(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
