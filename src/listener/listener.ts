import type { ListenerKind, TriggerEvent } from '../types/event.js';
import type { AsyncQueue } from '../utils/async-queue.js';
import { Deferred } from '../utils/deferred.js';
import { ProtocheckError } from '../dsl/helpers/errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { parseTriggerLine } from './framing.js';

export class ListenerStartError extends ProtocheckError {
  readonly destination: string;

  constructor(destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Listener failed to start at ${destination}: ${reason}`, { cause });
    this.name = 'ListenerStartError';
    this.destination = destination;
  }
}

export interface ListenerOptions {
  logger?: Logger | undefined;
}

/**
 * Příjemce trigger událostí.
 *
 * Podtřídy implementují `open()`/`close()`; základ hlídá jednorázový start,
 * ready signál a idempotentní stop.
 */
export abstract class Listener {
  abstract readonly kind: ListenerKind;
  readonly destination: string;
  protected readonly queue: AsyncQueue<TriggerEvent>;
  protected readonly logger: Logger;

  private readonly readySignal = new Deferred<void>();
  private started = false;
  private stopping: Promise<void> | null = null;

  constructor(destination: string, queue: AsyncQueue<TriggerEvent>, options: ListenerOptions = {}) {
    this.destination = destination;
    this.queue = queue;
    this.logger = options.logger ?? silentLogger;
  }

  /** Resolves once the listener accepts events; never resolves after a failed start. */
  get ready(): Promise<void> {
    return this.readySignal.promise;
  }

  get isReady(): boolean {
    return this.readySignal.settled;
  }

  /**
   * @throws {ListenerStartError} Když se nepodaří připravit cíl
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new ListenerStartError(this.destination, new Error('listener already started'));
    }
    this.started = true;

    try {
      await this.open();
    } catch (error) {
      await this.close().catch((closeError: unknown) => {
        this.logger.debug(`Cleanup after failed start raised: ${String(closeError)}`);
      });
      throw error instanceof ListenerStartError ? error : new ListenerStartError(this.destination, error);
    }

    this.readySignal.resolve();
    this.logger.info(`Listening on ${this.destination}`);
  }

  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.started ? this.close() : Promise.resolve();
    }
    return this.stopping;
  }

  /** Předá řádek do fronty, pokud je platný */
  protected enqueueLine(line: string): void {
    const event = parseTriggerLine(line, this.logger);
    if (event !== null) {
      this.logger.debug(`Received trigger ${event.attribute}`, { value: event.value });
      this.queue.push(event);
    }
  }

  protected abstract open(): Promise<void>;

  protected abstract close(): Promise<void>;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
