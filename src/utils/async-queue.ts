/**
 * Neomezená FIFO fronta s asynchronním odběrem.
 *
 * Producenti (listener spojení) volají `push` synchronně, konzument
 * (validator) čeká v `take`, dokud nepřijde položka nebo se nezruší signál.
 */

export class QueueAbortedError extends Error {
  constructor() {
    super('Queue wait aborted');
    this.name = 'QueueAbortedError';
  }
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
}

export class AsyncQueue<T extends NonNullable<unknown>> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Vrátí první položku, případně počká na další.
   *
   * @throws {QueueAbortedError} Když je `signal` zrušen dřív, než položka přijde
   */
  take(signal?: AbortSignal): Promise<T> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (signal?.aborted) {
      return Promise.reject(new QueueAbortedError());
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new QueueAbortedError());
      };

      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject,
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Vybere všechny čekající položky */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }
}
