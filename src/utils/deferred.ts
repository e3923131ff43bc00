/**
 * Jednorázově nastavitelná promise (single-assignment future).
 *
 * První `resolve`/`reject` vyhrává, další volání jsou ignorována.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private readonly resolveFn: (value: T) => void;
  private readonly rejectFn: (reason: unknown) => void;
  private done = false;

  constructor() {
    let resolveFn: (value: T) => void = () => {};
    let rejectFn: (reason: unknown) => void = () => {};
    this.promise = new Promise<T>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this.resolveFn = resolveFn;
    this.rejectFn = rejectFn;
  }

  get settled(): boolean {
    return this.done;
  }

  /** Vrací `true`, pokud toto volání hodnotu skutečně nastavilo */
  resolve(value: T): boolean {
    if (this.done) return false;
    this.done = true;
    this.resolveFn(value);
    return true;
  }

  reject(reason: unknown): boolean {
    if (this.done) return false;
    this.done = true;
    this.rejectFn(reason);
    return true;
  }
}
