/**
 * Process-wide handle around an async initializer. Concurrent callers share
 * one in-flight initialization and a success is kept for the life of the
 * process. A failure is not kept: the next `get()` runs the initializer again.
 */
export class LazyGateway<T> {
  private value: T | undefined;
  private pending: Promise<T> | undefined;

  constructor(private readonly init: () => Promise<T>) {}

  get(): Promise<T> {
    if (this.value !== undefined) return Promise.resolve(this.value);
    if (!this.pending) {
      this.pending = this.init().then(
        (value) => {
          this.value = value;
          this.pending = undefined;
          return value;
        },
        (err: unknown) => {
          this.pending = undefined;
          throw err;
        },
      );
    }
    return this.pending;
  }

  /** Whether an initialization has succeeded. */
  isReady(): boolean {
    return this.value !== undefined;
  }
}
