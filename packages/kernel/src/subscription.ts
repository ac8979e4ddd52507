/**
 * Subscription
 *
 * Consumer side of a server-push stream: an unbounded, ordered, lazily
 * consumed sequence. Producers (the TaskManager) push, end or fail it;
 * consumers iterate it once. Breaking out of `for await` cancels it.
 *
 * @module @lmlink/kernel/subscription
 */

export type SubscriptionStatus = "open" | "ended" | "failed" | "cancelled";

export class Subscription<T = unknown> implements AsyncIterableIterator<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private _status: SubscriptionStatus = "open";
  private failure?: Error;

  constructor(
    readonly id: number,
    private readonly onCancel: (subscription: Subscription<T>) => void,
  ) {}

  get status(): SubscriptionStatus {
    return this._status;
  }

  /** Items received but not yet consumed. */
  get buffered(): number {
    return this.buffer.length;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Producer side
  // ──────────────────────────────────────────────────────────────────────────

  /** @internal */
  push(item: T): void {
    if (this._status !== "open") return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.buffer.push({ value: item });
    }
  }

  /** @internal */
  end(): void {
    if (this._status !== "open") return;
    this._status = "ended";
    this.flushWaiters();
  }

  /** @internal */
  fail(error: Error): void {
    if (this._status !== "open") return;
    this._status = "failed";
    this.failure = error;
    this.flushWaiters();
  }

  /**
   * @internal Cancelled on the engine side (abort signal or cancel by id).
   * Unlike `cancel()`, consumers see `error` instead of a clean end.
   */
  interrupt(error: Error): void {
    if (this._status !== "open") return;
    this._status = "cancelled";
    this.buffer.length = 0;
    this.failure = error;
    this.flushWaiters();
  }

  // Waiters only exist while the buffer is empty, so a failure reaches them
  // directly and is not reported again.
  private flushWaiters(): void {
    const waiters = this.waiters.splice(0);
    if (waiters.length === 0) return;
    const failure = this.failure;
    this.failure = undefined;
    for (const waiter of waiters) {
      if (failure) {
        waiter.reject(failure);
      } else {
        waiter.resolve({ value: undefined, done: true });
      }
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Consumer side
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Stop the stream. Buffered items are discarded. Safe to call repeatedly
   * and after the stream has finished.
   */
  cancel(): void {
    if (this._status !== "open") return;
    this._status = "cancelled";
    this.buffer.length = 0;
    this.flushWaiters();
    this.onCancel(this);
  }

  next(): Promise<IteratorResult<T>> {
    const entry = this.buffer.shift();
    if (entry) {
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.failure) {
      const failure = this.failure;
      // Report the failure once, then behave as a finished iterator.
      this.failure = undefined;
      return Promise.reject(failure);
    }
    if (this._status !== "open") {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async return(): Promise<IteratorResult<T>> {
    this.cancel();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
