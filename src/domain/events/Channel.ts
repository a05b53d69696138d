/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */

interface Waiter<T> {
  readonly resolve: (result: IteratorResult<T>) => void;
  readonly reject: (error: unknown) => void;
}

type Failure = { readonly error: unknown };

/**
 * Unbounded single-consumer queue a background task pushes into and the
 * control loop pulls from.
 *
 * Buffered values are drained before the channel reports its end. A failure
 * is raised to the consumer exactly once, after which the channel is done.
 */
export class Channel<T> implements AsyncIterable<T> {
  #buffer: Array<{ readonly value: T }> = [];
  #waiters: Waiter<T>[] = [];
  #failure: Failure | undefined;
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  get size(): number {
    return this.#buffer.length;
  }

  send(value: T): boolean {
    if (this.#closed) return false;

    const waiter = this.#waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value });
    } else {
      this.#buffer.push({ value });
    }
    return true;
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#settleWaiters();
  }

  fail(error: unknown): void {
    if (this.#closed) return;
    this.#closed = true;
    this.#failure = { error };
    this.#settleWaiters();
  }

  next(): Promise<IteratorResult<T>> {
    const buffered = this.#buffer.shift();
    if (buffered) {
      return Promise.resolve({ done: false, value: buffered.value });
    }

    const failure = this.#takeFailure();
    if (failure) return Promise.reject(failure.error);
    if (this.#closed) return Promise.resolve({ done: true, value: undefined });

    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<T>> => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  #settleWaiters(): void {
    // waiters only exist while the buffer is empty
    const waiters = this.#waiters;
    this.#waiters = [];
    for (const waiter of waiters) {
      const failure = this.#takeFailure();
      if (failure) {
        waiter.reject(failure.error);
      } else {
        waiter.resolve({ done: true, value: undefined });
      }
    }
  }

  #takeFailure(): Failure | undefined {
    const failure = this.#failure;
    this.#failure = undefined;
    return failure;
  }
}
