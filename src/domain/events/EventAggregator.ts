/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */

interface SourceEntry<E> {
  readonly pull: () => Promise<IteratorResult<E>>;
}

type Settled<E> =
  | { readonly source: SourceEntry<E>; readonly result: IteratorResult<E> }
  | { readonly source: SourceEntry<E>; readonly error: unknown };

/**
 * Fan-in over independently paced async sources.
 *
 * Each source keeps at most one pull in flight. Settled pulls queue up in
 * arrival order and `next` takes from the head of that queue. Sources may be
 * added while a `next` call is waiting. The aggregator is exhausted once every
 * source has ended.
 */
export class EventAggregator<E> implements AsyncIterable<E> {
  #sources = new Set<SourceEntry<E>>();
  #ready: Settled<E>[] = [];
  #wake: (() => void) | undefined;

  get size(): number {
    return this.#sources.size;
  }

  add<S>(source: AsyncIterable<S>, map: (item: S) => E): void {
    const iterator = source[Symbol.asyncIterator]();
    const entry: SourceEntry<E> = {
      pull: async (): Promise<IteratorResult<E>> => {
        const result = await iterator.next();
        if (result.done) return { done: true, value: undefined };
        return { done: false, value: map(result.value) };
      },
    };
    this.#sources.add(entry);
    this.#request(entry);
  }

  /**
   * Resolves the next item from any source. A source that fails has its
   * error rethrown here once and is then dropped.
   */
  async next(): Promise<IteratorResult<E>> {
    for (;;) {
      const settled = this.#ready.shift();
      if (settled === undefined) {
        if (this.#sources.size === 0) {
          return { done: true, value: undefined };
        }
        await new Promise<void>((resolve) => {
          this.#wake = resolve;
        });
        continue;
      }

      const { source } = settled;
      if ("error" in settled) {
        this.#sources.delete(source);
        throw settled.error;
      }
      if (settled.result.done) {
        this.#sources.delete(source);
        continue;
      }

      this.#request(source);
      return settled.result;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<E> {
    return { next: () => this.next() };
  }

  #request(source: SourceEntry<E>): void {
    void source.pull().then(
      (result) => this.#settle({ source, result }),
      (error: unknown) => this.#settle({ source, error }),
    );
  }

  #settle(settled: Settled<E>): void {
    this.#ready.push(settled);
    const wake = this.#wake;
    this.#wake = undefined;
    wake?.();
  }
}
