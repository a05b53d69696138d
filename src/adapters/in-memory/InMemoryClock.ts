/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Clock } from "../../domain/ports/Clock.js";
import type { Millis, TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic clock used exclusively in tests.
 *
 * Sleepers are queued against a virtual time that only moves through
 * {@link runFor}. Pending microtasks are flushed before and after every wake-up
 * so tasks reacting to a timer can queue their next sleep before time moves on.
 */
interface Sleeper {
  readonly at: TimePoint;
  readonly resolve: () => void;
}

interface ClockState {
  readonly now: TimePoint;
  readonly queue: readonly Sleeper[];
}

export class InMemoryClock implements Clock {
  #state: ClockState;

  constructor(start: TimePoint = 0) {
    this.#state = { now: start, queue: [] };
  }

  now(): TimePoint {
    return this.#state.now;
  }

  get pendingSleepers(): number {
    return this.#state.queue.length;
  }

  sleep(ms: Millis, signal?: AbortSignal): Promise<void> {
    if (ms < 0) {
      return Promise.reject(new RangeError("Sleep duration must be non-negative"));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<void>((resolve, reject) => {
      const sleeper: Sleeper = {
        at: this.#state.now + ms,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        this.#remove(sleeper);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.#insert(sleeper);
    });
  }

  async runFor(milliseconds: Millis): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run clock backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    await flushPending();

    for (;;) {
      const [next, ...remaining] = this.#state.queue;
      if (!next || next.at > targetTime) break;

      this.#state = { now: next.at, queue: remaining };
      next.resolve();
      await flushPending();
    }

    this.#state = { ...this.#state, now: targetTime };
    await flushPending();
  }

  #insert(sleeper: Sleeper): void {
    const { queue } = this.#state;
    const insertAt = queue.findIndex((existing) => existing.at > sleeper.at);
    this.#state = {
      ...this.#state,
      queue:
        insertAt === -1
          ? [...queue, sleeper]
          : [...queue.slice(0, insertAt), sleeper, ...queue.slice(insertAt)],
    };
  }

  #remove(sleeper: Sleeper): void {
    this.#state = {
      ...this.#state,
      queue: this.#state.queue.filter((existing) => existing !== sleeper),
    };
  }
}

function flushPending(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
