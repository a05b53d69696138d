import type { Clock, Millis, TimePoint } from "../core.js";

/** Wall clock backed by `Date.now` and `setTimeout` */
export class SystemClock implements Clock {
  now(): TimePoint {
    return Date.now();
  }

  sleep(ms: Millis, signal?: AbortSignal): Promise<void> {
    if (ms < 0) {
      return Promise.reject(new RangeError("Sleep duration must be non-negative"));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
