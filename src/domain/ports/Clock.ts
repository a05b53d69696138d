import type { Millis, TimePoint } from "../typedefs.js";

/**
 * Source of wall-clock time for the control loop and its background tasks.
 *
 * `sleep` rejects with the signal's reason when the signal aborts, which is
 * how a background task is told to stop waiting.
 */
export interface Clock {
  now(): TimePoint;
  sleep(ms: Millis, signal?: AbortSignal): Promise<void>;
}
