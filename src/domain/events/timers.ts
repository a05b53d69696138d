import type { Clock } from "../ports/Clock.js";
import type { Millis, TimePoint } from "../typedefs.js";
import { Channel } from "./Channel.js";

export interface TimerSource {
  readonly events: Channel<TimePoint>;
  /** Stops the task and ends `events` */
  stop(): void;
  /** Settles once the task has returned */
  readonly done: Promise<void>;
}

async function runUntilStopped(
  events: Channel<TimePoint>,
  signal: AbortSignal,
  body: () => Promise<void>,
): Promise<void> {
  try {
    await body();
    events.close();
  } catch (error) {
    if (signal.aborted) {
      events.close();
    } else {
      events.fail(error);
    }
  }
}

/** Emits the current time every `intervalMs` until stopped. */
export function startTicker(clock: Clock, intervalMs: Millis): TimerSource {
  const events = new Channel<TimePoint>();
  const controller = new AbortController();

  const done = runUntilStopped(events, controller.signal, async () => {
    while (!controller.signal.aborted) {
      await clock.sleep(intervalMs, controller.signal);
      if (!events.send(clock.now())) return;
    }
  });

  return {
    events,
    done,
    stop(): void {
      controller.abort();
      events.close();
    },
  };
}

/** Emits once when the clock reaches `at`, then ends. */
export function startTimer(clock: Clock, at: TimePoint): TimerSource {
  const events = new Channel<TimePoint>();
  const controller = new AbortController();

  const done = runUntilStopped(events, controller.signal, async () => {
    await clock.sleep(Math.max(0, at - clock.now()), controller.signal);
    events.send(clock.now());
  });

  return {
    events,
    done,
    stop(): void {
      controller.abort();
      events.close();
    },
  };
}
