import type { InputRecord } from "../entities/InputRecord.js";
import type { Clock } from "../ports/Clock.js";
import type { Logger } from "../ports/Logger.js";
import type { Millis, TimePoint, Username } from "../typedefs.js";
import { Channel } from "./Channel.js";

export interface GhostInput {
  readonly char: string;
  /** Offset at which the input was originally recorded */
  readonly elapsedMs: Millis;
}

/**
 * Replays the correct inputs of a past record as an opponent.
 *
 * Every wait is computed from the race start rather than from the previous
 * emission, so a consumer that falls behind gets the backlog immediately and
 * the schedule never drifts.
 */
export class Ghost {
  readonly #record: InputRecord;
  readonly #clock: Clock;
  readonly #logger: Logger | undefined;
  readonly #events = new Channel<GhostInput>();
  readonly #controller = new AbortController();
  #task: Promise<void> | undefined;

  constructor(
    readonly name: Username,
    record: InputRecord,
    clock: Clock,
    logger?: Logger,
  ) {
    this.#record = record;
    this.#clock = clock;
    this.#logger = logger;
  }

  get events(): AsyncIterable<GhostInput> {
    return this.#events;
  }

  get started(): boolean {
    return this.#task !== undefined;
  }

  /** Settles once the replay finished or was stopped */
  get done(): Promise<void> {
    return this.#task ?? Promise.resolve();
  }

  start(raceStart: TimePoint): void {
    if (this.#task) {
      throw new Error(`Ghost ${this.name} was already started`);
    }
    this.#task = this.#replay(raceStart);
  }

  stop(): void {
    this.#controller.abort();
    this.#events.close();
  }

  async #replay(raceStart: TimePoint): Promise<void> {
    const { signal } = this.#controller;
    this.#logger?.debug?.("Ghost replay started", { name: this.name, raceStart });

    try {
      for (const { elapsedMs, input } of this.#record) {
        if (input.kind !== "Correct") continue;

        const wait = Math.max(0, elapsedMs - (this.#clock.now() - raceStart));
        await this.#clock.sleep(wait, signal);
        if (!this.#events.send({ char: input.char, elapsedMs })) return;
      }
      this.#events.close();
    } catch (error) {
      if (signal.aborted) {
        this.#events.close();
        return;
      }
      this.#logger?.error?.("Ghost replay failed", { name: this.name, error });
      this.#events.fail(error);
    }
  }
}
