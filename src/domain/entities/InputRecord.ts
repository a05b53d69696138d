import type { Millis, TimePoint } from "../typedefs.js";

export type RecordedInput =
  | { readonly kind: "Correct"; readonly char: string }
  | { readonly kind: "Wrong"; readonly expected: string; readonly typed: string };

export interface RecordEntry {
  /** Time since the participant's start instant */
  readonly elapsedMs: Millis;
  readonly input: RecordedInput;
}

const CHARS_PER_WORD = 5;

function toWpm(correct: number, seconds: number): number {
  if (seconds <= 0) return 0;
  return ((correct / seconds) * 60) / CHARS_PER_WORD;
}

/**
 * Append-only log of what a participant typed and when.
 * Entries are kept in elapsed order; appending an older entry is a bug.
 */
export class InputRecord implements Iterable<RecordEntry> {
  readonly #entries: RecordEntry[] = [];

  constructor(entries: Iterable<RecordEntry> = []) {
    for (const entry of entries) {
      this.append(entry.elapsedMs, entry.input);
    }
  }

  get size(): number {
    return this.#entries.length;
  }

  append(elapsedMs: Millis, input: RecordedInput): void {
    const last = this.#entries[this.#entries.length - 1];
    if (elapsedMs < 0 || (last !== undefined && elapsedMs < last.elapsedMs)) {
      throw new RangeError(`Record entries must be appended in order (got ${elapsedMs}ms)`);
    }
    this.#entries.push({ elapsedMs, input });
  }

  entries(): readonly RecordEntry[] {
    return this.#entries;
  }

  [Symbol.iterator](): Iterator<RecordEntry> {
    return this.#entries[Symbol.iterator]();
  }

  /** Entries with `startMs <= elapsed < endMs` */
  *inputsSince(startMs: Millis, endMs: Millis): Generator<RecordEntry> {
    for (const entry of this.#entries) {
      if (entry.elapsedMs >= endMs) return;
      if (entry.elapsedMs >= startMs) yield entry;
    }
  }

  /** WPM over the window of correct inputs ending at `elapsedMs` */
  wpmAt(windowMs: Millis, elapsedMs: Millis): number {
    const start = Math.max(0, elapsedMs - windowMs);
    let correct = 0;
    for (const entry of this.inputsSince(start, elapsedMs)) {
      if (entry.input.kind === "Correct") correct += 1;
    }
    return toWpm(correct, windowMs / 1000);
  }

  countCorrect(): number {
    return this.#entries.filter((entry) => entry.input.kind === "Correct").length;
  }

  countWrong(): number {
    return this.#entries.filter((entry) => entry.input.kind === "Wrong").length;
  }

  averageWpm(): number {
    return toWpm(this.countCorrect(), this.duration() / 1000);
  }

  topWpm(windowMs: Millis, stepMs: Millis): number {
    if (stepMs <= 0) {
      throw new RangeError("Sampling step must be positive");
    }

    const duration = this.duration();
    let top = 0;
    for (let elapsed = 0; elapsed < duration; elapsed += stepMs) {
      top = Math.max(top, this.wpmAt(windowMs, elapsed));
    }
    return top;
  }

  /** Fraction of correct inputs; 0 for an empty record */
  precision(): number {
    if (this.#entries.length === 0) return 0;
    return this.countCorrect() / this.#entries.length;
  }

  /** Mistakes keyed by the character that should have been typed */
  mistakeHistogram(): Map<string, number> {
    const histogram = new Map<string, number>();
    for (const { input } of this.#entries) {
      if (input.kind === "Wrong") {
        histogram.set(input.expected, (histogram.get(input.expected) ?? 0) + 1);
      }
    }
    return histogram;
  }

  duration(): Millis {
    return this.#entries[this.#entries.length - 1]?.elapsedMs ?? 0;
  }

  /** Elapsed time of the last correct input, if any */
  finishedAt(): Millis | undefined {
    for (let index = this.#entries.length - 1; index >= 0; index -= 1) {
      const entry = this.#entries[index];
      if (entry?.input.kind === "Correct") return entry.elapsedMs;
    }
    return undefined;
  }
}

/** Stamps inputs with the time elapsed since the recorder was created. */
export class InputRecorder {
  readonly record = new InputRecord();
  readonly startedAt: TimePoint;
  readonly #now: () => TimePoint;

  constructor(now: () => TimePoint) {
    this.#now = now;
    this.startedAt = now();
  }

  push(input: RecordedInput): Millis {
    // wall clocks can step backwards; the record must not
    const elapsed = Math.max(this.record.duration(), this.elapsed());
    this.record.append(elapsed, input);
    return elapsed;
  }

  elapsed(): Millis {
    return Math.max(0, this.#now() - this.startedAt);
  }
}
