import { CursorOutOfBoundsError } from "../errors/CursorOutOfBoundsError.js";
import { PlayerAlreadyFinishedError } from "../errors/PlayerAlreadyFinishedError.js";
import type { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import type { TimePoint, Username } from "../typedefs.js";
import { type InputRecord, InputRecorder } from "./InputRecord.js";
import type { TargetText } from "./TargetText.js";

export type Progress = "Ongoing" | "Finished";

export type InputResult =
  | { readonly kind: "Correct"; readonly progress: Progress }
  | { readonly kind: "Wrong"; readonly expected: string };

export type InputOutcome =
  | { readonly ok: true; readonly result: InputResult }
  | { readonly ok: false; readonly error: PlayerNotFoundError | PlayerAlreadyFinishedError };

/**
 * One participant racing on a shared {@link TargetText}.
 *
 * The cursor only moves forward, one character per correct input. Every
 * input, right or wrong, lands in the participant's record.
 */
export class PlayerState {
  readonly #recorder: InputRecorder;
  #cursor = 0;
  #lastInput: InputResult | undefined;

  constructor(
    readonly name: Username,
    readonly text: TargetText,
    now: () => TimePoint,
  ) {
    this.#recorder = new InputRecorder(now);
  }

  get cursor(): number {
    return this.#cursor;
  }

  get lastInput(): InputResult | undefined {
    return this.#lastInput;
  }

  get record(): InputRecord {
    return this.#recorder.record;
  }

  get recorder(): InputRecorder {
    return this.#recorder;
  }

  isDone(): boolean {
    return this.#cursor === this.text.length;
  }

  processInput(char: string): InputOutcome {
    const expected = this.#expectedChar();
    if (expected === undefined) {
      return { ok: false, error: new PlayerAlreadyFinishedError(this.name) };
    }

    if (char !== expected) {
      this.#recorder.push({ kind: "Wrong", expected, typed: char });
      return this.#settle({ kind: "Wrong", expected });
    }

    return this.#moveForward(expected);
  }

  /** Moves forward without validation; used to replay a known-correct run. */
  advance(): InputOutcome {
    const expected = this.#expectedChar();
    if (expected === undefined) {
      return { ok: false, error: new PlayerAlreadyFinishedError(this.name) };
    }
    return this.#moveForward(expected);
  }

  #expectedChar(): string | undefined {
    if (this.#cursor < 0 || this.#cursor > this.text.length) {
      throw new CursorOutOfBoundsError(this.#cursor, this.text.length);
    }
    return this.text.charAt(this.#cursor);
  }

  #moveForward(expected: string): InputOutcome {
    this.#cursor += 1;
    this.#recorder.push({ kind: "Correct", char: expected });
    return this.#settle({
      kind: "Correct",
      progress: this.isDone() ? "Finished" : "Ongoing",
    });
  }

  #settle(result: InputResult): InputOutcome {
    this.#lastInput = result;
    return { ok: true, result };
  }
}
