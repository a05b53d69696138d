import { emitKeypressEvents, type Key } from "node:readline";

import { Channel, type KeyInput } from "../core.js";

/** Maps one keypress to a race input; `undefined` for keys the race ignores */
export function toKeyInput(
  sequence: string | undefined,
  key: Key | undefined,
): KeyInput | undefined {
  if (key?.name === "escape" || (key?.ctrl === true && key.name === "c")) {
    return { kind: "Quit" };
  }
  if (key?.name === "return" || key?.name === "enter") {
    return { kind: "Char", char: "\n" };
  }
  if (key?.name === "tab") {
    return { kind: "Char", char: "\t" };
  }
  if (key?.ctrl === true || key?.meta === true || sequence === undefined) {
    return undefined;
  }

  const chars = Array.from(sequence);
  const [char] = chars;
  if (chars.length !== 1 || char === undefined || char < " " || char === "\u007f") {
    return undefined;
  }
  return { kind: "Char", char };
}

/**
 * Raw-mode keyboard reader feeding a channel the control loop consumes.
 */
export class TerminalKeys {
  readonly events = new Channel<KeyInput>();
  readonly #input: NodeJS.ReadStream;
  #attached = false;

  constructor(input: NodeJS.ReadStream = process.stdin) {
    this.#input = input;
  }

  start(): void {
    if (this.#attached) return;
    this.#attached = true;

    emitKeypressEvents(this.#input);
    if (this.#input.isTTY) {
      this.#input.setRawMode(true);
    }
    this.#input.on("keypress", this.#onKeypress);
    this.#input.on("end", this.#onEnd);
    this.#input.resume();
  }

  stop(): void {
    if (!this.#attached) return;
    this.#attached = false;

    this.#input.off("keypress", this.#onKeypress);
    this.#input.off("end", this.#onEnd);
    if (this.#input.isTTY) {
      this.#input.setRawMode(false);
    }
    this.#input.pause();
    this.events.close();
  }

  readonly #onKeypress = (sequence: string | undefined, key: Key | undefined): void => {
    const input = toKeyInput(sequence, key);
    if (input) this.events.send(input);
  };

  readonly #onEnd = (): void => {
    this.events.close();
  };
}
