import { createHash } from "node:crypto";

import { CursorOutOfBoundsError } from "../errors/CursorOutOfBoundsError.js";

/** Zero-based position of a character in the rendered text */
export interface TextCoord {
  readonly line: number;
  readonly column: number;
}

/**
 * Immutable text every participant of a session races on.
 *
 * Characters are Unicode code points, so cursors and columns count what the
 * user perceives as one keystroke rather than UTF-16 units. A single instance
 * is shared by reference between the pool and all of its players.
 */
export class TargetText {
  readonly chars: readonly string[];
  readonly digest: string;
  readonly #lineStarts: readonly number[];

  constructor(readonly content: string) {
    this.chars = Object.freeze(Array.from(content));
    this.digest = createHash("sha256").update(content, "utf8").digest("hex");

    const lineStarts = [0];
    this.chars.forEach((char, index) => {
      if (char === "\n") lineStarts.push(index + 1);
    });
    this.#lineStarts = Object.freeze(lineStarts);
  }

  get length(): number {
    return this.chars.length;
  }

  get lineCount(): number {
    return this.#lineStarts.length;
  }

  charAt(offset: number): string | undefined {
    return this.chars[offset];
  }

  /** Content-derived key under which records for this exact text are stored */
  recordKey(length: number): string {
    return this.digest.slice(0, length);
  }

  /** Lines including their trailing newline, as a renderer consumes them */
  lines(): string[] {
    const lines: string[] = [];
    for (let index = 0; index < this.#lineStarts.length; index += 1) {
      const start = this.#lineStarts[index] ?? 0;
      const end = this.#lineStarts[index + 1] ?? this.chars.length;
      if (start === end && index === this.#lineStarts.length - 1 && index > 0) break;
      lines.push(this.chars.slice(start, end).join(""));
    }
    return lines;
  }

  coordinateOf(offset: number): TextCoord {
    this.#assertInBounds(offset);

    let low = 0;
    let high = this.#lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.#lineStarts[mid] ?? Infinity) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { line: low, column: offset - (this.#lineStarts[low] ?? 0) };
  }

  /**
   * Projects ascending offsets in one pass over the line boundaries.
   * Throws if the offsets are not sorted.
   */
  coordinatesOf(sortedOffsets: readonly number[]): TextCoord[] {
    const coords: TextCoord[] = [];
    let line = 0;
    let previous = 0;

    for (const offset of sortedOffsets) {
      this.#assertInBounds(offset);
      if (offset < previous) {
        throw new RangeError("Offsets must be sorted in ascending order");
      }
      previous = offset;

      while ((this.#lineStarts[line + 1] ?? Infinity) <= offset) {
        line += 1;
      }
      coords.push({ line, column: offset - (this.#lineStarts[line] ?? 0) });
    }

    return coords;
  }

  #assertInBounds(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.chars.length) {
      throw new CursorOutOfBoundsError(offset, this.chars.length);
    }
  }
}
