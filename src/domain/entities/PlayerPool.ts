import { PlayerNotFoundError } from "../errors/PlayerNotFoundError.js";
import type { TimePoint, Username } from "../typedefs.js";
import { type InputOutcome, type InputResult, PlayerState } from "./PlayerState.js";
import type { TargetText } from "./TargetText.js";

/** What a renderer draws for one occupied cursor offset */
export interface CursorMarker {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  /** Participant whose last input is shown; smallest name on a shared offset */
  readonly player: Username;
  readonly players: readonly Username[];
  readonly lastInput: InputResult | undefined;
}

/**
 * Participants keyed by name, all bound to the pool's text.
 */
export class PlayerPool {
  readonly #players = new Map<Username, PlayerState>();
  readonly #now: () => TimePoint;

  constructor(
    readonly text: TargetText,
    now: () => TimePoint,
  ) {
    this.#now = now;
  }

  get size(): number {
    return this.#players.size;
  }

  withPlayers(names: Iterable<Username>): this {
    for (const name of names) {
      this.add(name);
    }
    return this;
  }

  /** Adds a participant; an existing name is left untouched. */
  add(name: Username): PlayerState {
    const existing = this.#players.get(name);
    if (existing) return existing;

    const player = new PlayerState(name, this.text, this.#now);
    this.#players.set(name, player);
    return player;
  }

  remove(name: Username): boolean {
    return this.#players.delete(name);
  }

  has(name: Username): boolean {
    return this.#players.has(name);
  }

  player(name: Username): PlayerState | undefined {
    return this.#players.get(name);
  }

  names(): Username[] {
    return [...this.#players.keys()];
  }

  players(): PlayerState[] {
    return [...this.#players.values()];
  }

  processInput(name: Username, char: string): InputOutcome {
    const player = this.#players.get(name);
    if (!player) return { ok: false, error: new PlayerNotFoundError(name) };
    return player.processInput(char);
  }

  advance(name: Username): InputOutcome {
    const player = this.#players.get(name);
    if (!player) return { ok: false, error: new PlayerNotFoundError(name) };
    return player.advance();
  }

  isDone(name: Username): boolean {
    return this.#players.get(name)?.isDone() ?? false;
  }

  areAllDone(): boolean {
    for (const player of this.#players.values()) {
      if (!player.isDone()) return false;
    }
    return true;
  }

  cursorCoordinates(): CursorMarker[] {
    return projectCursors(this.text, this.#players.values());
  }
}

/**
 * Groups participants by cursor offset and projects each offset to a
 * line/column pair in one pass over the text's line starts.
 */
export function projectCursors(
  text: TargetText,
  players: Iterable<PlayerState>,
): CursorMarker[] {
  const byOffset = new Map<number, PlayerState[]>();
  for (const player of players) {
    const group = byOffset.get(player.cursor);
    if (group) {
      group.push(player);
    } else {
      byOffset.set(player.cursor, [player]);
    }
  }

  const offsets = [...byOffset.keys()].sort((a, b) => a - b);
  const coords = text.coordinatesOf(offsets);

  const markers: CursorMarker[] = [];
  offsets.forEach((offset, index) => {
    const group = (byOffset.get(offset) ?? []).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
    const [shown] = group;
    const coord = coords[index];
    if (!shown || !coord) return;

    markers.push({
      offset,
      line: coord.line,
      column: coord.column,
      player: shown.name,
      players: group.map((player) => player.name),
      lastInput: shown.lastInput,
    });
  });

  return markers;
}
