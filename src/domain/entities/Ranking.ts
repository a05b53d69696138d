import type { Username } from "../typedefs.js";
import type { PlayerState } from "./PlayerState.js";

export interface Ranking {
  /** Finished participants, fastest first */
  readonly names: readonly Username[];
  /** Index of the local participant, or `undefined` if it did not finish */
  readonly spot: number | undefined;
}

export function computeRanking(players: Iterable<PlayerState>, local: Username): Ranking {
  const finished = [...players]
    .filter((player) => player.isDone())
    .map((player) => ({ name: player.name, at: player.record.finishedAt() ?? 0 }))
    .sort((a, b) => a.at - b.at || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const names = finished.map((entry) => entry.name);
  const spot = names.indexOf(local);
  return { names, spot: spot === -1 ? undefined : spot };
}
