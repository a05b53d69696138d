import type { CursorMarker } from "../entities/PlayerPool.js";
import type { PlayerState } from "../entities/PlayerState.js";
import type { SessionStats } from "../entities/SessionStats.js";
import type { TargetText } from "../entities/TargetText.js";
import type { SessionPhase, TimePoint, Username } from "../typedefs.js";

/** Read-only snapshot handed to the renderer after every event */
export interface RaceView {
  readonly text: TargetText;
  readonly phase: SessionPhase;
  /** Present once the race has started */
  readonly local: PlayerState | undefined;
  readonly opponents: readonly CursorMarker[];
  readonly stats: SessionStats;
  readonly participants: readonly Username[];
  readonly startAt?: TimePoint;
  readonly status?: string;
}

/**
 * Display collaborator. `leave` is always called once `enter` was, whatever
 * way the race ends.
 */
export interface Renderer {
  enter(): void;
  draw(view: RaceView): void;
  leave(): void;
}
