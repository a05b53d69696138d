import type { KeyInput } from "../ports/KeyInput.js";
import type { NetworkMessage } from "../ports/NetworkService.js";
import type { TimePoint, Username } from "../typedefs.js";
import type { GhostInput } from "./Ghost.js";

/** Everything the control loop reacts to */
export type AppEvent =
  | { readonly type: "WpmTick"; readonly at: TimePoint }
  | { readonly type: "Key"; readonly key: KeyInput }
  | { readonly type: "Network"; readonly message: NetworkMessage }
  | { readonly type: "Ghost"; readonly player: Username; readonly input: GhostInput }
  | { readonly type: "RaceStart"; readonly at: TimePoint }
  | { readonly type: "Lock" };

export const fromTick = (at: TimePoint): AppEvent => ({ type: "WpmTick", at });

export const fromKey = (key: KeyInput): AppEvent => ({ type: "Key", key });

export const fromNetwork = (message: NetworkMessage): AppEvent => ({
  type: "Network",
  message,
});

export const fromGhost =
  (player: Username) =>
  (input: GhostInput): AppEvent => ({ type: "Ghost", player, input });

export const fromRaceStart = (at: TimePoint): AppEvent => ({ type: "RaceStart", at });

export const fromLockRequest = (): AppEvent => ({ type: "Lock" });
