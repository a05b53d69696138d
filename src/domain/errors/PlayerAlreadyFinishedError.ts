import type { Username } from "../typedefs.js";

export class PlayerAlreadyFinishedError extends Error {
  constructor(public readonly player: Username) {
    super(`Player already reached the end of the text: ${player}`);
    this.name = "PlayerAlreadyFinishedError";
  }
}
