import type { Username } from "../typedefs.js";

export class PlayerNotFoundError extends Error {
  constructor(public readonly player: Username) {
    super(`Player not found: ${player}`);
    this.name = "PlayerNotFoundError";
  }
}
