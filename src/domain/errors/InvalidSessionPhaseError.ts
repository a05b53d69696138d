import type { SessionPhase } from "../typedefs.js";

export class InvalidSessionPhaseError extends Error {
  constructor(
    public readonly operation: string,
    public readonly phase: SessionPhase,
  ) {
    super(`Cannot ${operation} while session is in phase ${phase}`);
    this.name = "InvalidSessionPhaseError";
  }
}
