import type { PeerId, TimePoint, Username } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Broadcasts the frozen roster and the shared start instant */
export class LockSession extends Command {
  readonly type = "LockSession" as const;

  constructor(
    public readonly registeredUsers: Readonly<Record<PeerId, Username>>,
    public readonly sessionStart: string,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessions, logger }: CommandContext): Promise<void> {
    await sessions.publish({
      type: "LockSession",
      registeredUsers: this.registeredUsers,
      sessionStart: this.sessionStart,
    });

    logger?.info?.("Session locked", {
      type: this.type,
      participants: Object.values(this.registeredUsers),
      sessionStart: this.sessionStart,
    });
  }
}
