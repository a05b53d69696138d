import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/**
 * Unsubscribes from the session topic once the race is over. A host also
 * withdraws its discovery record.
 */
export class LeaveSession extends Command {
  readonly type = "LeaveSession" as const;

  constructor(
    public readonly host: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessions }: CommandContext): Promise<void> {
    if (this.host === undefined) {
      await sessions.leaveSession();
    } else {
      await sessions.stopHostingSession(this.host);
    }
  }
}
