import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

/** Host abandons the lobby: tells joiners, then withdraws the discovery record */
export class EndSession extends Command {
  readonly type = "EndSession" as const;

  constructor(
    public readonly host: string,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessions, logger }: CommandContext): Promise<void> {
    await sessions.publish({ type: "EndSession" });
    await sessions.stopHostingSession(this.host);

    logger?.info?.("Session ended", { type: this.type, host: this.host, at: this.at });
  }
}
