import { RaceConfigError } from "../errors/RaceConfigError.js";
import type { SessionData } from "../protocol/SessionData.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { JoinSession } from "./JoinSession.js";

/** Subscribes to a fresh session topic and advertises it under the host's name */
export class HostSession extends Command {
  readonly type = "HostSession" as const;

  constructor(
    public readonly host: string,
    public readonly data: SessionData,
    public readonly at: TimePoint,
  ) {
    super();

    if (!JoinSession.isValidUsername(host)) {
      throw RaceConfigError.because([
        "Username must be a non-empty string without whitespace",
      ]);
    }
  }

  async execute({ sessions }: CommandContext): Promise<void> {
    await sessions.hostSession(this.host, this.data);
  }
}
