import { RaceConfigError } from "../errors/RaceConfigError.js";
import type { SessionId, TimePoint, Username } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

const WHITESPACE_PATTERN = /\s/;

export class JoinSession extends Command {
  readonly type = "JoinSession" as const;

  constructor(
    public readonly sessionId: SessionId,
    public readonly user: Username,
    public readonly at: TimePoint,
  ) {
    super();

    if (!JoinSession.isValidUsername(user)) {
      throw RaceConfigError.because([
        "Username must be a non-empty string without whitespace",
      ]);
    }
  }

  async execute({ sessions, logger }: CommandContext): Promise<void> {
    await sessions.joinSession(this.sessionId);
    await sessions.publish({ type: "Register", user: this.user });

    logger?.info?.("Registered for session", {
      type: this.type,
      sessionId: this.sessionId,
      user: this.user,
      at: this.at,
    });
  }

  static isValidUsername(user: unknown): user is Username {
    return typeof user === "string" && user.length > 0 && !WHITESPACE_PATTERN.test(user);
  }
}
