import type { Logger } from "../ports/Logger.js";
import type { SessionClient } from "../session/SessionClient.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly sessions: SessionClient;
  readonly logger?: Logger;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
