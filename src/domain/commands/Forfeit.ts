import { encodeRaceMessage } from "../protocol/RaceMessage.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class Forfeit extends Command {
  readonly type = "Forfeit" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ sessions, logger }: CommandContext): Promise<void> {
    await sessions.publish({
      type: "Push",
      payload: encodeRaceMessage({ type: "Forfeit" }),
    });

    logger?.info?.("Forfeit published", { type: this.type, at: this.at });
  }
}
