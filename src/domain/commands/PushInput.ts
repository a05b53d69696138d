import { encodeRaceMessage } from "../protocol/RaceMessage.js";
import type { TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";

export class PushInput extends Command {
  readonly type = "PushInput" as const;

  constructor(
    public readonly char: string,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ sessions }: CommandContext): Promise<void> {
    await sessions.publish({
      type: "Push",
      payload: encodeRaceMessage({ type: "Input", char: this.char }),
    });
  }
}
