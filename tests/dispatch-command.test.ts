import { describe, expect, it } from "vitest";

import { createCommandContext } from "./support/mocks.js";
import { dispatchCommand } from "../src/domain/commands/dispatchCommand.js";
import { JoinSession } from "../src/domain/commands/JoinSession.js";
import { PushInput } from "../src/domain/commands/PushInput.js";
import { SessionNotJoinedError } from "../src/domain/errors/SessionNotJoinedError.js";

describe("dispatchCommand", () => {
  it("logs the command around its execution", async () => {
    const context = createCommandContext();

    await dispatchCommand(new JoinSession("s-1", "bob", 5), context);

    expect(context.logger.debug).toHaveBeenCalledWith("Dispatching command", {
      type: "JoinSession",
      at: 5,
    });
    expect(context.logger.debug).toHaveBeenCalledWith("Command completed", {
      type: "JoinSession",
      elapsedMs: expect.any(Number),
    });
  });

  it("logs and rethrows failures", async () => {
    const context = createCommandContext();

    await expect(dispatchCommand(new PushInput("x", 0), context)).rejects.toBeInstanceOf(
      SessionNotJoinedError,
    );
    expect(context.logger.error).toHaveBeenCalledWith("Command failed", {
      type: "PushInput",
      error: expect.any(SessionNotJoinedError),
    });
  });
});
