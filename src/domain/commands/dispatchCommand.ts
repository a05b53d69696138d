import type { Command, CommandContext } from "./Command.js";

export type DispatchCommand = (command: Command, ctx: CommandContext) => Promise<void>;

export async function dispatchCommand(
  command: Command,
  ctx: CommandContext,
): Promise<void> {
  const startedAt = Date.now();
  ctx.logger?.debug?.("Dispatching command", {
    type: command.type,
    at: command.at,
  });

  try {
    await command.execute(ctx);
    ctx.logger?.debug?.("Command completed", {
      type: command.type,
      elapsedMs: Date.now() - startedAt,
    });
  } catch (error) {
    ctx.logger?.error?.("Command failed", {
      type: command.type,
      error,
    });
    throw error;
  }
}
