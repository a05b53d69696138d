import { describe, expect, it } from "vitest";

import { PlayerState } from "../../src/domain/entities/PlayerState.js";
import { TargetText } from "../../src/domain/entities/TargetText.js";
import { PlayerAlreadyFinishedError } from "../../src/domain/errors/PlayerAlreadyFinishedError.js";

describe("PlayerState", () => {
  it("keeps the cursor in place on a wrong input and records it", () => {
    const player = new PlayerState("alice", new TargetText("ab"), () => 0);

    const outcome = player.processInput("x");

    expect(outcome).toEqual({ ok: true, result: { kind: "Wrong", expected: "a" } });
    expect(player.cursor).toBe(0);
    expect(player.lastInput).toEqual({ kind: "Wrong", expected: "a" });
    expect(player.record.entries()).toEqual([
      { elapsedMs: 0, input: { kind: "Wrong", expected: "a", typed: "x" } },
    ]);
  });

  it("advances on correct input until the end of the text", () => {
    let now = 100;
    const player = new PlayerState("alice", new TargetText("ab"), () => now);

    now = 250;
    expect(player.processInput("a")).toEqual({
      ok: true,
      result: { kind: "Correct", progress: "Ongoing" },
    });
    now = 400;
    expect(player.processInput("b")).toEqual({
      ok: true,
      result: { kind: "Correct", progress: "Finished" },
    });

    expect(player.cursor).toBe(2);
    expect(player.isDone()).toBe(true);
    expect(player.record.finishedAt()).toBe(300);
  });

  it("refuses input once finished", () => {
    const player = new PlayerState("alice", new TargetText("a"), () => 0);
    player.processInput("a");

    const outcome = player.processInput("b");

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(PlayerAlreadyFinishedError);
    }
    expect(player.record.size).toBe(1);
  });

  it("is done from the start on an empty text", () => {
    const player = new PlayerState("alice", new TargetText(""), () => 0);

    expect(player.isDone()).toBe(true);
    expect(player.advance().ok).toBe(false);
  });

  it("advances without validation", () => {
    const player = new PlayerState("ghost", new TargetText("xy"), () => 0);

    expect(player.advance()).toEqual({
      ok: true,
      result: { kind: "Correct", progress: "Ongoing" },
    });
    expect(player.cursor).toBe(1);
    expect(player.record.entries()).toEqual([
      { elapsedMs: 0, input: { kind: "Correct", char: "x" } },
    ]);
  });
});
