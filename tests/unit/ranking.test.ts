import { describe, expect, it } from "vitest";

import { PlayerPool } from "../../src/domain/entities/PlayerPool.js";
import { computeRanking } from "../../src/domain/entities/Ranking.js";
import { TargetText } from "../../src/domain/entities/TargetText.js";

describe("computeRanking", () => {
  it("orders finished players by completion time, then by name", () => {
    let now = 0;
    const pool = new PlayerPool(new TargetText("a"), () => now).withPlayers([
      "alice",
      "dave",
      "bob",
      "carol",
    ]);

    now = 300;
    pool.processInput("alice", "a");
    now = 200;
    pool.processInput("dave", "a");
    pool.processInput("bob", "a");
    pool.processInput("carol", "x");

    expect(computeRanking(pool.players(), "alice")).toEqual({
      names: ["bob", "dave", "alice"],
      spot: 2,
    });
    expect(computeRanking(pool.players(), "carol")).toEqual({
      names: ["bob", "dave", "alice"],
      spot: undefined,
    });
  });
});
