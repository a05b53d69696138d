import { describe, expect, it } from "vitest";

import { createLoggerMock } from "../support/mocks.js";
import { InvalidSessionPhaseError } from "../../src/domain/errors/InvalidSessionPhaseError.js";
import { encodeRaceMessage, type RaceMessage } from "../../src/domain/protocol/RaceMessage.js";
import type { SessionCommand } from "../../src/domain/protocol/SessionCommand.js";
import { RaceSession } from "../../src/domain/session/RaceSession.js";

const config = { lockDelayMs: 3_000, pendingPushTtlMs: 5_000, maxPendingPushes: 2 };

function push(message: RaceMessage): SessionCommand {
  return { type: "Push", payload: encodeRaceMessage(message) };
}

function createHost(): RaceSession {
  return new RaceSession({ role: "host", localPeer: "peer-a", localUser: "alice", config });
}

function createJoiner(logger = createLoggerMock()): RaceSession {
  return new RaceSession({
    role: "joiner",
    localPeer: "peer-b",
    localUser: "bob",
    config,
    logger,
  });
}

const lock: SessionCommand = {
  type: "LockSession",
  registeredUsers: { "peer-a": "alice", "peer-b": "bob" },
  sessionStart: "1970-01-01T00:00:04.000Z",
};

describe("RaceSession as host", () => {
  it("takes one registration per peer and per name", () => {
    const logger = createLoggerMock();
    const session = new RaceSession({
      role: "host",
      localPeer: "peer-a",
      localUser: "alice",
      config,
      logger,
    });

    expect(session.handle("peer-b", { type: "Register", user: "bob" }, 0)).toEqual([
      { kind: "Registered", peer: "peer-b", user: "bob" },
    ]);
    expect(session.handle("peer-b", { type: "Register", user: "bobby" }, 0)).toEqual([]);
    expect(session.handle("peer-c", { type: "Register", user: "bob" }, 0)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Registration rejected; username already taken",
      { peer: "peer-c", user: "bob" },
    );

    expect([...session.roster]).toEqual([
      ["peer-a", "alice"],
      ["peer-b", "bob"],
    ]);
    expect(session.opponents()).toEqual(["bob"]);
  });

  it("locks the roster with a start instant after the lock delay", () => {
    const session = createHost();
    session.register("peer-b", "bob");

    expect(session.lock(1_000)).toEqual({
      registeredUsers: { "peer-a": "alice", "peer-b": "bob" },
      startAt: 4_000,
      sessionStart: "1970-01-01T00:00:04.000Z",
    });
    expect(session.phase).toBe("AwaitingStart");
    expect(session.startAt).toBe(4_000);
    expect(session.register("peer-c", "carol")).toEqual([]);
    expect(() => session.lock(2_000)).toThrow(InvalidSessionPhaseError);
  });

  it("ignores an end of session sent by someone else", () => {
    const session = createHost();

    expect(session.handle("peer-b", { type: "EndSession" }, 0)).toEqual([]);
    expect(session.phase).toBe("TakingRegistrations");
  });

  it("ignores its own pushes", () => {
    const session = createHost();
    session.lock(0);
    session.start(3_000);

    expect(session.handle("peer-a", push({ type: "Input", char: "x" }), 3_100)).toEqual([]);
  });

  it("withdraws a lobby forfeit from the roster before the lock", () => {
    const logger = createLoggerMock();
    const session = new RaceSession({
      role: "host",
      localPeer: "peer-a",
      localUser: "alice",
      config,
      logger,
    });
    session.register("peer-b", "bob");

    expect(session.handle("peer-b", push({ type: "Forfeit" }), 1_000)).toEqual([
      { kind: "Forfeit", peer: "peer-b", user: "bob" },
    ]);
    expect(logger.info).toHaveBeenCalledWith("Participant forfeited", {
      peer: "peer-b",
      user: "bob",
    });
    expect(session.opponents()).toEqual([]);
    expect(session.lock(2_000).registeredUsers).toEqual({ "peer-a": "alice" });
  });
  it("keeps roster pushes through a long lobby and expires only unknown peers", () => {
    const logger = createLoggerMock();
    const session = new RaceSession({
      role: "host",
      localPeer: "peer-a",
      localUser: "alice",
      config,
      logger,
    });
    session.register("peer-b", "bob");

    session.handle("peer-c", push({ type: "Input", char: "c" }), 0);
    session.handle("peer-b", push({ type: "Input", char: "H" }), 100);
    session.handle("peer-d", push({ type: "Input", char: "d" }), 6_000);
    expect(session.pendingPushes).toBe(2);

    session.lock(10_000);
    expect(session.start(13_000)).toEqual([
      { kind: "Input", peer: "peer-b", user: "bob", char: "H" },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Dropping unattributed pushes past their deadline",
      { dropped: 1 },
    );
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});

describe("RaceSession as joiner", () => {
  it("accepts the roster broadcast by the host", () => {
    const session = createJoiner();

    const updates = session.handle("peer-a", lock, 1_000);

    expect(updates).toEqual([
      {
        kind: "Locked",
        roster: new Map([
          ["peer-a", "alice"],
          ["peer-b", "bob"],
        ]),
        startAt: 4_000,
      },
    ]);
    expect(session.phase).toBe("AwaitingStart");
    expect(session.opponents()).toEqual(["alice"]);
  });

  it("is rejected when left out of the roster", () => {
    const session = createJoiner();

    const updates = session.handle(
      "peer-a",
      { ...lock, registeredUsers: { "peer-a": "alice" } },
      1_000,
    );

    expect(updates).toEqual([{ kind: "Rejected" }]);
    expect(session.phase).toBe("Ended");
  });

  it("drops a lock with an unreadable start time", () => {
    const logger = createLoggerMock();
    const session = createJoiner(logger);

    expect(session.handle("peer-a", { ...lock, sessionStart: "soon" }, 0)).toEqual([]);
    expect(session.phase).toBe("AwaitingRoster");
    expect(logger.warn).toHaveBeenCalledWith("Protocol error; message dropped", {
      source: "peer-a",
      error: expect.objectContaining({ message: "Invalid session start time: soon" }),
    });
  });

  it("is cancelled when the host ends the session before the start", () => {
    const waiting = createJoiner();
    expect(waiting.handle("peer-a", { type: "EndSession" }, 0)).toEqual([{ kind: "Cancelled" }]);
    expect(waiting.phase).toBe("Ended");

    const locked = createJoiner();
    locked.handle("peer-a", lock, 0);
    expect(locked.handle("peer-a", { type: "EndSession" }, 0)).toEqual([{ kind: "Cancelled" }]);
  });

  it("buffers pushes that arrive before the start and attributes them at the start", () => {
    const session = createJoiner();
    session.handle("peer-a", lock, 0);

    expect(session.handle("peer-a", push({ type: "Input", char: "H" }), 100)).toEqual([]);
    expect(session.pendingPushes).toBe(1);

    expect(session.start(4_000)).toEqual([
      { kind: "Input", peer: "peer-a", user: "alice", char: "H" },
    ]);
    expect(session.phase).toBe("Racing");
    expect(session.pendingPushes).toBe(0);
  });

  it("drops buffered pushes from peers outside of the roster", () => {
    const logger = createLoggerMock();
    const session = createJoiner(logger);
    session.handle("peer-a", lock, 0);
    session.handle("peer-z", push({ type: "Input", char: "z" }), 1_000);
    session.handle("peer-a", push({ type: "Input", char: "H" }), 1_000);

    expect(session.start(2_000)).toEqual([
      { kind: "Input", peer: "peer-a", user: "alice", char: "H" },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Dropping push from a peer outside of the roster",
      { source: "peer-z" },
    );
  });

  it("keeps only the newest pending pushes", () => {
    const session = createJoiner();
    session.handle("peer-a", lock, 0);
    session.handle("peer-a", push({ type: "Input", char: "a" }), 0);
    session.handle("peer-a", push({ type: "Input", char: "b" }), 0);
    session.handle("peer-a", push({ type: "Input", char: "c" }), 0);

    expect(session.pendingPushes).toBe(2);
    expect(session.start(0).map((update) => (update.kind === "Input" ? update.char : "?"))).toEqual(
      ["b", "c"],
    );
  });

  it("attributes pushes while racing and removes forfeiting peers", () => {
    const logger = createLoggerMock();
    const session = createJoiner(logger);
    session.handle("peer-a", lock, 0);
    session.start(4_000);

    expect(session.handle("peer-a", push({ type: "Input", char: "x" }), 4_100)).toEqual([
      { kind: "Input", peer: "peer-a", user: "alice", char: "x" },
    ]);
    expect(session.handle("peer-z", push({ type: "Input", char: "x" }), 4_100)).toEqual([]);
    expect(
      session.handle("peer-a", { type: "Push", payload: new Uint8Array([1, 2]) }, 4_200),
    ).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Protocol error; message dropped",
      expect.objectContaining({ source: "peer-a" }),
    );

    expect(session.handle("peer-a", push({ type: "Forfeit" }), 4_300)).toEqual([
      { kind: "Forfeit", peer: "peer-a", user: "alice" },
    ]);
    expect(session.opponents()).toEqual([]);
    expect(session.handle("peer-a", push({ type: "Input", char: "y" }), 4_400)).toEqual([]);
  });

  it("applies a forfeit sent between the lock and the start right away", () => {
    const session = createJoiner();
    session.handle("peer-a", lock, 0);
    session.handle("peer-a", push({ type: "Input", char: "H" }), 100);

    expect(session.handle("peer-a", push({ type: "Forfeit" }), 200)).toEqual([
      { kind: "Forfeit", peer: "peer-a", user: "alice" },
    ]);
    expect(session.pendingPushes).toBe(0);
    expect(session.opponents()).toEqual([]);
    expect(session.start(4_000)).toEqual([]);
  });

  it("ignores everything once ended", () => {
    const session = createJoiner();
    session.handle("peer-a", lock, 0);
    session.start(4_000);
    session.end();

    expect(session.handle("peer-a", push({ type: "Input", char: "x" }), 4_100)).toEqual([]);
    expect(() => session.start(5_000)).toThrow(InvalidSessionPhaseError);
  });
});
