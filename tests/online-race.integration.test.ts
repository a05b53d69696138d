import { describe, expect, it } from "vitest";

import { createRendererMock, type RendererMock } from "./support/mocks.js";
import { InMemoryClock } from "../src/adapters/in-memory/InMemoryClock.js";
import {
  InMemoryNetwork,
  type InMemoryPeer,
} from "../src/adapters/in-memory/InMemoryNetwork.js";
import { TargetText } from "../src/domain/entities/TargetText.js";
import { TransportClosedError } from "../src/domain/errors/TransportClosedError.js";
import { Channel } from "../src/domain/events/Channel.js";
import { OnlineRace } from "../src/domain/game/OnlineRace.js";
import type { KeyInput } from "../src/domain/ports/KeyInput.js";
import { createRaceConfig } from "../src/domain/RaceConfig.js";
import { SessionClient } from "../src/domain/session/SessionClient.js";
import type { SessionRole } from "../src/domain/typedefs.js";

const config = createRaceConfig({ lockDelayMs: 3_000, shutdownGraceMs: 500 });

interface Participant {
  readonly race: OnlineRace;
  readonly keys: Channel<KeyInput>;
  readonly renderer: RendererMock;
  readonly peer: InMemoryPeer;
}

function createParticipant(
  network: InMemoryNetwork,
  clock: InMemoryClock,
  options: { readonly peerId: string; readonly user: string; readonly role: SessionRole },
): Participant {
  const peer = network.connect(options.peerId);
  const keys = new Channel<KeyInput>();
  const renderer = createRendererMock();
  const race = new OnlineRace({
    text: new TargetText("Hi"),
    localUser: options.user,
    clock,
    keys,
    renderer,
    config,
    sessions: new SessionClient(peer),
    role: options.role,
    host: "alice",
    sessionId: "s-1",
  });
  return { race, keys, renderer, peer };
}

function type(participant: Participant, chars: string): void {
  for (const char of chars) {
    participant.keys.send({ kind: "Char", char });
  }
}

function setupLobby(): {
  readonly clock: InMemoryClock;
  readonly host: Participant;
  readonly joiner: Participant;
} {
  const network = new InMemoryNetwork();
  const clock = new InMemoryClock(0);
  const host = createParticipant(network, clock, {
    peerId: "peer-a",
    user: "alice",
    role: "host",
  });
  const joiner = createParticipant(network, clock, {
    peerId: "peer-b",
    user: "bob",
    role: "joiner",
  });
  return { clock, host, joiner };
}

describe("Integration: online race", () => {
  it("races two peers from registration to ranking", async () => {
    const { clock, host, joiner } = setupLobby();

    const hostResult = host.race.run();
    await clock.runFor(0);
    const joinerResult = joiner.race.run();
    await clock.runFor(0);

    expect([...host.race.session.roster.values()]).toEqual(["alice", "bob"]);

    type(host, "\n");
    await clock.runFor(0);
    expect(host.race.phase).toBe("AwaitingStart");
    expect(joiner.race.phase).toBe("AwaitingStart");
    expect(joiner.race.session.startAt).toBe(3_000);

    await clock.runFor(3_000);
    expect(host.race.phase).toBe("Racing");
    expect(joiner.race.phase).toBe("Racing");

    await clock.runFor(100);
    type(host, "Hi");
    await clock.runFor(100);
    type(joiner, "Hx");
    await clock.runFor(0);
    type(joiner, "i");
    await clock.runFor(500);

    const [hostOutcome, joinerOutcome] = await Promise.all([hostResult, joinerResult]);

    expect(hostOutcome.outcome).toBe("finished");
    expect(hostOutcome.ranking).toEqual({ names: ["alice", "bob"], spot: 0 });
    expect(hostOutcome.record.entries()).toEqual([
      { elapsedMs: 100, input: { kind: "Correct", char: "H" } },
      { elapsedMs: 100, input: { kind: "Correct", char: "i" } },
    ]);

    expect(joinerOutcome.outcome).toBe("finished");
    expect(joinerOutcome.ranking).toEqual({ names: ["alice", "bob"], spot: 1 });
    expect(joinerOutcome.stats.mistakes).toBe(1);

    expect(host.peer.topics).toEqual([]);
    expect(joiner.peer.topics).toEqual([]);
    expect(host.renderer.leave).toHaveBeenCalledTimes(1);
  });

  it("cancels the session for joiners when the host quits the lobby", async () => {
    const { clock, host, joiner } = setupLobby();

    const hostResult = host.race.run();
    await clock.runFor(0);
    const joinerResult = joiner.race.run();
    await clock.runFor(0);

    host.keys.send({ kind: "Quit" });
    await clock.runFor(500);

    const [hostOutcome, joinerOutcome] = await Promise.all([hostResult, joinerResult]);
    expect(hostOutcome.outcome).toBe("cancelled");
    expect(hostOutcome.ranking).toBeUndefined();
    expect(joinerOutcome.outcome).toBe("cancelled");
    expect(joiner.peer.topics).toEqual([]);
  });

  it("lets the remaining peer finish after an opponent forfeits", async () => {
    const { clock, host, joiner } = setupLobby();

    const hostResult = host.race.run();
    await clock.runFor(0);
    const joinerResult = joiner.race.run();
    await clock.runFor(0);
    expect(host.race.requestLock()).toBe(true);
    await clock.runFor(3_000);

    joiner.keys.send({ kind: "Quit" });
    await clock.runFor(0);
    expect(host.race.race?.pool.names()).toEqual([]);

    await clock.runFor(200);
    type(host, "Hi");
    await clock.runFor(500);

    const [hostOutcome, joinerOutcome] = await Promise.all([hostResult, joinerResult]);
    expect(joinerOutcome.outcome).toBe("forfeited");
    expect(hostOutcome.outcome).toBe("finished");
    expect(hostOutcome.ranking).toEqual({ names: ["alice"], spot: 0 });
  });

  it("leaves a joiner who quit the lobby out of the race", async () => {
    const { clock, host, joiner } = setupLobby();

    const hostResult = host.race.run();
    await clock.runFor(0);
    const joinerResult = joiner.race.run();
    await clock.runFor(0);

    joiner.keys.send({ kind: "Quit" });
    await clock.runFor(10_000);
    expect([...host.race.session.roster.values()]).toEqual(["alice"]);

    type(host, "\n");
    await clock.runFor(0);
    await clock.runFor(3_000);
    expect(host.race.race?.pool.names()).toEqual([]);

    type(host, "Hi");
    await clock.runFor(500);

    const [hostOutcome, joinerOutcome] = await Promise.all([hostResult, joinerResult]);
    expect(joinerOutcome.outcome).toBe("cancelled");
    expect(hostOutcome.outcome).toBe("finished");
    expect(hostOutcome.ranking).toEqual({ names: ["alice"], spot: 0 });
  });

  it("aborts when the network goes away", async () => {
    const { clock, host } = setupLobby();

    const hostResult = host.race.run();
    await clock.runFor(0);
    host.peer.disconnect();

    const outcome = await hostResult;
    expect(outcome.outcome).toBe("aborted");
    expect(outcome.error).toBeInstanceOf(TransportClosedError);
    expect(host.renderer.enter).toHaveBeenCalledTimes(1);
    expect(host.renderer.leave).toHaveBeenCalledTimes(1);
  });
});
