/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { InvalidSessionPhaseError } from "../errors/InvalidSessionPhaseError.js";
import { ProtocolError } from "../errors/ProtocolError.js";
import type { Logger } from "../ports/Logger.js";
import { decodeRaceMessage } from "../protocol/RaceMessage.js";
import type { SessionCommand } from "../protocol/SessionCommand.js";
import type { RaceConfig } from "../RaceConfig.js";
import type {
  PeerId,
  SessionPhase,
  SessionRole,
  TimePoint,
  Username,
} from "../typedefs.js";

/** What the control loop has to act on after feeding the session */
export type SessionUpdate =
  | { readonly kind: "Registered"; readonly peer: PeerId; readonly user: Username }
  | {
      readonly kind: "Locked";
      readonly roster: ReadonlyMap<PeerId, Username>;
      readonly startAt: TimePoint;
    }
  | {
      readonly kind: "Input";
      readonly peer: PeerId;
      readonly user: Username;
      readonly char: string;
    }
  | { readonly kind: "Forfeit"; readonly peer: PeerId; readonly user: Username }
  | { readonly kind: "Cancelled" }
  | { readonly kind: "Rejected" };

export interface LockPlan {
  readonly registeredUsers: Readonly<Record<PeerId, Username>>;
  readonly startAt: TimePoint;
  /** `startAt` as broadcast on the wire */
  readonly sessionStart: string;
}

export interface RaceSessionOptions {
  readonly role: SessionRole;
  readonly localPeer: PeerId;
  readonly localUser: Username;
  readonly config: Pick<RaceConfig, "lockDelayMs" | "pendingPushTtlMs" | "maxPendingPushes">;
  readonly logger?: Logger;
}

interface PendingPush {
  readonly source: PeerId;
  readonly payload: Uint8Array;
  readonly receivedAt: TimePoint;
}

/**
 * Per-peer protocol state of one race: registration, roster lock, the shared
 * start instant and attribution of in-race pushes.
 *
 * Pure with respect to I/O. Inbound commands go through {@link handle}; what
 * has to be published in response is decided by the caller.
 */
export class RaceSession {
  readonly role: SessionRole;
  readonly localPeer: PeerId;
  readonly localUser: Username;
  readonly #config: RaceSessionOptions["config"];
  readonly #logger: Logger | undefined;

  #phase: SessionPhase;
  #roster = new Map<PeerId, Username>();
  #startAt: TimePoint | undefined;
  #pending: PendingPush[] = [];

  constructor({ role, localPeer, localUser, config, logger }: RaceSessionOptions) {
    this.role = role;
    this.localPeer = localPeer;
    this.localUser = localUser;
    this.#config = config;
    this.#logger = logger;

    if (role === "host") {
      this.#phase = "TakingRegistrations";
      this.#roster.set(localPeer, localUser);
    } else {
      this.#phase = "AwaitingRoster";
    }
  }

  get phase(): SessionPhase {
    return this.#phase;
  }

  get startAt(): TimePoint | undefined {
    return this.#startAt;
  }

  get roster(): ReadonlyMap<PeerId, Username> {
    return this.#roster;
  }

  get pendingPushes(): number {
    return this.#pending.length;
  }

  /** Usernames of every participant other than the local one */
  opponents(): Username[] {
    return [...this.#roster]
      .filter(([peer]) => peer !== this.localPeer)
      .map(([, user]) => user);
  }

  register(peer: PeerId, user: Username): SessionUpdate[] {
    if (this.role !== "host" || this.#phase !== "TakingRegistrations") {
      this.#logger?.debug?.("Registration ignored outside of the lobby", {
        peer,
        user,
        phase: this.#phase,
      });
      return [];
    }

    const existing = this.#roster.get(peer);
    if (existing !== undefined) {
      this.#logger?.debug?.("Registration ignored; peer already registered", {
        peer,
        user,
        registeredAs: existing,
      });
      return [];
    }

    if ([...this.#roster.values()].includes(user)) {
      this.#logger?.warn?.("Registration rejected; username already taken", { peer, user });
      return [];
    }

    this.#roster.set(peer, user);
    this.#logger?.info?.("Participant registered", { peer, user });
    return [{ kind: "Registered", peer, user }];
  }

  lock(now: TimePoint): LockPlan {
    if (this.role !== "host" || this.#phase !== "TakingRegistrations") {
      throw new InvalidSessionPhaseError("lock the session", this.#phase);
    }

    const startAt = now + this.#config.lockDelayMs;
    this.#startAt = startAt;
    this.#phase = "AwaitingStart";

    return {
      registeredUsers: Object.fromEntries(this.#roster),
      startAt,
      sessionStart: new Date(startAt).toISOString(),
    };
  }

  handle(source: PeerId, command: SessionCommand, now: TimePoint): SessionUpdate[] {
    switch (command.type) {
      case "Register":
        return this.register(source, command.user);
      case "LockSession":
        return this.#acceptLock(source, command.registeredUsers, command.sessionStart);
      case "Push":
        return this.#push(source, command.payload, now);
      case "EndSession":
        return this.#endFromRemote(source);
    }
  }

  start(now: TimePoint): SessionUpdate[] {
    if (this.#phase !== "AwaitingStart") {
      throw new InvalidSessionPhaseError("start the race", this.#phase);
    }
    this.#phase = "Racing";

    const pending = this.#prune(now);
    this.#pending = [];

    return pending.flatMap(({ source, payload }) => {
      if (!this.#roster.has(source)) {
        this.#logger?.warn?.("Dropping push from a peer outside of the roster", { source });
        return [];
      }
      return this.#attribute(source, payload);
    });
  }

  end(): void {
    this.#phase = "Ended";
    this.#pending = [];
  }

  #acceptLock(
    source: PeerId,
    registeredUsers: Readonly<Record<PeerId, Username>>,
    sessionStart: string,
  ): SessionUpdate[] {
    if (this.role !== "joiner" || this.#phase !== "AwaitingRoster") {
      this.#logger?.debug?.("Lock ignored", { source, phase: this.#phase });
      return [];
    }

    const startAt = Date.parse(sessionStart);
    if (Number.isNaN(startAt)) {
      this.#logger?.warn?.("Protocol error; message dropped", {
        source,
        error: ProtocolError.because([`Invalid session start time: ${sessionStart}`]),
      });
      return [];
    }

    const roster = new Map(Object.entries(registeredUsers));
    if (!roster.has(this.localPeer)) {
      this.end();
      this.#logger?.warn?.("Local peer is missing from the locked roster", { source });
      return [{ kind: "Rejected" }];
    }

    this.#roster = roster;
    this.#startAt = startAt;
    this.#phase = "AwaitingStart";
    this.#logger?.info?.("Session locked", { source, participants: roster.size, startAt });
    return [{ kind: "Locked", roster, startAt }];
  }

  #push(source: PeerId, payload: Uint8Array, now: TimePoint): SessionUpdate[] {
    if (this.#phase === "Ended" || source === this.localPeer) {
      return [];
    }

    if (this.#phase === "Racing") {
      if (!this.#roster.has(source)) {
        this.#logger?.warn?.("Dropping push from a peer outside of the roster", { source });
        return [];
      }
      return this.#attribute(source, payload);
    }

    if (this.#roster.has(source) && this.#isForfeit(payload)) {
      this.#pending = this.#pending.filter((pending) => pending.source !== source);
      return this.#attribute(source, payload);
    }

    this.#pending = this.#prune(now);
    this.#pending.push({ source, payload, receivedAt: now });
    while (this.#pending.length > this.#config.maxPendingPushes) {
      const dropped = this.#pending.shift();
      this.#logger?.warn?.("Pending push buffer full; dropping oldest", {
        source: dropped?.source,
      });
    }
    return [];
  }

  /** Pushes from roster members wait for the start; the deadline only applies to unknown peers. */
  #prune(now: TimePoint): PendingPush[] {
    const fresh = this.#pending.filter(
      ({ source, receivedAt }) =>
        this.#roster.has(source) || now - receivedAt <= this.#config.pendingPushTtlMs,
    );
    if (fresh.length < this.#pending.length) {
      this.#logger?.warn?.("Dropping unattributed pushes past their deadline", {
        dropped: this.#pending.length - fresh.length,
      });
    }
    return fresh;
  }

  #isForfeit(payload: Uint8Array): boolean {
    try {
      return decodeRaceMessage(payload).type === "Forfeit";
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      return false;
    }
  }

  #attribute(source: PeerId, payload: Uint8Array): SessionUpdate[] {
    const user = this.#roster.get(source);
    if (user === undefined) return [];

    try {
      const message = decodeRaceMessage(payload);
      if (message.type === "Forfeit") {
        this.#roster.delete(source);
        this.#logger?.info?.("Participant forfeited", { peer: source, user });
        return [{ kind: "Forfeit", peer: source, user }];
      }
      return [{ kind: "Input", peer: source, user, char: message.char }];
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.#logger?.warn?.("Protocol error; message dropped", { source, error });
      return [];
    }
  }

  #endFromRemote(source: PeerId): SessionUpdate[] {
    if (
      this.role === "joiner" &&
      (this.#phase === "AwaitingRoster" || this.#phase === "AwaitingStart")
    ) {
      this.end();
      this.#logger?.info?.("Session cancelled by host", { source });
      return [{ kind: "Cancelled" }];
    }

    this.#logger?.debug?.("End of session ignored", { source, phase: this.#phase });
    return [];
  }
}
