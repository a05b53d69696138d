import type { Command } from "../commands/Command.js";
import { dispatchCommand, type DispatchCommand } from "../commands/dispatchCommand.js";
import { EndSession } from "../commands/EndSession.js";
import { Forfeit } from "../commands/Forfeit.js";
import { HostSession } from "../commands/HostSession.js";
import { JoinSession } from "../commands/JoinSession.js";
import { LeaveSession } from "../commands/LeaveSession.js";
import { LockSession } from "../commands/LockSession.js";
import { PushInput } from "../commands/PushInput.js";
import { ProtocolError } from "../errors/ProtocolError.js";
import {
  type AppEvent,
  fromLockRequest,
  fromNetwork,
  fromRaceStart,
} from "../events/AppEvent.js";
import { Channel } from "../events/Channel.js";
import { startTimer, type TimerSource } from "../events/timers.js";
import type { NetworkMessage } from "../ports/NetworkService.js";
import { encodeSessionMetadata } from "../protocol/SessionData.js";
import { RaceSession, type SessionUpdate } from "../session/RaceSession.js";
import type { InboundCommand, SessionClient } from "../session/SessionClient.js";
import type {
  SessionId,
  SessionOutcome,
  SessionPhase,
  SessionRole,
  TimePoint,
  Username,
} from "../typedefs.js";
import { Game, type GameOptions, type ResultExtras } from "./Game.js";

export interface OnlineRaceOptions extends GameOptions {
  readonly sessions: SessionClient;
  readonly role: SessionRole;
  /** Name the session is advertised under */
  readonly host: string;
  readonly sessionId: SessionId;
  /** Syntax hint published with the text by a host */
  readonly syntax?: string;
  readonly dispatch?: DispatchCommand;
}

/**
 * A race against remote peers over the session protocol.
 *
 * The host collects registrations until the local operator locks the
 * session (Enter in the lobby, or {@link requestLock}); both roles then wait
 * for the broadcast start instant and relay every keystroke as a push.
 */
export class OnlineRace extends Game {
  readonly role: SessionRole;
  readonly host: string;
  readonly sessionId: SessionId;
  readonly #sessions: SessionClient;
  readonly #session: RaceSession;
  readonly #syntax: string | undefined;
  readonly #dispatch: DispatchCommand;
  readonly #lockRequests = new Channel<void>();
  #startTimer: TimerSource | undefined;
  #endAnnounced = false;

  constructor(options: OnlineRaceOptions) {
    super(options);
    this.role = options.role;
    this.host = options.host;
    this.sessionId = options.sessionId;
    this.#sessions = options.sessions;
    this.#syntax = options.syntax;
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#session = new RaceSession({
      role: options.role,
      localPeer: options.sessions.peerId,
      localUser: options.localUser,
      config: options.config,
      logger: options.logger,
    });
  }

  get phase(): SessionPhase {
    return this.#session.phase;
  }

  get session(): RaceSession {
    return this.#session;
  }

  /** Asks the control loop to lock the lobby; hosts only */
  requestLock(): boolean {
    return this.role === "host" && this.#lockRequests.send(undefined);
  }

  protected async setup(): Promise<void> {
    this.aggregator.add(this.#sessions.messages(), fromNetwork);
    const now = this.clock.now();

    if (this.role === "host") {
      this.aggregator.add(this.#lockRequests, fromLockRequest);
      const metadata = encodeSessionMetadata({ text: this.text.content, syntax: this.#syntax });
      await this.#run(new HostSession(this.host, { sessionId: this.sessionId, metadata }, now));
      this.setStatus("Waiting for participants; press Enter to start");
    } else {
      this.#lockRequests.close();
      await this.#run(new JoinSession(this.sessionId, this.localUser, now));
      this.setStatus(`Joined ${this.host}; waiting for the host to start`);
    }
  }

  protected override participants(): Username[] {
    if (this.race) return super.participants();
    return [...this.#session.roster.values()];
  }

  protected async onEvent(event: AppEvent): Promise<SessionOutcome | undefined> {
    switch (event.type) {
      case "Network":
        return this.#onNetwork(event.message);
      case "Lock":
        await this.#lock();
        return undefined;
      case "RaceStart":
        return this.#onRaceStart(event.at);
      default:
        return undefined;
    }
  }

  protected override async onIdleKey(char: string): Promise<SessionOutcome | undefined> {
    if (char === "\n" && this.role === "host" && this.phase === "TakingRegistrations") {
      await this.#lock();
    }
    return undefined;
  }

  protected override async onLocalInput(char: string): Promise<void> {
    await this.#run(new PushInput(char, this.clock.now()));
  }

  protected async onQuit(): Promise<SessionOutcome> {
    const now = this.clock.now();

    if (this.role === "host" && this.phase === "TakingRegistrations") {
      await this.#run(new EndSession(this.host, now));
      this.#endAnnounced = true;
      return "cancelled";
    }

    await this.#run(new Forfeit(now));
    return this.race ? "forfeited" : "cancelled";
  }

  protected override async finish(outcome: SessionOutcome): Promise<ResultExtras> {
    this.#session.end();
    this.teardown();

    if (outcome !== "aborted" && !this.#endAnnounced) {
      // let the last publish leave the outbound queue
      await this.clock.sleep(this.config.shutdownGraceMs);
      await this.#run(
        new LeaveSession(this.role === "host" ? this.host : undefined, this.clock.now()),
      );
    }
    return {};
  }

  protected override teardown(): void {
    this.#startTimer?.stop();
    this.#lockRequests.close();
  }

  async #onNetwork(message: NetworkMessage): Promise<SessionOutcome | undefined> {
    let inbound: InboundCommand | undefined;
    try {
      inbound = this.#sessions.decode(message);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.logger?.warn?.("Protocol error; message dropped", { source: message.source, error });
      return undefined;
    }
    if (!inbound) return undefined;

    const updates = this.#session.handle(inbound.source, inbound.command, this.clock.now());
    return this.#apply(updates);
  }

  async #lock(): Promise<void> {
    if (this.role !== "host" || this.phase !== "TakingRegistrations") return;

    const now = this.clock.now();
    const plan = this.#session.lock(now);
    await this.#run(new LockSession(plan.registeredUsers, plan.sessionStart, now));
    this.#scheduleStart(plan.startAt);
  }

  #onRaceStart(at: TimePoint): SessionOutcome | undefined {
    const updates = this.#session.start(at);
    this.startRace(this.#session.opponents(), at);
    this.setStatus("Go!");
    return this.#apply(updates);
  }

  #scheduleStart(startAt: TimePoint): void {
    this.#startTimer = startTimer(this.clock, startAt);
    this.aggregator.add(this.#startTimer.events, fromRaceStart);
    this.setStatus(`Race starts at ${new Date(startAt).toISOString()}`);
  }

  #apply(updates: readonly SessionUpdate[]): SessionOutcome | undefined {
    for (const update of updates) {
      switch (update.kind) {
        case "Registered":
          this.setStatus(`${update.user} joined`);
          break;
        case "Locked":
          this.#scheduleStart(update.startAt);
          break;
        case "Input": {
          const outcome = this.race?.pool.processInput(update.user, update.char);
          if (outcome && !outcome.ok) {
            this.logger?.debug?.("Remote input ignored", {
              peer: update.peer,
              error: outcome.error,
            });
          }
          break;
        }
        case "Forfeit":
          this.race?.pool.remove(update.user);
          this.setStatus(`${update.user} forfeited`);
          break;
        case "Cancelled":
          return "cancelled";
        case "Rejected":
          return "rejected";
      }
    }
    return this.checkOver();
  }

  async #run(command: Command): Promise<void> {
    await this.#dispatch(command, { sessions: this.#sessions, logger: this.logger });
  }
}
