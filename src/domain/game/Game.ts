import { TransportClosedError } from "../errors/TransportClosedError.js";
import { type AppEvent, fromKey, fromTick } from "../events/AppEvent.js";
import { EventAggregator } from "../events/EventAggregator.js";
import { startTicker, type TimerSource } from "../events/timers.js";
import { InputRecord } from "../entities/InputRecord.js";
import { PlayerPool } from "../entities/PlayerPool.js";
import { PlayerState } from "../entities/PlayerState.js";
import { computeRanking, type Ranking } from "../entities/Ranking.js";
import {
  createSessionStats,
  sampleStats,
  type SessionStats,
} from "../entities/SessionStats.js";
import type { TargetText } from "../entities/TargetText.js";
import type { Clock } from "../ports/Clock.js";
import type { KeyInput } from "../ports/KeyInput.js";
import type { Logger } from "../ports/Logger.js";
import type { RaceView, Renderer } from "../ports/Renderer.js";
import type { RaceConfig } from "../RaceConfig.js";
import type { SessionOutcome, SessionPhase, TimePoint, Username } from "../typedefs.js";

export interface GameOptions {
  readonly text: TargetText;
  readonly localUser: Username;
  readonly clock: Clock;
  readonly keys: AsyncIterable<KeyInput>;
  readonly renderer: Renderer;
  readonly config: RaceConfig;
  readonly logger?: Logger;
}

/** Terminal artifact of a race, produced once when `run` settles */
export interface SessionResult {
  readonly outcome: SessionOutcome;
  readonly stats: SessionStats;
  /** Present once the race has started */
  readonly ranking?: Ranking;
  readonly record: InputRecord;
  /** Whether the record was persisted, when persistence was requested */
  readonly saved?: boolean;
  /** Transport failure that aborted the session */
  readonly error?: Error;
}

export type ResultExtras = Pick<SessionResult, "saved">;

export interface Race {
  readonly local: PlayerState;
  /** Opponents, remote or replayed */
  readonly pool: PlayerPool;
  readonly startedAt: TimePoint;
}

/**
 * Single control loop of a race.
 *
 * Every state change happens here, driven by events pulled from the
 * aggregator; background tasks only feed channels. Subclasses add their own
 * sources in `setup` and react to the events the base does not handle.
 */
export abstract class Game {
  protected readonly aggregator = new EventAggregator<AppEvent>();
  protected readonly text: TargetText;
  protected readonly localUser: Username;
  protected readonly clock: Clock;
  protected readonly config: RaceConfig;
  protected readonly logger: Logger | undefined;

  readonly #renderer: Renderer;
  readonly #keys: AsyncIterable<KeyInput>;
  #race: Race | undefined;
  #ticker: TimerSource | undefined;
  #stats: SessionStats = createSessionStats();
  #status: string | undefined;
  #running = false;

  constructor({ text, localUser, clock, keys, renderer, config, logger }: GameOptions) {
    this.text = text;
    this.localUser = localUser;
    this.clock = clock;
    this.config = config;
    this.logger = logger;
    this.#renderer = renderer;
    this.#keys = keys;
  }

  get race(): Race | undefined {
    return this.#race;
  }

  get stats(): SessionStats {
    return this.#stats;
  }

  abstract get phase(): SessionPhase;

  async run(): Promise<SessionResult> {
    if (this.#running) {
      throw new Error("Game is already running");
    }
    this.#running = true;

    this.#renderer.enter();
    try {
      this.aggregator.add(this.#keys, fromKey);
      await this.setup();
      this.redraw();

      const outcome = await this.#loop();
      this.#stopTicker();
      const result = this.#snapshot(outcome);
      const extras = await this.finish(outcome);
      return { ...result, ...extras };
    } catch (error) {
      if (!(error instanceof TransportClosedError)) throw error;
      this.logger?.error?.("Network channel closed; session aborted", { error });
      this.#stopTicker();
      return { ...this.#snapshot("aborted"), error };
    } finally {
      this.#stopTicker();
      this.teardown();
      this.#renderer.leave();
    }
  }

  /** Registers the subclass's sources and performs its opening moves */
  protected abstract setup(): Promise<void>;

  /** Handles events the base loop leaves to the subclass */
  protected abstract onEvent(event: AppEvent): Promise<SessionOutcome | undefined>;

  /** The local user asked to quit */
  protected abstract onQuit(): Promise<SessionOutcome>;

  /** A key typed while no race is in progress */
  protected async onIdleKey(_char: string): Promise<SessionOutcome | undefined> {
    return undefined;
  }

  /** Called after every local input the race state machine accepted */
  protected async onLocalInput(_char: string): Promise<void> {}

  /** Runs once the loop decided the outcome, before the result is returned */
  protected async finish(_outcome: SessionOutcome): Promise<ResultExtras> {
    return {};
  }

  /** Releases the subclass's background tasks; runs on every exit path */
  protected teardown(): void {}

  /** Outcome when every source ran dry without the race being decided */
  protected exhausted(): SessionOutcome {
    return "aborted";
  }

  protected isOver(race: Race): boolean {
    return race.local.isDone() && race.pool.areAllDone();
  }

  protected participants(): Username[] {
    return this.#race ? [this.localUser, ...this.#race.pool.names()] : [this.localUser];
  }

  protected startRace(opponents: Iterable<Username>, at: TimePoint): Race {
    if (this.#race) {
      throw new Error("Race already started");
    }

    const now = (): TimePoint => this.clock.now();
    const pool = new PlayerPool(this.text, now).withPlayers(
      [...opponents].filter((name) => name !== this.localUser),
    );
    const race: Race = {
      local: new PlayerState(this.localUser, pool.text, now),
      pool,
      startedAt: at,
    };
    this.#race = race;

    this.#ticker = startTicker(this.clock, this.config.wpmTickIntervalMs);
    this.aggregator.add(this.#ticker.events, fromTick);

    this.logger?.info?.("Race started", { participants: this.participants(), at });
    return race;
  }

  protected checkOver(): SessionOutcome | undefined {
    return this.#race && this.isOver(this.#race) ? "finished" : undefined;
  }

  protected setStatus(status: string): void {
    this.#status = status;
  }

  protected redraw(): void {
    this.#renderer.draw(this.view());
  }

  protected view(): RaceView {
    return {
      text: this.text,
      phase: this.phase,
      local: this.#race?.local,
      opponents: this.#race?.pool.cursorCoordinates() ?? [],
      stats: this.#stats,
      participants: this.participants(),
      ...(this.#race ? { startAt: this.#race.startedAt } : {}),
      ...(this.#status === undefined ? {} : { status: this.#status }),
    };
  }

  async #loop(): Promise<SessionOutcome> {
    for (;;) {
      let next: IteratorResult<AppEvent>;
      try {
        next = await this.aggregator.next();
      } catch (error) {
        if (error instanceof TransportClosedError) throw error;
        this.logger?.error?.("Event source failed and was dropped", { error });
        continue;
      }

      if (next.done) return this.exhausted();

      const outcome = await this.#handle(next.value);
      if (outcome !== undefined) return outcome;
      this.redraw();
    }
  }

  async #handle(event: AppEvent): Promise<SessionOutcome | undefined> {
    switch (event.type) {
      case "WpmTick":
        if (this.#race) {
          this.#stats = sampleStats(this.#stats, this.#race.local.recorder, this.config);
        }
        return undefined;

      case "Ghost": {
        const outcome = this.#race?.pool.advance(event.player);
        if (outcome && !outcome.ok) {
          this.logger?.debug?.("Ghost input ignored", { error: outcome.error });
        }
        return this.checkOver();
      }

      case "Key":
        if (event.key.kind === "Quit") return this.onQuit();
        if (this.#race && !this.#race.local.isDone()) {
          return this.#typeLocal(this.#race, event.key.char);
        }
        return this.onIdleKey(event.key.char);

      default:
        return this.onEvent(event);
    }
  }

  async #typeLocal(race: Race, char: string): Promise<SessionOutcome | undefined> {
    const outcome = race.local.processInput(char);
    if (!outcome.ok) {
      this.logger?.debug?.("Local input ignored", { error: outcome.error });
      return undefined;
    }

    await this.onLocalInput(char);
    return this.checkOver();
  }

  #snapshot(outcome: SessionOutcome): SessionResult {
    const race = this.#race;
    if (!race) {
      return { outcome, stats: this.#stats, record: new InputRecord() };
    }

    const sampled = sampleStats(this.#stats, race.local.recorder, this.config);
    const { wpmWindowMs, topWpmStepMs } = this.config;
    // ticks only sample the record; the top comes from a full scan
    this.#stats = {
      ...sampled,
      topWpm: Math.max(sampled.topWpm, race.local.record.topWpm(wpmWindowMs, topWpmStepMs)),
    };
    return {
      outcome,
      stats: this.#stats,
      ranking: computeRanking([race.local, ...race.pool.players()], this.localUser),
      record: race.local.record,
    };
  }

  #stopTicker(): void {
    this.#ticker?.stop();
    this.#ticker = undefined;
  }
}
