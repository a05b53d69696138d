import { RecordStoreError } from "../errors/RecordStoreError.js";
import { type AppEvent, fromGhost } from "../events/AppEvent.js";
import { Ghost } from "../events/Ghost.js";
import type { InputRecord } from "../entities/InputRecord.js";
import type { RecordStore } from "../ports/RecordStore.js";
import type { SavePolicy, SessionOutcome, SessionPhase, Username } from "../typedefs.js";
import { Game, type GameOptions, type Race, type ResultExtras } from "./Game.js";

export interface PracticeRaceOptions extends GameOptions {
  /** Past performance replayed as an opponent */
  readonly ghost?: InputRecord;
  readonly ghostName?: Username;
  readonly store?: RecordStore;
  /** Persist the local record on completion under this policy */
  readonly savePolicy?: SavePolicy;
}

/**
 * Offline race, optionally against a ghost of an earlier run. Starts at
 * once and ends as soon as the local participant completes the text.
 */
export class PracticeRace extends Game {
  readonly #ghost: Ghost | undefined;
  readonly #store: RecordStore | undefined;
  readonly #savePolicy: SavePolicy | undefined;
  #ended = false;

  constructor(options: PracticeRaceOptions) {
    super(options);
    this.#store = options.store;
    this.#savePolicy = options.savePolicy;

    if (options.ghost) {
      const requested = options.ghostName ?? "ghost";
      const name = requested === options.localUser ? `${requested} (ghost)` : requested;
      this.#ghost = new Ghost(name, options.ghost, options.clock, options.logger);
    }
  }

  get phase(): SessionPhase {
    if (this.#ended) return "Ended";
    return this.race ? "Racing" : "AwaitingStart";
  }

  protected async setup(): Promise<void> {
    const now = this.clock.now();
    const ghost = this.#ghost;

    this.startRace(ghost ? [ghost.name] : [], now);
    if (ghost) {
      this.aggregator.add(ghost.events, fromGhost(ghost.name));
      ghost.start(now);
    }
  }

  protected async onEvent(_event: AppEvent): Promise<SessionOutcome | undefined> {
    return undefined;
  }

  protected async onQuit(): Promise<SessionOutcome> {
    return "forfeited";
  }

  protected override isOver(race: Race): boolean {
    return race.local.isDone();
  }

  protected override exhausted(): SessionOutcome {
    return this.race?.local.isDone() ? "finished" : "aborted";
  }

  protected override async finish(outcome: SessionOutcome): Promise<ResultExtras> {
    this.#ended = true;
    this.teardown();

    const race = this.race;
    if (outcome !== "finished" || !race || !this.#store || !this.#savePolicy) {
      return {};
    }

    try {
      const saved = await this.#store.save(this.text, race.local.record, this.#savePolicy);
      this.logger?.info?.("Record saved", { saved, policy: this.#savePolicy });
      return { saved };
    } catch (error) {
      if (!(error instanceof RecordStoreError)) throw error;
      this.logger?.error?.("Failed to save record", { error });
      return { saved: false };
    }
  }

  protected override teardown(): void {
    this.#ghost?.stop();
  }
}
