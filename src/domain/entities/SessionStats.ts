import type { RaceConfig } from "../RaceConfig.js";
import type { InputRecorder } from "./InputRecord.js";

/** Running figures shown during and after a race */
export interface SessionStats {
  /** `[seconds since start, window WPM]` samples, one per tick */
  readonly wpmSeries: ReadonlyArray<readonly [number, number]>;
  readonly currentWpm: number;
  readonly averageWpm: number;
  readonly topWpm: number;
  readonly precision: number;
  readonly mistakes: number;
}

export function createSessionStats(): SessionStats {
  return {
    wpmSeries: [],
    currentWpm: 0,
    averageWpm: 0,
    topWpm: 0,
    precision: 0,
    mistakes: 0,
  };
}

export function sampleStats(
  stats: SessionStats,
  recorder: InputRecorder,
  config: Pick<RaceConfig, "wpmWindowMs">,
): SessionStats {
  const { record } = recorder;
  const elapsed = recorder.elapsed();
  const currentWpm = record.wpmAt(config.wpmWindowMs, elapsed);

  return {
    wpmSeries: [...stats.wpmSeries, [elapsed / 1000, currentWpm]],
    currentWpm,
    averageWpm: record.averageWpm(),
    topWpm: Math.max(stats.topWpm, currentWpm),
    precision: record.precision(),
    mistakes: record.countWrong(),
  };
}

export function formatStats(stats: SessionStats): string {
  return [
    `Current WPM: ${stats.currentWpm.toFixed(2)}`,
    `Average WPM: ${stats.averageWpm.toFixed(2)}`,
    `Top WPM: ${stats.topWpm.toFixed(2)}`,
    `Precision: ${(stats.precision * 100).toFixed(1)}%`,
    `Mistakes: ${stats.mistakes}`,
  ].join("\n");
}
