import { RaceConfigError } from "./errors/RaceConfigError.js";

export interface RaceConfig {
  /** Delay between the host locking registrations and the shared start time */
  readonly lockDelayMs: number;
  /** Pause before leaving so the last outbound publish can drain */
  readonly shutdownGraceMs: number;
  /** Period of the WPM sampling timer */
  readonly wpmTickIntervalMs: number;
  /** Sliding window used for the current WPM figure */
  readonly wpmWindowMs: number;
  /** Sampling step used when computing the top WPM of a record */
  readonly topWpmStepMs: number;
  /** How long a push from an unknown peer is kept waiting for attribution */
  readonly pendingPushTtlMs: number;
  /** Upper bound on buffered unattributed pushes */
  readonly maxPendingPushes: number;
  /** Number of hex characters of the text digest used as a record key */
  readonly recordKeyLength: number;
  /** How long a discovery lookup waits on remote peers */
  readonly recordLookupTimeoutMs: number;
}

export type RaceConfigOverrides = Partial<RaceConfig>;

export function createRaceConfig(overrides: RaceConfigOverrides = {}): RaceConfig {
  const config: RaceConfig = {
    lockDelayMs: overrides.lockDelayMs ?? 3_000,
    shutdownGraceMs: overrides.shutdownGraceMs ?? 500,
    wpmTickIntervalMs: overrides.wpmTickIntervalMs ?? 1_000,
    wpmWindowMs: overrides.wpmWindowMs ?? 4_000,
    topWpmStepMs: overrides.topWpmStepMs ?? 1_000,
    pendingPushTtlMs: overrides.pendingPushTtlMs ?? 5_000,
    maxPendingPushes: overrides.maxPendingPushes ?? 256,
    recordKeyLength: overrides.recordKeyLength ?? 10,
    recordLookupTimeoutMs: overrides.recordLookupTimeoutMs ?? 2_000,
  };

  const issues: string[] = [];
  if (config.lockDelayMs < 0) issues.push("lockDelayMs must be non-negative");
  if (config.shutdownGraceMs < 0) issues.push("shutdownGraceMs must be non-negative");
  if (config.wpmTickIntervalMs <= 0) issues.push("wpmTickIntervalMs must be positive");
  if (config.wpmWindowMs <= 0) issues.push("wpmWindowMs must be positive");
  if (config.topWpmStepMs <= 0) issues.push("topWpmStepMs must be positive");
  if (config.pendingPushTtlMs < 0) issues.push("pendingPushTtlMs must be non-negative");
  if (!Number.isInteger(config.maxPendingPushes) || config.maxPendingPushes < 0) {
    issues.push("maxPendingPushes must be a non-negative integer");
  }
  if (
    !Number.isInteger(config.recordKeyLength) ||
    config.recordKeyLength < 1 ||
    config.recordKeyLength > 64
  ) {
    issues.push("recordKeyLength must be an integer between 1 and 64");
  }
  if (config.recordLookupTimeoutMs < 0) {
    issues.push("recordLookupTimeoutMs must be non-negative");
  }

  if (issues.length > 0) {
    throw RaceConfigError.because(issues);
  }

  return config;
}
