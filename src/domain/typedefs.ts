/**
 * Core domain typedefs used throughout the race.
 * These are simple aliases; identities travel over the wire as plain strings.
 */

/** Opaque per-process network identity of a peer */
export type PeerId = string;

/** Name a participant races under, unique within one session */
export type Username = string;

/** Identifier of a session, also used as its pub/sub topic */
export type SessionId = string;

/** Named pub/sub channel */
export type Topic = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Duration in milliseconds */
export type Millis = number;

/** Participant role within an online session */
export type SessionRole = "host" | "joiner";

/** Protocol phase of one peer's session */
export type SessionPhase =
  | "TakingRegistrations"
  | "AwaitingRoster"
  | "AwaitingStart"
  | "Racing"
  | "Ended";

/** Terminal outcome of a race from the local participant's point of view */
export type SessionOutcome =
  | "finished"
  | "forfeited"
  | "aborted"
  | "cancelled"
  | "rejected";

/** How a finished practice run replaces the stored record for its text */
export type SavePolicy = "best" | "override";
