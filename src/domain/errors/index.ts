export { CursorOutOfBoundsError } from "./CursorOutOfBoundsError.js";
export { InvalidSessionPhaseError } from "./InvalidSessionPhaseError.js";
export { PlayerAlreadyFinishedError } from "./PlayerAlreadyFinishedError.js";
export { PlayerNotFoundError } from "./PlayerNotFoundError.js";
export { ProtocolError } from "./ProtocolError.js";
export { RaceConfigError } from "./RaceConfigError.js";
export { RecordStoreError } from "./RecordStoreError.js";
export { SessionNotFoundError } from "./SessionNotFoundError.js";
export { SessionNotJoinedError } from "./SessionNotJoinedError.js";
export { TransportClosedError } from "./TransportClosedError.js";
