export type { Command, CommandContext } from "@keyduel/core/domain/commands/Command.js";
export {
  dispatchCommand,
  type DispatchCommand,
} from "@keyduel/core/domain/commands/dispatchCommand.js";
export { JoinSession } from "@keyduel/core/domain/commands/JoinSession.js";
export { decodeInputRecord, encodeInputRecord } from "@keyduel/core/domain/entities/InputRecordCodec.js";
export { InputRecord } from "@keyduel/core/domain/entities/InputRecord.js";
export type { CursorMarker } from "@keyduel/core/domain/entities/PlayerPool.js";
export type { InputResult } from "@keyduel/core/domain/entities/PlayerState.js";
export type { Ranking } from "@keyduel/core/domain/entities/Ranking.js";
export { formatStats } from "@keyduel/core/domain/entities/SessionStats.js";
export { TargetText } from "@keyduel/core/domain/entities/TargetText.js";
export {
  ProtocolError,
  RaceConfigError,
  RecordStoreError,
  SessionNotFoundError,
  TransportClosedError,
} from "@keyduel/core/domain/errors/index.js";
export { Channel } from "@keyduel/core/domain/events/Channel.js";
export type { GameOptions, SessionResult } from "@keyduel/core/domain/game/Game.js";
export { OnlineRace } from "@keyduel/core/domain/game/OnlineRace.js";
export { PracticeRace } from "@keyduel/core/domain/game/PracticeRace.js";
export type { Clock } from "@keyduel/core/domain/ports/Clock.js";
export type { KeyInput } from "@keyduel/core/domain/ports/KeyInput.js";
export type { Logger } from "@keyduel/core/domain/ports/Logger.js";
export type {
  NetworkMessage,
  NetworkService,
} from "@keyduel/core/domain/ports/NetworkService.js";
export type { RecordStore } from "@keyduel/core/domain/ports/RecordStore.js";
export type { RaceView, Renderer } from "@keyduel/core/domain/ports/Renderer.js";
export {
  decodeSessionMetadata,
  type SessionMetadata,
} from "@keyduel/core/domain/protocol/SessionData.js";
export { decodeJson, toBase64 } from "@keyduel/core/domain/protocol/wire.js";
export { createRaceConfig, type RaceConfig } from "@keyduel/core/domain/RaceConfig.js";
export { SessionClient } from "@keyduel/core/domain/session/SessionClient.js";
export type {
  Millis,
  PeerId,
  SavePolicy,
  SessionId,
  TimePoint,
  Topic,
  Username,
} from "@keyduel/core/domain/typedefs.js";
